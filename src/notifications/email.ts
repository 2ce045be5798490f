/**
 * Email Notification Delivery - Resend and SendGrid HTTP API integration
 *
 * Sends emails via HTTP APIs (no SMTP dependencies). Resend is the default
 * provider; SendGrid is selected with EMAIL_PROVIDER=sendgrid.
 */

import { createLogger } from '../utils/logger';
import type { AppConfig } from '../utils/config';
import type { AnalysisReport } from '../analytics/report';
import {
  renderEanDropEmail,
  renderFailureEmail,
  renderPriceAlertEmail,
  renderReportEmail,
  type TemplateOptions,
} from './email-templates';
import type { EanDropNotice, Notifier, PriceChangeNotice, RenderedEmail, ScrapeFailureReport } from './types';

const logger = createLogger('email-delivery');

const RESEND_URL = 'https://api.resend.com/emails';
const SENDGRID_URL = 'https://api.sendgrid.com/v3/mail/send';

// =============================================================================
// TYPES
// =============================================================================

export type EmailProvider = 'resend' | 'sendgrid';

export interface EmailConfig {
  provider: EmailProvider;
  apiKey: string;
  /** `Name <address>` or a bare address */
  from: string;
  timeoutMs?: number;
}

export interface EmailParams {
  to: string[];
  subject: string;
  html: string;
}

export interface EmailResult {
  success: boolean;
  provider: EmailProvider;
  messageId?: string;
  error?: string;
}

/** Split `Name <address>` into its parts. */
export function parseAddress(value: string): { email: string; name?: string } {
  const match = /^\s*(.*?)\s*<([^>]+)>\s*$/.exec(value);
  if (!match) return { email: value.trim() };
  return match[1] ? { email: match[2].trim(), name: match[1] } : { email: match[2].trim() };
}

/** Comma- or semicolon-separated recipient list. */
export function parseRecipients(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readMessageId(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') {
    return data.id;
  }
  return undefined;
}

// =============================================================================
// RESEND
// =============================================================================

async function sendViaResend(config: EmailConfig, params: EmailParams): Promise<EmailResult> {
  const { apiKey, from } = config;
  const { to, subject, html } = params;

  try {
    const response = await fetch(RESEND_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ from, to, subject, html }),
      signal: AbortSignal.timeout(config.timeoutMs ?? 30_000),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      logger.warn({ status: response.status, recipients: to.length }, 'Resend delivery failed');
      return { success: false, provider: 'resend', error: `HTTP ${response.status}: ${errorText.slice(0, 500)}` };
    }

    const data: unknown = await response.json().catch(() => null);
    const messageId = readMessageId(data);
    logger.info({ recipients: to.length, messageId }, 'Email sent via Resend');
    return { success: true, provider: 'resend', messageId };
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err);
    logger.error({ err }, 'Resend delivery error');
    return { success: false, provider: 'resend', error: errorMsg };
  }
}

// =============================================================================
// SENDGRID
// =============================================================================

async function sendViaSendGrid(config: EmailConfig, params: EmailParams): Promise<EmailResult> {
  const { apiKey } = config;
  const { to, subject, html } = params;

  const body = {
    personalizations: [{ to: to.map((email) => ({ email })) }],
    from: parseAddress(config.from),
    subject,
    content: [{ type: 'text/html', value: html }],
  };

  try {
    const response = await fetch(SENDGRID_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(config.timeoutMs ?? 30_000),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      logger.warn({ status: response.status, recipients: to.length }, 'SendGrid delivery failed');
      return { success: false, provider: 'sendgrid', error: `HTTP ${response.status}: ${errorText.slice(0, 500)}` };
    }

    const messageId = response.headers.get('x-message-id') ?? undefined;
    logger.info({ recipients: to.length, messageId }, 'Email sent via SendGrid');
    return { success: true, provider: 'sendgrid', messageId };
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err);
    logger.error({ err }, 'SendGrid delivery error');
    return { success: false, provider: 'sendgrid', error: errorMsg };
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Send an email using the configured provider.
 */
export async function sendEmail(config: EmailConfig, params: EmailParams): Promise<EmailResult> {
  if (!config.apiKey) {
    return { success: false, provider: config.provider, error: 'API key is required' };
  }
  if (!config.from) {
    return { success: false, provider: config.provider, error: 'From address is required' };
  }
  if (params.to.length === 0) {
    return { success: false, provider: config.provider, error: 'Recipient email is required' };
  }
  if (!params.subject) {
    return { success: false, provider: config.provider, error: 'Subject is required' };
  }
  if (!params.html) {
    return { success: false, provider: config.provider, error: 'HTML body is required' };
  }

  switch (config.provider) {
    case 'resend':
      return sendViaResend(config, params);
    case 'sendgrid':
      return sendViaSendGrid(config, params);
  }
}

// =============================================================================
// NOTIFIER
// =============================================================================

export class EmailNotifier implements Notifier {
  readonly name = 'email';
  private readonly config: EmailConfig;
  private readonly to: string[];
  private readonly templates: TemplateOptions;

  constructor(config: EmailConfig, to: string[], templates: TemplateOptions = {}) {
    this.config = config;
    this.to = to;
    this.templates = templates;
  }

  /**
   * Build from the app config. Returns null when no API key or recipient is
   * configured.
   */
  static fromAppConfig(config: AppConfig): EmailNotifier | null {
    const to = parseRecipients(config.email.to);
    if (!config.email.apiKey || to.length === 0) return null;
    return new EmailNotifier(
      { provider: config.email.provider, apiKey: config.email.apiKey, from: config.email.from, timeoutMs: config.requestTimeoutMs },
      to,
      { currency: config.currency }
    );
  }

  private async deliver(email: RenderedEmail): Promise<boolean> {
    const result = await sendEmail(this.config, { to: this.to, ...email });
    if (!result.success) {
      logger.error({ provider: result.provider, error: result.error, subject: email.subject }, 'Email notification not delivered');
    }
    return result.success;
  }

  async notifyPriceChanges(notices: PriceChangeNotice[]): Promise<boolean> {
    if (notices.length === 0) return true;
    return this.deliver(renderPriceAlertEmail(notices, this.templates));
  }

  async notifyEanPriceDrops(notices: EanDropNotice[]): Promise<boolean> {
    if (notices.length === 0) return true;
    return this.deliver(renderEanDropEmail(notices, this.templates));
  }

  async notifyScrapeFailure(report: ScrapeFailureReport): Promise<boolean> {
    return this.deliver(renderFailureEmail(report));
  }

  async sendReport(report: AnalysisReport | null): Promise<boolean> {
    return this.deliver(renderReportEmail(report, this.templates));
  }
}
