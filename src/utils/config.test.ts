import { describe, it, expect } from 'vitest';
import { ConfigError, isEmailConfigured, loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      historyFile: 'price_history.json',
      eanHistoryFile: 'ean_price_history.json',
      productsFile: 'products.yaml',
      eanProductsFile: 'ean_products.yaml',
      retentionDays: 365,
      requestDelayMs: 2000,
      requestTimeoutMs: 30000,
      requestMaxAttempts: 3,
      currency: 'EUR',
      email: { provider: 'resend', from: 'Price Tracker <onboarding@resend.dev>' },
    });
    expect(isEmailConfigured(config)).toBe(false);
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig({
      PRICEWATCH_HISTORY_FILE: 'data/history.json',
      PRICEWATCH_RETENTION_DAYS: '90',
      PRICEWATCH_REQUEST_DELAY_MS: '0',
      PRICEWATCH_CURRENCY: 'SEK',
      EMAIL_PROVIDER: 'sendgrid',
      SENDGRID_API_KEY: 'test-key',
      RESEND_API_KEY: 'other-key',
      EMAIL_TO: 'me@example.test',
    });

    expect(config.historyFile).toBe('data/history.json');
    expect(config.retentionDays).toBe(90);
    expect(config.requestDelayMs).toBe(0);
    expect(config.currency).toBe('SEK');
    expect(config.email).toEqual({
      provider: 'sendgrid',
      apiKey: 'test-key',
      to: 'me@example.test',
      from: 'Price Tracker <onboarding@resend.dev>',
    });
    expect(isEmailConfigured(config)).toBe(true);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ PRICEWATCH_RETENTION_DAYS: ' ', RESEND_API_KEY: '', EMAIL_TO: '  ' });

    expect(config.retentionDays).toBe(365);
    expect(config.email.apiKey).toBeUndefined();
    expect(config.email.to).toBeUndefined();
  });

  it('rejects invalid values with every issue listed', () => {
    let error: unknown;
    try {
      loadConfig({ PRICEWATCH_RETENTION_DAYS: '-1', EMAIL_PROVIDER: 'mailgun' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^retentionDays: /);
    expect(error.issues[1]).toMatch(/^email\.provider: /);
  });
});
