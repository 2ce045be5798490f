/**
 * Configuration - loads and validates environment variables
 *
 * Reads `.env` from the working directory (without overriding variables that
 * are already set), then validates everything through a zod schema.
 */

import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const configSchema = z.object({
  historyFile: z.string().default('price_history.json'),
  eanHistoryFile: z.string().default('ean_price_history.json'),
  productsFile: z.string().default('products.yaml'),
  eanProductsFile: z.string().default('ean_products.yaml'),
  retentionDays: z.coerce.number().int().positive().default(365),
  requestDelayMs: z.coerce.number().int().nonnegative().default(2000),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  requestMaxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  currency: z.string().default('EUR'),
  email: z.object({
    provider: z.enum(['resend', 'sendgrid']).default('resend'),
    apiKey: optionalString,
    to: optionalString,
    from: z.string().default('Price Tracker <onboarding@resend.dev>'),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Build the config from an environment map. Pass `process.env` (the default)
 * in production; tests pass a plain object.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = configSchema.safeParse({
    historyFile: emptyToUndefined(env.PRICEWATCH_HISTORY_FILE),
    eanHistoryFile: emptyToUndefined(env.PRICEWATCH_EAN_HISTORY_FILE),
    productsFile: emptyToUndefined(env.PRICEWATCH_PRODUCTS_FILE),
    eanProductsFile: emptyToUndefined(env.PRICEWATCH_EAN_PRODUCTS_FILE),
    retentionDays: emptyToUndefined(env.PRICEWATCH_RETENTION_DAYS),
    requestDelayMs: emptyToUndefined(env.PRICEWATCH_REQUEST_DELAY_MS),
    requestTimeoutMs: emptyToUndefined(env.PRICEWATCH_REQUEST_TIMEOUT_MS),
    requestMaxAttempts: emptyToUndefined(env.PRICEWATCH_REQUEST_MAX_ATTEMPTS),
    currency: emptyToUndefined(env.PRICEWATCH_CURRENCY),
    email: {
      provider: emptyToUndefined(env.EMAIL_PROVIDER),
      apiKey: env.EMAIL_PROVIDER === 'sendgrid' ? env.SENDGRID_API_KEY : env.RESEND_API_KEY,
      to: env.EMAIL_TO,
      from: emptyToUndefined(env.EMAIL_FROM),
    },
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load `.env` (CWD) into process.env. Existing variables win.
 */
export function loadDotenv(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
}

export function isEmailConfigured(config: AppConfig): boolean {
  return Boolean(config.email.apiKey && config.email.to);
}
