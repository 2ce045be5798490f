/**
 * Retry Infrastructure - Exponential backoff with jitter
 *
 * Used by the page fetcher; monitoring cycles never see a retry, only the
 * final observation result.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0.1 = +/-10%) */
  jitter?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Custom predicate to determine if error is retryable */
  retryPredicate?: (error: Error, attempt: number) => boolean;
  /** Injected for tests */
  sleepFn?: (ms: number) => Promise<void>;
}

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * Non-2xx response from a store. 429 and 5xx are worth another attempt,
 * anything else (404 for a delisted product, 403 from a bot wall) is not.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly retryAfter?: number;

  constructor(status: number, url: string, retryAfter?: number) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
    this.retryAfter = retryAfter;
  }

  get retryable(): boolean {
    return this.status === 429 || (this.status >= 500 && this.status <= 504);
  }
}

const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'network error',
  'fetch failed',
  'timed out',
];

/**
 * Detect transient/network errors that are safe to retry.
 */
export function isTransientError(err: Error): boolean {
  if (err instanceof HttpError) return err.retryable;
  if (err.name === 'AbortError' || err.name === 'TimeoutError') return true;

  const message = err.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => message.includes(p));
}

/**
 * Parse a Retry-After header (seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number.parseInt(header, 10);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const dateMs = Date.parse(header);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - now;
    return delayMs > 0 ? delayMs : undefined;
  }
  return undefined;
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>
): number {
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);

  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;

  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// withRetry
// =============================================================================

/**
 * Execute a function with automatic retry on transient errors.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0.1,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    sleepFn = sleep,
  } = options;

  let lastError: Error = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < maxAttempts && retryPredicate(lastError, attempt);

      const serverHint = lastError instanceof HttpError ? lastError.retryAfter : undefined;
      const delay =
        serverHint !== undefined
          ? Math.min(serverHint, maxDelay)
          : calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      logger.debug({ attempt, maxAttempts, delay, willRetry, error: lastError.message }, 'Retry attempt');

      if (!willRetry) break;
      await sleepFn(delay);
    }
  }

  throw lastError;
}
