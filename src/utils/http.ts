/**
 * HTTP page fetcher for observation sources.
 *
 * One fetcher is created per monitoring cycle and shared by that cycle's
 * sources, so the politeness delay applies across every store it talks to.
 */

import { createLogger } from './logger';
import { HttpError, parseRetryAfter, sleep, withRetry, type RetryOptions } from '../infra/retry';

const logger = createLogger('http');

// =============================================================================
// Types
// =============================================================================

export interface PageFetcherOptions {
  /** Minimum gap between the start of two requests */
  delayMs?: number;
  /** Per-request timeout */
  timeoutMs?: number;
  retry?: RetryOptions;
  headers?: Record<string, string>;
  /** Injected for tests */
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface PageFetcher {
  fetchText(url: string): Promise<string>;
  /** Number of HTTP requests issued, including retries */
  readonly requestCount: number;
}

// =============================================================================
// Constants
// =============================================================================

export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'fi-FI,fi;q=0.9,en;q=0.8',
};

const DEFAULT_TIMEOUT_MS = 30_000;

// =============================================================================
// Fetcher
// =============================================================================

export function createPageFetcher(options: PageFetcherOptions = {}): PageFetcher {
  const delayMs = options.delayMs ?? 0;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers = { ...BROWSER_HEADERS, ...options.headers };
  const sleepFn = options.sleepFn ?? sleep;
  const now = options.now ?? Date.now;

  let lastRequestAt: number | null = null;
  let requestCount = 0;

  async function throttle(): Promise<void> {
    if (lastRequestAt !== null && delayMs > 0) {
      const wait = lastRequestAt + delayMs - now();
      if (wait > 0) await sleepFn(wait);
    }
    lastRequestAt = now();
  }

  async function attempt(url: string): Promise<string> {
    await throttle();
    requestCount++;
    const response = await fetch(url, {
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new HttpError(response.status, url, parseRetryAfter(response.headers.get('retry-after')));
    }
    return response.text();
  }

  return {
    get requestCount() {
      return requestCount;
    },

    async fetchText(url: string): Promise<string> {
      logger.debug({ url }, 'Fetching page');
      return withRetry(() => attempt(url), { sleepFn, ...options.retry });
    },
  };
}
