import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BROWSER_HEADERS, createPageFetcher } from './http';
import { HttpError } from '../infra/retry';

// =============================================================================
// Mock fetch globally
// =============================================================================

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

const PAGE_URL = 'https://example.test/product';

describe('createPageFetcher', () => {
  it('returns the page body and sends browser headers', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>ok</html>'));
    const fetcher = createPageFetcher();

    await expect(fetcher.fetchText(PAGE_URL)).resolves.toBe('<html>ok</html>');
    expect(mockFetch.mock.calls[0][0]).toBe(PAGE_URL);
    expect(mockFetch.mock.calls[0][1]).toMatchObject({
      redirect: 'follow',
      headers: expect.objectContaining({ 'User-Agent': BROWSER_HEADERS['User-Agent'] }),
    });
    expect(fetcher.requestCount).toBe(1);
  });

  it('retries server errors', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 503 })).mockResolvedValueOnce(new Response('ok'));
    const sleepFn = vi.fn(async () => undefined);
    const fetcher = createPageFetcher({ sleepFn, retry: { jitter: 0 } });

    await expect(fetcher.fetchText(PAGE_URL)).resolves.toBe('ok');
    expect(fetcher.requestCount).toBe(2);
    expect(sleepFn.mock.calls).toEqual([[1000]]);
  });

  it('waits as long as Retry-After asks', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'retry-after': '2' } }))
      .mockResolvedValueOnce(new Response('ok'));
    const sleepFn = vi.fn(async () => undefined);

    await createPageFetcher({ sleepFn }).fetchText(PAGE_URL);

    expect(sleepFn.mock.calls).toEqual([[2000]]);
  });

  it('fails fast on a missing page', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 404 }));
    const fetcher = createPageFetcher({ sleepFn: async () => undefined });

    const error = await fetcher.fetchText(PAGE_URL).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 404, url: PAGE_URL });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('spaces requests by the configured delay', async () => {
    mockFetch.mockImplementation(async () => new Response('ok'));
    let clock = 0;
    const sleepFn = vi.fn(async () => undefined);
    const fetcher = createPageFetcher({ delayMs: 2000, sleepFn, now: () => clock });

    await fetcher.fetchText(PAGE_URL);
    clock = 500;
    await fetcher.fetchText(PAGE_URL);
    clock = 5000;
    await fetcher.fetchText(PAGE_URL);

    expect(sleepFn.mock.calls).toEqual([[1500]]);
    expect(fetcher.requestCount).toBe(3);
  });
});
