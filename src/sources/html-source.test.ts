import { describe, it, expect, vi } from 'vitest';
import { StructuredDataSource, absoluteUrl, extractProduct } from './html-source';
import { SITE_PRESETS, presetFor } from './presets';
import { HttpError } from '../infra/retry';
import type { PageFetcher } from '../utils/http';

// =============================================================================
// Helpers
// =============================================================================

function makeFetcher(impl: (url: string) => Promise<string>) {
  const fetchText = vi.fn(impl);
  const fetcher: PageFetcher = { fetchText, requestCount: 0 };
  return { fetcher, fetchText };
}

const SOCKS_URL = 'https://www.bjornborg.com/fi/essential-socks-10-pack-10004564-mp001/';

const SOCKS_PAGE = `
  <h1 data-testid="product-name">Essential Socks 10-pack</h1>
  <span data-testid="current-price">35,96 €</span>
  <span data-testid="original-price">44,95 €</span>`;

const MAGNESIUM_PAGE = `
  <script type="application/ld+json">${JSON.stringify({
    '@type': 'Product',
    name: 'Magnesium',
    sku: 'MG-1',
    brand: { name: 'Nutri' },
    offers: { price: '12.90', availability: 'https://schema.org/InStock', gtin13: '6415712345678' },
  })}</script>
  <span class="price__compare">14,90 €</span>`;

function wheyPage(availability: string): string {
  const push = {
    event: 'productDetail',
    ecommerce: { detail: { products: [{ name: 'Whey 80', id: '5854R', price: '39.90', brand: 'Star Nutrition', availability }] } },
  };
  return `<script>dataLayer.push(${JSON.stringify(push)});</script><span class="price-non-adjusted">49,90 €</span>`;
}

// =============================================================================
// absoluteUrl
// =============================================================================

describe('absoluteUrl', () => {
  it('joins relative paths onto the base', () => {
    expect(absoluteUrl('/fi/socks/', 'https://www.bjornborg.com/')).toBe('https://www.bjornborg.com/fi/socks/');
    expect(absoluteUrl('fi/socks/', 'https://www.bjornborg.com')).toBe('https://www.bjornborg.com/fi/socks/');
  });

  it('keeps absolute URLs', () => {
    expect(absoluteUrl('https://other.test/p', 'https://www.bjornborg.com')).toBe('https://other.test/p');
  });
});

// =============================================================================
// extractProduct
// =============================================================================

describe('extractProduct', () => {
  it('reads JSON-LD with the GTIN as EAN', () => {
    const url = 'https://apteekki360.fi/products/magnesium-250';

    expect(extractProduct(MAGNESIUM_PAGE, url, SITE_PRESETS.apteekki360)).toEqual({
      name: 'Magnesium',
      url,
      price: 12.9,
      originalPrice: 14.9,
      discountPct: 13,
      available: true,
      ean: '6415712345678',
      sku: 'MG-1',
      productId: 'magnesium-250',
      baseProductCode: null,
      brand: 'Nutri',
      extractedVia: 'json-ld',
    });
  });

  it('drops an original price equal to the current one', () => {
    const html = MAGNESIUM_PAGE.replace('14,90 €', '12,90 €');
    const product = extractProduct(html, 'https://apteekki360.fi/products/magnesium-250', SITE_PRESETS.apteekki360);

    expect(product?.originalPrice).toBeNull();
    expect(product?.discountPct).toBeNull();
  });

  it('reads the dataLayer product and prefixes its id', () => {
    const url = 'https://www.fitnesstukku.fi/whey-80-4-kg/5854R.html';

    expect(extractProduct(wheyPage('IN STOCK'), url, SITE_PRESETS.fitnesstukku)).toEqual({
      name: 'Whey 80',
      url,
      price: 39.9,
      originalPrice: 49.9,
      discountPct: 20,
      available: true,
      ean: null,
      sku: null,
      productId: 'fitnesstukku_5854R',
      baseProductCode: null,
      brand: 'Star Nutrition',
      extractedVia: 'data-layer',
    });
  });

  it('reads dataLayer availability', () => {
    const product = extractProduct(wheyPage('OUT OF STOCK'), 'https://www.fitnesstukku.fi/w/5854R.html', SITE_PRESETS.fitnesstukku);
    expect(product?.available).toBe(false);
  });

  it('falls back to markup selectors with the code from the URL', () => {
    expect(extractProduct(SOCKS_PAGE, SOCKS_URL, SITE_PRESETS.bjornborg)).toEqual({
      name: 'Essential Socks 10-pack',
      url: SOCKS_URL,
      price: 35.96,
      originalPrice: 44.95,
      discountPct: 20,
      available: true,
      ean: null,
      sku: null,
      productId: '10004564',
      baseProductCode: '10004564',
      brand: null,
      extractedVia: 'markup',
    });
  });

  it('cuts the site suffix from the page title and reads a script price', () => {
    const html = `<title>Essential Socks - Black | Björn Borg</title>
      <script>window.__data = {"price": 35.96, "currency": "EUR"}</script>`;
    const product = extractProduct(html, SOCKS_URL, SITE_PRESETS.bjornborg);

    expect(product?.name).toBe('Essential Socks');
    expect(product?.price).toBe(35.96);
  });

  it('keeps an out-of-stock product whose page shows no price', () => {
    const page = `<script type="application/ld+json">${JSON.stringify({
      '@type': 'Product',
      name: 'Magnesium',
      offers: { availability: 'https://schema.org/OutOfStock', gtin13: '6415712345678' },
    })}</script>
    <span class="price__compare">14,90 €</span>`;

    const product = extractProduct(page, 'https://apteekki360.fi/products/magnesium-250', SITE_PRESETS.apteekki360);

    expect(product).toMatchObject({
      name: 'Magnesium',
      price: null,
      originalPrice: null,
      discountPct: null,
      available: false,
      ean: '6415712345678',
      extractedVia: 'json-ld',
    });
  });

  it('still needs a price for an in-stock product', () => {
    const page = `<script type="application/ld+json">${JSON.stringify({
      '@type': 'Product',
      name: 'Magnesium',
      offers: { availability: 'https://schema.org/InStock' },
    })}</script>`;

    expect(extractProduct(page, 'https://apteekki360.fi/products/magnesium-250', SITE_PRESETS.apteekki360)).toBeNull();
  });

  it('returns null without a name and a price', () => {
    expect(extractProduct('<p>Nothing here</p>', SOCKS_URL, SITE_PRESETS.bjornborg)).toBeNull();
  });
});

describe('presetFor', () => {
  it('builds a generic preset from the URL origin', () => {
    const preset = presetFor('example', 'https://shop.example.test/p/1');
    expect(preset.key).toBe('generic');
    expect(preset.baseUrl).toBe('https://shop.example.test');
    expect(presetFor('example', 'not a url').baseUrl).toBe('');
  });

  it('returns the known preset', () => {
    expect(presetFor('tokmanni')).toBe(SITE_PRESETS.tokmanni);
  });
});

// =============================================================================
// StructuredDataSource
// =============================================================================

describe('StructuredDataSource', () => {
  it('fetches relative URLs from the site base', async () => {
    const { fetcher, fetchText } = makeFetcher(async () => SOCKS_PAGE);
    const source = StructuredDataSource.forSite(fetcher, 'bjornborg');

    const result = await source.observe({ site: 'bjornborg', url: '/fi/essential-socks-10-pack-10004564-mp001/' });

    expect(fetchText).toHaveBeenCalledWith(SOCKS_URL);
    expect(result.status).toBe('observed');
    if (result.status === 'observed') {
      expect(result.product.url).toBe(SOCKS_URL);
      expect(result.product.price).toBe(35.96);
    }
  });

  it('reports a gone page as unavailable', async () => {
    const { fetcher } = makeFetcher(async (url) => {
      throw new HttpError(404, url);
    });

    const result = await new StructuredDataSource(fetcher, SITE_PRESETS.bjornborg).observe({ site: 'bjornborg', url: SOCKS_URL });

    expect(result).toEqual({ status: 'unavailable', reason: 'HTTP 404' });
  });

  it('reports server errors as retryable', async () => {
    const { fetcher } = makeFetcher(async (url) => {
      throw new HttpError(503, url);
    });

    const result = await new StructuredDataSource(fetcher, SITE_PRESETS.bjornborg).observe({ site: 'bjornborg', url: SOCKS_URL });

    expect(result).toEqual({ status: 'error', reason: `HTTP 503 for ${SOCKS_URL}`, retryable: true });
  });

  it('reports a bot wall as not retryable', async () => {
    const { fetcher } = makeFetcher(async (url) => {
      throw new HttpError(403, url);
    });

    const result = await new StructuredDataSource(fetcher, SITE_PRESETS.bjornborg).observe({ site: 'bjornborg', url: SOCKS_URL });

    expect(result).toMatchObject({ status: 'error', retryable: false });
  });

  it('reports network errors', async () => {
    const { fetcher } = makeFetcher(async () => {
      throw new Error('fetch failed');
    });

    const result = await new StructuredDataSource(fetcher, SITE_PRESETS.bjornborg).observe({ site: 'bjornborg', url: SOCKS_URL });

    expect(result).toEqual({ status: 'error', reason: 'fetch failed', retryable: true });
  });

  it('reports a page without product data as unavailable', async () => {
    const { fetcher } = makeFetcher(async () => '<html><body>Maintenance</body></html>');

    const result = await new StructuredDataSource(fetcher, SITE_PRESETS.bjornborg).observe({ site: 'bjornborg', url: SOCKS_URL });

    expect(result).toEqual({ status: 'unavailable', reason: 'no name and price found on page' });
  });
});
