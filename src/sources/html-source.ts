/**
 * Structured-data product source
 *
 * Fetches a product page and reads it in order of reliability: JSON-LD
 * Product, then the dataLayer productDetail event (where the site has one),
 * then the markup selectors of the site preset.
 */

import { createLogger } from '../utils/logger';
import type { PageFetcher } from '../utils/http';
import { HttpError } from '../infra/retry';
import { presetFor, type SitePreset } from './presets';
import { baseCodeFromSku, mpCode, urlSlug } from './product-key';
import {
  availabilityOf,
  extractDataLayerProduct,
  extractJsonLdProduct,
  extractScriptPrice,
  firstOffer,
  selectFirstText,
  selectPrice,
  toPrice,
  type DataLayerProduct,
  type JsonLdProduct,
} from './structured-data';
import type { ExtractionMethod, ObservationResult, ObservationSource, ObservedProduct, ProductRef } from './types';

const logger = createLogger('html-source');

// =============================================================================
// EXTRACTION
// =============================================================================

export function absoluteUrl(url: string, baseUrl: string): string {
  return /^https?:\/\//i.test(url) ? url : `${baseUrl.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}`;
}

function productIdFor(preset: SitePreset, url: string, dataLayerId?: string): string {
  switch (preset.productId) {
    case 'mp-code':
      return mpCode(url) ?? urlSlug(url);
    case 'prefixed-slug':
      return `${preset.site}_${dataLayerId ?? urlSlug(url).replace(/\.html$/, '')}`;
    case 'slug':
      return urlSlug(url);
  }
}

function eanFor(preset: SitePreset, url: string, ld: JsonLdProduct | null): string | null {
  if (preset.ean === 'none') return null;
  if (preset.ean === 'gtin') {
    const offer = ld ? firstOffer(ld) : null;
    return offer?.gtin13 ?? offer?.gtin ?? ld?.gtin13 ?? ld?.gtin ?? ld?.mpn ?? null;
  }
  const fromLd = ld?.sku ?? ld?.mpn ?? null;
  if (fromLd) return fromLd;
  const tail = url.replace(/\/+$/, '').split('-').pop() ?? '';
  return /^\d{13}$/.test(tail) ? tail : null;
}

function brandOf(ld: JsonLdProduct): string | null {
  if (!ld.brand) return null;
  return typeof ld.brand === 'string' ? ld.brand : ld.brand.name ?? null;
}

function discountPct(price: number, original: number | null): number | null {
  if (original === null || original <= price) return null;
  return Math.round(((original - price) / original) * 100);
}

function titleFromPage(html: string, preset: SitePreset): string | null {
  const title = selectFirstText(html, preset.titleSelectors);
  if (!title) return null;
  if (preset.titleSuffix && title.includes(preset.titleSuffix)) {
    const name = title.split(preset.titleSuffix)[0];
    return name.split(' - ')[0].trim();
  }
  return title;
}

interface Extracted {
  name: string;
  price: number | null;
  available: boolean;
  sku: string | null;
  brand: string | null;
  dataLayerId?: string;
  via: ExtractionMethod;
}

/** A stock-out page often drops the price; keep it as an observation without one. */
function pricedOrOutOfStock(price: number | null, available: boolean): number | null | undefined {
  if (price !== null && price > 0) return price;
  return available ? undefined : null;
}

function fromJsonLd(ld: JsonLdProduct): Extracted | null {
  const offer = firstOffer(ld);
  const available = availabilityOf(offer?.availability) ?? true;
  const price = pricedOrOutOfStock(toPrice(offer?.price ?? offer?.lowPrice), available);
  const name = ld.name?.trim();
  if (!name || price === undefined) return null;
  return {
    name,
    price,
    available,
    sku: offer?.sku ?? ld.sku ?? null,
    brand: brandOf(ld),
    via: 'json-ld',
  };
}

function fromDataLayer(product: DataLayerProduct): Extracted | null {
  const available = product.availability ? product.availability.toUpperCase().includes('IN STOCK') : true;
  const price = pricedOrOutOfStock(toPrice(product.price), available);
  const name = product.name?.trim();
  if (!name || price === undefined) return null;
  return {
    name,
    price,
    available,
    sku: null,
    brand: product.brand?.trim() || null,
    dataLayerId: product.id,
    via: 'data-layer',
  };
}

function fromMarkup(html: string, preset: SitePreset): Extracted | null {
  let price = selectPrice(html, preset.priceSelectors);
  if (price === null && preset.scriptPriceFallback) price = extractScriptPrice(html);
  const name = titleFromPage(html, preset);
  if (!name || price === null || price <= 0) return null;
  return { name, price, available: true, sku: null, brand: null, via: 'markup' };
}

/**
 * Read one product from a page. Returns null when no method finds both a
 * name and a positive price, unless structured data marks the product out of
 * stock, in which case the price is null.
 */
export function extractProduct(html: string, url: string, preset: SitePreset): ObservedProduct | null {
  const ld = extractJsonLdProduct(html);
  let extracted = ld ? fromJsonLd(ld) : null;

  if (!extracted && preset.useDataLayer) {
    const dl = extractDataLayerProduct(html);
    extracted = dl ? fromDataLayer(dl) : null;
  }
  if (!extracted) extracted = fromMarkup(html, preset);
  if (!extracted) return null;

  const price = extracted.price;
  let originalPrice = price === null ? null : selectPrice(html, preset.originalPriceSelectors);
  if (originalPrice !== null && price !== null && Math.abs(originalPrice - price) < 0.005) originalPrice = null;

  const sku = extracted.sku;
  return {
    name: extracted.name,
    url,
    price,
    originalPrice,
    discountPct: price === null ? null : discountPct(price, originalPrice),
    available: extracted.available,
    ean: eanFor(preset, url, ld),
    sku,
    productId: productIdFor(preset, url, extracted.dataLayerId),
    baseProductCode: baseCodeFromSku(sku) ?? (preset.productId === 'mp-code' ? mpCode(url) : null),
    brand: extracted.brand,
    extractedVia: extracted.via,
  };
}

// =============================================================================
// SOURCE
// =============================================================================

export class StructuredDataSource implements ObservationSource {
  readonly site: string;
  private readonly preset: SitePreset;
  private readonly fetcher: PageFetcher;

  constructor(fetcher: PageFetcher, preset: SitePreset) {
    this.fetcher = fetcher;
    this.preset = preset;
    this.site = preset.site;
  }

  static forSite(fetcher: PageFetcher, site: string, sampleUrl?: string): StructuredDataSource {
    return new StructuredDataSource(fetcher, presetFor(site, sampleUrl));
  }

  async observe(ref: ProductRef): Promise<ObservationResult> {
    const url = absoluteUrl(ref.url, this.preset.baseUrl);

    let html: string;
    try {
      html = await this.fetcher.fetchText(url);
    } catch (err) {
      if (err instanceof HttpError) {
        if (err.status === 404 || err.status === 410) {
          logger.warn({ url, status: err.status }, 'Product page is gone');
          return { status: 'unavailable', reason: `HTTP ${err.status}` };
        }
        logger.error({ url, status: err.status }, 'Product page request failed');
        return { status: 'error', reason: err.message, retryable: err.retryable };
      }
      const reason = err instanceof Error ? err.message : String(err);
      logger.error({ url, err }, 'Product page request failed');
      return { status: 'error', reason, retryable: true };
    }

    const product = extractProduct(html, url, this.preset);
    if (!product) {
      logger.warn({ url, site: this.site }, 'No product data found on page');
      return { status: 'unavailable', reason: 'no name and price found on page' };
    }

    logger.info(
      { site: this.site, name: product.name, price: product.price, available: product.available, via: product.extractedVia },
      'Observed product'
    );
    return { status: 'observed', product };
  }
}
