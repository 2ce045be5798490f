/**
 * Observation Source Types
 *
 * A source turns a configured product reference into one observation. The
 * result type keeps "the page has no price" apart from "the request failed",
 * so a cycle can count each and never mistake a bug for missing data.
 */

export type ExtractionMethod = 'json-ld' | 'data-layer' | 'markup';

/** What the tracking configuration knows about a product before observing it. */
export interface ProductRef {
  site: string;
  url: string;
  name?: string;
  productId?: string;
  baseProductCode?: string;
  sku?: string;
}

export interface ObservedProduct {
  name: string;
  /** Absolute product page URL */
  url: string;
  /** Null only when the page says the product is out of stock and shows no price */
  price: number | null;
  originalPrice: number | null;
  discountPct: number | null;
  available: boolean;
  ean: string | null;
  sku: string | null;
  productId: string | null;
  baseProductCode: string | null;
  brand: string | null;
  extractedVia: ExtractionMethod;
}

export type ObservationResult =
  | { status: 'observed'; product: ObservedProduct }
  | { status: 'unavailable'; reason: string }
  | { status: 'error'; reason: string; retryable: boolean };

export interface ObservationSource {
  readonly site: string;
  observe(ref: ProductRef): Promise<ObservationResult>;
}
