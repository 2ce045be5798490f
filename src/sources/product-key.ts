/**
 * Product identity keys for the single-store history.
 *
 * Keys are stable for the life of a record, so the precedence below must not
 * change once histories exist: a product keyed `base_10004564` stays that.
 */

import { presetFor } from './presets';
import type { ObservedProduct, ProductRef } from './types';

/** Last path segment of a URL, ignoring a trailing slash. */
export function urlSlug(url: string): string {
  const parts = url.replace(/[?#].*$/, '').replace(/\/+$/, '').split('/');
  return parts[parts.length - 1] || 'unknown';
}

/** Björn Borg base product code: `...-10004564-mp001/` -> `10004564`. */
export function mpCode(url: string): string | null {
  const match = /-(\d+)-mp\d+/.exec(url);
  return match ? match[1] : null;
}

/** SKU `10004564_MP001` -> `10004564`. */
export function baseCodeFromSku(sku: string | null | undefined): string | null {
  if (!sku) return null;
  const match = /^(\d+)_/.exec(sku);
  return match ? match[1] : null;
}

type KeyFields = Pick<ObservedProduct, 'url' | 'productId' | 'baseProductCode' | 'sku' | 'ean'>;

/**
 * Identity key for an observed product. Values found on the page win over
 * the ones in the tracking configuration.
 */
export function productKeyFor(ref: ProductRef, product: KeyFields): string {
  const preset = presetFor(ref.site, ref.url);
  const baseCode = product.baseProductCode ?? ref.baseProductCode ?? null;
  const productId = product.productId ?? ref.productId ?? null;
  const sku = product.sku ?? ref.sku ?? null;
  const url = product.url || ref.url;

  switch (preset.key) {
    case 'bjornborg':
      if (baseCode) return `base_${baseCode}`;
      if (productId) return `id_${productId}`;
      if (sku) return `sku_${sku}`;
      return `url_${urlSlug(url)}`;
    case 'fitnesstukku':
      if (productId) return `id_${productId}`;
      return `url_fitnesstukku_${urlSlug(url).replace(/\.html$/, '')}`;
    case 'store-ean':
      return `${preset.site}_${product.ean ?? sku ?? 'unknown'}`;
    case 'generic':
      if (baseCode) return `base_${baseCode}`;
      if (productId) return `id_${productId}`;
      return `url_${url}`;
  }
}
