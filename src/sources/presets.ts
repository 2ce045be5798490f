/**
 * Per-site extraction settings for the structured-data source.
 */

export type EanStrategy =
  /** offers.gtin13 > offers.gtin > gtin13 > gtin > mpn (Shopify) */
  | 'gtin'
  /** sku > mpn, then a 13-digit URL tail (Tokmanni) */
  | 'sku'
  | 'none';

export type ProductIdStyle =
  /** `-12345-mp001` code in the URL, else the URL slug */
  | 'mp-code'
  /** `<site>_<slug without .html>`; dataLayer ids become `<site>_<id>` */
  | 'prefixed-slug'
  | 'slug';

export type KeyStrategy = 'bjornborg' | 'fitnesstukku' | 'store-ean' | 'generic';

export interface SitePreset {
  site: string;
  baseUrl: string;
  ean: EanStrategy;
  productId: ProductIdStyle;
  key: KeyStrategy;
  useDataLayer: boolean;
  /** Last resort: a `"price": n` inside an EUR-mentioning script */
  scriptPriceFallback: boolean;
  priceSelectors: readonly string[];
  originalPriceSelectors: readonly string[];
  titleSelectors: readonly string[];
  /** Page-title suffix to cut when the title comes from `<title>` */
  titleSuffix?: string;
}

const SHOPIFY_PRICE = ['.price__current', '.product__price', '.price-item--regular', '.product-price', '[data-product-price]', '.money'];
const SHOPIFY_TITLE = ['.product__title', '.product-title', 'h1.title', '[data-product-title]', 'h1'];

function shopify(site: string, baseUrl: string): SitePreset {
  return {
    site,
    baseUrl,
    ean: 'gtin',
    productId: 'slug',
    key: 'store-ean',
    useDataLayer: false,
    scriptPriceFallback: false,
    priceSelectors: SHOPIFY_PRICE,
    originalPriceSelectors: ['.price__compare', '.price-item--sale-compare', 'compare-at-price'],
    titleSelectors: SHOPIFY_TITLE,
  };
}

export const SITE_PRESETS: Record<string, SitePreset> = {
  bjornborg: {
    site: 'bjornborg',
    baseUrl: 'https://www.bjornborg.com',
    ean: 'none',
    productId: 'mp-code',
    key: 'bjornborg',
    useDataLayer: false,
    scriptPriceFallback: true,
    priceSelectors: ['[data-testid="current-price"]', '.price-current', '.current-price'],
    originalPriceSelectors: ['[data-testid="original-price"]', '.price-original', '.original-price'],
    titleSelectors: ['h1[data-testid="product-name"]', '.pdp-product-name', 'h1.product-title', 'title'],
    titleSuffix: ' | Björn Borg',
  },
  fitnesstukku: {
    site: 'fitnesstukku',
    baseUrl: 'https://www.fitnesstukku.fi',
    ean: 'none',
    productId: 'prefixed-slug',
    key: 'fitnesstukku',
    useDataLayer: true,
    scriptPriceFallback: false,
    priceSelectors: ['.price-adjusted', '.price-sales', '.current-price', '[data-automation-id="current-price"]', '.price-current'],
    originalPriceSelectors: ['.price-non-adjusted', '.price-original', '.list-price', '.price-was', '[data-automation-id="list-price"]'],
    titleSelectors: ['h1.product-name', 'h1[data-testid="product-name"]', 'h1', '.product-title'],
  },
  apteekki360: shopify('apteekki360', 'https://apteekki360.fi'),
  sinunapteekki: shopify('sinunapteekki', 'https://www.sinunapteekki.fi'),
  ruohonjuuri: shopify('ruohonjuuri', 'https://www.ruohonjuuri.fi'),
  tokmanni: {
    site: 'tokmanni',
    baseUrl: 'https://www.tokmanni.fi',
    ean: 'sku',
    productId: 'slug',
    key: 'store-ean',
    useDataLayer: false,
    scriptPriceFallback: false,
    priceSelectors: ['.product-price', '.price', '[data-price]', '.current-price'],
    originalPriceSelectors: ['.old-price', '.price-before'],
    titleSelectors: ['h1.product-name', '.product-title', 'h1'],
  },
};

/** Preset for a site, or a generic one built from the product URL's origin. */
export function presetFor(site: string, url?: string): SitePreset {
  const known = SITE_PRESETS[site];
  if (known) return known;
  let baseUrl = '';
  if (url) {
    try {
      baseUrl = new URL(url).origin;
    } catch {
      baseUrl = '';
    }
  }
  return {
    site,
    baseUrl,
    ean: 'gtin',
    productId: 'slug',
    key: 'generic',
    useDataLayer: true,
    scriptPriceFallback: false,
    priceSelectors: [...SHOPIFY_PRICE, '.price', '.current-price'],
    originalPriceSelectors: ['.price-original', '.original-price', '.list-price'],
    titleSelectors: ['h1', 'title'],
  };
}
