/**
 * Structured data extraction from product pages
 *
 * Regex-based, no DOM: JSON-LD `Product` blocks, Google Analytics
 * `dataLayer.push({event: 'productDetail'})` calls, and a small selector
 * matcher (`tag`, `.class`, `[attr]`, `[attr="value"]` and combinations) for
 * the markup fallback.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';

const logger = createLogger('structured-data');

// =============================================================================
// SCHEMAS
// =============================================================================

const idValue = z.union([z.string(), z.number()]).transform((v) => String(v));
const priceValue = z.union([z.number(), z.string()]);

const offerSchema = z
  .object({
    price: priceValue.optional(),
    lowPrice: priceValue.optional(),
    priceCurrency: z.string().optional(),
    availability: z.string().optional(),
    gtin13: idValue.optional(),
    gtin: idValue.optional(),
    sku: idValue.optional(),
  })
  .passthrough();

const jsonLdProductSchema = z
  .object({
    name: z.string().optional(),
    sku: idValue.optional(),
    mpn: idValue.optional(),
    gtin13: idValue.optional(),
    gtin: idValue.optional(),
    brand: z.union([z.string(), z.object({ name: z.string().optional() }).passthrough()]).optional(),
    offers: z.union([offerSchema, z.array(offerSchema)]).optional(),
  })
  .passthrough();

export type JsonLdOffer = z.infer<typeof offerSchema>;
export type JsonLdProduct = z.infer<typeof jsonLdProductSchema>;

const dataLayerProductSchema = z
  .object({
    name: z.string().optional(),
    id: idValue.optional(),
    price: priceValue.optional(),
    brand: z.string().optional(),
    category: z.string().optional(),
    availability: z.string().optional(),
    variant: z.string().optional(),
  })
  .passthrough();

const productDetailSchema = z.object({
  event: z.literal('productDetail'),
  ecommerce: z.object({
    currencyCode: z.string().optional(),
    detail: z.object({ products: z.array(dataLayerProductSchema) }),
  }),
});

export type DataLayerProduct = z.infer<typeof dataLayerProductSchema>;

// =============================================================================
// TEXT HELPERS
// =============================================================================

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  euro: '€',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) return String.fromCodePoint(parseInt(body.slice(2), 16));
    if (body.startsWith('#')) return String.fromCodePoint(parseInt(body.slice(1), 10));
    return ENTITIES[body.toLowerCase()] ?? whole;
  });
}

export function textContent(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * First number in a price string. Decimal commas are read as points, so
 * `"35,96 €"` is 35.96.
 */
export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = /(\d+[.,]\d+|\d+)/.exec(text.replace(/,/g, '.'));
  if (!match) return null;
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

export function toPrice(value: number | string | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  return parsePrice(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// JSON-LD
// =============================================================================

const JSON_LD_PATTERN = /<script\b[^>]*type=["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi;

function jsonLdBlocks(html: string): unknown[] {
  const blocks: unknown[] = [];
  for (const match of html.matchAll(JSON_LD_PATTERN)) {
    const body = match[1].trim();
    if (!body) continue;
    try {
      blocks.push(JSON.parse(body));
    } catch (err) {
      logger.debug({ err }, 'Skipping unparseable JSON-LD block');
    }
  }
  return blocks;
}

function isProductNode(value: Record<string, unknown>): boolean {
  const type = value['@type'];
  return type === 'Product' || (Array.isArray(type) && type.includes('Product'));
}

/**
 * First `Product` node on the page, looking inside arrays and `@graph`.
 */
export function extractJsonLdProduct(html: string): JsonLdProduct | null {
  const queue = jsonLdBlocks(html);
  while (queue.length > 0) {
    const node = queue.shift();
    if (Array.isArray(node)) {
      queue.push(...node);
      continue;
    }
    if (!isRecord(node)) continue;
    if (isProductNode(node)) {
      const parsed = jsonLdProductSchema.safeParse(node);
      if (parsed.success) return parsed.data;
      logger.debug({ issues: parsed.error.issues.length }, 'JSON-LD Product node has an unexpected shape');
      continue;
    }
    const graph = node['@graph'];
    if (Array.isArray(graph)) queue.push(...graph);
  }
  return null;
}

export function firstOffer(product: JsonLdProduct): JsonLdOffer | null {
  const offers = product.offers;
  if (!offers) return null;
  if (Array.isArray(offers)) return offers[0] ?? null;
  return offers;
}

/** `true` for schema.org InStock, `false` for OutOfStock, `null` when unstated. */
export function availabilityOf(value: string | undefined): boolean | null {
  if (!value) return null;
  if (/InStock|in stock/i.test(value)) return true;
  if (/OutOfStock|SoldOut|Discontinued|out of stock/i.test(value)) return false;
  return null;
}

// =============================================================================
// DATALAYER
// =============================================================================

/**
 * The balanced `{...}` starting at `start`, honouring string literals.
 */
export function readBalancedObject(text: string, start: number): string | null {
  if (text[start] !== '{') return null;
  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * First product of the first `productDetail` event pushed to the dataLayer.
 * Pushes that are not valid JSON are skipped.
 */
export function extractDataLayerProduct(html: string): DataLayerProduct | null {
  const marker = 'dataLayer.push(';
  let index = html.indexOf(marker);
  while (index !== -1) {
    let start = index + marker.length;
    while (start < html.length && /\s/.test(html[start])) start++;
    const body = readBalancedObject(html, start);
    if (body && body.includes('productDetail')) {
      try {
        const parsed = productDetailSchema.safeParse(JSON.parse(body));
        if (parsed.success) return parsed.data.ecommerce.detail.products[0] ?? null;
      } catch (err) {
        logger.debug({ err }, 'dataLayer push is not JSON');
      }
    }
    index = html.indexOf(marker, start);
  }
  return null;
}

/**
 * First `"price": 12.34` inside a script that mentions EUR.
 */
export function extractScriptPrice(html: string): number | null {
  for (const match of html.matchAll(/<script\b[^>]*>([\s\S]*?)<\/script>/gi)) {
    const script = match[1];
    if (!script.includes('EUR')) continue;
    const price = /"price":\s*(\d+\.?\d*)/.exec(script);
    if (price) return parseFloat(price[1]);
  }
  return null;
}

// =============================================================================
// MARKUP SELECTORS
// =============================================================================

interface ParsedSelector {
  tag: string | null;
  className: string | null;
  attr: string | null;
  attrValue: string | null;
}

const SELECTOR_PATTERN = /^([a-z][a-z0-9-]*)?(?:\.([\w-]+))?(?:\[([\w-]+)(?:="([^"]*)")?\])?$/i;

function parseSelector(selector: string): ParsedSelector | null {
  const match = SELECTOR_PATTERN.exec(selector.trim());
  if (!match || (!match[1] && !match[2] && !match[3])) return null;
  return {
    tag: match[1]?.toLowerCase() ?? null,
    className: match[2] ?? null,
    attr: match[3]?.toLowerCase() ?? null,
    attrValue: match[4] ?? null,
  };
}

function readAttribute(attrs: string, name: string): string | null {
  const match = new RegExp(`(?:^|\\s)${name}(?:\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s"'>]+)))?(?=\\s|/|$)`, 'i').exec(attrs);
  if (!match) return null;
  return match[1] ?? match[2] ?? match[3] ?? '';
}

function matchesSelector(tag: string, attrs: string, selector: ParsedSelector): boolean {
  if (selector.tag && selector.tag !== tag) return false;
  if (selector.className) {
    const classes = readAttribute(attrs, 'class');
    if (classes === null || !classes.split(/\s+/).includes(selector.className)) return false;
  }
  if (selector.attr) {
    const value = readAttribute(attrs, selector.attr);
    if (value === null) return false;
    if (selector.attrValue !== null && value !== selector.attrValue) return false;
  }
  return true;
}

function innerHtml(html: string, tag: string, from: number): string {
  const pattern = new RegExp(`<(/?)${tag}\\b[^>]*>`, 'gi');
  pattern.lastIndex = from;
  let depth = 1;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(html)) !== null) {
    if (match[1]) {
      depth--;
      if (depth === 0) return html.slice(from, match.index);
    } else if (!match[0].endsWith('/>')) {
      depth++;
    }
  }
  return html.slice(from);
}

/**
 * Text of the first element matching `selector`, or null.
 */
export function selectText(html: string, selector: string): string | null {
  const parsed = parseSelector(selector);
  if (!parsed) {
    logger.warn({ selector }, 'Unsupported selector');
    return null;
  }
  const openTag = /<([a-z][a-z0-9-]*)\b([^>]*)>/gi;
  let match: RegExpExecArray | null;
  while ((match = openTag.exec(html)) !== null) {
    const tag = match[1].toLowerCase();
    if (!matchesSelector(tag, match[2], parsed)) continue;
    if (match[0].endsWith('/>')) return '';
    return textContent(innerHtml(html, tag, openTag.lastIndex));
  }
  return null;
}

/** First selector whose element holds a parseable price. */
export function selectPrice(html: string, selectors: readonly string[]): number | null {
  for (const selector of selectors) {
    const price = parsePrice(selectText(html, selector));
    if (price !== null && price > 0) return price;
  }
  return null;
}

/** First selector whose element has non-empty text. */
export function selectFirstText(html: string, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const text = selectText(html, selector);
    if (text) return text;
  }
  return null;
}
