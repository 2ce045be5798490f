/**
 * Tracking configuration - which products the cycles observe
 *
 * `products.yaml` lists single-store products grouped by site;
 * `ean_products.yaml` lists EANs with one URL per store. Only products with
 * `status: track` (and, per EAN, stores with `status: active`) are observed.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { ConfigError } from '../utils/config';
import type { ProductRef } from '../sources/types';

const logger = createLogger('tracking-config');

// =============================================================================
// SCHEMAS
// =============================================================================

const idValue = z.union([z.string(), z.number()]).transform((v) => String(v));

const trackedProductSchema = z
  .object({
    name: z.string(),
    url: z.string().min(1),
    site: z.string().optional(),
    status: z.string().default('track'),
    product_id: idValue.optional(),
    base_product_code: idValue.optional(),
    sku: idValue.optional(),
    category: z.string().optional(),
  })
  .passthrough();

const productsFileSchema = z.object({
  products: z.record(z.array(trackedProductSchema).nullable().transform((v) => v ?? [])).default({}),
});

const eanStoreSchema = z.object({
  url: z.string().min(1),
  status: z.string().default('active'),
});

const eanProductSchema = z.object({
  ean: idValue,
  name: z.string().default('Unknown Product'),
  status: z.string().default('track'),
  stores: z.record(eanStoreSchema).default({}),
});

const eanProductsFileSchema = z.object({
  products: z.array(eanProductSchema).nullable().transform((v) => v ?? []).default([]),
});

export type TrackedProduct = z.infer<typeof trackedProductSchema>;
export type ProductsConfig = z.infer<typeof productsFileSchema>;
export type EanProductConfig = z.infer<typeof eanProductSchema>;
export type EanProductsConfig = z.infer<typeof eanProductsFileSchema>;

export interface TrackedEan {
  ean: string;
  name: string;
  /** Active stores in file order */
  stores: Array<{ store: string; url: string }>;
}

// =============================================================================
// LOADING
// =============================================================================

function readYaml(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError([`${path}: file not found`]);
  }
  try {
    const parsed: unknown = YAML.parse(readFileSync(path, 'utf-8'));
    return parsed ?? {};
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
}

function validate<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${path}: ${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

export function parseProductsConfig(text: string, path = 'products.yaml'): ProductsConfig {
  const raw: unknown = YAML.parse(text);
  return validate(path, productsFileSchema, raw ?? {});
}

export function loadProductsConfig(path: string): ProductsConfig {
  const config = validate(path, productsFileSchema, readYaml(path));
  logger.debug({ path, sites: Object.keys(config.products).length }, 'Products config loaded');
  return config;
}

export function saveProductsConfig(path: string, config: ProductsConfig): void {
  writeFileSync(path, YAML.stringify(config, { indent: 2 }), 'utf-8');
  logger.info({ path }, 'Products config saved');
}

export function parseEanProductsConfig(text: string, path = 'ean_products.yaml'): EanProductsConfig {
  const raw: unknown = YAML.parse(text);
  return validate(path, eanProductsFileSchema, raw ?? {});
}

export function loadEanProductsConfig(path: string): EanProductsConfig {
  return validate(path, eanProductsFileSchema, readYaml(path));
}

// =============================================================================
// SELECTION
// =============================================================================

/**
 * Product references for every `status: track` entry, in file order. The site
 * is the entry's own `site` or else the group it is listed under.
 */
export function trackedProductRefs(config: ProductsConfig): ProductRef[] {
  const refs: ProductRef[] = [];
  for (const [group, products] of Object.entries(config.products)) {
    for (const product of products) {
      if (product.status !== 'track') continue;
      refs.push({
        site: product.site ?? group,
        url: product.url,
        name: product.name,
        productId: product.product_id,
        baseProductCode: product.base_product_code,
        sku: product.sku,
      });
    }
  }
  return refs;
}

export function trackedEans(config: EanProductsConfig): TrackedEan[] {
  const tracked: TrackedEan[] = [];
  for (const product of config.products) {
    if (product.status !== 'track') continue;
    const stores = Object.entries(product.stores)
      .filter(([, store]) => store.status === 'active')
      .map(([store, { url }]) => ({ store, url }));
    if (stores.length === 0) {
      logger.warn({ ean: product.ean }, 'Tracked EAN has no active stores');
      continue;
    }
    tracked.push({ ean: product.ean, name: product.name, stores });
  }
  return tracked;
}
