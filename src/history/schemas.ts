/**
 * zod schemas for the history files, current and legacy.
 */

import { z } from 'zod';
import { isDayKey } from '../utils/dates';
import type { EanProductHistory, ProductHistory } from './types';

const dayKey = z.string().refine(isDayKey, { message: 'expected a YYYY-MM-DD date' });
const optionalMoney = z.number().nullable().optional();
const storeUrl = z
  .string()
  .nullish()
  .transform((url) => url ?? '');

// =============================================================================
// EVENT-BASED (CURRENT) FORMAT
// =============================================================================

const initialEventSchema = z.object({
  date: dayKey,
  type: z.literal('initial'),
  price: z.number(),
  original_price: optionalMoney,
  discount_pct: optionalMoney,
});

const changeEventSchema = z.object({
  date: dayKey,
  from: z.number(),
  to: z.number(),
  change_pct: z.number(),
  original_price: optionalMoney,
  discount_pct: optionalMoney,
});

export const productHistorySchema: z.ZodType<ProductHistory, z.ZodTypeDef, unknown> = z.object({
  name: z.string().default('Unknown'),
  purchase_url: z.string().default(''),
  current: z
    .object({
      price: z.number(),
      original_price: optionalMoney,
      discount_pct: optionalMoney,
      since: dayKey,
    })
    .nullable(),
  all_time_lowest: z
    .object({
      price: z.number(),
      date: dayKey,
      original_price: optionalMoney,
    })
    .nullable()
    .default(null),
  price_changes: z.array(z.union([initialEventSchema, changeEventSchema])),
});

const storeInitialEventSchema = z.object({
  date: dayKey,
  store: z.string(),
  type: z.literal('initial'),
  price: z.number().nullable(),
  available: z.boolean(),
});

const storeChangeEventSchema = z.object({
  date: dayKey,
  store: z.string(),
  available: z.boolean(),
  from: z.number().optional(),
  to: z.number().optional(),
  change_pct: z.number().optional(),
  availability_changed: z.literal(true).optional(),
  from_available: z.boolean().optional(),
});

const crossStoreLowestSchema = z.object({
  price: z.number(),
  store: z.string(),
  url: storeUrl,
  date: dayKey.optional(),
});

export const eanProductHistorySchema: z.ZodType<EanProductHistory, z.ZodTypeDef, unknown> = z.object({
  name: z.string().default('Unknown Product'),
  stores: z.record(
    z.object({
      url: storeUrl,
      current_price: z.number().nullable(),
      available: z.boolean(),
      last_updated: dayKey,
    })
  ),
  current_lowest: crossStoreLowestSchema.nullable().default(null),
  previous_day_lowest: crossStoreLowestSchema.nullable().optional(),
  all_time_lowest: z
    .object({
      price: z.number(),
      store: z.string(),
      date: dayKey,
      url: storeUrl,
    })
    .nullable()
    .default(null),
  price_changes: z.array(z.union([storeInitialEventSchema, storeChangeEventSchema])),
});

// =============================================================================
// LEGACY DAILY-SNAPSHOT FORMAT
// =============================================================================

export const legacyProductHistorySchema = z.object({
  name: z.string().optional(),
  purchase_url: z.string().optional(),
  price_history: z.record(
    z.object({
      current_price: z.number().nullable().optional(),
      original_price: optionalMoney,
      discount_percent: optionalMoney,
      scraped_at: z.string().optional(),
    })
  ),
});

export type LegacyProductHistory = z.infer<typeof legacyProductHistorySchema>;

export const legacyEanHistorySchema = z.object({
  name: z.string().optional(),
  stores: z.record(
    z.object({
      url: z.string().nullable().optional(),
      price_history: z.record(
        z.object({
          price: z.number().nullable().optional(),
          available: z.boolean().optional(),
          scraped_at: z.string().optional(),
        })
      ),
    })
  ),
  cross_store_lowest: z
    .record(
      z.object({
        price: z.number(),
        store: z.string(),
        url: z.string().nullable().optional(),
      })
    )
    .optional(),
  all_time_lowest: z
    .object({
      price: z.number(),
      store: z.string(),
      date: z.string(),
      url: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

export type LegacyEanHistory = z.infer<typeof legacyEanHistorySchema>;
