/**
 * History Migrator - daily snapshots to change events
 *
 * Older versions stored one entry per product per day. This module replays
 * those snapshots in date order and keeps only the days on which something
 * changed, producing the same shape the stores write natively. Entries that
 * are already event-based pass through untouched, so running the migration
 * twice is harmless.
 */

import { copyFileSync, existsSync } from 'fs';
import { createLogger } from '../utils/logger';
import { fileTimestamp, isDayKey, type DayKey } from '../utils/dates';
import { changePct, isValidPrice, priceMoved } from './events';
import { readJsonObject, writeHistoryFile } from './persistence';
import {
  eanProductHistorySchema,
  legacyEanHistorySchema,
  legacyProductHistorySchema,
  productHistorySchema,
  type LegacyEanHistory,
  type LegacyProductHistory,
} from './schemas';
import type {
  AllTimeLowest,
  EanAllTimeLowest,
  EanHistoryFile,
  EanProductHistory,
  PriceChangeEvent,
  ProductHistory,
  ProductHistoryFile,
  StoreChangeEvent,
  StorePriceEvent,
  StoreState,
} from './types';

const logger = createLogger('migrate');

// =============================================================================
// TYPES
// =============================================================================

export type HistoryKind = 'product' | 'ean';

export class MigrationError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = 'MigrationError';
    this.path = path;
  }
}

export interface MigrationStats {
  /** Products converted from snapshots */
  products: number;
  /** Products that were already event-based */
  passthrough: number;
  /** Products that matched neither format */
  skipped: number;
  /** Daily snapshot entries read */
  oldEntries: number;
  /** Change events written for converted products */
  newEntries: number;
  /** oldEntries / max(newEntries, 1) */
  compressionRatio: number;
}

export interface MigrationResult<T> {
  data: T;
  stats: MigrationStats;
}

export interface FileMigrationReport {
  path: string;
  kind: HistoryKind;
  status: 'migrated' | 'already_migrated';
  backupPath: string | null;
  stats: MigrationStats;
}

function sortedDays(record: Record<string, unknown>): DayKey[] {
  return Object.keys(record).filter(isDayKey).sort();
}

function buildStats(products: number, passthrough: number, skipped: number, oldEntries: number, newEntries: number): MigrationStats {
  return {
    products,
    passthrough,
    skipped,
    oldEntries,
    newEntries,
    compressionRatio: Math.round((oldEntries / Math.max(newEntries, 1)) * 100) / 100,
  };
}

// =============================================================================
// SINGLE-STORE
// =============================================================================

function migrateProduct(legacy: LegacyProductHistory): { history: ProductHistory; snapshots: number } | null {
  const snapshots = legacy.price_history;
  const days = sortedDays(snapshots);

  const events: PriceChangeEvent[] = [];
  let previous: number | null = null;
  let since: DayKey | null = null;
  let lowest: AllTimeLowest | null = null;
  let lastOriginal: number | null = null;
  let lastDiscount: number | null = null;

  for (const day of days) {
    const entry = snapshots[day];
    const price = entry.current_price;
    if (!isValidPrice(price)) continue;

    const original = entry.original_price ?? null;
    const discount = entry.discount_percent ?? null;

    if (!lowest || price < lowest.price) {
      lowest = { price, date: day, original_price: original };
    }

    if (previous === null) {
      events.push({ date: day, type: 'initial', price, original_price: original, discount_pct: discount });
      since = day;
      previous = price;
    } else if (priceMoved(previous, price)) {
      events.push({
        date: day,
        from: previous,
        to: price,
        change_pct: changePct(previous, price),
        original_price: original,
        discount_pct: discount,
      });
      since = day;
      previous = price;
    }
    lastOriginal = original;
    lastDiscount = discount;
  }

  if (previous === null || since === null || events.length === 0) return null;

  return {
    snapshots: days.length,
    history: {
      name: legacy.name ?? 'Unknown',
      purchase_url: legacy.purchase_url ?? '',
      current: { price: previous, original_price: lastOriginal, discount_pct: lastDiscount, since },
      all_time_lowest: lowest,
      price_changes: events,
    },
  };
}

/**
 * Convert a whole `price_history.json` object.
 */
export function migrateProductHistory(input: Record<string, unknown>): MigrationResult<ProductHistoryFile> {
  const data: ProductHistoryFile = {};
  let products = 0;
  let passthrough = 0;
  let skipped = 0;
  let oldEntries = 0;
  let newEntries = 0;

  for (const [key, value] of Object.entries(input)) {
    const current = productHistorySchema.safeParse(value);
    if (current.success) {
      data[key] = current.data;
      passthrough++;
      continue;
    }

    const legacy = legacyProductHistorySchema.safeParse(value);
    if (!legacy.success) {
      logger.warn({ key }, 'Entry matches neither the snapshot nor the event format, dropping');
      skipped++;
      continue;
    }

    const migrated = migrateProduct(legacy.data);
    oldEntries += sortedDays(legacy.data.price_history).length;
    if (!migrated) {
      logger.warn({ key }, 'No priced snapshots for product, dropping');
      skipped++;
      continue;
    }

    data[key] = migrated.history;
    products++;
    newEntries += migrated.history.price_changes.length;
  }

  return { data, stats: buildStats(products, passthrough, skipped, oldEntries, newEntries) };
}

// =============================================================================
// MULTI-STORE (EAN)
// =============================================================================

function migrateEanProduct(legacy: LegacyEanHistory): { history: EanProductHistory; snapshots: number; events: number } | null {
  const events: StorePriceEvent[] = [];
  const stores: Record<string, StoreState> = {};
  let snapshots = 0;

  for (const [store, storeData] of Object.entries(legacy.stores)) {
    const days = sortedDays(storeData.price_history);
    snapshots += days.length;

    let previousPrice: number | null = null;
    let previousAvailable = true;
    let lastDay: DayKey | null = null;

    for (const day of days) {
      const entry = storeData.price_history[day];
      const price = entry.price;
      const available = entry.available ?? true;
      lastDay = day;

      if (previousPrice === null) {
        if (!isValidPrice(price)) continue;
        events.push({ date: day, store, type: 'initial', price, available });
        previousPrice = price;
        previousAvailable = available;
        continue;
      }

      const moved = isValidPrice(price) && priceMoved(previousPrice, price);
      const flipped = available !== previousAvailable;
      if (moved || flipped) {
        const event: StoreChangeEvent = { date: day, store, available };
        if (moved) {
          event.from = previousPrice;
          event.to = price;
          event.change_pct = changePct(previousPrice, price);
        }
        if (flipped) {
          event.availability_changed = true;
          event.from_available = previousAvailable;
        }
        events.push(event);
      }

      if (moved) previousPrice = price;
      previousAvailable = available;
    }

    if (previousPrice !== null && lastDay !== null) {
      stores[store] = {
        url: storeData.url ?? '',
        current_price: previousPrice,
        available: previousAvailable,
        last_updated: lastDay,
      };
    }
  }

  if (events.length === 0) return null;

  events.sort((a, b) => (a.date === b.date ? a.store.localeCompare(b.store) : a.date < b.date ? -1 : 1));

  const crossStore = legacy.cross_store_lowest ?? {};
  const crossDays = sortedDays(crossStore);
  const urlFor = (store: string, url: string | null | undefined) => url ?? stores[store]?.url ?? '';

  let currentLowest: EanProductHistory['current_lowest'] = null;
  if (crossDays.length > 0) {
    const latestDay = crossDays[crossDays.length - 1];
    const latest = crossStore[latestDay];
    currentLowest = { price: latest.price, store: latest.store, url: urlFor(latest.store, latest.url), date: latestDay };
  }

  let allTimeLowest: EanAllTimeLowest | null = null;
  for (const day of crossDays) {
    const entry = crossStore[day];
    if (!allTimeLowest || entry.price < allTimeLowest.price) {
      allTimeLowest = { price: entry.price, store: entry.store, date: day, url: urlFor(entry.store, entry.url) };
    }
  }
  if (!allTimeLowest) {
    allTimeLowest = replayInStockLowest(legacy);
  }
  if (!allTimeLowest && legacy.all_time_lowest && isDayKey(legacy.all_time_lowest.date)) {
    const legacyLow = legacy.all_time_lowest;
    allTimeLowest = { price: legacyLow.price, store: legacyLow.store, date: legacyLow.date, url: urlFor(legacyLow.store, legacyLow.url) };
  }

  return {
    snapshots,
    events: events.length,
    history: {
      name: legacy.name ?? 'Unknown Product',
      stores,
      current_lowest: currentLowest,
      all_time_lowest: allTimeLowest,
      price_changes: events,
    },
  };
}

/**
 * Running minimum over in-stock store snapshots, for files written before
 * cross-store lowest tracking existed.
 */
function replayInStockLowest(legacy: LegacyEanHistory): EanAllTimeLowest | null {
  const points: Array<{ day: DayKey; store: string; price: number; url: string }> = [];
  for (const [store, storeData] of Object.entries(legacy.stores)) {
    for (const day of sortedDays(storeData.price_history)) {
      const entry = storeData.price_history[day];
      if ((entry.available ?? true) && isValidPrice(entry.price)) {
        points.push({ day, store, price: entry.price, url: storeData.url ?? '' });
      }
    }
  }
  points.sort((a, b) => (a.day < b.day ? -1 : a.day > b.day ? 1 : 0));

  let lowest: EanAllTimeLowest | null = null;
  for (const point of points) {
    if (!lowest || point.price < lowest.price) {
      lowest = { price: point.price, store: point.store, date: point.day, url: point.url };
    }
  }
  return lowest;
}

/**
 * Convert a whole `ean_price_history.json` object.
 */
export function migrateEanHistory(input: Record<string, unknown>): MigrationResult<EanHistoryFile> {
  const data: EanHistoryFile = {};
  let products = 0;
  let passthrough = 0;
  let skipped = 0;
  let oldEntries = 0;
  let newEntries = 0;

  for (const [ean, value] of Object.entries(input)) {
    const current = eanProductHistorySchema.safeParse(value);
    if (current.success) {
      data[ean] = current.data;
      passthrough++;
      continue;
    }

    const legacy = legacyEanHistorySchema.safeParse(value);
    if (!legacy.success) {
      logger.warn({ ean }, 'Entry matches neither the snapshot nor the event format, dropping');
      skipped++;
      continue;
    }

    const migrated = migrateEanProduct(legacy.data);
    if (!migrated) {
      logger.warn({ ean }, 'No priced store snapshots for product, dropping');
      skipped++;
      continue;
    }

    data[ean] = migrated.history;
    products++;
    oldEntries += migrated.snapshots;
    newEntries += migrated.events;
  }

  return { data, stats: buildStats(products, passthrough, skipped, oldEntries, newEntries) };
}

// =============================================================================
// FILE MIGRATION
// =============================================================================

/**
 * Migrate a history file in place. A timestamped backup is written before the
 * file is replaced. Nothing is touched when the input is missing or garbled,
 * or when the migration would leave no events at all.
 */
export function migrateHistoryFile(path: string, kind: HistoryKind, now: Date = new Date()): FileMigrationReport {
  if (!existsSync(path)) {
    throw new MigrationError(`History file not found: ${path}`, path);
  }

  const input = readJsonObject(path);
  if (!input) {
    throw new MigrationError(`History file is not a readable JSON object: ${path}`, path);
  }

  const result = kind === 'product' ? migrateProductHistory(input) : migrateEanHistory(input);
  const { stats } = result;

  if (Object.keys(result.data).length === 0) {
    throw new MigrationError(`Migration produced no events, keeping ${path} as it is`, path);
  }

  if (stats.products === 0) {
    logger.info({ path, passthrough: stats.passthrough }, 'History is already event-based, nothing to migrate');
    return { path, kind, status: 'already_migrated', backupPath: null, stats };
  }

  const backupPath = `${path}.backup.${fileTimestamp(now)}`;
  copyFileSync(path, backupPath);
  logger.info({ backupPath }, 'Backup created');

  writeHistoryFile(path, result.data);
  logger.info(
    {
      path,
      products: stats.products,
      passthrough: stats.passthrough,
      oldEntries: stats.oldEntries,
      newEntries: stats.newEntries,
      compressionRatio: stats.compressionRatio,
    },
    'Migration complete'
  );
  if (stats.products > 0 && stats.compressionRatio <= 1) {
    logger.warn({ path }, 'Compression ratio is 1.0: every snapshot was a change, double-check the source data');
  }

  return { path, kind, status: 'migrated', backupPath, stats };
}
