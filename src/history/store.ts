/**
 * Price History Store - single store per product
 *
 * Keeps one ProductHistory per product key and turns observations into
 * change events. All mutation is in memory; `save()` flushes once at the end
 * of a monitoring cycle.
 */

import { createLogger } from '../utils/logger';
import { daysBefore, today, type DayKey } from '../utils/dates';
import { changePct, eventPrice, isInitialEvent, isValidPrice, priceMoved } from './events';
import { loadHistoryFile, writeHistoryFile } from './persistence';
import { productHistorySchema } from './schemas';
import type {
  AllTimeLowest,
  ChangeEvent,
  ChangeOutcome,
  PriceObservation,
  PriceSummary,
  PriceSummaryItem,
  ProductHistory,
  ProductHistoryFile,
} from './types';

const logger = createLogger('price-history');

export class PriceHistoryStore {
  private readonly data: ProductHistoryFile;
  readonly path: string | null;
  /** Entries that did not validate on load; read-only, saved back verbatim */
  private readonly retained: Record<string, unknown>;

  constructor(data: ProductHistoryFile = {}, path: string | null = null, retained: Record<string, unknown> = {}) {
    this.data = data;
    this.path = path;
    this.retained = retained;
  }

  /** Load from disk; a missing or corrupt file yields an empty store. */
  static load(path: string): PriceHistoryStore {
    const { entries, retained } = loadHistoryFile(path, productHistorySchema);
    return new PriceHistoryStore(entries, path, retained);
  }

  /** Keys held in a format this store cannot update, such as legacy snapshots. */
  retainedKeys(): string[] {
    return Object.keys(this.retained);
  }

  get size(): number {
    return Object.keys(this.data).length;
  }

  get(productKey: string): ProductHistory | undefined {
    return this.data[productKey];
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  entries(): Array<[string, ProductHistory]> {
    return Object.entries(this.data);
  }

  toJSON(): ProductHistoryFile {
    return this.data;
  }

  // ===========================================================================
  // INGESTION
  // ===========================================================================

  recordObservation(productKey: string, observation: PriceObservation, asOf: DayKey = today()): ChangeOutcome {
    const noChange: ChangeOutcome = { kind: 'no_change', productKey };
    if (productKey in this.retained) {
      logger.warn({ productKey }, 'History entry needs migration, observation not recorded');
      return noChange;
    }
    if (!isValidPrice(observation.price)) {
      logger.debug({ productKey, price: observation.price }, 'Ignoring observation without a usable price');
      return noChange;
    }

    const price = observation.price;
    const originalPrice = observation.originalPrice ?? null;
    const discountPct = observation.discountPct ?? null;
    const existing = this.data[productKey];

    if (!existing || !existing.current || existing.price_changes.length === 0) {
      this.data[productKey] = {
        name: observation.name || existing?.name || 'Unknown',
        purchase_url: observation.url || existing?.purchase_url || '',
        current: { price, original_price: originalPrice, discount_pct: discountPct, since: asOf },
        all_time_lowest: { price, date: asOf, original_price: originalPrice },
        price_changes: [
          { date: asOf, type: 'initial', price, original_price: originalPrice, discount_pct: discountPct },
        ],
      };
      logger.info({ productKey, name: observation.name, price }, 'New product tracked');
      return { kind: 'new', productKey, name: observation.name, price, date: asOf };
    }

    const history = existing;
    const current = existing.current;
    if (observation.name) history.name = observation.name;
    if (observation.url) history.purchase_url = observation.url;

    const events = history.price_changes;
    const last = events[events.length - 1];
    if (asOf < last.date) {
      logger.warn({ productKey, asOf, lastEvent: last.date }, 'Observation is older than the latest event, ignoring');
      return noChange;
    }

    const previousLowest = history.all_time_lowest ? { ...history.all_time_lowest } : null;

    // A later observation on the same day supersedes that day's event.
    if (last.date === asOf) {
      if (isInitialEvent(last)) {
        if (priceMoved(last.price, price)) {
          last.price = price;
          last.original_price = originalPrice;
          last.discount_pct = discountPct;
          history.current = { price, original_price: originalPrice, discount_pct: discountPct, since: asOf };
          this.lowerAllTimeLowest(history, price, originalPrice, asOf);
        }
        return noChange;
      }

      if (!priceMoved(last.to, price)) return noChange;

      if (!priceMoved(last.from, price)) {
        events.pop();
        const before = events[events.length - 1];
        history.current = {
          price: eventPrice(before),
          original_price: originalPrice,
          discount_pct: discountPct,
          since: before.date,
        };
        logger.info({ productKey, price }, 'Same-day price change reverted');
        return noChange;
      }

      last.to = price;
      last.change_pct = changePct(last.from, price);
      last.original_price = originalPrice;
      last.discount_pct = discountPct;
      history.current = { price, original_price: originalPrice, discount_pct: discountPct, since: asOf };
      this.lowerAllTimeLowest(history, price, originalPrice, asOf);
      return this.changedOutcome(productKey, history, last, previousLowest);
    }

    if (!priceMoved(current.price, price)) {
      current.original_price = originalPrice;
      current.discount_pct = discountPct;
      logger.debug({ productKey, price }, 'No price change');
      return noChange;
    }

    const event: ChangeEvent = {
      date: asOf,
      from: current.price,
      to: price,
      change_pct: changePct(current.price, price),
      original_price: originalPrice,
      discount_pct: discountPct,
    };
    events.push(event);
    history.current = { price, original_price: originalPrice, discount_pct: discountPct, since: asOf };
    this.lowerAllTimeLowest(history, price, originalPrice, asOf);

    logger.info(
      { productKey, from: event.from, to: event.to, changePct: event.change_pct },
      'Price change detected'
    );
    return this.changedOutcome(productKey, history, event, previousLowest);
  }

  private lowerAllTimeLowest(
    history: ProductHistory,
    price: number,
    originalPrice: number | null,
    date: DayKey
  ): void {
    if (!history.all_time_lowest || price < history.all_time_lowest.price) {
      history.all_time_lowest = { price, date, original_price: originalPrice };
    }
  }

  private changedOutcome(
    productKey: string,
    history: ProductHistory,
    event: ChangeEvent,
    previousLowest: AllTimeLowest | null
  ): ChangeOutcome {
    return {
      kind: 'changed',
      productKey,
      name: history.name,
      url: history.purchase_url,
      date: event.date,
      from: event.from,
      to: event.to,
      changePct: event.change_pct,
      originalPrice: event.original_price ?? null,
      discountPct: event.discount_pct ?? null,
      previousLowest,
    };
  }

  // ===========================================================================
  // RETENTION
  // ===========================================================================

  /**
   * Drop events dated before `now - retentionDays`. The initial event and the
   * most recent event always survive; `current` and `all_time_lowest` are
   * never touched. Returns the number of events removed.
   */
  cleanup(retentionDays: number, now: Date = new Date()): number {
    const cutoff = daysBefore(retentionDays, now);
    let removed = 0;

    for (const history of Object.values(this.data)) {
      const events = history.price_changes;
      if (events.length <= 1) continue;

      const lastIndex = events.length - 1;
      const kept = events.filter(
        (event, index) => index === lastIndex || event.date >= cutoff || (index === 0 && isInitialEvent(event))
      );
      removed += events.length - kept.length;
      history.price_changes = kept;
    }

    if (removed > 0) {
      logger.info({ removed, retentionDays }, 'Pruned old price change events');
    }
    return removed;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Current prices with the direction of the most recent change. Pass `keys`
   * to limit the summary to the products seen in this cycle.
   */
  summary(keys?: Iterable<string>): PriceSummary {
    const filter = keys ? new Set(keys) : null;
    const products: PriceSummaryItem[] = [];

    for (const [key, history] of Object.entries(this.data)) {
      if (filter && !filter.has(key)) continue;
      if (!history.current) continue;

      const events = history.price_changes;
      const last = events[events.length - 1];
      let trend: PriceSummaryItem['trend'] = 'stable';
      let trendChange = 0;
      if (events.length >= 2 && last && !isInitialEvent(last)) {
        trendChange = last.to - last.from;
        if (priceMoved(last.from, last.to)) trend = trendChange < 0 ? 'down' : 'up';
      }

      products.push({
        key,
        name: history.name,
        currentPrice: history.current.price,
        originalPrice: history.current.original_price ?? null,
        discountPercent: history.current.discount_pct ?? null,
        purchaseUrl: history.purchase_url,
        trend,
        trendChange,
        lastUpdated: history.current.since,
      });
    }

    return { totalProducts: filter ? products.length : this.size, products };
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  save(path: string | null = this.path): void {
    if (!path) throw new Error('PriceHistoryStore.save: no path given');
    writeHistoryFile(path, { ...this.retained, ...this.data });
    logger.info({ path, products: this.size, retained: this.retainedKeys().length }, 'Price history saved');
  }
}
