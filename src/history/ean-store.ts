/**
 * EAN Price History Store - one product, many stores
 *
 * Each store keeps its own event stream inside the product's `price_changes`
 * (events carry a `store` field). On top of the per-store records the store
 * tracks the cheapest in-stock offer across stores and its all-time low.
 */

import { createLogger } from '../utils/logger';
import { daysBefore, today, type DayKey } from '../utils/dates';
import { PRICE_EPSILON, changePct, isStoreInitialEvent, isValidPrice, priceMoved } from './events';
import { loadHistoryFile, writeHistoryFile } from './persistence';
import { eanProductHistorySchema } from './schemas';
import type {
  CrossStoreUpdate,
  EanHistoryFile,
  EanProductHistory,
  LowestOffer,
  StoreChangeEvent,
  StoreChangeOutcome,
  StorePriceEvent,
  StorePriceObservation,
} from './types';

const logger = createLogger('ean-history');

/**
 * Cheapest in-stock offer. Out-of-stock stores and stores without a price are
 * ignored however cheap they are. On a tie the store that comes first in the
 * map's iteration order (insertion order) wins.
 */
export function findLowestInStock(observations: Record<string, StorePriceObservation>): LowestOffer | null {
  let best: LowestOffer | null = null;
  for (const [store, observation] of Object.entries(observations)) {
    if (!observation.available || !isValidPrice(observation.price)) continue;
    if (best === null || observation.price < best.price) {
      best = { store, price: observation.price, url: observation.url };
    }
  }
  return best;
}

export class EanHistoryStore {
  private readonly data: EanHistoryFile;
  readonly path: string | null;
  private readonly retained: Record<string, unknown>;

  constructor(data: EanHistoryFile = {}, path: string | null = null, retained: Record<string, unknown> = {}) {
    this.data = data;
    this.path = path;
    this.retained = retained;
  }

  static load(path: string): EanHistoryStore {
    const { entries, retained } = loadHistoryFile(path, eanProductHistorySchema);
    return new EanHistoryStore(entries, path, retained);
  }

  retainedKeys(): string[] {
    return Object.keys(this.retained);
  }

  get size(): number {
    return Object.keys(this.data).length;
  }

  get(ean: string): EanProductHistory | undefined {
    return this.data[ean];
  }

  entries(): Array<[string, EanProductHistory]> {
    return Object.entries(this.data);
  }

  toJSON(): EanHistoryFile {
    return this.data;
  }

  private ensureProduct(ean: string, name: string): EanProductHistory {
    const existing = this.data[ean];
    if (existing) {
      if (name) existing.name = name;
      return existing;
    }
    const created: EanProductHistory = {
      name: name || 'Unknown Product',
      stores: {},
      current_lowest: null,
      all_time_lowest: null,
      price_changes: [],
    };
    this.data[ean] = created;
    return created;
  }

  /** Events for one store, oldest first. */
  storeEvents(ean: string, store: string): StorePriceEvent[] {
    return (this.data[ean]?.price_changes ?? []).filter((event) => event.store === store);
  }

  // ===========================================================================
  // INGESTION
  // ===========================================================================

  recordStoreObservation(
    ean: string,
    name: string,
    store: string,
    observation: StorePriceObservation,
    asOf: DayKey = today()
  ): StoreChangeOutcome {
    if (ean in this.retained) {
      logger.warn({ ean, store }, 'History entry needs migration, observation not recorded');
      return { kind: 'no_change', ean, store };
    }
    // An out-of-stock page without a price still flips availability; the
    // store keeps its last known price.
    const known = this.data[ean]?.stores[store]?.current_price ?? null;
    const price = isValidPrice(observation.price) ? observation.price : observation.available ? null : known;
    if (price === null) {
      logger.debug({ ean, store }, 'Ignoring store observation without a usable price');
      return { kind: 'no_change', ean, store };
    }

    const available = observation.available;
    const history = this.ensureProduct(ean, name);
    const state = history.stores[store];

    if (!state || state.current_price === null) {
      history.stores[store] = { url: observation.url, current_price: price, available, last_updated: asOf };
      const pending = this.lastStoreEvent(history, store);
      if (pending && isStoreInitialEvent(pending) && pending.price === null) {
        pending.price = price;
        pending.available = available;
      } else {
        history.price_changes.push({ date: asOf, store, type: 'initial', price, available });
      }
      logger.info({ ean, store, price, available }, 'New store tracked');
      return { kind: 'new', ean, store, price, available, date: asOf };
    }

    if (asOf < state.last_updated) {
      logger.warn({ ean, store, asOf, lastUpdated: state.last_updated }, 'Observation is older than the store record, ignoring');
      return { kind: 'no_change', ean, store };
    }

    const previousPrice = state.current_price;
    const previousAvailable = state.available;
    state.url = observation.url || state.url;
    state.last_updated = asOf;

    const moved = priceMoved(previousPrice, price);
    const flipped = previousAvailable !== available;
    if (!moved && !flipped) {
      return { kind: 'no_change', ean, store };
    }

    // Same-day observations collapse into that day's event for the store.
    const sameDay = this.lastStoreEvent(history, store);
    if (sameDay && sameDay.date === asOf) {
      if (isStoreInitialEvent(sameDay)) {
        sameDay.price = price;
        sameDay.available = available;
        state.current_price = price;
        state.available = available;
        return { kind: 'no_change', ean, store };
      }
      return this.supersedeSameDay(history, ean, store, sameDay, price, available);
    }

    const event: StoreChangeEvent = { date: asOf, store, available };
    if (moved) {
      event.from = previousPrice;
      event.to = price;
      event.change_pct = changePct(previousPrice, price);
    }
    if (flipped) {
      event.availability_changed = true;
      event.from_available = previousAvailable;
    }
    history.price_changes.push(event);
    state.current_price = price;
    state.available = available;

    const availability = flipped ? { from: previousAvailable, to: available } : undefined;
    if (moved) {
      logger.info({ ean, store, from: previousPrice, to: price, available }, 'Store price change detected');
      return {
        kind: 'changed',
        ean,
        store,
        date: asOf,
        from: previousPrice,
        to: price,
        changePct: changePct(previousPrice, price),
        ...(availability ? { availability } : {}),
      };
    }

    logger.info({ ean, store, available }, 'Store availability changed');
    return { kind: 'availability_changed', ean, store, date: asOf, availability: { from: previousAvailable, to: available } };
  }

  private lastStoreEvent(history: EanProductHistory, store: string): StorePriceEvent | undefined {
    for (let i = history.price_changes.length - 1; i >= 0; i--) {
      if (history.price_changes[i].store === store) return history.price_changes[i];
    }
    return undefined;
  }

  /**
   * Rebuild today's event for a store against the state it had before today.
   * The event disappears if the store is back where it started the day.
   */
  private supersedeSameDay(
    history: EanProductHistory,
    ean: string,
    store: string,
    event: StoreChangeEvent,
    price: number,
    available: boolean
  ): StoreChangeOutcome {
    const state = history.stores[store];
    const baseAvailable = event.availability_changed ? event.from_available ?? !event.available : event.available;
    const basePrice = event.from ?? state.current_price ?? price;

    const moved = priceMoved(basePrice, price);
    const flipped = baseAvailable !== available;
    state.current_price = price;
    state.available = available;

    delete event.from;
    delete event.to;
    delete event.change_pct;
    delete event.availability_changed;
    delete event.from_available;
    event.available = available;

    if (!moved && !flipped) {
      history.price_changes.splice(history.price_changes.indexOf(event), 1);
      state.current_price = basePrice;
      return { kind: 'no_change', ean, store };
    }
    if (moved) {
      event.from = basePrice;
      event.to = price;
      event.change_pct = changePct(basePrice, price);
    }
    if (flipped) {
      event.availability_changed = true;
      event.from_available = baseAvailable;
    }

    const availability = flipped ? { from: baseAvailable, to: available } : undefined;
    if (moved) {
      return {
        kind: 'changed',
        ean,
        store,
        date: event.date,
        from: basePrice,
        to: price,
        changePct: changePct(basePrice, price),
        ...(availability ? { availability } : {}),
      };
    }
    return { kind: 'availability_changed', ean, store, date: event.date, availability: { from: baseAvailable, to: available } };
  }

  /**
   * Record today's cheapest in-stock offer for a product and report whether
   * it is a drop against the cross-store lowest of the most recent earlier
   * day. Later runs on the same day compare against that same reference and
   * report only a price below what an earlier run already reported.
   * With nothing in stock the previous lowest is kept so the next in-stock
   * day compares against it.
   */
  updateCrossStoreLowest(ean: string, name: string, lowest: LowestOffer | null, asOf: DayKey = today()): CrossStoreUpdate {
    const previousAllTimeLowest = this.data[ean]?.all_time_lowest ?? null;
    if (ean in this.retained) {
      return { ean, name, date: asOf, lowest, previous: null, dropped: false, previousAllTimeLowest: null, isAllTimeLow: false };
    }

    const history = this.ensureProduct(ean, name);
    const latest = history.current_lowest ? { ...history.current_lowest } : null;
    const atlBefore = previousAllTimeLowest ? { ...previousAllTimeLowest } : null;

    if (!lowest) {
      return { ean, name: history.name, date: asOf, lowest: null, previous: latest, dropped: false, previousAllTimeLowest: atlBefore, isAllTimeLow: false };
    }

    const sameDay = latest !== null && latest.date === asOf;
    if (latest && !sameDay) {
      history.previous_day_lowest = latest;
    }
    const reference = sameDay ? history.previous_day_lowest ?? null : latest;

    const isDrop = (price: number) => reference !== null && price < reference.price - PRICE_EPSILON;
    const alreadyReported = sameDay && latest !== null && isDrop(latest.price) && lowest.price >= latest.price - PRICE_EPSILON;
    const dropped = isDrop(lowest.price) && !alreadyReported;

    history.current_lowest = { price: lowest.price, store: lowest.store, url: lowest.url, date: asOf };
    if (!history.all_time_lowest || lowest.price < history.all_time_lowest.price) {
      history.all_time_lowest = { price: lowest.price, store: lowest.store, date: asOf, url: lowest.url };
    }

    const isAllTimeLow = atlBefore === null || lowest.price <= atlBefore.price;
    if (dropped) {
      logger.info({ ean, from: reference?.price, to: lowest.price, store: lowest.store, isAllTimeLow }, 'Cross-store price drop');
    }

    return { ean, name: history.name, date: asOf, lowest, previous: reference, dropped, previousAllTimeLowest: atlBefore, isAllTimeLow };
  }

  // ===========================================================================
  // RETENTION
  // ===========================================================================

  /**
   * Drop events dated before `now - retentionDays`, keeping each store's
   * initial event and most recent event.
   */
  cleanup(retentionDays: number, now: Date = new Date()): number {
    const cutoff = daysBefore(retentionDays, now);
    let removed = 0;

    for (const history of Object.values(this.data)) {
      const events = history.price_changes;
      const lastIndexByStore = new Map<string, number>();
      events.forEach((event, index) => lastIndexByStore.set(event.store, index));

      const kept = events.filter(
        (event, index) =>
          event.date >= cutoff || lastIndexByStore.get(event.store) === index || isStoreInitialEvent(event)
      );
      removed += events.length - kept.length;
      history.price_changes = kept;
    }

    if (removed > 0) {
      logger.info({ removed, retentionDays }, 'Pruned old store price events');
    }
    return removed;
  }

  save(path: string | null = this.path): void {
    if (!path) throw new Error('EanHistoryStore.save: no path given');
    writeHistoryFile(path, { ...this.retained, ...this.data });
    logger.info({ path, products: this.size, retained: this.retainedKeys().length }, 'EAN price history saved');
  }
}
