/**
 * Monitoring cycle - products tracked by EAN across several stores
 */

import { createLogger } from '../utils/logger';
import { toDayKey } from '../utils/dates';
import { EanHistoryStore, findLowestInStock } from '../history/ean-store';
import type { CrossStoreUpdate, StorePriceObservation } from '../history/types';
import type { TrackedEan } from '../tracking/config';
import { collectEanDropNotices, dispatchCycleNotifications, type DispatchResult } from '../notifications/trigger';
import type { Notifier } from '../notifications/types';
import { emptyTally, type ObservationTally, type SourceResolver } from './cycle';

const logger = createLogger('ean-monitor');

export interface EanCycleOptions {
  store: EanHistoryStore;
  products: TrackedEan[];
  sourceFor: SourceResolver;
  notifier: Notifier;
  retentionDays: number;
  now?: Date;
}

export interface StoreQuote {
  store: string;
  price: number;
  available: boolean;
}

/** In-stock stores first, cheapest first within each group. */
export function orderQuotes(quotes: StoreQuote[]): StoreQuote[] {
  return [...quotes].sort((a, b) => {
    if (a.available !== b.available) return a.available ? -1 : 1;
    return a.price - b.price;
  });
}

export interface EanCycleResult extends ObservationTally {
  success: boolean;
  /** EANs with at least one observed store */
  productsObserved: number;
  drops: number;
  prunedEvents: number;
  notification: DispatchResult;
}

export async function runEanCycle(options: EanCycleOptions): Promise<EanCycleResult> {
  const { store, products, sourceFor, notifier, retentionDays } = options;
  const now = options.now ?? new Date();
  const asOf = toDayKey(now);
  const tally = emptyTally();
  const updates: CrossStoreUpdate[] = [];
  const storePrices: Record<string, Record<string, number>> = {};
  let productsObserved = 0;

  logger.info({ products: products.length, date: asOf }, 'Starting multi-store monitoring cycle');

  for (const product of products) {
    const observations: Record<string, StorePriceObservation> = {};
    const quotes: StoreQuote[] = [];

    for (const { store: storeName, url } of product.stores) {
      tally.attempted++;
      const ref = { site: storeName, url, name: product.name };
      const result = await sourceFor(ref).observe(ref);
      if (result.status !== 'observed') {
        if (result.status === 'error') tally.errors++;
        else tally.unavailable++;
        tally.failures.push({ ref: `${product.name} @ ${storeName}`, reason: result.reason });
        continue;
      }

      tally.observed++;
      const observation: StorePriceObservation = {
        url: result.product.url,
        price: result.product.price,
        available: result.product.available,
      };
      observations[storeName] = observation;
      if (result.product.price !== null) {
        quotes.push({ store: storeName, price: result.product.price, available: result.product.available });
      }
      store.recordStoreObservation(product.ean, product.name, storeName, observation, asOf);
    }

    if (Object.keys(observations).length === 0) {
      logger.warn({ ean: product.ean, name: product.name }, 'No store could be observed for product');
      continue;
    }
    productsObserved++;

    const lowest = findLowestInStock(observations);
    updates.push(store.updateCrossStoreLowest(product.ean, product.name, lowest, asOf));

    const inStock: Record<string, number> = {};
    for (const quote of quotes) {
      if (quote.available) inStock[quote.store] = quote.price;
    }
    storePrices[product.ean] = inStock;

    logger.info(
      {
        ean: product.ean,
        name: product.name,
        lowest: lowest ? `${lowest.price} @ ${lowest.store}` : null,
        stores: orderQuotes(quotes).map((q) => `${q.store}: ${q.price}${q.available ? '' : ' (out of stock)'}`),
      },
      'Store prices'
    );
  }

  const prunedEvents = store.cleanup(retentionDays, now);
  if (tally.observed > 0 && store.path) {
    store.save();
  }

  const eanNotices = collectEanDropNotices(updates, storePrices);
  const notification = await dispatchCycleNotifications(notifier, {
    cycle: 'ean-monitor',
    attempted: tally.attempted,
    observed: tally.observed,
    failures: tally.failures,
    eanNotices,
  });

  const result: EanCycleResult = {
    ...tally,
    success: tally.observed > 0,
    productsObserved,
    drops: eanNotices.length,
    prunedEvents,
    notification,
  };

  logger.info(
    { attempted: result.attempted, observed: result.observed, productsObserved, drops: result.drops },
    result.success ? 'Multi-store monitoring cycle complete' : 'Multi-store monitoring cycle failed'
  );
  return result;
}
