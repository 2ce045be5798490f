/**
 * Monitoring cycle - single-store products
 *
 * Observes every tracked product once, in order, records the prices, prunes
 * old events, saves the history, then decides what to notify.
 */

import { createLogger } from '../utils/logger';
import { toDayKey } from '../utils/dates';
import { PriceHistoryStore } from '../history/store';
import type { ChangeOutcome } from '../history/types';
import { productKeyFor } from '../sources/product-key';
import { StructuredDataSource } from '../sources/html-source';
import type { PageFetcher } from '../utils/http';
import type { ObservationSource, ProductRef } from '../sources/types';
import { collectPriceChangeNotices, dispatchCycleNotifications, type DispatchResult } from '../notifications/trigger';
import type { Notifier, ObservationFailure } from '../notifications/types';

const logger = createLogger('monitor');

export type SourceResolver = (ref: ProductRef) => ObservationSource;

/** One structured-data source per site, shared through the cycle's fetcher. */
export function createSourceResolver(fetcher: PageFetcher): SourceResolver {
  const sources = new Map<string, ObservationSource>();
  return (ref) => {
    let source = sources.get(ref.site);
    if (!source) {
      source = StructuredDataSource.forSite(fetcher, ref.site, ref.url);
      sources.set(ref.site, source);
    }
    return source;
  };
}

export interface ObservationTally {
  attempted: number;
  observed: number;
  unavailable: number;
  errors: number;
  failures: ObservationFailure[];
}

export interface MonitorCycleOptions {
  store: PriceHistoryStore;
  refs: ProductRef[];
  sourceFor: SourceResolver;
  notifier: Notifier;
  retentionDays: number;
  now?: Date;
}

export interface MonitorCycleResult extends ObservationTally {
  /** False when no product could be observed */
  success: boolean;
  newProducts: number;
  changes: number;
  prunedEvents: number;
  notification: DispatchResult;
}

export function emptyTally(): ObservationTally {
  return { attempted: 0, observed: 0, unavailable: 0, errors: 0, failures: [] };
}

export async function runMonitorCycle(options: MonitorCycleOptions): Promise<MonitorCycleResult> {
  const { store, refs, sourceFor, notifier, retentionDays } = options;
  const now = options.now ?? new Date();
  const asOf = toDayKey(now);
  const tally = emptyTally();
  const outcomes: ChangeOutcome[] = [];
  const siteByKey = new Map<string, string>();

  logger.info({ products: refs.length, date: asOf }, 'Starting monitoring cycle');

  for (const ref of refs) {
    tally.attempted++;
    const result = await sourceFor(ref).observe(ref);

    if (result.status === 'unavailable') {
      tally.unavailable++;
      tally.failures.push({ ref: ref.name ?? ref.url, reason: result.reason });
      continue;
    }
    if (result.status === 'error') {
      tally.errors++;
      tally.failures.push({ ref: ref.name ?? ref.url, reason: result.reason });
      continue;
    }

    tally.observed++;
    const product = result.product;
    const key = productKeyFor(ref, product);
    siteByKey.set(key, ref.site);
    outcomes.push(
      store.recordObservation(
        key,
        {
          name: product.name,
          url: product.url,
          price: product.price,
          originalPrice: product.originalPrice,
          discountPct: product.discountPct,
        },
        asOf
      )
    );
  }

  const prunedEvents = store.cleanup(retentionDays, now);
  if (tally.observed > 0 && store.path) {
    store.save();
  }

  const priceNotices = collectPriceChangeNotices(outcomes, (key) => siteByKey.get(key) ?? null);
  const notification = await dispatchCycleNotifications(notifier, {
    cycle: 'monitor',
    attempted: tally.attempted,
    observed: tally.observed,
    failures: tally.failures,
    priceNotices,
  });

  const result: MonitorCycleResult = {
    ...tally,
    success: tally.observed > 0,
    newProducts: outcomes.filter((o) => o.kind === 'new').length,
    changes: priceNotices.length,
    prunedEvents,
    notification,
  };

  logger.info(
    {
      attempted: result.attempted,
      observed: result.observed,
      unavailable: result.unavailable,
      errors: result.errors,
      newProducts: result.newProducts,
      changes: result.changes,
    },
    result.success ? 'Monitoring cycle complete' : 'Monitoring cycle failed'
  );
  return result;
}
