/**
 * Notification trigger: decides what, if anything, a cycle reports.
 *
 * Silence is the default. A cycle that observed nothing at all raises a
 * failure alert; otherwise only real changes are sent.
 */

import { createLogger } from '../utils/logger';
import { formatDisplayDate } from '../utils/dates';
import { round2 } from '../history/events';
import type { ChangeOutcome, CrossStoreUpdate } from '../history/types';
import type { EanDropNotice, Notifier, ObservationFailure, PriceChangeNotice } from './types';

const logger = createLogger('notification-trigger');

export const SUSPECTED_CAUSES = [
  'Product URLs have changed',
  'Website structure updated',
  'Products out of stock or discontinued',
  'Anti-bot measures blocking access',
  'Network connectivity issues',
] as const;

/**
 * Map `changed` outcomes to notices; `new` and `no_change` are dropped.
 */
export function collectPriceChangeNotices(
  outcomes: ChangeOutcome[],
  siteOf: (productKey: string) => string | null = () => null
): PriceChangeNotice[] {
  const notices: PriceChangeNotice[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind !== 'changed') continue;
    notices.push({
      productKey: outcome.productKey,
      name: outcome.name,
      site: siteOf(outcome.productKey),
      currentPrice: outcome.to,
      previousPrice: outcome.from,
      changePct: outcome.changePct,
      originalPrice: outcome.originalPrice,
      discountPercent: outcome.discountPct,
      purchaseUrl: outcome.url,
      changeDate: outcome.date,
      lowestPrice: outcome.previousLowest?.price ?? null,
      lowestPriceDate: outcome.previousLowest ? formatDisplayDate(outcome.previousLowest.date) : null,
    });
  }
  return notices;
}

/**
 * Map cross-store updates that dropped to notices. `storePrices` holds the
 * in-stock prices seen this cycle, keyed by EAN then store.
 */
export function collectEanDropNotices(
  updates: CrossStoreUpdate[],
  storePrices: Record<string, Record<string, number>> = {}
): EanDropNotice[] {
  const notices: EanDropNotice[] = [];
  for (const update of updates) {
    if (!update.dropped || !update.lowest || !update.previous) continue;
    const atl = update.previousAllTimeLowest;
    notices.push({
      ean: update.ean,
      name: update.name,
      store: update.lowest.store,
      url: update.lowest.url,
      currentPrice: update.lowest.price,
      previousPrice: update.previous.price,
      savings: round2(update.previous.price - update.lowest.price),
      isAllTimeLow: update.isAllTimeLow,
      allTimePrice: atl?.price ?? null,
      allTimeDate: atl?.date ?? null,
      allTimeStore: atl?.store ?? null,
      allStorePrices: storePrices[update.ean] ?? {},
    });
  }
  return notices;
}

export interface CycleNotificationInput {
  cycle: 'monitor' | 'ean-monitor';
  attempted: number;
  observed: number;
  failures: ObservationFailure[];
  priceNotices?: PriceChangeNotice[];
  eanNotices?: EanDropNotice[];
}

export type DispatchKind = 'failure' | 'price_alert' | 'ean_alert' | 'none';

export interface DispatchResult {
  kind: DispatchKind;
  delivered: boolean;
}

export async function dispatchCycleNotifications(notifier: Notifier, input: CycleNotificationInput): Promise<DispatchResult> {
  if (input.observed === 0) {
    logger.warn({ cycle: input.cycle, attempted: input.attempted }, 'No products observed, sending failure alert');
    const delivered = await notifier.notifyScrapeFailure({
      cycle: input.cycle,
      attempted: input.attempted,
      failures: input.failures,
      suspectedCauses: [...SUSPECTED_CAUSES],
    });
    return { kind: 'failure', delivered };
  }

  const priceNotices = input.priceNotices ?? [];
  if (priceNotices.length > 0) {
    logger.info({ count: priceNotices.length, notifier: notifier.name }, 'Sending price change alert');
    return { kind: 'price_alert', delivered: await notifier.notifyPriceChanges(priceNotices) };
  }

  const eanNotices = input.eanNotices ?? [];
  if (eanNotices.length > 0) {
    logger.info({ count: eanNotices.length, notifier: notifier.name }, 'Sending multi-store drop alert');
    return { kind: 'ean_alert', delivered: await notifier.notifyEanPriceDrops(eanNotices) };
  }

  logger.info({ cycle: input.cycle }, 'No price changes, no notification sent');
  return { kind: 'none', delivered: true };
}
