/**
 * Notification Types
 */

import type { DayKey } from '../utils/dates';
import type { AnalysisReport } from '../analytics/report';

// =============================================================================
// NOTICES
// =============================================================================

/** One single-store price change worth telling someone about. */
export interface PriceChangeNotice {
  productKey: string;
  name: string;
  site: string | null;
  currentPrice: number;
  previousPrice: number;
  changePct: number;
  originalPrice: number | null;
  discountPercent: number | null;
  purchaseUrl: string;
  changeDate: DayKey;
  /** All-time lowest before this change */
  lowestPrice: number | null;
  /** Display form, e.g. `Jul 04, 2025` */
  lowestPriceDate: string | null;
}

/** A drop in the cheapest in-stock price of an EAN across stores. */
export interface EanDropNotice {
  ean: string;
  name: string;
  store: string;
  url: string;
  currentPrice: number;
  previousPrice: number;
  savings: number;
  isAllTimeLow: boolean;
  allTimePrice: number | null;
  allTimeDate: DayKey | null;
  allTimeStore: string | null;
  /** In-stock prices of every store seen this cycle */
  allStorePrices: Record<string, number>;
}

export interface ObservationFailure {
  ref: string;
  reason: string;
}

export interface ScrapeFailureReport {
  cycle: 'monitor' | 'ean-monitor';
  attempted: number;
  failures: ObservationFailure[];
  suspectedCauses: string[];
}

// =============================================================================
// NOTIFIER
// =============================================================================

/**
 * Delivery channel. Every method resolves to whether the message went out;
 * delivery problems are logged, never thrown.
 */
export interface Notifier {
  readonly name: string;
  notifyPriceChanges(notices: PriceChangeNotice[]): Promise<boolean>;
  notifyEanPriceDrops(notices: EanDropNotice[]): Promise<boolean>;
  notifyScrapeFailure(report: ScrapeFailureReport): Promise<boolean>;
  /** `null` means there was no history to analyze */
  sendReport(report: AnalysisReport | null): Promise<boolean>;
}

export interface RenderedEmail {
  subject: string;
  html: string;
}
