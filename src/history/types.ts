/**
 * Price History Types
 *
 * Persisted shapes use snake_case field names: they are the on-disk format
 * of `price_history.json` / `ean_price_history.json` and the migrator reads
 * files written by earlier versions.
 */

import type { DayKey } from '../utils/dates';

// =============================================================================
// SINGLE-STORE HISTORY
// =============================================================================

export interface InitialEvent {
  date: DayKey;
  type: 'initial';
  price: number;
  original_price?: number | null;
  discount_pct?: number | null;
}

export interface ChangeEvent {
  date: DayKey;
  from: number;
  to: number;
  change_pct: number;
  original_price?: number | null;
  discount_pct?: number | null;
}

export type PriceChangeEvent = InitialEvent | ChangeEvent;

export interface CurrentState {
  price: number;
  original_price?: number | null;
  discount_pct?: number | null;
  since: DayKey;
}

export interface AllTimeLowest {
  price: number;
  date: DayKey;
  original_price?: number | null;
}

export interface ProductHistory {
  name: string;
  purchase_url: string;
  current: CurrentState | null;
  all_time_lowest: AllTimeLowest | null;
  price_changes: PriceChangeEvent[];
}

export type ProductHistoryFile = Record<string, ProductHistory>;

// =============================================================================
// MULTI-STORE (EAN) HISTORY
// =============================================================================

export interface StoreState {
  url: string;
  current_price: number | null;
  available: boolean;
  last_updated: DayKey;
}

export interface StoreInitialEvent {
  date: DayKey;
  store: string;
  type: 'initial';
  /** Null in files whose first snapshot for the store had no price */
  price: number | null;
  available: boolean;
}

/**
 * A price move, an availability flip, or both. Price fields are present only
 * when the price moved; availability fields only when stock flipped.
 */
export interface StoreChangeEvent {
  date: DayKey;
  store: string;
  available: boolean;
  from?: number;
  to?: number;
  change_pct?: number;
  availability_changed?: true;
  from_available?: boolean;
}

export type StorePriceEvent = StoreInitialEvent | StoreChangeEvent;

export interface CrossStoreLowest {
  price: number;
  store: string;
  url: string;
  date?: DayKey;
}

export interface EanAllTimeLowest {
  price: number;
  store: string;
  date: DayKey;
  url: string;
}

export interface EanProductHistory {
  name: string;
  stores: Record<string, StoreState>;
  current_lowest: CrossStoreLowest | null;
  /** Lowest of the most recent day before `current_lowest.date` */
  previous_day_lowest?: CrossStoreLowest | null;
  all_time_lowest: EanAllTimeLowest | null;
  price_changes: StorePriceEvent[];
}

export type EanHistoryFile = Record<string, EanProductHistory>;

// =============================================================================
// OBSERVATIONS & OUTCOMES
// =============================================================================

export interface PriceObservation {
  name: string;
  url: string;
  price: number | null | undefined;
  originalPrice?: number | null;
  discountPct?: number | null;
}

export interface StorePriceObservation {
  url: string;
  price: number | null | undefined;
  available: boolean;
}

export interface NoChangeOutcome {
  kind: 'no_change';
  productKey: string;
}

export interface NewProductOutcome {
  kind: 'new';
  productKey: string;
  name: string;
  price: number;
  date: DayKey;
}

export interface PriceChangedOutcome {
  kind: 'changed';
  productKey: string;
  name: string;
  url: string;
  date: DayKey;
  from: number;
  to: number;
  changePct: number;
  originalPrice: number | null;
  discountPct: number | null;
  /** All-time lowest as it stood before this observation */
  previousLowest: AllTimeLowest | null;
}

export type ChangeOutcome = NoChangeOutcome | NewProductOutcome | PriceChangedOutcome;

export interface AvailabilityDelta {
  from: boolean;
  to: boolean;
}

export type StoreChangeOutcome =
  | { kind: 'no_change'; ean: string; store: string }
  | { kind: 'new'; ean: string; store: string; price: number; available: boolean; date: DayKey }
  | {
      kind: 'changed';
      ean: string;
      store: string;
      date: DayKey;
      from: number;
      to: number;
      changePct: number;
      availability?: AvailabilityDelta;
    }
  | { kind: 'availability_changed'; ean: string; store: string; date: DayKey; availability: AvailabilityDelta };

export interface LowestOffer {
  store: string;
  price: number;
  url: string;
}

export interface CrossStoreUpdate {
  ean: string;
  name: string;
  date: DayKey;
  /** Today's cheapest in-stock offer; null when nothing was in stock */
  lowest: LowestOffer | null;
  /** Cross-store lowest of the most recent earlier day */
  previous: CrossStoreLowest | null;
  /** Today's lowest is more than a cent below `previous` and not yet reported today */
  dropped: boolean;
  previousAllTimeLowest: EanAllTimeLowest | null;
  isAllTimeLow: boolean;
}

export interface PriceSummaryItem {
  key: string;
  name: string;
  currentPrice: number;
  originalPrice: number | null;
  discountPercent: number | null;
  purchaseUrl: string;
  trend: 'up' | 'down' | 'stable';
  trendChange: number;
  lastUpdated: DayKey;
}

export interface PriceSummary {
  totalProducts: number;
  products: PriceSummaryItem[];
}
