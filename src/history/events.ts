/**
 * Event helpers shared by the stores, the migrator and the analyzer.
 */

import type {
  InitialEvent,
  PriceChangeEvent,
  StoreInitialEvent,
  StorePriceEvent,
} from './types';

/** Prices closer than this are the same price. */
export const PRICE_EPSILON = 0.01;

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * True when two prices differ by more than a cent. The difference is rounded
 * first so that float noise (35.97 - 35.96 = 0.01000000000000156) does not
 * turn a one-cent wobble into a change.
 */
export function priceMoved(previous: number, next: number): boolean {
  return Math.abs(Math.round((next - previous) * 1e6) / 1e6) > PRICE_EPSILON;
}

/** Signed percentage change, one decimal. */
export function changePct(from: number, to: number): number {
  if (from === 0) return 0;
  return round1(((to - from) / from) * 100);
}

export function isValidPrice(price: number | null | undefined): price is number {
  return typeof price === 'number' && Number.isFinite(price) && price > 0;
}

export function isInitialEvent(event: PriceChangeEvent): event is InitialEvent {
  return 'type' in event && event.type === 'initial';
}

export function isStoreInitialEvent(event: StorePriceEvent): event is StoreInitialEvent {
  return 'type' in event && event.type === 'initial';
}

/** Price the product had after this event. */
export function eventPrice(event: PriceChangeEvent): number {
  return isInitialEvent(event) ? event.price : event.to;
}

/** Price after this store event, or null for an availability-only event. */
export function storeEventPrice(event: StorePriceEvent): number | null {
  if (isStoreInitialEvent(event)) return event.price;
  return event.to ?? null;
}
