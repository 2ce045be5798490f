/**
 * Price Analyzer - trend, deal and seasonal analytics over change events
 *
 * Everything here is a pure read of the event history. Histories only contain
 * the days on which a price changed, so averages and seasonal buckets are
 * weighted by change events rather than by calendar days.
 */

import { daysAgo, monthName, today, type DayKey } from '../utils/dates';
import { eventPrice, isValidPrice, round1, round2 } from '../history/events';
import type { AllTimeLowest, PriceChangeEvent, ProductHistory, ProductHistoryFile } from '../history/types';

// =============================================================================
// HELPERS
// =============================================================================

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1); 0 for fewer than two values. */
function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squaredDiffs = values.map((v) => (v - avg) ** 2);
  return Math.sqrt(squaredDiffs.reduce((s, d) => s + d, 0) / (values.length - 1));
}

interface PricePoint {
  price: number;
  date: DayKey;
}

function pricePoints(events: PriceChangeEvent[]): PricePoint[] {
  const points: PricePoint[] = [];
  for (const event of events) {
    const price = eventPrice(event);
    if (isValidPrice(price)) points.push({ price, date: event.date });
  }
  return points;
}

// =============================================================================
// TYPES
// =============================================================================

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface TrendAnalysis {
  trend: TrendDirection;
  /** 0-100, ten points per percent of total change */
  trendStrength: number;
  totalChange: number;
  totalChangePercent: number;
  recentChange: number;
  recentChangePercent: number;
  totalPriceChanges: number;
  analysis: 'available' | 'insufficient_data';
}

export interface BestDeal {
  price: number;
  date: DayKey;
  daysAgo: number;
  isAllTimeLowest?: true;
}

export type SeasonalPatterns =
  | { analysis: 'insufficient_data'; message: string }
  | {
      analysis: 'available';
      monthlyAverages: Record<string, number>;
      bestMonth: { month: string; averagePrice: number };
      worstMonth: { month: string; averagePrice: number };
      seasonalVariation: number;
      note: string;
    };

export interface PriceStatistics {
  currentPrice: number;
  lowestPrice: number;
  highestPrice: number;
  averagePrice: number;
  priceVolatility: number;
  totalPriceChanges: number;
}

export interface ProductAnalysis {
  productKey: string;
  productName: string;
  purchaseUrl: string;
  priceStatistics: PriceStatistics;
  trends: TrendAnalysis;
  bestDeals: BestDeal[];
  seasonalPatterns: SeasonalPatterns;
  priceChangesCount: number;
  trackingPeriod: { startDate: DayKey; endDate: DayKey };
}

export interface PortfolioInsights {
  totalProductsAnalyzed: number;
  totalSavingsPotential: number;
  trendDistribution: Record<TrendDirection, number>;
  averagePriceChanges: number;
  priceRanges: {
    lowestCurrentPrice: number | null;
    highestCurrentPrice: number | null;
    averageCurrentPrice: number | null;
  };
}

export interface ProductOverview {
  key: string;
  name: string;
  currentPrice: number;
  priceChangesCount: number;
  lastUpdated: DayKey;
}

// =============================================================================
// TREND
// =============================================================================

/**
 * Direction and strength of the move from the first event to the last.
 * The recent change is the last event's own delta.
 */
export function analyzeTrend(events: PriceChangeEvent[]): TrendAnalysis {
  const insufficient: TrendAnalysis = {
    trend: 'stable',
    trendStrength: 0,
    totalChange: 0,
    totalChangePercent: 0,
    recentChange: 0,
    recentChangePercent: 0,
    totalPriceChanges: events.length,
    analysis: 'insufficient_data',
  };
  if (events.length < 2) return insufficient;

  const first = eventPrice(events[0]);
  const lastEvent = events[events.length - 1];
  const last = eventPrice(lastEvent);
  if (!isValidPrice(first) || !isValidPrice(last)) return insufficient;

  const totalChange = last - first;
  const totalChangePct = (totalChange / first) * 100;

  let recentChange = 0;
  let recentChangePct = 0;
  if ('from' in lastEvent) {
    recentChange = lastEvent.to - lastEvent.from;
    recentChangePct = lastEvent.change_pct;
  }

  let trend: TrendDirection = 'stable';
  if (Math.abs(totalChangePct) >= 1) {
    trend = totalChangePct > 0 ? 'increasing' : 'decreasing';
  }

  return {
    trend,
    trendStrength: round1(Math.min(Math.abs(totalChangePct) * 10, 100)),
    totalChange: round2(totalChange),
    totalChangePercent: round1(totalChangePct),
    recentChange: round2(recentChange),
    recentChangePercent: round1(recentChangePct),
    totalPriceChanges: events.length,
    analysis: 'available',
  };
}

// =============================================================================
// BEST DEALS
// =============================================================================

/**
 * Up to three cheapest event prices, cheapest first. The all-time lowest is
 * put in front when none of them matches its price, which happens once
 * retention has pruned the event that set it.
 */
export function findBestDeals(
  events: PriceChangeEvent[],
  allTimeLowest: AllTimeLowest | null,
  now: Date = new Date()
): BestDeal[] {
  const points = pricePoints(events);
  if (points.length === 0) return [];

  const deals: BestDeal[] = [];
  for (const point of [...points].sort((a, b) => a.price - b.price).slice(0, 3)) {
    const age = daysAgo(point.date, now);
    if (age === null) continue;
    deals.push({ price: point.price, date: point.date, daysAgo: age });
  }

  if (allTimeLowest && isValidPrice(allTimeLowest.price)) {
    const atlPrice = allTimeLowest.price;
    const age = daysAgo(allTimeLowest.date, now);
    if (age !== null && !deals.some((deal) => deal.price === atlPrice)) {
      deals.unshift({ price: atlPrice, date: allTimeLowest.date, daysAgo: age, isAllTimeLowest: true });
    }
  }

  return deals.slice(0, 3);
}

// =============================================================================
// SEASONAL
// =============================================================================

/**
 * Average event price per month name. Months with the same name are pooled
 * across years, so every January contributes to one bucket.
 */
export function analyzeSeasonalPatterns(events: PriceChangeEvent[]): SeasonalPatterns {
  if (events.length < 3) {
    return { analysis: 'insufficient_data', message: 'Need at least 3 price changes for seasonal analysis' };
  }

  const byMonth = new Map<string, number[]>();
  for (const point of pricePoints(events)) {
    const month = monthName(point.date);
    if (!month) continue;
    const bucket = byMonth.get(month) ?? [];
    bucket.push(point.price);
    byMonth.set(month, bucket);
  }

  if (byMonth.size < 2) {
    return {
      analysis: 'insufficient_data',
      message: 'Need price changes from multiple months for seasonal analysis',
    };
  }

  const averages: Array<[string, number]> = [...byMonth.entries()].map(([month, prices]) => [month, mean(prices)]);
  let best = averages[0];
  let worst = averages[0];
  for (const entry of averages) {
    if (entry[1] < best[1]) best = entry;
    if (entry[1] > worst[1]) worst = entry;
  }

  return {
    analysis: 'available',
    monthlyAverages: Object.fromEntries(averages.map(([month, avg]) => [month, round2(avg)])),
    bestMonth: { month: best[0], averagePrice: round2(best[1]) },
    worstMonth: { month: worst[0], averagePrice: round2(worst[1]) },
    seasonalVariation: round2(worst[1] - best[1]),
    note: 'Based on price change events, not daily snapshots',
  };
}

// =============================================================================
// PER-PRODUCT
// =============================================================================

/**
 * Full analysis of one product. Returns null when the history holds no usable
 * price at all.
 */
export function analyzeProduct(productKey: string, history: ProductHistory, now: Date = new Date()): ProductAnalysis | null {
  const events = history.price_changes;
  let points = pricePoints(events);
  const currentPrice = history.current?.price ?? (points.length > 0 ? points[points.length - 1].price : null);

  if (points.length === 0 && isValidPrice(currentPrice)) {
    points = [{ price: currentPrice, date: today(now) }];
  }
  if (points.length === 0 || !isValidPrice(currentPrice)) return null;

  const prices = points.map((p) => p.price);

  return {
    productKey,
    productName: history.name || 'Unknown Product',
    purchaseUrl: history.purchase_url,
    priceStatistics: {
      currentPrice,
      lowestPrice: history.all_time_lowest?.price ?? Math.min(...prices),
      highestPrice: Math.max(...prices),
      averagePrice: round2(mean(prices)),
      priceVolatility: round2(sampleStdDev(prices)),
      totalPriceChanges: events.length,
    },
    trends: analyzeTrend(events),
    bestDeals: findBestDeals(events, history.all_time_lowest, now),
    seasonalPatterns: analyzeSeasonalPatterns(events),
    priceChangesCount: events.length,
    trackingPeriod: { startDate: points[0].date, endDate: points[points.length - 1].date },
  };
}

// =============================================================================
// PORTFOLIO
// =============================================================================

export function analyzeAll(histories: ProductHistoryFile, now: Date = new Date()): ProductAnalysis[] {
  const analyses: ProductAnalysis[] = [];
  for (const [key, history] of Object.entries(histories)) {
    const analysis = analyzeProduct(key, history, now);
    if (analysis) analyses.push(analysis);
  }
  return analyses;
}

/**
 * Aggregate view across every analyzable product. Savings potential is the
 * sum of `current - lowest` over products priced above their all-time low.
 * Returns null when nothing can be analyzed.
 */
export function calculatePortfolioInsights(histories: ProductHistoryFile, now: Date = new Date()): PortfolioInsights | null {
  const analyses = analyzeAll(histories, now);
  if (analyses.length === 0) return null;

  let savings = 0;
  const trendDistribution: Record<TrendDirection, number> = { increasing: 0, decreasing: 0, stable: 0 };
  for (const analysis of analyses) {
    const { currentPrice, lowestPrice } = analysis.priceStatistics;
    if (currentPrice > lowestPrice) savings += currentPrice - lowestPrice;
    trendDistribution[analysis.trends.trend]++;
  }

  const currentPrices = analyses.map((a) => a.priceStatistics.currentPrice);

  return {
    totalProductsAnalyzed: analyses.length,
    totalSavingsPotential: round2(savings),
    trendDistribution,
    averagePriceChanges: round1(mean(analyses.map((a) => a.priceChangesCount))),
    priceRanges: {
      lowestCurrentPrice: Math.min(...currentPrices),
      highestCurrentPrice: Math.max(...currentPrices),
      averageCurrentPrice: round2(mean(currentPrices)),
    },
  };
}

/** One line per product that has a current price. */
export function summarizeProducts(histories: ProductHistoryFile): { totalProducts: number; products: ProductOverview[] } {
  const products: ProductOverview[] = [];
  for (const [key, history] of Object.entries(histories)) {
    if (!history.current) continue;
    products.push({
      key,
      name: history.name || 'Unknown',
      currentPrice: history.current.price,
      priceChangesCount: history.price_changes.length,
      lastUpdated: history.current.since,
    });
  }
  return { totalProducts: Object.keys(histories).length, products };
}
