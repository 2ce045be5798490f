import { describe, it, expect } from 'vitest';
import {
  analyzeProduct,
  analyzeSeasonalPatterns,
  analyzeTrend,
  calculatePortfolioInsights,
  findBestDeals,
  summarizeProducts,
} from './price-analyzer';
import type { PriceChangeEvent, ProductHistory } from '../history/types';

// =============================================================================
// Helpers
// =============================================================================

// Noon keeps whole-day ages stable across a daylight-saving switch.
const NOW = new Date(2025, 3, 1, 12);

const EVENTS: PriceChangeEvent[] = [
  { date: '2025-01-10', type: 'initial', price: 40 },
  { date: '2025-02-15', from: 40, to: 30, change_pct: -25 },
  { date: '2025-03-20', from: 30, to: 36, change_pct: 20 },
];

function makeHistory(overrides: Partial<ProductHistory> = {}): ProductHistory {
  return {
    name: 'Whey 80 4 kg',
    purchase_url: 'https://example.test/whey',
    current: { price: 36, since: '2025-03-20' },
    all_time_lowest: { price: 30, date: '2025-02-15' },
    price_changes: EVENTS,
    ...overrides,
  };
}

// =============================================================================
// Trend
// =============================================================================

describe('analyzeTrend', () => {
  it('measures the move from the first event to the last', () => {
    expect(analyzeTrend(EVENTS)).toEqual({
      trend: 'decreasing',
      trendStrength: 100,
      totalChange: -4,
      totalChangePercent: -10,
      recentChange: 6,
      recentChangePercent: 20,
      totalPriceChanges: 3,
      analysis: 'available',
    });
  });

  it('calls moves under one percent stable', () => {
    const trend = analyzeTrend([
      { date: '2025-01-01', type: 'initial', price: 100 },
      { date: '2025-01-05', from: 100, to: 100.5, change_pct: 0.5 },
    ]);
    expect(trend.trend).toBe('stable');
    expect(trend.trendStrength).toBe(5);
  });

  it('needs at least two events', () => {
    const trend = analyzeTrend([EVENTS[0]]);
    expect(trend.analysis).toBe('insufficient_data');
    expect(trend.trend).toBe('stable');
    expect(trend.totalPriceChanges).toBe(1);
  });
});

// =============================================================================
// Best deals
// =============================================================================

describe('findBestDeals', () => {
  it('lists the cheapest event prices with their age', () => {
    expect(findBestDeals(EVENTS, { price: 30, date: '2025-02-15' }, NOW)).toEqual([
      { price: 30, date: '2025-02-15', daysAgo: 45 },
      { price: 36, date: '2025-03-20', daysAgo: 12 },
      { price: 40, date: '2025-01-10', daysAgo: 81 },
    ]);
  });

  it('puts a pruned all-time lowest first', () => {
    const deals = findBestDeals(EVENTS, { price: 25, date: '2024-12-01' }, NOW);

    expect(deals.map((d) => d.price)).toEqual([25, 30, 36]);
    expect(deals[0]).toEqual({ price: 25, date: '2024-12-01', daysAgo: 121, isAllTimeLowest: true });
  });

  it('returns nothing without events', () => {
    expect(findBestDeals([], { price: 25, date: '2024-12-01' }, NOW)).toEqual([]);
  });
});

// =============================================================================
// Seasonal
// =============================================================================

describe('analyzeSeasonalPatterns', () => {
  it('averages event prices by month', () => {
    expect(analyzeSeasonalPatterns(EVENTS)).toEqual({
      analysis: 'available',
      monthlyAverages: { January: 40, February: 30, March: 36 },
      bestMonth: { month: 'February', averagePrice: 30 },
      worstMonth: { month: 'January', averagePrice: 40 },
      seasonalVariation: 10,
      note: 'Based on price change events, not daily snapshots',
    });
  });

  it('pools the same month across years', () => {
    const patterns = analyzeSeasonalPatterns([
      { date: '2024-01-05', type: 'initial', price: 10 },
      { date: '2024-06-05', from: 10, to: 20, change_pct: 100 },
      { date: '2025-01-05', from: 20, to: 30, change_pct: 50 },
    ]);
    if (patterns.analysis !== 'available') throw new Error('expected seasonal data');
    expect(patterns.monthlyAverages).toEqual({ January: 20, June: 20 });
  });

  it('needs three events', () => {
    expect(analyzeSeasonalPatterns(EVENTS.slice(0, 2))).toEqual({
      analysis: 'insufficient_data',
      message: 'Need at least 3 price changes for seasonal analysis',
    });
  });

  it('needs more than one month', () => {
    const patterns = analyzeSeasonalPatterns([
      { date: '2025-01-01', type: 'initial', price: 10 },
      { date: '2025-01-10', from: 10, to: 12, change_pct: 20 },
      { date: '2025-01-20', from: 12, to: 11, change_pct: -8.3 },
    ]);
    expect(patterns).toEqual({
      analysis: 'insufficient_data',
      message: 'Need price changes from multiple months for seasonal analysis',
    });
  });
});

// =============================================================================
// Product & portfolio
// =============================================================================

describe('analyzeProduct', () => {
  it('combines statistics, trend, deals and seasonality', () => {
    const analysis = analyzeProduct('id_5854R', makeHistory(), NOW);

    expect(analysis?.productName).toBe('Whey 80 4 kg');
    expect(analysis?.priceStatistics).toEqual({
      currentPrice: 36,
      lowestPrice: 30,
      highestPrice: 40,
      averagePrice: 35.33,
      priceVolatility: 5.03,
      totalPriceChanges: 3,
    });
    expect(analysis?.trackingPeriod).toEqual({ startDate: '2025-01-10', endDate: '2025-03-20' });
    expect(analysis?.bestDeals).toHaveLength(3);
    expect(analysis?.priceChangesCount).toBe(3);
  });

  it('returns null without any price', () => {
    expect(analyzeProduct('x', makeHistory({ current: null, all_time_lowest: null, price_changes: [] }), NOW)).toBeNull();
  });
});

describe('calculatePortfolioInsights', () => {
  it('aggregates savings and trends across products', () => {
    const insights = calculatePortfolioInsights(
      {
        whey: makeHistory(),
        socks: makeHistory({
          name: 'Socks',
          current: { price: 10, since: '2025-01-01' },
          all_time_lowest: { price: 10, date: '2025-01-01' },
          price_changes: [{ date: '2025-01-01', type: 'initial', price: 10 }],
        }),
      },
      NOW
    );

    expect(insights).toEqual({
      totalProductsAnalyzed: 2,
      totalSavingsPotential: 6,
      trendDistribution: { increasing: 0, decreasing: 1, stable: 1 },
      averagePriceChanges: 2,
      priceRanges: { lowestCurrentPrice: 10, highestCurrentPrice: 36, averageCurrentPrice: 23 },
    });
  });

  it('returns null when nothing can be analyzed', () => {
    expect(calculatePortfolioInsights({}, NOW)).toBeNull();
  });
});

describe('summarizeProducts', () => {
  it('lists products that have a current price', () => {
    const summary = summarizeProducts({
      whey: makeHistory(),
      empty: makeHistory({ current: null, price_changes: [] }),
    });

    expect(summary.totalProducts).toBe(2);
    expect(summary.products).toEqual([
      { key: 'whey', name: 'Whey 80 4 kg', currentPrice: 36, priceChangesCount: 3, lastUpdated: '2025-03-20' },
    ]);
  });
});
