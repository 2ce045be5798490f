/**
 * Periodic analysis report: per-product analyses plus a portfolio summary
 * with market sentiment. Rendering lives in notifications/email-templates.
 */

import { writeFileSync } from 'fs';
import { join } from 'path';
import { createLogger } from '../utils/logger';
import { MONTH_NAMES, today, type DayKey } from '../utils/dates';
import { round2 } from '../history/events';
import type { ProductHistoryFile } from '../history/types';
import { analyzeAll, type ProductAnalysis } from './price-analyzer';

const logger = createLogger('analysis-report');

export type MarketSentiment = 'bullish' | 'bearish' | 'mixed' | 'unknown';

export interface RecentDeal {
  product: string;
  price: number;
  daysAgo: number;
}

export interface ReportSummary {
  totalProductsTracked: number;
  totalSavingsPotential: number;
  priceTrends: { increasing: number; decreasing: number; stable: number };
  recentBestDeals: RecentDeal[];
  marketSentiment: MarketSentiment;
}

export interface AnalysisReport {
  reportDate: DayKey;
  reportPeriod: string;
  products: Record<string, ProductAnalysis>;
  summary: ReportSummary | null;
}

const QUARTER_BEFORE: Record<number, string> = { 0: 'Q4', 3: 'Q1', 6: 'Q2', 9: 'Q3' };

/**
 * Reports sent in January, April, July and October cover the quarter that
 * just ended; any other month covers the previous month.
 */
export function determineReportPeriod(now: Date = new Date()): string {
  const month = now.getMonth();
  const quarter = QUARTER_BEFORE[month];
  if (quarter) {
    const year = month === 0 ? now.getFullYear() - 1 : now.getFullYear();
    return `${quarter} ${year} Quarterly Report`;
  }
  const previous = new Date(now.getFullYear(), month - 1, 1);
  return `${MONTH_NAMES[previous.getMonth()]} ${previous.getFullYear()} Monthly Report`;
}

/** More than 60% of products rising is bullish, more than 60% falling bearish. */
export function determineMarketSentiment(up: number, down: number, total: number): MarketSentiment {
  if (total === 0) return 'unknown';
  if ((up / total) * 100 > 60) return 'bullish';
  if ((down / total) * 100 > 60) return 'bearish';
  return 'mixed';
}

export function summarizeAnalyses(analyses: ProductAnalysis[]): ReportSummary {
  let savings = 0;
  let up = 0;
  let down = 0;
  const deals: RecentDeal[] = [];

  for (const analysis of analyses) {
    const { currentPrice, lowestPrice } = analysis.priceStatistics;
    if (currentPrice > lowestPrice) savings += currentPrice - lowestPrice;
    if (analysis.trends.trend === 'increasing') up++;
    else if (analysis.trends.trend === 'decreasing') down++;

    const best = analysis.bestDeals[0];
    if (best) deals.push({ product: analysis.productName, price: best.price, daysAgo: best.daysAgo });
  }

  deals.sort((a, b) => a.daysAgo - b.daysAgo);

  return {
    totalProductsTracked: analyses.length,
    totalSavingsPotential: round2(savings),
    priceTrends: { increasing: up, decreasing: down, stable: analyses.length - up - down },
    recentBestDeals: deals.slice(0, 3),
    marketSentiment: determineMarketSentiment(up, down, analyses.length),
  };
}

/**
 * Build the report for every analyzable product. Returns null when the
 * history is empty.
 */
export function generateReport(histories: ProductHistoryFile, now: Date = new Date()): AnalysisReport | null {
  if (Object.keys(histories).length === 0) return null;

  const analyses = analyzeAll(histories, now);
  const products: Record<string, ProductAnalysis> = {};
  for (const analysis of analyses) products[analysis.productKey] = analysis;

  return {
    reportDate: today(now),
    reportPeriod: determineReportPeriod(now),
    products,
    summary: analyses.length > 0 ? summarizeAnalyses(analyses) : null,
  };
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `price_analysis_YYYY-MM-DD_HH-MM-SS` */
export function reportFileStem(now: Date = new Date()): string {
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `price_analysis_${today(now)}_${time}`;
}

/**
 * Write the report as JSON, and as HTML when `html` is given. Returns the
 * paths written.
 */
export function saveReportFiles(report: AnalysisReport, html: string | null, dir: string, now: Date = new Date()): string[] {
  const stem = join(dir, reportFileStem(now));
  const written = [`${stem}.json`];
  writeFileSync(written[0], `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  if (html !== null) {
    written.push(`${stem}.html`);
    writeFileSync(written[1], html, 'utf-8');
  }
  logger.info({ files: written }, 'Report files saved');
  return written;
}
