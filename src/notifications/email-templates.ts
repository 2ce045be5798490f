/**
 * Email Templates - HTML for price alerts, failure alerts and reports
 *
 * Simple inline CSS, table layout, no external dependencies.
 */

import { formatDisplayDate } from '../utils/dates';
import type { AnalysisReport, MarketSentiment } from '../analytics/report';
import type { TrendDirection } from '../analytics/price-analyzer';
import type { EanDropNotice, PriceChangeNotice, RenderedEmail, ScrapeFailureReport } from './types';

// =============================================================================
// SHARED STYLES
// =============================================================================

const COLORS = {
  primary: '#3498db',
  success: '#27ae60',
  warning: '#f39c12',
  danger: '#e74c3c',
  muted: '#95a5a6',
  text: '#2c3e50',
  textSecondary: '#7f8c8d',
  border: '#dadce0',
  bgLight: '#f8f9fa',
  bgDrop: '#f0f9f4',
  bgIncrease: '#fdf2f2',
  bgHighlight: '#e8f4fd',
  white: '#ffffff',
} as const;

const SITE_LABELS: Record<string, string> = {
  bjornborg: '🧦 Björn Borg',
  fitnesstukku: '💪 Fitnesstukku',
};

const SENTIMENT_COLORS: Record<MarketSentiment, string> = {
  bullish: COLORS.danger,
  bearish: COLORS.success,
  mixed: COLORS.warning,
  unknown: COLORS.muted,
};

const TREND_ICONS: Record<TrendDirection, string> = {
  increasing: '📈',
  decreasing: '📉',
  stable: '➡️',
};

export interface TemplateOptions {
  /** ISO currency code appended to amounts */
  currency?: string;
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function formatMoney(amount: number, currency = 'EUR'): string {
  return `${amount.toFixed(2)} ${currency}`;
}

function signed(n: number, digits: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(digits)}`;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function wrapLayout(title: string, heading: string, bodyContent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
</head>
<body style="margin: 0; padding: 0; background-color: ${COLORS.bgLight}; font-family: 'Segoe UI', Arial, sans-serif;">
  <table role="presentation" cellpadding="0" cellspacing="0" style="width: 100%; background-color: ${COLORS.bgLight};">
    <tr>
      <td style="padding: 24px 16px;">
        <table role="presentation" cellpadding="0" cellspacing="0" style="max-width: 640px; margin: 0 auto; width: 100%;">
          <!-- Header -->
          <tr>
            <td style="background-color: ${COLORS.text}; border-radius: 8px 8px 0 0; padding: 20px 24px;">
              <h1 style="margin: 0; color: ${COLORS.white}; font-size: 20px; font-weight: 600;">${escapeHtml(heading)}</h1>
            </td>
          </tr>
          <!-- Body -->
          <tr>
            <td style="background-color: ${COLORS.white}; padding: 24px; border-left: 1px solid ${COLORS.border}; border-right: 1px solid ${COLORS.border};">
              ${bodyContent}
            </td>
          </tr>
          <!-- Footer -->
          <tr>
            <td style="background-color: ${COLORS.bgLight}; border-radius: 0 0 8px 8px; padding: 16px 24px; border: 1px solid ${COLORS.border}; border-top: none;">
              <p style="margin: 0; font-size: 12px; color: ${COLORS.textSecondary}; text-align: center;">
                Sent by pricewatch, your automated price tracker.
              </p>
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

function buyButton(url: string): string {
  return `<a href="${escapeHtml(url)}" style="display: inline-block; background-color: ${COLORS.primary}; color: ${COLORS.white}; padding: 10px 22px; text-decoration: none; border-radius: 6px; font-weight: 600; margin-top: 12px;">🛒 Buy Now</a>`;
}

// =============================================================================
// PRICE ALERT
// =============================================================================

/**
 * Only drops, only increases, or a mix of both.
 */
export function priceAlertSubject(notices: PriceChangeNotice[]): string {
  const drops = notices.filter((n) => n.currentPrice < n.previousPrice).length;
  const increases = notices.filter((n) => n.currentPrice > n.previousPrice).length;
  if (drops > 0 && increases === 0) return `📉 ${drops} price drop(s)`;
  if (increases > 0 && drops === 0) return `📈 ${increases} price increase(s)`;
  return `${notices.length} price change(s)`;
}

function renderPriceChange(notice: PriceChangeNotice, currency: string): string {
  const delta = notice.currentPrice - notice.previousPrice;
  const isDrop = delta < 0;
  const color = isDrop ? COLORS.success : COLORS.danger;
  const label = isDrop ? '📉 PRICE DROP!' : '📈 Price Increase';

  const extras: string[] = [];
  if (notice.originalPrice !== null && notice.originalPrice > notice.currentPrice) {
    const totalDiscount = ((notice.originalPrice - notice.currentPrice) / notice.originalPrice) * 100;
    extras.push(
      `<p style="margin: 6px 0; color: ${COLORS.success}; font-weight: 600;">💰 Total discount: ${totalDiscount.toFixed(0)}% off (originally ${formatMoney(notice.originalPrice, currency)})</p>`
    );
  }
  if (notice.lowestPrice !== null) {
    const since = notice.lowestPriceDate ? ` on ${escapeHtml(notice.lowestPriceDate)}` : '';
    const isNewLow = notice.currentPrice < notice.lowestPrice;
    extras.push(
      `<p style="margin: 6px 0; font-size: 13px; color: ${COLORS.textSecondary};">${isNewLow ? '🏆 New all-time low! Previous lowest' : 'All-time lowest'}: ${formatMoney(notice.lowestPrice, currency)}${since}</p>`
    );
  }

  return `
    <div style="background-color: ${isDrop ? COLORS.bgDrop : COLORS.bgIncrease}; border-left: 4px solid ${color}; border-radius: 8px; padding: 16px; margin: 12px 0;">
      <h3 style="margin: 0 0 8px; font-size: 16px; color: ${COLORS.text};">${escapeHtml(notice.name)}</h3>
      <p style="margin: 6px 0; font-weight: 600;">${label}: ${signed(delta, 2)} ${currency} (${signed(notice.changePct, 1)}%)</p>
      <p style="margin: 6px 0; font-size: 18px; font-weight: 700;">Current price: <span style="color: ${color};">${formatMoney(notice.currentPrice, currency)}</span></p>
      <p style="margin: 6px 0;">Previous price: <span style="text-decoration: line-through; color: ${COLORS.textSecondary};">${formatMoney(notice.previousPrice, currency)}</span></p>
      ${extras.join('\n')}
      ${buyButton(notice.purchaseUrl)}
    </div>
  `;
}

/**
 * Price change alert, grouped by site in the order the sites first appear.
 */
export function renderPriceAlertEmail(notices: PriceChangeNotice[], options: TemplateOptions = {}): RenderedEmail {
  const currency = options.currency ?? 'EUR';
  const subject = priceAlertSubject(notices);

  const bySite = new Map<string, PriceChangeNotice[]>();
  for (const notice of notices) {
    const site = notice.site && SITE_LABELS[notice.site] ? notice.site : 'other';
    const group = bySite.get(site) ?? [];
    group.push(notice);
    bySite.set(site, group);
  }

  let sections = '';
  for (const [site, group] of bySite) {
    const label = SITE_LABELS[site] ?? '🌐 Other Sites';
    sections += `
      <h2 style="margin: 24px 0 8px; font-size: 18px; color: ${COLORS.text}; border-bottom: 1px solid ${COLORS.border}; padding-bottom: 6px;">${escapeHtml(label)} (${group.length} products)</h2>
      ${group.map((n) => renderPriceChange(n, currency)).join('')}
    `;
  }

  const bodyContent = `
    <div style="background-color: ${COLORS.bgHighlight}; border-left: 4px solid ${COLORS.primary}; border-radius: 8px; padding: 12px 16px;">
      <strong>📊 Summary:</strong> ${notices.length} price change(s) detected
    </div>
    ${sections}
  `;

  return { subject, html: wrapLayout(subject, '🛒 Price Alert', bodyContent) };
}

// =============================================================================
// EAN DROP ALERT
// =============================================================================

export function eanDropSubject(notices: EanDropNotice[]): string {
  const lows = notices.filter((n) => n.isAllTimeLow).length;
  const base = `📉 ${notices.length} price drop(s) across stores`;
  return lows > 0 ? `${base}, ${lows} at all-time low` : base;
}

function renderEanDrop(notice: EanDropNotice, currency: string): string {
  const storeRows = Object.entries(notice.allStorePrices)
    .sort((a, b) => a[1] - b[1])
    .map(
      ([store, price]) =>
        `<tr><td style="padding: 4px 12px; font-size: 13px;">${escapeHtml(store)}${store === notice.store ? ' ⭐' : ''}</td><td style="padding: 4px 12px; font-size: 13px; text-align: right;">${formatMoney(price, currency)}</td></tr>`
    )
    .join('\n');

  const allTime =
    notice.allTimePrice !== null
      ? `<p style="margin: 6px 0; font-size: 13px; color: ${COLORS.textSecondary};">${notice.isAllTimeLow ? '🏆 All-time low! Previous best' : 'All-time lowest'}: ${formatMoney(notice.allTimePrice, currency)}${notice.allTimeStore ? ` at ${escapeHtml(notice.allTimeStore)}` : ''}${notice.allTimeDate ? ` on ${formatDisplayDate(notice.allTimeDate)}` : ''}</p>`
      : '';

  return `
    <div style="background-color: ${COLORS.bgDrop}; border-left: 4px solid ${COLORS.success}; border-radius: 8px; padding: 16px; margin: 12px 0;">
      <h3 style="margin: 0 0 4px; font-size: 16px; color: ${COLORS.text};">${escapeHtml(notice.name)}</h3>
      <p style="margin: 0 0 8px; font-size: 12px; color: ${COLORS.textSecondary};">EAN ${escapeHtml(notice.ean)}</p>
      <p style="margin: 6px 0; font-size: 18px; font-weight: 700;">${formatMoney(notice.currentPrice, currency)} at ${escapeHtml(notice.store)}</p>
      <p style="margin: 6px 0;">Was <span style="text-decoration: line-through; color: ${COLORS.textSecondary};">${formatMoney(notice.previousPrice, currency)}</span>, save ${formatMoney(notice.savings, currency)}</p>
      ${allTime}
      ${storeRows ? `<table role="presentation" cellpadding="0" cellspacing="0" style="width: 100%; background-color: ${COLORS.white}; border-radius: 6px; margin-top: 8px;">${storeRows}</table>` : ''}
      ${buyButton(notice.url)}
    </div>
  `;
}

export function renderEanDropEmail(notices: EanDropNotice[], options: TemplateOptions = {}): RenderedEmail {
  const currency = options.currency ?? 'EUR';
  const subject = eanDropSubject(notices);
  const bodyContent = `
    <p style="margin: 0 0 12px; color: ${COLORS.text};">The cheapest in-stock price went down for ${notices.length} product(s).</p>
    ${notices.map((n) => renderEanDrop(n, currency)).join('')}
  `;
  return { subject, html: wrapLayout(subject, '💊 Multi-Store Price Drop', bodyContent) };
}

// =============================================================================
// FAILURE ALERT
// =============================================================================

export const FAILURE_SUBJECT = '🚨 Product Scraper Failure Alert - Action Required';

export function renderFailureEmail(report: ScrapeFailureReport): RenderedEmail {
  const failureRows = report.failures
    .slice(0, 25)
    .map((f) => `<li><code>${escapeHtml(f.ref)}</code>: ${escapeHtml(f.reason)}</li>`)
    .join('\n');
  const more = report.failures.length > 25 ? `<p>... and ${report.failures.length - 25} more</p>` : '';

  const bodyContent = `
    <div style="background-color: ${COLORS.bgIncrease}; border-left: 4px solid ${COLORS.danger}; border-radius: 8px; padding: 16px;">
      <h2 style="margin: 0 0 8px; color: ${COLORS.danger}; font-size: 18px;">Scraper health alert</h2>
      <p style="margin: 0;"><strong>The ${escapeHtml(report.cycle)} cycle observed 0 of ${report.attempted} products.</strong></p>
    </div>
    <h3 style="font-size: 15px; color: ${COLORS.text};">Error details</h3>
    <ul style="font-size: 13px;">${failureRows || '<li>No products were configured for tracking.</li>'}</ul>
    ${more}
    <h3 style="font-size: 15px; color: ${COLORS.text};">Possible causes</h3>
    <ul style="font-size: 14px;">${report.suspectedCauses.map((c) => `<li>${escapeHtml(c)}</li>`).join('\n')}</ul>
  `;

  return { subject: FAILURE_SUBJECT, html: wrapLayout(FAILURE_SUBJECT, '🚨 Scraper Failure', bodyContent) };
}

// =============================================================================
// ANALYSIS REPORT
// =============================================================================

export const REPORT_ERROR_SUBJECT = '❌ Price Analysis Report - Error';

export function reportSubject(report: AnalysisReport): string {
  return `📊 ${report.reportPeriod} - ${report.summary?.totalProductsTracked ?? 0} Products Analyzed`;
}

function statCard(value: string, label: string, color: string): string {
  return `
    <td style="text-align: center; padding: 12px; background-color: ${COLORS.bgHighlight}; border-radius: 8px; width: 33%;">
      <div style="font-size: 22px; font-weight: 700; color: ${color};">${value}</div>
      <div style="font-size: 12px; color: ${COLORS.textSecondary}; margin-top: 4px;">${label}</div>
    </td>`;
}

export function renderReportEmail(report: AnalysisReport | null, options: TemplateOptions = {}): RenderedEmail {
  const currency = options.currency ?? 'EUR';

  if (!report) {
    const bodyContent = `
      <h2 style="color: ${COLORS.danger}; font-size: 18px;">Price analysis report error</h2>
      <p>Unable to generate the price analysis report: no price history data available.</p>
      <p>The analysis becomes available after a few days of price tracking.</p>
    `;
    return { subject: REPORT_ERROR_SUBJECT, html: wrapLayout(REPORT_ERROR_SUBJECT, '📊 Price Analysis', bodyContent) };
  }

  const subject = reportSubject(report);
  let summaryHtml = '';
  if (report.summary) {
    const s = report.summary;
    summaryHtml = `
      <h2 style="margin: 0 0 12px; font-size: 18px; color: ${COLORS.text};">📊 Executive summary</h2>
      <table role="presentation" cellpadding="0" cellspacing="0" style="width: 100%; margin-bottom: 12px;">
        <tr>
          ${statCard(String(s.totalProductsTracked), 'Products Tracked', COLORS.text)}
          ${statCard(formatMoney(s.totalSavingsPotential, currency), 'Total Savings Potential', COLORS.success)}
          ${statCard(capitalize(s.marketSentiment), 'Market Sentiment', SENTIMENT_COLORS[s.marketSentiment])}
        </tr>
      </table>
      <p style="font-size: 14px;"><strong>Price trends:</strong> 📈 ${s.priceTrends.increasing} increasing, 📉 ${s.priceTrends.decreasing} decreasing, ➡️ ${s.priceTrends.stable} stable</p>
    `;
  }

  const productHtml = Object.values(report.products)
    .map((analysis) => {
      const stats = analysis.priceStatistics;
      const savings = stats.currentPrice - stats.lowestPrice;
      const savingsPct = stats.currentPrice > 0 ? (savings / stats.currentPrice) * 100 : 0;
      const deal = analysis.bestDeals[0];
      const seasonal = analysis.seasonalPatterns;
      return `
        <div style="border: 1px solid ${COLORS.border}; border-radius: 8px; padding: 16px; margin: 16px 0;">
          <h3 style="margin: 0 0 8px; font-size: 16px; color: ${COLORS.text};">${escapeHtml(analysis.productName)}</h3>
          <p style="margin: 4px 0; font-size: 14px;">Current ${formatMoney(stats.currentPrice, currency)}, best ${formatMoney(stats.lowestPrice, currency)}, highest ${formatMoney(stats.highestPrice, currency)}, average ${formatMoney(stats.averagePrice, currency)}</p>
          <p style="margin: 4px 0; font-size: 14px;">${TREND_ICONS[analysis.trends.trend]} ${capitalize(analysis.trends.trend)}${savings > 0.01 ? ` <span style="color: ${COLORS.success}; font-weight: 600;">💰 Save ${formatMoney(savings, currency)} (${savingsPct.toFixed(1)}%) vs current</span>` : ''}</p>
          ${deal ? `<p style="margin: 4px 0; font-size: 14px;"><strong>🎯 Last best deal:</strong> ${formatMoney(deal.price, currency)} (${deal.daysAgo} days ago)</p>` : ''}
          ${seasonal.analysis === 'available' ? `<p style="margin: 4px 0; font-size: 14px;"><strong>📅 Best month:</strong> ${seasonal.bestMonth.month} (avg ${formatMoney(seasonal.bestMonth.averagePrice, currency)})</p>` : ''}
          ${buyButton(analysis.purchaseUrl)}
        </div>
      `;
    })
    .join('');

  const bodyContent = `
    <p style="margin: 0 0 16px; font-size: 14px; color: ${COLORS.textSecondary};">${escapeHtml(report.reportPeriod)}, generated ${formatDisplayDate(report.reportDate)}</p>
    ${summaryHtml}
    ${productHtml}
  `;

  return { subject, html: wrapLayout(subject, '📊 Price Analysis Report', bodyContent) };
}
