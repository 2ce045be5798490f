#!/usr/bin/env node
/**
 * pricewatch CLI
 *
 * Commands:
 * - pricewatch monitor       Observe single-store products, record changes, notify
 * - pricewatch ean-monitor   Observe EAN products across stores, notify on drops
 * - pricewatch migrate       Convert a daily-snapshot history to events
 * - pricewatch analyze       Print the analysis of one product or all of them
 * - pricewatch report        Write and send the periodic analysis report
 * - pricewatch decide        Apply a track/ignore reply to products.yaml
 */

import { readFileSync } from 'fs';
import { loadDotenv } from '../utils/config';

// Load .env before the logger reads LOG_LEVEL
loadDotenv();

import { Command } from 'commander';
import { loadConfig, type AppConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { createPageFetcher } from '../utils/http';
import { PriceHistoryStore } from '../history/store';
import { EanHistoryStore } from '../history/ean-store';
import { migrateHistoryFile, type HistoryKind } from '../history/migrate';
import { analyzeProduct, calculatePortfolioInsights, summarizeProducts } from '../analytics/price-analyzer';
import { generateReport, saveReportFiles } from '../analytics/report';
import { renderReportEmail } from '../notifications/email-templates';
import { EmailNotifier } from '../notifications/email';
import { LogNotifier } from '../notifications/log-notifier';
import type { Notifier } from '../notifications/types';
import { loadEanProductsConfig, loadProductsConfig, saveProductsConfig, trackedEans, trackedProductRefs } from '../tracking/config';
import { applyTrackingDecision, parseDecision, parseProposal } from '../tracking/approval';
import { createSourceResolver, runMonitorCycle, type SourceResolver } from '../monitor/cycle';
import { runEanCycle } from '../monitor/ean-cycle';
import { reportCommandFailure, reportUnhandledRejection } from './failures';

const program = new Command();

process.on('unhandledRejection', reportUnhandledRejection);

program
  .name('pricewatch')
  .description('Track product prices and email when they change')
  .version('0.1.0');

function createNotifier(config: AppConfig, dryRun: boolean): Notifier {
  if (dryRun) return new LogNotifier();
  const email = EmailNotifier.fromAppConfig(config);
  if (email) return email;
  logger.warn('Email is not configured (API key or EMAIL_TO missing), notifications go to the log');
  return new LogNotifier();
}

function createResolver(config: AppConfig): SourceResolver {
  return createSourceResolver(
    createPageFetcher({
      delayMs: config.requestDelayMs,
      timeoutMs: config.requestTimeoutMs,
      retry: { maxAttempts: config.requestMaxAttempts },
    })
  );
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ============================================================================
// monitor
// ============================================================================
program
  .command('monitor')
  .description('Observe every tracked product once and notify on price changes')
  .option('--products <file>', 'Tracking configuration (products.yaml)')
  .option('--history <file>', 'Price history JSON file')
  .option('--dry-run', 'Log notifications instead of sending them', false)
  .action(async (options: { products?: string; history?: string; dryRun: boolean }) => {
    const config = loadConfig();
    const refs = trackedProductRefs(loadProductsConfig(options.products ?? config.productsFile));
    const result = await runMonitorCycle({
      store: PriceHistoryStore.load(options.history ?? config.historyFile),
      refs,
      sourceFor: createResolver(config),
      notifier: createNotifier(config, options.dryRun),
      retentionDays: config.retentionDays,
    });
    if (!result.success) process.exitCode = 1;
  });

// ============================================================================
// ean-monitor
// ============================================================================
program
  .command('ean-monitor')
  .description('Observe EAN-tracked products in every active store and notify on drops')
  .option('--products <file>', 'EAN tracking configuration (ean_products.yaml)')
  .option('--history <file>', 'EAN price history JSON file')
  .option('--dry-run', 'Log notifications instead of sending them', false)
  .action(async (options: { products?: string; history?: string; dryRun: boolean }) => {
    const config = loadConfig();
    const products = trackedEans(loadEanProductsConfig(options.products ?? config.eanProductsFile));
    const result = await runEanCycle({
      store: EanHistoryStore.load(options.history ?? config.eanHistoryFile),
      products,
      sourceFor: createResolver(config),
      notifier: createNotifier(config, options.dryRun),
      retentionDays: config.retentionDays,
    });
    if (!result.success) process.exitCode = 1;
  });

// ============================================================================
// migrate
// ============================================================================
program
  .command('migrate')
  .description('Convert a daily-snapshot history file to the event-based format (with backup)')
  .option('--kind <kind>', 'History kind: product or ean', 'product')
  .option('--file <file>', 'History file to migrate')
  .action((options: { kind: string; file?: string }) => {
    if (options.kind !== 'product' && options.kind !== 'ean') {
      logger.error({ kind: options.kind }, 'Unknown history kind, expected product or ean');
      process.exitCode = 1;
      return;
    }
    const kind: HistoryKind = options.kind;
    const config = loadConfig();
    const path = options.file ?? (kind === 'product' ? config.historyFile : config.eanHistoryFile);
    const report = migrateHistoryFile(path, kind);
    printJson(report);
  });

// ============================================================================
// analyze
// ============================================================================
program
  .command('analyze [productKey]')
  .description('Print the analysis of one product, or portfolio insights for all')
  .option('--history <file>', 'Price history JSON file')
  .action((productKey: string | undefined, options: { history?: string }) => {
    const config = loadConfig();
    const store = PriceHistoryStore.load(options.history ?? config.historyFile);

    if (productKey) {
      const history = store.get(productKey);
      const analysis = history ? analyzeProduct(productKey, history) : null;
      if (!analysis) {
        logger.error({ productKey }, 'No price data for product');
        process.exitCode = 1;
        return;
      }
      printJson(analysis);
      return;
    }

    printJson({ overview: summarizeProducts(store.toJSON()), insights: calculatePortfolioInsights(store.toJSON()) });
  });

// ============================================================================
// report
// ============================================================================
program
  .command('report')
  .description('Generate the periodic analysis report, save it and email it')
  .option('--history <file>', 'Price history JSON file')
  .option('--out-dir <dir>', 'Directory for the JSON and HTML report files', '.')
  .option('--dry-run', 'Log the report instead of sending it', false)
  .action(async (options: { history?: string; outDir: string; dryRun: boolean }) => {
    const config = loadConfig();
    const store = PriceHistoryStore.load(options.history ?? config.historyFile);
    const report = generateReport(store.toJSON());

    if (report) {
      const { html } = renderReportEmail(report, { currency: config.currency });
      const files = saveReportFiles(report, html, options.outDir);
      logger.info({ files }, 'Report files written');
    } else {
      logger.error('No price history to analyze, sending error report');
    }

    const delivered = await createNotifier(config, options.dryRun).sendReport(report);
    if (!report || !delivered) process.exitCode = 1;
  });

// ============================================================================
// decide
// ============================================================================
program
  .command('decide')
  .description('Record a track/ignore decision for a proposed product')
  .requiredOption('--proposal <file>', 'File holding the proposal with its ```json block')
  .requiredOption('--comment <text>', 'Reviewer reply, starting with track or ignore')
  .option('--products <file>', 'Tracking configuration (products.yaml)')
  .action((options: { proposal: string; comment: string; products?: string }) => {
    const decision = parseDecision(options.comment);
    if (!decision) {
      logger.info({ comment: options.comment }, 'Reply is not a track/ignore command, nothing to do');
      return;
    }
    const config = loadConfig();
    const path = options.products ?? config.productsFile;
    const proposal = parseProposal(readFileSync(options.proposal, 'utf-8'));
    saveProductsConfig(path, applyTrackingDecision(loadProductsConfig(path), proposal, decision));
    logger.info({ decision, name: proposal.name, site: proposal.site }, 'Tracking decision recorded');
  });

program.parseAsync().catch(reportCommandFailure);
