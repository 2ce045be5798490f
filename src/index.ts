/**
 * pricewatch - event-based product price tracking
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './history/types';
export { PRICE_EPSILON, changePct, priceMoved, isValidPrice } from './history/events';
export { PriceHistoryStore } from './history/store';
export { EanHistoryStore, findLowestInStock } from './history/ean-store';
export {
  MigrationError,
  migrateEanHistory,
  migrateHistoryFile,
  migrateProductHistory,
  type FileMigrationReport,
  type HistoryKind,
  type MigrationStats,
} from './history/migrate';

export * from './analytics/price-analyzer';
export * from './analytics/report';

export * from './notifications/types';
export { collectEanDropNotices, collectPriceChangeNotices, dispatchCycleNotifications } from './notifications/trigger';
export { EmailNotifier, sendEmail } from './notifications/email';
export { LogNotifier } from './notifications/log-notifier';

export * from './sources/types';
export { StructuredDataSource, extractProduct } from './sources/html-source';
export { productKeyFor } from './sources/product-key';
export { SITE_PRESETS, presetFor, type SitePreset } from './sources/presets';

export * from './tracking/config';
export * from './tracking/approval';

export { runMonitorCycle, createSourceResolver, type MonitorCycleResult } from './monitor/cycle';
export { runEanCycle, type EanCycleResult } from './monitor/ean-cycle';

export { ConfigError, loadConfig, type AppConfig } from './utils/config';
export { createPageFetcher, type PageFetcher } from './utils/http';
export { HttpError, withRetry } from './infra/retry';
