/**
 * Notifier that only writes to the log. Used for `--dry-run` and whenever
 * e-mail is not configured.
 */

import { createLogger, type Logger } from '../utils/logger';
import type { AnalysisReport } from '../analytics/report';
import { eanDropSubject, priceAlertSubject, reportSubject, FAILURE_SUBJECT, REPORT_ERROR_SUBJECT } from './email-templates';
import type { EanDropNotice, Notifier, PriceChangeNotice, ScrapeFailureReport } from './types';

export class LogNotifier implements Notifier {
  readonly name = 'log';
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('notifier')) {
    this.logger = logger;
  }

  async notifyPriceChanges(notices: PriceChangeNotice[]): Promise<boolean> {
    if (notices.length === 0) return true;
    this.logger.info({ subject: priceAlertSubject(notices), count: notices.length }, 'Price alert (not sent)');
    for (const n of notices) {
      this.logger.info(
        { productKey: n.productKey, from: n.previousPrice, to: n.currentPrice, changePct: n.changePct, url: n.purchaseUrl },
        n.name
      );
    }
    return true;
  }

  async notifyEanPriceDrops(notices: EanDropNotice[]): Promise<boolean> {
    if (notices.length === 0) return true;
    this.logger.info({ subject: eanDropSubject(notices), count: notices.length }, 'Multi-store drop alert (not sent)');
    for (const n of notices) {
      this.logger.info(
        { ean: n.ean, store: n.store, from: n.previousPrice, to: n.currentPrice, savings: n.savings, isAllTimeLow: n.isAllTimeLow },
        n.name
      );
    }
    return true;
  }

  async notifyScrapeFailure(report: ScrapeFailureReport): Promise<boolean> {
    this.logger.error(
      { subject: FAILURE_SUBJECT, cycle: report.cycle, attempted: report.attempted, failures: report.failures.length },
      'Scrape failure alert (not sent)'
    );
    return true;
  }

  async sendReport(report: AnalysisReport | null): Promise<boolean> {
    this.logger.info({ subject: report ? reportSubject(report) : REPORT_ERROR_SUBJECT }, 'Analysis report (not sent)');
    return true;
  }
}
