/**
 * Process-level failure handling for the CLI. Any failure leaves exit code 1
 * so cron and CI see the run as failed.
 */

import { logger } from '../utils/logger';

export function reportUnhandledRejection(reason: unknown): void {
  logger.error({ reason }, 'Unhandled promise rejection');
  process.exitCode = 1;
}

export function reportCommandFailure(err: unknown): void {
  logger.error({ err }, 'Command failed');
  process.exitCode = 1;
}
