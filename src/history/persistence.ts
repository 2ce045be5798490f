/**
 * History file I/O.
 *
 * Loading never throws: a missing file is an empty history and an unreadable
 * or corrupt file degrades to an empty history. Entries that fail validation
 * (legacy snapshot entries among them) are retained as raw JSON and written
 * back unchanged on save. Writes go through a temp file and a rename so a
 * crash mid-write leaves the previous file in place.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from 'fs';
import type { z } from 'zod';
import { createLogger } from '../utils/logger';

const logger = createLogger('history-file');

export type HistoryRecord<T> = Record<string, T>;

export interface LoadedHistory<T> {
  entries: HistoryRecord<T>;
  /** Entries that failed validation, as read from disk */
  retained: Record<string, unknown>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON file. Returns null when the file is missing or cannot
 * be parsed as a JSON object.
 */
export function readJsonObject(path: string): Record<string, unknown> | null {
  if (!existsSync(path)) return null;

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    logger.error({ err, path }, 'Failed to read history file');
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!isPlainObject(parsed)) {
      logger.error({ path }, 'History file is not a JSON object');
      return null;
    }
    return parsed;
  } catch (err) {
    logger.error({ err, path }, 'History file is not valid JSON');
    return null;
  }
}

function isLegacyEntry(value: unknown): boolean {
  return isPlainObject(value) && 'price_history' in value && !('price_changes' in value);
}

/**
 * Load a keyed history file, validating every entry with `schema`.
 */
export function loadHistoryFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): LoadedHistory<T> {
  const data = readJsonObject(path);
  if (!data) {
    if (existsSync(path)) {
      logger.error({ path }, 'Starting from an empty history; the unreadable file will be overwritten on save');
    }
    return { entries: {}, retained: {} };
  }

  const entries: HistoryRecord<T> = {};
  const retained: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const parsed = schema.safeParse(value);
    if (parsed.success) {
      entries[key] = parsed.data;
      continue;
    }
    retained[key] = value;
    logger.warn(
      { path, key, issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join('.')}: ${i.message}`) },
      isLegacyEntry(value)
        ? 'Entry is in legacy daily-snapshot format and will not be updated (run `pricewatch migrate`)'
        : 'Invalid history entry will be kept as is and not updated'
    );
  }

  logger.debug(
    { path, entries: Object.keys(entries).length, retained: Object.keys(retained).length },
    'History loaded'
  );
  return { entries, retained };
}

export function serializeHistory(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function writeHistoryFile(path: string, data: unknown): void {
  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, serializeHistory(data), 'utf-8');
  renameSync(tmpPath, path);
}
