/**
 * Calendar-day helpers. History is kept at day granularity in the local
 * calendar of the machine running the cycle, as `YYYY-MM-DD` strings, which
 * sort chronologically as plain strings.
 */

export type DayKey = string;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const SHORT_MONTH_NAMES = MONTH_NAMES.map((m) => m.slice(0, 3));

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

export function toDayKey(date: Date): DayKey {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function today(now: Date = new Date()): DayKey {
  return toDayKey(now);
}

/**
 * Parse a day key into local midnight. Returns null for anything that is not
 * a real calendar day (`2025-02-30` included).
 */
export function parseDayKey(key: string): Date | null {
  const match = DAY_KEY_PATTERN.exec(key);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function isDayKey(value: string): boolean {
  return parseDayKey(value) !== null;
}

/** Day key `days` calendar days before `now`. */
export function daysBefore(days: number, now: Date = new Date()): DayKey {
  const shifted = new Date(now.getFullYear(), now.getMonth(), now.getDate() - days);
  return toDayKey(shifted);
}

/** Whole days elapsed between local midnight of `key` and `now`. */
export function daysAgo(key: DayKey, now: Date = new Date()): number | null {
  const date = parseDayKey(key);
  if (!date) return null;
  return Math.floor((now.getTime() - date.getTime()) / MS_PER_DAY);
}

export function monthName(key: DayKey): string | null {
  const date = parseDayKey(key);
  return date ? MONTH_NAMES[date.getMonth()] : null;
}

/** `2025-07-04` -> `Jul 04, 2025`; unparseable input is returned as-is. */
export function formatDisplayDate(key: DayKey): string {
  const date = parseDayKey(key);
  if (!date) return key;
  return `${SHORT_MONTH_NAMES[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()}`;
}

/** `YYYYMMDD_HHMMSS`, used for backup file suffixes. */
export function fileTimestamp(now: Date = new Date()): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}
