import { describe, it, expect } from 'vitest';
import { daysAgo, daysBefore, fileTimestamp, formatDisplayDate, isDayKey, monthName, parseDayKey, toDayKey } from './dates';

describe('toDayKey', () => {
  it('uses the local calendar day', () => {
    expect(toDayKey(new Date(2025, 0, 5, 23, 59))).toBe('2025-01-05');
  });
});

describe('parseDayKey', () => {
  it('parses real days to local midnight', () => {
    expect(parseDayKey('2024-02-29')?.getTime()).toBe(new Date(2024, 1, 29).getTime());
  });

  it('rejects impossible or malformed days', () => {
    expect(parseDayKey('2025-02-30')).toBeNull();
    expect(parseDayKey('2025-1-5')).toBeNull();
    expect(isDayKey('yesterday')).toBe(false);
  });
});

describe('daysBefore', () => {
  it('moves back whole calendar days across month ends', () => {
    expect(daysBefore(365, new Date(2025, 5, 1, 12))).toBe('2024-06-01');
    expect(daysBefore(1, new Date(2025, 2, 1, 12))).toBe('2025-02-28');
  });
});

describe('daysAgo', () => {
  it('counts whole days since the key', () => {
    expect(daysAgo('2025-02-15', new Date(2025, 3, 1, 12))).toBe(45);
    expect(daysAgo('2025-04-01', new Date(2025, 3, 1, 12))).toBe(0);
    expect(daysAgo('not a day')).toBeNull();
  });
});

describe('formatting', () => {
  it('renders display dates and month names', () => {
    expect(formatDisplayDate('2025-07-04')).toBe('Jul 04, 2025');
    expect(formatDisplayDate('unknown')).toBe('unknown');
    expect(monthName('2025-02-10')).toBe('February');
  });

  it('renders backup timestamps', () => {
    expect(fileTimestamp(new Date(2025, 1, 10, 8, 5, 3))).toBe('20250210_080503');
  });
});
