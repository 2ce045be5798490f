import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PriceHistoryStore } from './store';
import { eventPrice } from './events';
import type { PriceObservation } from './types';

// =============================================================================
// Helpers
// =============================================================================

function obs(price: number | null, overrides: Partial<PriceObservation> = {}): PriceObservation {
  return { name: 'Essential Socks 10-pack', url: 'https://example.test/socks', price, ...overrides };
}

const KEY = 'base_10004564';

// =============================================================================
// Ingestion
// =============================================================================

describe('PriceHistoryStore.recordObservation', () => {
  let store: PriceHistoryStore;

  beforeEach(() => {
    store = new PriceHistoryStore();
  });

  it('creates an initial event for a new product', () => {
    const outcome = store.recordObservation(KEY, obs(44.95), '2025-01-01');

    expect(outcome).toEqual({ kind: 'new', productKey: KEY, name: 'Essential Socks 10-pack', price: 44.95, date: '2025-01-01' });
    const history = store.get(KEY);
    expect(history?.price_changes).toEqual([
      { date: '2025-01-01', type: 'initial', price: 44.95, original_price: null, discount_pct: null },
    ]);
    expect(history?.current).toEqual({ price: 44.95, original_price: null, discount_pct: null, since: '2025-01-01' });
    expect(history?.all_time_lowest).toEqual({ price: 44.95, date: '2025-01-01', original_price: null });
  });

  it('records a drop as a change event and lowers the all-time lowest', () => {
    store.recordObservation(KEY, obs(44.95), '2025-01-01');
    const outcome = store.recordObservation(KEY, obs(35.96), '2025-01-02');

    expect(outcome).toMatchObject({ kind: 'changed', from: 44.95, to: 35.96, changePct: -20 });
    if (outcome.kind !== 'changed') throw new Error('expected a change');
    expect(outcome.previousLowest).toEqual({ price: 44.95, date: '2025-01-01', original_price: null });

    const history = store.get(KEY);
    expect(history?.price_changes[1]).toEqual({
      date: '2025-01-02',
      from: 44.95,
      to: 35.96,
      change_pct: -20,
      original_price: null,
      discount_pct: null,
    });
    expect(history?.all_time_lowest?.price).toBe(35.96);
    expect(history?.all_time_lowest?.date).toBe('2025-01-02');
  });

  it('returns no_change for an unchanged price on a later day', () => {
    store.recordObservation(KEY, obs(44.95), '2025-01-01');
    store.recordObservation(KEY, obs(35.96), '2025-01-02');
    const outcome = store.recordObservation(KEY, obs(35.96), '2025-01-03');

    expect(outcome).toEqual({ kind: 'no_change', productKey: KEY });
    expect(store.get(KEY)?.price_changes).toHaveLength(2);
  });

  it('keeps the all-time lowest when the price goes back up', () => {
    store.recordObservation(KEY, obs(44.95), '2025-01-01');
    store.recordObservation(KEY, obs(35.96), '2025-01-02');
    store.recordObservation(KEY, obs(35.96), '2025-01-03');
    const outcome = store.recordObservation(KEY, obs(38.21), '2025-01-04');

    expect(outcome).toMatchObject({ kind: 'changed', from: 35.96, to: 38.21, changePct: 6.3 });
    expect(store.get(KEY)?.all_time_lowest?.price).toBe(35.96);
    expect(store.get(KEY)?.current?.since).toBe('2025-01-04');
  });

  it('ignores observations without a usable price', () => {
    expect(store.recordObservation(KEY, obs(null), '2025-01-01').kind).toBe('no_change');
    expect(store.recordObservation(KEY, obs(0), '2025-01-01').kind).toBe('no_change');
    expect(store.recordObservation(KEY, obs(Number.NaN), '2025-01-01').kind).toBe('no_change');
    expect(store.size).toBe(0);
  });

  it('ignores observations older than the latest event', () => {
    store.recordObservation(KEY, obs(20), '2025-01-05');
    const outcome = store.recordObservation(KEY, obs(10), '2025-01-04');

    expect(outcome.kind).toBe('no_change');
    expect(store.get(KEY)?.current?.price).toBe(20);
  });

  it('updates name and URL from the latest observation', () => {
    store.recordObservation(KEY, obs(20), '2025-01-01');
    store.recordObservation(KEY, obs(20, { name: 'Renamed', url: 'https://example.test/new' }), '2025-01-02');

    expect(store.get(KEY)?.name).toBe('Renamed');
    expect(store.get(KEY)?.purchase_url).toBe('https://example.test/new');
  });

  describe('same-day observations', () => {
    it('folds a second price into the initial event of the day', () => {
      store.recordObservation(KEY, obs(10), '2025-01-01');
      const outcome = store.recordObservation(KEY, obs(8), '2025-01-01');

      expect(outcome.kind).toBe('no_change');
      const history = store.get(KEY);
      expect(history?.price_changes).toHaveLength(1);
      expect(history?.price_changes[0]).toMatchObject({ type: 'initial', price: 8 });
      expect(history?.all_time_lowest?.price).toBe(8);
    });

    it('rewrites the day change event against the previous day', () => {
      store.recordObservation(KEY, obs(10), '2025-01-01');
      store.recordObservation(KEY, obs(12), '2025-01-02');
      const outcome = store.recordObservation(KEY, obs(13), '2025-01-02');

      expect(outcome).toMatchObject({ kind: 'changed', from: 10, to: 13, changePct: 30 });
      const history = store.get(KEY);
      expect(history?.price_changes).toHaveLength(2);
      expect(history?.price_changes[1]).toMatchObject({ date: '2025-01-02', from: 10, to: 13, change_pct: 30 });
      expect(history?.current?.price).toBe(13);
    });

    it('drops the day change event when the price returns to where it started', () => {
      store.recordObservation(KEY, obs(10), '2025-01-01');
      store.recordObservation(KEY, obs(12), '2025-01-02');
      const outcome = store.recordObservation(KEY, obs(10), '2025-01-02');

      expect(outcome.kind).toBe('no_change');
      const history = store.get(KEY);
      expect(history?.price_changes).toHaveLength(1);
      expect(history?.current).toMatchObject({ price: 10, since: '2025-01-01' });
    });

    it('is a no-op when the same price is seen twice in one cycle', () => {
      store.recordObservation(KEY, obs(10), '2025-01-01');
      store.recordObservation(KEY, obs(12), '2025-01-02');
      const before = structuredClone(store.toJSON());

      const outcome = store.recordObservation(KEY, obs(12), '2025-01-02');

      expect(outcome.kind).toBe('no_change');
      expect(store.toJSON()).toEqual(before);
    });
  });
});

// =============================================================================
// Properties
// =============================================================================

describe('PriceHistoryStore invariants', () => {
  const days = ['2025-02-01', '2025-02-02', '2025-02-03', '2025-02-04', '2025-02-05', '2025-02-06', '2025-02-07'];

  it('never records a change for one-cent wobbles', () => {
    const store = new PriceHistoryStore();
    const prices = [35.96, 35.97, 35.96, 35.95, 35.96, 35.97, 35.96];
    prices.forEach((price, i) => store.recordObservation(KEY, obs(price), days[i]));

    expect(store.get(KEY)?.price_changes).toHaveLength(1);
    expect(store.get(KEY)?.current?.price).toBe(35.96);
  });

  it('keeps current equal to the last event and the lowest non-increasing', () => {
    const store = new PriceHistoryStore();
    const prices = [10, 12, 12.005, 9, 9, 15, 9.5];
    let previousLowest = Infinity;

    prices.forEach((price, i) => {
      store.recordObservation(KEY, obs(price), days[i]);
      const history = store.get(KEY);
      if (!history?.current || !history.all_time_lowest) throw new Error('history missing');

      const events = history.price_changes;
      expect(history.current.price).toBe(eventPrice(events[events.length - 1]));
      expect(history.all_time_lowest.price).toBeLessThanOrEqual(previousLowest);
      for (const seen of prices.slice(0, i + 1)) {
        expect(history.all_time_lowest.price).toBeLessThanOrEqual(seen);
      }
      previousLowest = history.all_time_lowest.price;
    });

    expect(store.get(KEY)?.all_time_lowest).toMatchObject({ price: 9, date: '2025-02-04' });
  });

  it('keeps events in date order with one event per day', () => {
    const store = new PriceHistoryStore();
    const observations: Array<[string, number]> = [
      ['2025-02-01', 10],
      ['2025-02-02', 11],
      ['2025-02-02', 12],
      ['2025-02-03', 9],
      ['2025-02-03', 8],
    ];
    for (const [day, price] of observations) store.recordObservation(KEY, obs(price), day);

    const dates = store.get(KEY)?.price_changes.map((e) => e.date);
    expect(dates).toEqual(['2025-02-01', '2025-02-02', '2025-02-03']);
  });
});

// =============================================================================
// Retention
// =============================================================================

describe('PriceHistoryStore.cleanup', () => {
  it('drops old events but keeps the initial and the latest', () => {
    const store = new PriceHistoryStore();
    store.recordObservation(KEY, obs(10), '2024-01-01');
    store.recordObservation(KEY, obs(12), '2024-03-01');
    store.recordObservation(KEY, obs(11), '2024-06-01');
    store.recordObservation(KEY, obs(9), '2025-05-01');

    const removed = store.cleanup(365, new Date(2025, 5, 1));

    expect(removed).toBe(1);
    expect(store.get(KEY)?.price_changes.map((e) => e.date)).toEqual(['2024-01-01', '2024-06-01', '2025-05-01']);
    expect(store.get(KEY)?.current?.price).toBe(9);
    expect(store.get(KEY)?.all_time_lowest?.price).toBe(9);
  });

  it('never empties a history whose events are all old', () => {
    const store = new PriceHistoryStore();
    store.recordObservation(KEY, obs(10), '2020-01-01');
    store.recordObservation(KEY, obs(12), '2020-02-01');

    expect(store.cleanup(30, new Date(2025, 0, 1))).toBe(0);
    expect(store.get(KEY)?.price_changes).toHaveLength(2);
  });
});

// =============================================================================
// Summary
// =============================================================================

describe('PriceHistoryStore.summary', () => {
  it('reports the direction of the latest change', () => {
    const store = new PriceHistoryStore();
    store.recordObservation('a', obs(10), '2025-01-01');
    store.recordObservation('a', obs(8), '2025-01-02');
    store.recordObservation('b', obs(5), '2025-01-01');

    const summary = store.summary();
    expect(summary.totalProducts).toBe(2);
    expect(summary.products.find((p) => p.key === 'a')).toMatchObject({ trend: 'down', trendChange: -2, lastUpdated: '2025-01-02' });
    expect(summary.products.find((p) => p.key === 'b')).toMatchObject({ trend: 'stable', trendChange: 0 });
  });

  it('limits the summary to the given keys', () => {
    const store = new PriceHistoryStore();
    store.recordObservation('a', obs(10), '2025-01-01');
    store.recordObservation('b', obs(5), '2025-01-01');

    const summary = store.summary(['b']);
    expect(summary.totalProducts).toBe(1);
    expect(summary.products.map((p) => p.key)).toEqual(['b']);
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe('PriceHistoryStore persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pricewatch-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('saves and loads the same history', () => {
    const path = join(dir, 'price_history.json');
    const store = new PriceHistoryStore({}, path);
    store.recordObservation(KEY, obs(44.95, { originalPrice: 49.95, discountPct: 10 }), '2025-01-01');
    store.recordObservation(KEY, obs(35.96), '2025-01-02');
    store.save();

    const loaded = PriceHistoryStore.load(path);
    expect(loaded.toJSON()).toEqual(store.toJSON());
  });

  it('starts empty when the file is missing', () => {
    expect(PriceHistoryStore.load(join(dir, 'missing.json')).size).toBe(0);
  });

  it('starts empty when the file is corrupt', () => {
    const path = join(dir, 'price_history.json');
    writeFileSync(path, '{ not json', 'utf-8');
    expect(PriceHistoryStore.load(path).size).toBe(0);
  });

  it('writes legacy entries back untouched and does not update them', () => {
    const path = join(dir, 'price_history.json');
    const legacy = { name: 'Old', price_history: { '2025-01-01': { current_price: 10 } } };
    const current = {
      name: 'New',
      purchase_url: 'https://example.test/new',
      current: { price: 10, since: '2025-01-01' },
      all_time_lowest: { price: 10, date: '2025-01-01' },
      price_changes: [{ date: '2025-01-01', type: 'initial', price: 10 }],
    };
    writeFileSync(path, JSON.stringify({ legacy, current }), 'utf-8');

    const loaded = PriceHistoryStore.load(path);
    const outcome = loaded.recordObservation('legacy', obs(8), '2025-01-02');
    loaded.recordObservation('current', obs(8), '2025-01-02');
    loaded.save();

    expect(outcome).toEqual({ kind: 'no_change', productKey: 'legacy' });
    expect(loaded.keys()).toEqual(['current']);
    expect(loaded.retainedKeys()).toEqual(['legacy']);
    const saved = JSON.parse(readFileSync(path, 'utf-8'));
    expect(saved.legacy).toEqual(legacy);
    expect(saved.current.current.price).toBe(8);
  });

  it('refuses to save without a path', () => {
    expect(() => new PriceHistoryStore().save()).toThrow('no path given');
  });
});
