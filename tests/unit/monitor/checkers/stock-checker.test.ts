import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CacheStore } from '../../../../src/cache/cache-store.js';
import { EventBus } from '../../../../src/kernel/event-bus.js';
import {
  StockChecker,
  formatQuantity,
  formatStockAlert,
  stockLevel,
} from '../../../../src/monitor/checkers/stock-checker.js';
import type { Product, Snapshot } from '../../../../src/monitor/types.js';
import { createLogger } from '../../../../src/utils/logger.js';

const logger = createLogger('test', { level: 'silent' });
const HOUR_MS = 60 * 60 * 1000;

function product(overrides: Partial<Product> = {}): Product {
  return {
    id: 'p1',
    name: 'Oat milk',
    stock: 3,
    minBalance: 10,
    groupPath: 'Food > Dairy',
    expirationDate: null,
    ...overrides,
  };
}

function snapshot(...products: Product[]): Snapshot {
  return { fetchedAt: new Date(), products };
}

describe('stockLevel', () => {
  it('should bucket stock against the minimum', () => {
    expect(stockLevel(0, 10)).toBe('zero');
    expect(stockLevel(-2, 10)).toBe('zero');
    expect(stockLevel(5, 10)).toBe('critical');
    expect(stockLevel(6, 10)).toBe('low');
    expect(stockLevel(10, 10)).toBe('low');
    expect(stockLevel(11, 10)).toBeNull();
  });
});

describe('formatStockAlert', () => {
  it('should escape the name and format quantities and time', () => {
    const text = formatStockAlert(
      product({ name: 'Milk <1L>', stock: 0 }),
      4,
      'zero',
      new Date(2026, 2, 10, 9, 5),
    );

    expect(text).toBe('🛑 <b>Out of stock: Milk &lt;1L&gt;</b>\n▸ Stock: 0 (minimum: 4)\n▸ 10.03.2026 09:05');
  });

  it('should print fractional quantities with two decimals', () => {
    expect(formatQuantity(2.5)).toBe('2.50');
    expect(formatQuantity(7)).toBe('7');
  });
});

describe('StockChecker', () => {
  let store: CacheStore;
  let checker: StockChecker;
  const t0 = new Date('2026-03-10T08:00:00.000Z');

  beforeEach(() => {
    store = new CacheStore(join(tmpdir(), 'stock-checker-unused.json'), { logger });
    checker = new StockChecker({
      store,
      context: { logger, events: new EventBus(), clock: () => t0 },
      suppressionMs: 24 * HOUR_MS,
      retentionMs: 30 * 24 * HOUR_MS,
    });
  });

  it('should alert once for a new low-stock product', () => {
    const [alert] = checker.check(snapshot(product()), t0);

    expect(alert).toMatchObject({ source: 'stock', key: 'p1', group: 'Food > Dairy', priority: 'normal' });
    expect(alert?.text.startsWith('🔴 <b>Critically low: Oat milk</b>')).toBe(true);
    expect(store.get('p1')).toEqual({ firstSeen: t0, lastAlerted: t0, fingerprint: 'stock:critical' });
  });

  it('should suppress an unchanged condition inside the window', () => {
    checker.check(snapshot(product()), t0);

    expect(checker.check(snapshot(product()), new Date(t0.getTime() + HOUR_MS))).toEqual([]);
    expect(checker.check(snapshot(product()), new Date(t0.getTime() + 24 * HOUR_MS - 1))).toEqual([]);
  });

  it('should alert again once the suppression window has elapsed', () => {
    checker.check(snapshot(product()), t0);
    const later = new Date(t0.getTime() + 24 * HOUR_MS);

    expect(checker.check(snapshot(product()), later)).toHaveLength(1);
    expect(store.get('p1')).toEqual({ firstSeen: t0, lastAlerted: later, fingerprint: 'stock:critical' });
  });

  it('should alert immediately when the level changes', () => {
    checker.check(snapshot(product()), t0);
    const [alert] = checker.check(snapshot(product({ stock: 0 })), new Date(t0.getTime() + HOUR_MS));

    expect(alert?.priority).toBe('high');
    expect(store.get('p1')?.fingerprint).toBe('stock:zero');
  });

  it('should forget a recovered product so a relapse alerts again', () => {
    checker.check(snapshot(product()), t0);
    expect(checker.check(snapshot(product({ stock: 20 })), new Date(t0.getTime() + HOUR_MS))).toEqual([]);
    expect(store.has('p1')).toBe(false);

    expect(checker.check(snapshot(product()), new Date(t0.getTime() + 2 * HOUR_MS))).toHaveLength(1);
  });

  it('should ignore products without a positive minimum', () => {
    const alerts = checker.check(
      snapshot(product({ id: 'a', minBalance: null, stock: 0 }), product({ id: 'b', minBalance: 0, stock: 0 })),
      t0,
    );

    expect(alerts).toEqual([]);
    expect(store.size).toBe(0);
  });

  it('should skip malformed entries and keep checking the rest', () => {
    const alerts = checker.check(
      snapshot(product({ id: '' }), product({ id: 'nan', stock: Number.NaN }), product({ id: 'ok', stock: 0 })),
      t0,
    );

    expect(alerts.map((a) => a.key)).toEqual(['ok']);
  });
});
