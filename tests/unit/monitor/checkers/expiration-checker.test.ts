import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CacheStore } from '../../../../src/cache/cache-store.js';
import { EventBus } from '../../../../src/kernel/event-bus.js';
import {
  ExpirationChecker,
  daysUntil,
  expirationBucket,
} from '../../../../src/monitor/checkers/expiration-checker.js';
import type { Product, Snapshot } from '../../../../src/monitor/types.js';
import { createLogger } from '../../../../src/utils/logger.js';

const logger = createLogger('test', { level: 'silent' });
const HOUR_MS = 60 * 60 * 1000;

function product(overrides: Partial<Product> = {}): Product {
  return {
    id: 'p1',
    name: 'Yogurt',
    stock: 12,
    minBalance: null,
    groupPath: 'Food > Dairy',
    expirationDate: new Date(2026, 5, 15, 12, 0),
    ...overrides,
  };
}

function snapshot(...products: Product[]): Snapshot {
  return { fetchedAt: new Date(), products };
}

describe('expirationBucket', () => {
  it('should classify days left against the alert window', () => {
    expect(expirationBucket(-1, 7)).toBe('expired');
    expect(expirationBucket(0, 7)).toBe('critical');
    expect(expirationBucket(3, 7)).toBe('critical');
    expect(expirationBucket(4, 7)).toBe('expiring');
    expect(expirationBucket(7, 7)).toBe('expiring');
    expect(expirationBucket(8, 7)).toBeNull();
  });

  it('should cap the critical range at the alert window', () => {
    expect(expirationBucket(2, 2)).toBe('critical');
    expect(expirationBucket(3, 2)).toBeNull();
  });
});

describe('daysUntil', () => {
  it('should floor partial days', () => {
    expect(daysUntil(new Date(2026, 5, 15, 12, 0), new Date(2026, 5, 10, 0, 0))).toBe(5);
    expect(daysUntil(new Date(2026, 5, 15, 12, 0), new Date(2026, 5, 16, 0, 0))).toBe(-1);
  });
});

describe('ExpirationChecker', () => {
  let store: CacheStore;
  let checker: ExpirationChecker;

  beforeEach(() => {
    store = new CacheStore(join(tmpdir(), 'expiration-checker-unused.json'), { logger });
    checker = new ExpirationChecker({
      store,
      context: { logger, events: new EventBus(), clock: () => new Date() },
      suppressionMs: 24 * HOUR_MS,
      retentionMs: 30 * 24 * HOUR_MS,
      alertDays: 7,
    });
  });

  it('should alert, suppress, then alert again once the product expires', () => {
    const first = checker.check(snapshot(product()), new Date(2026, 5, 10, 0, 0));
    expect(first).toHaveLength(1);
    expect(first[0]?.text).toBe(
      '🟡 <b>EXPIRING</b>\n▸ Product: Yogurt\n▸ Expires on: 15.06.2026\n▸ Days left: 5',
    );
    expect(first[0]?.priority).toBe('normal');

    expect(checker.check(snapshot(product()), new Date(2026, 5, 10, 6, 0))).toEqual([]);

    const third = checker.check(snapshot(product()), new Date(2026, 5, 16, 0, 0));
    expect(third).toHaveLength(1);
    expect(third[0]?.text).toBe('🚨 <b>EXPIRED</b>\n▸ Product: Yogurt\n▸ Expired on: 15.06.2026');
    expect(third[0]?.priority).toBe('high');
    expect(store.get('p1')?.fingerprint).toBe('2026-06-15|expired');
  });

  it('should mark products within three days as critical', () => {
    const [alert] = checker.check(snapshot(product()), new Date(2026, 5, 13, 0, 0));

    expect(alert?.text.startsWith('🔴 <b>EXPIRING</b>')).toBe(true);
    expect(alert?.priority).toBe('high');
  });

  it('should alert again inside the window when the date changes', () => {
    const now = new Date(2026, 5, 10, 0, 0);
    checker.check(snapshot(product()), now);

    const alerts = checker.check(
      snapshot(product({ expirationDate: new Date(2026, 5, 14, 12, 0) })),
      new Date(now.getTime() + HOUR_MS),
    );

    expect(alerts).toHaveLength(1);
    expect(store.get('p1')?.fingerprint).toBe('2026-06-14|expiring');
  });

  it('should clear the record once the date moves out of the window', () => {
    checker.check(snapshot(product()), new Date(2026, 5, 10, 0, 0));
    checker.check(snapshot(product({ expirationDate: new Date(2026, 7, 1) })), new Date(2026, 5, 10, 1, 0));

    expect(store.has('p1')).toBe(false);
  });

  it('should skip products without a date and invalid dates', () => {
    const alerts = checker.check(
      snapshot(
        product({ id: 'none', expirationDate: null }),
        product({ id: 'bad', expirationDate: new Date(Number.NaN) }),
        product({ id: 'ok' }),
      ),
      new Date(2026, 5, 10, 0, 0),
    );

    expect(alerts.map((a) => a.key)).toEqual(['ok']);
  });

  it('should group notifications under the product group path', () => {
    const [alert] = checker.check(snapshot(product({ groupPath: 'No group' })), new Date(2026, 5, 10, 0, 0));
    expect(alert?.group).toBe('No group');
  });
});
