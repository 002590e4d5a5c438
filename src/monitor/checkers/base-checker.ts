import type { CacheStore } from '../../cache/cache-store.js';
import type { Logger } from '../../utils/logger.js';
import type {
  Checker,
  MonitorContext,
  Notification,
  NotificationSource,
  Product,
  Snapshot,
} from '../types.js';

export interface CheckerOptions {
  store: CacheStore;
  context: MonitorContext;
  /** Minimum time between two alerts for an unchanged condition */
  suppressionMs: number;
  /** Records whose last alert is older than this are purged */
  retentionMs: number;
}

/**
 * Shared decision logic: alert when the entity is unknown, its fingerprint
 * changed, or the suppression window since the last alert has elapsed.
 */
export abstract class BaseChecker implements Checker {
  readonly name: NotificationSource;
  protected readonly store: CacheStore;
  protected readonly logger: Logger;
  private readonly suppressionMs: number;
  private readonly retentionMs: number;

  protected constructor(name: NotificationSource, options: CheckerOptions) {
    this.name = name;
    this.store = options.store;
    this.logger = options.context.logger.child({ checker: name });
    this.suppressionMs = options.suppressionMs;
    this.retentionMs = options.retentionMs;
  }

  check(snapshot: Snapshot, now: Date): Notification[] {
    const notifications: Notification[] = [];
    let evaluated = 0;
    let skipped = 0;

    for (const product of snapshot.products) {
      const problem = this.validate(product);
      if (problem !== null) {
        skipped++;
        this.logger.warn({ productId: product.id, reason: problem }, 'Skipping malformed product');
        continue;
      }
      if (!this.applies(product)) continue;

      evaluated++;
      try {
        const notification = this.evaluate(product, now);
        if (notification) notifications.push(notification);
      } catch (error) {
        skipped++;
        this.logger.warn({ productId: product.id, err: error }, 'Failed to evaluate product');
      }
    }

    this.logger.info(
      { products: snapshot.products.length, evaluated, alerts: notifications.length, skipped },
      'Check complete',
    );
    return notifications;
  }

  async persist(): Promise<void> {
    await this.store.persist();
  }

  purgeExpired(now: Date): number {
    return this.store.purgeExpired(now, this.retentionMs);
  }

  /** Whether the product is in scope for this checker at all */
  protected abstract applies(product: Product): boolean;

  /** Decide and, when alerting, record the alert in the cache */
  protected abstract evaluate(product: Product, now: Date): Notification | null;

  /**
   * @returns a reason when the entry cannot be evaluated, otherwise null
   */
  protected validate(product: Product): string | null {
    if (typeof product.id !== 'string' || product.id.length === 0) return 'missing id';
    if (typeof product.name !== 'string') return 'missing name';
    return null;
  }

  protected shouldAlert(key: string, fingerprint: string, now: Date): boolean {
    const record = this.store.get(key);
    if (!record) return true;
    if (record.fingerprint !== fingerprint) return true;
    return now.getTime() - record.lastAlerted.getTime() >= this.suppressionMs;
  }

  protected recordAlert(key: string, fingerprint: string, now: Date): void {
    const existing = this.store.get(key);
    this.store.put(key, {
      firstSeen: existing?.firstSeen ?? now,
      lastAlerted: now,
      fingerprint,
    });
  }

  /** The condition no longer holds; a relapse alerts again */
  protected clearCondition(key: string): void {
    if (this.store.delete(key)) {
      this.logger.debug({ key }, 'Condition cleared');
    }
  }
}
