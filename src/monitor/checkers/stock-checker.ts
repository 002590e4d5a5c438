import { escapeHtml, formatDateTime } from '../../utils/format.js';
import type { Notification, Product } from '../types.js';
import { BaseChecker, type CheckerOptions } from './base-checker.js';

export type StockLevel = 'zero' | 'critical' | 'low';

/**
 * Bucket a stock level against its minimum; null means the stock is fine.
 */
export function stockLevel(stock: number, minBalance: number): StockLevel | null {
  if (stock <= 0) return 'zero';
  if (stock <= minBalance / 2) return 'critical';
  if (stock <= minBalance) return 'low';
  return null;
}

export function formatQuantity(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

const TITLES: Record<StockLevel, string> = {
  zero: '🛑 <b>Out of stock: {name}</b>',
  critical: '🔴 <b>Critically low: {name}</b>',
  low: '⚠️ <b>Below minimum: {name}</b>',
};

export function formatStockAlert(product: Product, minBalance: number, level: StockLevel, now: Date): string {
  return [
    TITLES[level].replace('{name}', escapeHtml(product.name)),
    `▸ Stock: ${formatQuantity(product.stock)} (minimum: ${formatQuantity(minBalance)})`,
    `▸ ${formatDateTime(now)}`,
  ].join('\n');
}

export class StockChecker extends BaseChecker {
  constructor(options: CheckerOptions) {
    super('stock', options);
  }

  protected applies(product: Product): boolean {
    return product.minBalance !== null && product.minBalance > 0;
  }

  protected validate(product: Product): string | null {
    const problem = super.validate(product);
    if (problem !== null) return problem;
    if (!Number.isFinite(product.stock)) return 'stock is not a number';
    if (product.minBalance !== null && !Number.isFinite(product.minBalance)) return 'minimum balance is not a number';
    return null;
  }

  protected evaluate(product: Product, now: Date): Notification | null {
    const minBalance = product.minBalance ?? 0;
    const level = stockLevel(product.stock, minBalance);

    if (level === null) {
      this.clearCondition(product.id);
      return null;
    }

    const fingerprint = `stock:${level}`;
    if (!this.shouldAlert(product.id, fingerprint, now)) return null;

    const notification: Notification = {
      source: 'stock',
      key: product.id,
      group: product.groupPath,
      text: formatStockAlert(product, minBalance, level, now),
      priority: level === 'zero' ? 'high' : 'normal',
    };
    this.recordAlert(product.id, fingerprint, now);
    return notification;
  }
}
