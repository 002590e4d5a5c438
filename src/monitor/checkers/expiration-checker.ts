import { escapeHtml, formatDate, formatIsoDay } from '../../utils/format.js';
import type { Notification, Product } from '../types.js';
import { BaseChecker, type CheckerOptions } from './base-checker.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const CRITICAL_DAYS = 3;

export type ExpirationBucket = 'expired' | 'critical' | 'expiring';

export function daysUntil(date: Date, now: Date): number {
  return Math.floor((date.getTime() - now.getTime()) / DAY_MS);
}

/**
 * Expired products always land in a bucket; the rest only within `alertDays`.
 */
export function expirationBucket(daysLeft: number, alertDays: number): ExpirationBucket | null {
  if (daysLeft < 0) return 'expired';
  if (daysLeft > alertDays) return null;
  if (daysLeft <= Math.min(CRITICAL_DAYS, alertDays)) return 'critical';
  return 'expiring';
}

export function formatExpirationAlert(
  product: Product,
  expirationDate: Date,
  bucket: ExpirationBucket,
  daysLeft: number,
): string {
  const name = escapeHtml(product.name);

  if (bucket === 'expired') {
    return [
      '🚨 <b>EXPIRED</b>',
      `▸ Product: ${name}`,
      `▸ Expired on: ${formatDate(expirationDate)}`,
    ].join('\n');
  }

  return [
    `${bucket === 'critical' ? '🔴' : '🟡'} <b>EXPIRING</b>`,
    `▸ Product: ${name}`,
    `▸ Expires on: ${formatDate(expirationDate)}`,
    `▸ Days left: ${daysLeft}`,
  ].join('\n');
}

export interface ExpirationCheckerOptions extends CheckerOptions {
  alertDays: number;
}

export class ExpirationChecker extends BaseChecker {
  private readonly alertDays: number;

  constructor(options: ExpirationCheckerOptions) {
    super('expiration', options);
    this.alertDays = options.alertDays;
  }

  protected applies(product: Product): boolean {
    return product.expirationDate !== null;
  }

  protected validate(product: Product): string | null {
    const problem = super.validate(product);
    if (problem !== null) return problem;
    if (product.expirationDate !== null && Number.isNaN(product.expirationDate.getTime())) {
      return 'invalid expiration date';
    }
    return null;
  }

  protected evaluate(product: Product, now: Date): Notification | null {
    if (product.expirationDate === null) return null;

    const daysLeft = daysUntil(product.expirationDate, now);
    const bucket = expirationBucket(daysLeft, this.alertDays);

    if (bucket === null) {
      this.clearCondition(product.id);
      return null;
    }

    // the date is part of the fingerprint so a relabelled batch alerts again
    const fingerprint = `${formatIsoDay(product.expirationDate)}|${bucket}`;
    if (!this.shouldAlert(product.id, fingerprint, now)) return null;

    const notification: Notification = {
      source: 'expiration',
      key: product.id,
      group: product.groupPath,
      text: formatExpirationAlert(product, product.expirationDate, bucket, daysLeft),
      priority: bucket === 'expiring' ? 'normal' : 'high',
    };
    this.recordAlert(product.id, fingerprint, now);
    return notification;
  }
}
