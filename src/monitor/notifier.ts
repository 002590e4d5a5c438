/**
 * Notifier: turns checker output into chat messages.
 *
 * Delivery is best-effort: every chunk is attempted in order, a failing chunk
 * is logged and dropped, and nothing is thrown back to the cycle.
 *
 * @module monitor/notifier
 */

import { DeliveryError } from '../types/errors.js';
import { escapeHtml, splitTelegramMessage, TELEGRAM_MAX_LENGTH } from '../utils/format.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import type { Notification, NotificationSource } from './types.js';

export interface SendOptions {
  /** Deliver without a sound notification */
  silent?: boolean;
}

/** Outbound side of the messaging channel. */
export interface ChatTransport {
  sendMessage(text: string, options?: SendOptions): Promise<void>;
  close(): Promise<void>;
}

export interface DeliveryReport {
  sent: number;
  failed: number;
}

export interface NotifierOptions {
  logger: Logger;
  messageLimit?: number;
  /** Pause between consecutive chunks, to stay under the provider's rate limit */
  chunkDelayMs?: number;
}

const HEADERS: Record<NotificationSource, string> = {
  stock: '📊 <b>STOCK ALERTS</b>',
  expiration: '⏳ <b>EXPIRATION ALERTS</b>',
};

export class Notifier {
  private readonly transport: ChatTransport;
  private readonly logger: Logger;
  private readonly messageLimit: number;
  private readonly chunkDelayMs: number;
  private closed = false;

  constructor(transport: ChatTransport, options: NotifierOptions) {
    this.transport = transport;
    this.logger = options.logger.child({ component: 'notifier' });
    this.messageLimit = options.messageLimit ?? TELEGRAM_MAX_LENGTH;
    this.chunkDelayMs = options.chunkDelayMs ?? 1000;
  }

  /**
   * Send notifications grouped by source and product group, one message
   * (possibly several chunks) per group, in order of first appearance.
   */
  async deliver(notifications: readonly Notification[]): Promise<DeliveryReport> {
    const groups = new Map<string, { source: NotificationSource; group: string; items: Notification[] }>();

    for (const notification of notifications) {
      const id = `${notification.source}\u0000${notification.group}`;
      let entry = groups.get(id);
      if (!entry) {
        entry = { source: notification.source, group: notification.group, items: [] };
        groups.set(id, entry);
      }
      entry.items.push(notification);
    }

    const total: DeliveryReport = { sent: 0, failed: 0 };
    for (const { source, group, items } of groups.values()) {
      const header = `${HEADERS[source]} (${escapeHtml(group)})`;
      const text = [header, ...items.map((item) => item.text)].join('\n\n');
      const silent = items.every((item) => item.priority === 'normal');

      const report = await this.send(text, { silent });
      total.sent += report.sent;
      total.failed += report.failed;
    }

    return total;
  }

  async send(text: string, options: SendOptions = {}): Promise<DeliveryReport> {
    const chunks = splitTelegramMessage(text, this.messageLimit);
    const report: DeliveryReport = { sent: 0, failed: 0 };

    for (const [index, chunk] of chunks.entries()) {
      if (index > 0) await sleep(this.chunkDelayMs);

      if (this.closed) {
        report.failed++;
        this.logger.warn({ chunk: index, of: chunks.length }, 'Notifier closed, dropping chunk');
        continue;
      }

      try {
        await this.transport.sendMessage(chunk, options);
        report.sent++;
      } catch (error) {
        report.failed++;
        const failure = new DeliveryError(index, `Failed to deliver chunk ${index + 1}/${chunks.length}`, { cause: error });
        this.logger.error({ err: failure, cause: error, chunk: index, of: chunks.length }, 'Chunk delivery failed');
      }
    }

    return report;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close();
  }
}
