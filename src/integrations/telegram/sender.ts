/**
 * Telegram chat transport
 *
 * Outbound delivery to the alert chat through grammY's Bot API client.
 * The bot plugin handles the interactive side; this is strictly for
 * notifications.
 */

import type { Api } from 'grammy';
import type { ChatTransport, SendOptions } from '../../monitor/notifier.js';

export interface TelegramSenderConfig {
  chatId: string | number;
  parseMode?: 'HTML' | 'MarkdownV2';
}

export class TelegramSender implements ChatTransport {
  private readonly api: Pick<Api, 'sendMessage'>;
  private readonly chatId: string | number;
  private readonly parseMode: 'HTML' | 'MarkdownV2';
  private closed = false;

  constructor(api: Pick<Api, 'sendMessage'>, config: TelegramSenderConfig) {
    this.api = api;
    this.chatId = config.chatId;
    this.parseMode = config.parseMode ?? 'HTML';
  }

  async sendMessage(text: string, options?: SendOptions): Promise<void> {
    if (this.closed) {
      throw new Error('Telegram sender is closed');
    }

    await this.api.sendMessage(this.chatId, text, {
      parse_mode: this.parseMode,
      disable_notification: options?.silent ?? false,
    });
  }

  /**
   * grammY keeps no session of its own; closing only refuses further sends.
   */
  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
