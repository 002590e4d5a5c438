import { Bot } from 'grammy';
import type { EventBus } from '../../kernel/event-bus.js';
import type { Logger } from '../../utils/logger.js';
import type { CounterpartyService } from './counterparty-service.js';
import type { StatusSource, TelegramBotConfig } from './types.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { handleStatus } from './commands/status.js';
import { handleRegister } from './commands/register.js';
import { downloadTelegramFile, handleSpreadsheet, type FileDownloader } from './commands/upload.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

export interface BotDependencies {
  eventBus: EventBus;
  logger: Logger;
  lookup: CounterpartyService;
  status: StatusSource;
  config: TelegramBotConfig;
  /** Fetches uploaded documents; the Bot API file endpoint by default */
  download?: FileDownloader;
}

export const HELP_TEXT =
  '<b>Commands</b>\n\n' +
  '/status: API connection and last check\n' +
  '/help: this message\n\n' +
  'Send a phone number to register it as a counterparty.\n' +
  'Upload an Excel file with a "Наименование" or "Name" column to register numbers in bulk.';

/**
 * Creates the grammY bot with middleware chain:
 * auth → logging → commands → spreadsheet upload / phone registration
 *
 * Long polling only; the bot is started by the app shell.
 */
export function createBot(deps: BotDependencies): Bot {
  const { eventBus, logger, lookup, status, config } = deps;

  if (!config.botToken) {
    throw new Error('Telegram bot token not configured. Set BOT_TOKEN.');
  }

  const log = logger.child({ component: 'telegram-bot' });
  const bot = new Bot(config.botToken);

  // ── Middleware chain ──────────────────────────────────────────────

  bot.use(createAuthMiddleware({ allowedUserIds: config.allowedUserIds, eventBus, logger: log }));
  bot.use(createLoggingMiddleware(log));

  // ── Command handlers ──────────────────────────────────────────────

  bot.command('start', async (ctx) => {
    await ctx.reply(
      '<b>Inventory monitor</b>\n\n' +
      'Stock and expiration alerts are posted to the alert chat automatically.\n\n' +
      HELP_TEXT,
      { parse_mode: 'HTML' },
    );
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
  });

  bot.command('status', (ctx) => handleStatus(ctx, status));

  // ── Phone registration ────────────────────────────────────────────

  bot.on('message:document', (ctx) =>
    handleSpreadsheet(ctx, { lookup, download: deps.download ?? downloadTelegramFile, logger: log }),
  );
  bot.on('message:text', (ctx) => handleRegister(ctx, lookup));

  bot.catch((error) => {
    log.error({ err: error.error, updateId: error.ctx.update.update_id }, 'Bot handler failed');
  });

  return bot;
}
