/**
 * Monitor App: wires configuration, caches, checkers, the scheduler and the
 * Telegram bot into one process, and owns its orderly shutdown.
 *
 * @module ops/monitor-app
 */

import { Bot } from 'grammy';
import { CacheStore } from '../cache/cache-store.js';
import { ensureDirectories, getCachePath, getLogsPath } from '../config/config.js';
import { MoySkladClient } from '../integrations/moysklad/client.js';
import { TelegramSender } from '../integrations/telegram/sender.js';
import { EventBus } from '../kernel/event-bus.js';
import { ExpirationChecker } from '../monitor/checkers/expiration-checker.js';
import { StockChecker } from '../monitor/checkers/stock-checker.js';
import { Notifier } from '../monitor/notifier.js';
import { MonitorScheduler } from '../monitor/scheduler.js';
import type { CycleReport, MonitorContext, SchedulerState } from '../monitor/types.js';
import { createBot } from '../plugins/telegram-bot/bot.js';
import { CounterpartyDirectory } from '../plugins/telegram-bot/counterparty-directory.js';
import { CounterpartyService } from '../plugins/telegram-bot/counterparty-service.js';
import { SetupError } from '../types/errors.js';
import { isErr, type Config } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { pruneLogFiles } from '../utils/logger.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// ═══════════════════════════════════════════════════════════════════════════
// APP SHELL
// ═══════════════════════════════════════════════════════════════════════════

/** Long-polling side of the bot. grammY's Bot satisfies this. */
export interface PollingBot {
  start(options?: { drop_pending_updates?: boolean; onStart?: () => void }): Promise<void>;
  stop(): Promise<void>;
}

export interface MonitorAppParts {
  logger: Logger;
  scheduler: Pick<MonitorScheduler, 'run' | 'runOnce' | 'stop' | 'getState'>;
  notifier: Pick<Notifier, 'close'>;
  /** Absent when the process only runs a single check */
  bot?: PollingBot | null;
  lookup?: Pick<CounterpartyService, 'stop'> | null;
  /** Background task started with the bot, e.g. loading known counterparties */
  warmUp?: ((signal: AbortSignal) => Promise<void>) | null;
}

export class MonitorApp {
  private readonly logger: Logger;
  private readonly parts: MonitorAppParts;
  private readonly warmUpAbort = new AbortController();
  private polling: Promise<void> | null = null;
  private warming: Promise<void> | null = null;
  private shuttingDown: Promise<void> | null = null;

  constructor(parts: MonitorAppParts) {
    this.parts = parts;
    this.logger = parts.logger.child({ component: 'app' });
  }

  getState(): SchedulerState {
    return this.parts.scheduler.getState();
  }

  /**
   * Start the bot and the monitoring loop. Resolves once shutdown has completed.
   */
  async run(): Promise<void> {
    const { bot, warmUp, scheduler } = this.parts;

    if (warmUp) {
      this.warming = warmUp(this.warmUpAbort.signal).catch((error: unknown) => {
        this.logger.error({ err: error }, 'Warm-up failed');
      });
    }

    if (bot) {
      this.polling = bot
        .start({
          drop_pending_updates: true,
          onStart: () => this.logger.info('Telegram bot polling started'),
        })
        .catch((error: unknown) => {
          this.logger.error({ err: error }, 'Telegram bot polling stopped with an error');
        });
    }

    try {
      await scheduler.run();
    } finally {
      await this.shutdown();
    }
  }

  /**
   * Run one check cycle, then shut down.
   */
  async runOnce(): Promise<CycleReport> {
    try {
      return await this.parts.scheduler.runOnce();
    } finally {
      await this.shutdown();
    }
  }

  /**
   * Stop everything in order: scheduler, lookups, bot, warm-up, transport.
   * Every call returns the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.performShutdown();
    }
    return this.shuttingDown;
  }

  private async performShutdown(): Promise<void> {
    this.logger.info('Shutting down');
    const { scheduler, lookup, bot, notifier } = this.parts;

    await this.step('scheduler', () => scheduler.stop());
    lookup?.stop();

    if (bot && this.polling) {
      await this.step('bot', () => bot.stop());
      await this.polling;
    }

    if (this.warming) {
      this.warmUpAbort.abort();
      await this.warming;
    }

    await this.step('notifier', () => notifier.close());
    this.logger.info('Shutdown complete');
  }

  private async step(name: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.logger.error({ err: error, step: name }, 'Shutdown step failed');
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export interface BuildOptions {
  /** Start the bot and register counterparties; false for single checks */
  interactive?: boolean;
  clock?: () => Date;
}

/**
 * Build a ready-to-run app from validated configuration.
 *
 * @throws SetupError when directories cannot be created or the bot token is rejected
 */
export async function buildMonitorApp(
  config: Config,
  logger: Logger,
  options: BuildOptions = {},
): Promise<MonitorApp> {
  const interactive = options.interactive ?? true;
  const clock = options.clock ?? (() => new Date());

  const dirs = ensureDirectories(config);
  if (isErr(dirs)) {
    throw new SetupError(`Cannot create data directories: ${dirs.error.message}`, { cause: dirs.error });
  }

  try {
    const removed = pruneLogFiles(getLogsPath(config), config.logging.days_to_keep, clock());
    if (removed.length > 0) logger.info({ removed }, 'Old log files removed');
  } catch (error) {
    logger.warn({ err: error }, 'Log pruning failed');
  }

  const events = new EventBus(logger);
  const context: MonitorContext = { logger, events, clock };
  const retentionMs = config.cache.reset_days * DAY_MS;
  const suppressionMs = config.monitor.alert_suppression_hours * HOUR_MS;

  const stockStore = new CacheStore(getCachePath(config, 'stock'), { logger });
  const expirationStore = new CacheStore(getCachePath(config, 'expiration'), { logger });
  await stockStore.load({ now: clock(), retentionMs });
  await expirationStore.load({ now: clock(), retentionMs });

  const client = new MoySkladClient({
    token: config.moysklad.token,
    logger,
    pageSize: config.moysklad.page_size,
    requestTimeoutMs: config.moysklad.request_timeout_seconds * 1000,
    expirationAttribute: config.moysklad.expiration_attribute,
    counterpartyTags: config.moysklad.counterparty_tags,
    clock,
  });

  const checkers = [
    new StockChecker({ store: stockStore, context, suppressionMs, retentionMs }),
    new ExpirationChecker({
      store: expirationStore,
      context,
      suppressionMs,
      retentionMs,
      alertDays: config.monitor.alert_days,
    }),
  ];

  let lastCycle: CycleReport | null = null;
  events.on('monitor:cycle_completed', (report) => {
    lastCycle = report;
  });

  const phoneStore = new CacheStore(getCachePath(config, 'phones'), { logger });
  await phoneStore.load();
  const directory = new CounterpartyDirectory(phoneStore, logger);
  const lookup = new CounterpartyService({
    directory,
    api: client,
    logger,
    events,
    maxAttempts: config.lookup.max_attempts,
    retryDelayMs: config.lookup.retry_delay_seconds * 1000,
    clock,
  });

  let scheduler: MonitorScheduler | null = null;
  const bot: Bot = interactive
    ? createBot({
        eventBus: events,
        logger,
        lookup,
        config: {
          botToken: config.telegram.bot_token,
          allowedUserIds: config.telegram.allowed_user_ids,
        },
        status: {
          checkConnection: () => client.checkConnection(),
          schedulerState: () => scheduler?.getState() ?? 'idle',
          lastCycle: () => lastCycle,
          knownPhones: () => directory.size,
        },
      })
    : new Bot(config.telegram.bot_token);

  if (interactive) {
    try {
      await bot.init();
      logger.info({ username: bot.botInfo.username }, 'Telegram bot authenticated');
    } catch (error) {
      throw new SetupError('Telegram bot initialisation failed', { cause: error });
    }
  }

  const notifier = new Notifier(new TelegramSender(bot.api, { chatId: config.telegram.chat_id }), {
    logger,
    messageLimit: config.telegram.message_limit,
    chunkDelayMs: config.telegram.chunk_delay_ms,
  });

  scheduler = new MonitorScheduler(context, client, checkers, notifier, {
    intervalMs: config.monitor.check_interval_minutes * 60 * 1000,
    fetchTimeoutMs: config.monitor.fetch_timeout_seconds * 1000,
    purgeEveryCycles: config.cache.purge_every_cycles,
  });

  return new MonitorApp({
    logger,
    scheduler,
    notifier,
    bot: interactive ? bot : null,
    lookup: interactive ? lookup : null,
    warmUp: interactive
      ? async (signal) => {
          directory.warm(await client.loadCounterparties(signal), clock());
          await directory.persist();
        }
      : null,
  });
}
