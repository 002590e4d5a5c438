/**
 * stock-sentinel: Main Exports
 *
 * Public API surface for embedding the monitor.
 *
 * @module stock-sentinel
 */

// Types
export {
  type Config,
  type ConfigInput,
  type CacheName,
  type LogLevel,
  type Result,
  ConfigSchema,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';
export {
  MonitorError,
  FetchError,
  CacheCorruptionError,
  DeliveryError,
  SetupError,
  SchedulerStateError,
} from './types/errors.js';

// Configuration
export { loadConfig, ensureDirectories, getCachePath, getLogsPath } from './config/config.js';

// Kernel
export { EventBus, type EventMap } from './kernel/event-bus.js';

// Cache
export { CacheStore, type CacheRecord } from './cache/cache-store.js';

// Monitor
export type {
  Product,
  Snapshot,
  SnapshotSource,
  Notification,
  Checker,
  CycleReport,
  SchedulerState,
} from './monitor/types.js';
export { StockChecker } from './monitor/checkers/stock-checker.js';
export { ExpirationChecker } from './monitor/checkers/expiration-checker.js';
export { Notifier, type ChatTransport, type DeliveryReport } from './monitor/notifier.js';
export { MonitorScheduler, type MonitorSchedulerOptions } from './monitor/scheduler.js';

// Integrations
export { MoySkladClient } from './integrations/moysklad/client.js';
export { TelegramSender } from './integrations/telegram/sender.js';

// Bot
export { createBot } from './plugins/telegram-bot/bot.js';
export { extractPhone } from './plugins/telegram-bot/phone.js';
export {
  CounterpartyService,
  type RegistrationStatus,
  type BatchReport,
} from './plugins/telegram-bot/counterparty-service.js';
export { readSheetPhones } from './plugins/telegram-bot/spreadsheet.js';

// App
export { MonitorApp, buildMonitorApp } from './ops/monitor-app.js';

// Utilities
export { createLogger, createFileLogger, type Logger } from './utils/logger.js';
