import type { Logger } from '../utils/logger.js';
import type { CycleReport, SchedulerState } from '../monitor/types.js';
import type { RegistrationStatus } from '../plugins/telegram-bot/counterparty-service.js';

/**
 * EventMap interface defining event name to payload mappings.
 */
export interface EventMap {
  // ── Scheduler events ───────────────────────────────────────────────────
  'monitor:state_changed': { from: SchedulerState; to: SchedulerState };
  'monitor:cycle_started': { cycle: number; startedAt: Date };
  'monitor:cycle_completed': CycleReport;
  'monitor:fetch_failed': { cycle: number; error: string };
  'monitor:cache_purged': { checker: string; removed: number };

  // ── Telegram events ────────────────────────────────────────────────────
  'telegram:auth_rejected': { userId: number; chatId: number; timestamp: string };
  'lookup:completed': { phone: string | null; status: RegistrationStatus };

  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

type Handler = (payload: never) => void;

export class EventBus {
  private listeners: Map<keyof EventMap, Set<Handler>> = new Map();
  private handlerErrors = 0;
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers. A throwing handler does not stop the others.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as (payload: EventMap[K]) => void)(payload);
      } catch (error) {
        this.handlerErrors++;
        this.logger?.error({ event, err: error }, 'Error in event handler');

        // guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: error instanceof Error ? error.message : String(error),
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  /**
   * Subscribe to an event for a single occurrence
   */
  once<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  /** Resolves with the payload of the next `event`. */
  next<K extends keyof EventMap>(event: K): Promise<EventMap[K]> {
    return new Promise((resolve) => {
      this.once(event, resolve);
    });
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
