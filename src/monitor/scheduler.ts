/**
 * Monitor Scheduler
 *
 * Runs the polling cycle on a fixed interval:
 * - fetch one snapshot from the inventory API
 * - hand it to every checker, in order
 * - deliver what they report and persist their caches
 *
 * Lifecycle: idle → running → stop_requested → stopped. The wait between
 * cycles and an in-flight fetch are both cut short by stop(); a checker that
 * is already running finishes its work first.
 */

import type { EventBus } from '../kernel/event-bus.js';
import { SchedulerStateError } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import type { Notifier } from './notifier.js';
import type {
  Checker,
  CycleReport,
  MonitorContext,
  SchedulerState,
  Snapshot,
  SnapshotSource,
} from './types.js';

export interface MonitorSchedulerOptions {
  intervalMs: number;
  /** Upper bound for one snapshot fetch */
  fetchTimeoutMs: number;
  /** Purge expired cache records every N cycles */
  purgeEveryCycles: number;
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export class MonitorScheduler {
  private readonly logger: Logger;
  private readonly events: EventBus;
  private readonly clock: () => Date;
  private readonly source: SnapshotSource;
  private readonly checkers: readonly Checker[];
  private readonly notifier: Pick<Notifier, 'deliver'>;
  private readonly options: MonitorSchedulerOptions;

  private state: SchedulerState = 'idle';
  private started = false;
  private cycle = 0;
  private readonly stopSignal = new AbortController();
  private readonly finished: Promise<void>;
  private markFinished: () => void = () => undefined;

  constructor(
    context: MonitorContext,
    source: SnapshotSource,
    checkers: readonly Checker[],
    notifier: Pick<Notifier, 'deliver'>,
    options: MonitorSchedulerOptions,
  ) {
    this.logger = context.logger.child({ component: 'scheduler' });
    this.events = context.events;
    this.clock = context.clock;
    this.source = source;
    this.checkers = [...checkers];
    this.notifier = notifier;
    this.options = options;
    this.finished = new Promise((resolve) => {
      this.markFinished = resolve;
    });
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Run the loop until stop() is called. Resolves once the loop has exited.
   */
  async run(): Promise<void> {
    if (this.state === 'stopped' && !this.started) {
      this.logger.info('Stop requested before start, not running');
      return;
    }
    this.claim('run');

    this.logger.info(
      { intervalMs: this.options.intervalMs, checkers: this.checkers.map((c) => c.name) },
      'Scheduler started',
    );

    try {
      while (this.state === 'running') {
        const began = Date.now();

        try {
          await this.runCycle();
        } catch (error) {
          this.logger.error({ err: error }, 'Unexpected error in check cycle');
        }

        if (this.state !== 'running') break;

        const waitMs = Math.max(0, this.options.intervalMs - (Date.now() - began));
        this.logger.info({ waitMs }, 'Waiting for next cycle');
        await sleep(waitMs, this.stopSignal.signal);
      }
    } finally {
      this.finish();
    }
  }

  /**
   * Execute a single cycle outside the loop. The scheduler is stopped afterwards.
   */
  async runOnce(): Promise<CycleReport> {
    this.claim('runOnce');
    try {
      return await this.runCycle();
    } finally {
      this.finish();
    }
  }

  /**
   * Request the loop to stop and wait until it has. Safe to call at any time,
   * any number of times.
   */
  async stop(): Promise<void> {
    if (this.state === 'idle') {
      this.transition('stopped');
      this.markFinished();
      return;
    }

    if (this.state === 'running') {
      this.transition('stop_requested');
      this.stopSignal.abort(new Error('Scheduler stop requested'));
    }

    await this.finished;
  }

  private claim(operation: string): void {
    if (this.state !== 'idle') {
      throw new SchedulerStateError(`Cannot ${operation} scheduler in state "${this.state}"`);
    }
    this.started = true;
    this.transition('running');
  }

  private finish(): void {
    this.transition('stopped');
    this.logger.info({ cycles: this.cycle }, 'Scheduler stopped');
    this.markFinished();
  }

  private transition(to: SchedulerState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.events.emit('monitor:state_changed', { from, to });
  }

  private async runCycle(): Promise<CycleReport> {
    const cycle = ++this.cycle;
    const now = this.clock();
    const began = Date.now();
    const report: CycleReport = { cycle, fetched: false, products: 0, notifications: 0, durationMs: 0 };

    this.events.emit('monitor:cycle_started', { cycle, startedAt: now });
    this.logger.info({ cycle }, 'Check cycle started');

    if (cycle % this.options.purgeEveryCycles === 0) {
      this.purge(now);
    }

    const snapshot = await this.fetch(cycle);
    if (snapshot) {
      report.fetched = true;
      report.products = snapshot.products.length;

      for (const checker of this.checkers) {
        report.notifications += await this.runChecker(checker, snapshot, now);
        // Stop lets the current checker finish and skips the rest
        if (this.state !== 'running') break;
      }
    }

    report.durationMs = Date.now() - began;
    this.events.emit('monitor:cycle_completed', report);
    this.logger.info(report, 'Check cycle finished');
    return report;
  }

  private async fetch(cycle: number): Promise<Snapshot | null> {
    if (this.state !== 'running') return null;

    const signal = AbortSignal.any([
      this.stopSignal.signal,
      AbortSignal.timeout(this.options.fetchTimeoutMs),
    ]);

    try {
      return await abortable(this.source.fetchSnapshot(signal), signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (this.stopSignal.signal.aborted) {
        this.logger.warn({ cycle }, 'Snapshot fetch abandoned, stop requested');
      } else {
        this.logger.error({ cycle, err: error }, 'Snapshot fetch failed, skipping checks this cycle');
      }
      this.events.emit('monitor:fetch_failed', { cycle, error: message });
      return null;
    }
  }

  private async runChecker(checker: Checker, snapshot: Snapshot, now: Date): Promise<number> {
    let notifications;
    try {
      notifications = checker.check(snapshot, now);
    } catch (error) {
      this.logger.error({ checker: checker.name, err: error }, 'Checker failed');
      return 0;
    }

    if (notifications.length > 0) {
      try {
        const delivery = await this.notifier.deliver(notifications);
        this.logger.info({ checker: checker.name, ...delivery }, 'Notifications delivered');
      } catch (error) {
        this.logger.error({ checker: checker.name, err: error }, 'Notification delivery failed');
      }
    }

    try {
      await checker.persist();
    } catch (error) {
      this.logger.error({ checker: checker.name, err: error }, 'Failed to persist checker cache');
    }

    return notifications.length;
  }

  private purge(now: Date): void {
    for (const checker of this.checkers) {
      try {
        const removed = checker.purgeExpired(now);
        this.events.emit('monitor:cache_purged', { checker: checker.name, removed });
      } catch (error) {
        this.logger.error({ checker: checker.name, err: error }, 'Cache purge failed');
      }
    }
  }
}
