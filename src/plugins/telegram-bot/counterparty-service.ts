import type { EventBus } from '../../kernel/event-bus.js';
import type { CreateCounterpartyResult } from '../../integrations/moysklad/client.js';
import type { Logger } from '../../utils/logger.js';
import { sleep } from '../../utils/retry.js';
import type { CounterpartyDirectory } from './counterparty-directory.js';
import { extractPhone } from './phone.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COUNTERPARTY SERVICE: phone number registration with retries
// ═══════════════════════════════════════════════════════════════════════════════

export type RegistrationStatus = 'invalid' | 'exists' | 'created' | 'failed';

export interface RegistrationResult {
  status: RegistrationStatus;
  phone: string | null;
  attempts: number;
}

export interface BatchReport {
  created: number;
  /** Already known locally or already present in MoySklad */
  skipped: number;
  failed: string[];
}

export interface BatchOptions {
  batchSize?: number;
  /** Called after each batch with the running count */
  onProgress?: (processed: number, total: number) => Promise<void> | void;
}

export const DEFAULT_BATCH_SIZE = 20;

export interface CounterpartyApi {
  createCounterparty(phone: string, signal?: AbortSignal): Promise<CreateCounterpartyResult>;
}

export interface CounterpartyServiceOptions {
  directory: CounterpartyDirectory;
  api: CounterpartyApi;
  logger: Logger;
  events?: EventBus;
  maxAttempts: number;
  /** Base delay; attempt N waits N times this long */
  retryDelayMs: number;
  clock?: () => Date;
}

const INDIVIDUAL = 'individual';

export class CounterpartyService {
  private readonly directory: CounterpartyDirectory;
  private readonly api: CounterpartyApi;
  private readonly logger: Logger;
  private readonly events?: EventBus;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly clock: () => Date;
  private readonly stopSignal = new AbortController();

  constructor(options: CounterpartyServiceOptions) {
    this.directory = options.directory;
    this.api = options.api;
    this.logger = options.logger.child({ component: 'counterparty-service' });
    this.events = options.events;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.retryDelayMs = options.retryDelayMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async register(text: string): Promise<RegistrationResult> {
    const result = await this.attemptRegistration(text);
    this.events?.emit('lookup:completed', { phone: result.phone, status: result.status });
    return result;
  }

  /**
   * Register already-normalised phone numbers, one API call each, in batches.
   * The directory is saved after every batch. Numbers left when the service
   * stops are reported as failed.
   */
  async registerBatch(phones: readonly string[], options: BatchOptions = {}): Promise<BatchReport> {
    const unique = [...new Set(phones)];
    const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    const report: BatchReport = { created: 0, skipped: 0, failed: [] };
    const signal = this.stopSignal.signal;

    for (let start = 0; start < unique.length; start += batchSize) {
      const batch = unique.slice(start, start + batchSize);
      if (signal.aborted) {
        report.failed.push(...unique.slice(start));
        break;
      }

      for (const phone of batch) {
        const status = await this.registerOnce(phone, signal);
        if (status === 'created') report.created++;
        else if (status === 'exists') report.skipped++;
        else report.failed.push(phone);
        this.events?.emit('lookup:completed', { phone, status });
      }

      await this.saveDirectory();
      await options.onProgress?.(start + batch.length, unique.length);
    }

    this.logger.info(
      { total: unique.length, created: report.created, skipped: report.skipped, failed: report.failed.length },
      'Batch registration finished',
    );
    return report;
  }

  /** Cut pending retry waits short; registrations in progress give up. */
  stop(): void {
    this.stopSignal.abort();
  }

  private async attemptRegistration(text: string): Promise<RegistrationResult> {
    const phone = extractPhone(text);
    if (phone === null) {
      return { status: 'invalid', phone: null, attempts: 0 };
    }

    if (this.directory.has(phone)) {
      this.logger.info({ phone }, 'Phone already known');
      return { status: 'exists', phone, attempts: 0 };
    }

    const signal = this.stopSignal.signal;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal.aborted) break;

      try {
        const outcome = await this.api.createCounterparty(phone, signal);

        if (outcome === 'rejected') {
          return { status: 'failed', phone, attempts: attempt };
        }

        this.directory.add(phone, INDIVIDUAL, this.clock());
        await this.saveDirectory();
        return { status: outcome, phone, attempts: attempt };
      } catch (error) {
        this.logger.warn({ phone, attempt, err: error }, 'Counterparty registration attempt failed');
        if (attempt < this.maxAttempts) {
          await sleep(this.retryDelayMs * attempt, signal);
        }
      }
    }

    this.logger.error({ phone, attempts: this.maxAttempts }, 'Counterparty registration failed');
    return { status: 'failed', phone, attempts: this.maxAttempts };
  }

  private async registerOnce(phone: string, signal: AbortSignal): Promise<RegistrationStatus> {
    if (this.directory.has(phone)) return 'exists';

    try {
      const outcome = await this.api.createCounterparty(phone, signal);
      if (outcome === 'rejected') return 'failed';
      this.directory.add(phone, INDIVIDUAL, this.clock());
      return outcome;
    } catch (error) {
      this.logger.warn({ phone, err: error }, 'Counterparty registration failed');
      return 'failed';
    }
  }

  private async saveDirectory(): Promise<void> {
    try {
      await this.directory.persist();
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to persist counterparty directory');
    }
  }
}
