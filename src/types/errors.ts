/**
 * Error taxonomy.
 *
 * Only SetupError is fatal. The others are caught at the boundary of the
 * cycle, chunk or cache file they belong to and end up in the log.
 */

export type MonitorErrorCode =
  | 'FETCH_FAILED'
  | 'CACHE_CORRUPT'
  | 'DELIVERY_FAILED'
  | 'SETUP_FAILED'
  | 'INVALID_STATE';

export class MonitorError extends Error {
  readonly code: MonitorErrorCode;

  constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
    this.code = code;
  }
}

/** Network, HTTP or auth failure talking to the inventory API. */
export class FetchError extends MonitorError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('FETCH_FAILED', message, { cause: options?.cause });
    this.name = 'FetchError';
    this.status = options?.status;
  }

  get retryable(): boolean {
    return this.status === undefined || this.status >= 500 || this.status === 429;
  }
}

export class CacheCorruptionError extends MonitorError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('CACHE_CORRUPT', message, options);
    this.name = 'CacheCorruptionError';
    this.filePath = filePath;
  }
}

export class DeliveryError extends MonitorError {
  readonly chunkIndex: number;

  constructor(chunkIndex: number, message: string, options?: { cause?: unknown }) {
    super('DELIVERY_FAILED', message, options);
    this.name = 'DeliveryError';
    this.chunkIndex = chunkIndex;
  }
}

export class SetupError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SETUP_FAILED', message, options);
    this.name = 'SetupError';
  }
}

export class SchedulerStateError extends MonitorError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'SchedulerStateError';
  }
}
