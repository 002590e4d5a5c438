/**
 * withRetry: exponential backoff retry wrapper
 */

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 500) */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor?: number;
  /** Max delay cap in ms (default: 30_000) */
  maxDelayMs?: number;
  /** Retry only if this returns true for the error */
  retryIf?: (error: unknown) => boolean;
  /** Called before each wait with the failed attempt number */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborting stops further attempts and cuts the current wait short */
  signal?: AbortSignal;
}

/** Longest delay a single timer accepts; Node fires longer ones after 1 ms */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Delays past the timer
 * limit are waited out in slices.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const arm = (): void => {
      const slice = Math.min(remaining, MAX_TIMER_MS);
      remaining -= slice;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, slice);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    arm();
  });
}

/**
 * Retry an async function with exponential backoff.
 * On final failure, the last error is re-thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 500,
    backoffFactor = 2,
    maxDelayMs = 30_000,
    retryIf,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;
  let delayMs = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts) break;
      if (signal?.aborted) break;
      if (retryIf && !retryIf(error)) break;

      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, signal);
      if (signal?.aborted) break;
      delayMs = Math.min(delayMs * backoffFactor, maxDelayMs);
    }
  }

  throw lastError;
}
