/**
 * Retry with Exponential Backoff
 *
 * Every network call to the parsing engine, vector engine and LLM backend
 * goes through withRetry. Only transient failures are retried; the caller
 * decides what counts as transient via `isRetryable`.
 */

import { OperationCancelledError } from '../errors/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RetryOptions {
  /** Retries after the first attempt (0 = single attempt) */
  retries: number;
  /** Delay before the first retry in milliseconds */
  initialDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs?: number;
  /** Multiplier applied per attempt (default 2) */
  backoffMultiplier?: number;
  /** Decides whether an error is worth another attempt */
  isRetryable: (error: unknown) => boolean;
  /** Aborts waiting and further attempts */
  signal?: AbortSignal;
  /** Called before each retry sleep */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injected in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Sleep that rejects with OperationCancelledError when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Throw OperationCancelledError if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation?: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

/**
 * Settle with `promise`, or reject with OperationCancelledError as soon as
 * the signal aborts. The underlying work is not interrupted, only awaited
 * no longer; use for clients that take no signal of their own.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation?: string): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new OperationCancelledError(operation));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new OperationCancelledError(operation));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Delay before retry number `attempt` (1-based).
 */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  backoffMultiplier = 2,
  maxDelayMs = 30_000
): number {
  return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
}

// ============================================================================
// RETRY
// ============================================================================

/**
 * Execute `fn` and retry transient failures with exponential backoff.
 *
 * Non-retryable errors are rethrown immediately. After the last attempt the
 * final error is rethrown unchanged so callers can wrap it in their own
 * category (EmbedError, GenerationFailedError, ...).
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(options.signal);

    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof OperationCancelledError || options.signal?.aborted) {
        throw error;
      }
      if (attempt >= options.retries || !options.isRetryable(error)) {
        throw error;
      }

      const delay = backoffDelay(
        attempt + 1,
        options.initialDelayMs,
        options.backoffMultiplier,
        options.maxDelayMs
      );
      options.onRetry?.(error, attempt + 1, delay);
      await wait(delay, options.signal);
    }
  }
}
