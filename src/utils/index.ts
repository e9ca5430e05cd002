/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { consoleLogger, silentLogger, scopedLogger, type Logger } from './logger.js';

export {
  withRetry,
  sleep,
  throwIfAborted,
  abortable,
  backoffDelay,
  type RetryOptions,
} from './retry.js';

export { mapWithConcurrency } from './concurrency.js';

export { splitsSurrogatePair, codePointBoundary } from './text.js';

export {
  createHttpClient,
  isTransientHttpError,
  describeHttpError,
  type HttpClientOptions,
} from './http.js';

export {
  defaultExecFile,
  describeExecError,
  type ExecFileFn,
  type ExecOptions,
} from './exec.js';
