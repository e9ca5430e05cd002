/**
 * JSON-over-HTTP call used by every backend client: retry transient
 * failures, validate the response shape, surface aborts as cancellations.
 */

import axios, { type AxiosInstance } from 'axios';
import type { z } from 'zod';
import { OperationCancelledError } from '../errors/index.js';
import { withRetry } from '../utils/retry.js';
import { isTransientHttpError } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import type { BackendHttpOptions } from './types.js';

export class UnexpectedResponseError extends Error {
  constructor(path: string, issues: string) {
    super(`Unexpected response from ${path}: ${issues}`);
    this.name = 'UnexpectedResponseError';
  }
}

export interface PostJsonOptions extends BackendHttpOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export async function postJson<T>(
  http: AxiosInstance,
  path: string,
  body: unknown,
  schema: z.ZodType<T>,
  options: PostJsonOptions
): Promise<T> {
  try {
    const data = await withRetry(
      async () => {
        const response = await http.post<unknown>(path, body, { signal: options.signal });
        return response.data;
      },
      {
        retries: options.retries,
        initialDelayMs: options.retryBackoffMs,
        isRetryable: isTransientHttpError,
        signal: options.signal,
        onRetry: (_error, attempt, delayMs) =>
          options.logger?.debug?.(`POST ${path}: retry ${attempt} in ${delayMs}ms`),
      }
    );

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new UnexpectedResponseError(
        path,
        parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')
      );
    }
    return parsed.data;
  } catch (error) {
    if (error instanceof OperationCancelledError || axios.isCancel(error) || options.signal?.aborted) {
      throw new OperationCancelledError('Request');
    }
    throw error;
  }
}
