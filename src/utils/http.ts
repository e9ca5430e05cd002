/**
 * HTTP helpers shared by the LLM backends and the parsing client.
 */

import axios, { type AxiosInstance } from 'axios';

/** Error codes that indicate the peer was unreachable or dropped us */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
]);

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL.replace(/\/+$/, ''),
    timeout: options.timeoutMs,
    headers: options.headers,
  });
}

/**
 * Connection refused/reset, timeouts and 5xx responses are transient.
 * 4xx responses and anything that is not an HTTP error are not.
 */
export function isTransientHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  if (axios.isCancel(error)) {
    return false;
  }
  if (error.response) {
    return error.response.status >= 500;
  }
  return error.code !== undefined && TRANSIENT_NETWORK_CODES.has(error.code);
}

/**
 * One-line description of an HTTP failure, without request bodies or headers
 * (which may carry API keys).
 */
export function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const detail = extractErrorDetail(error.response.data);
      return detail
        ? `HTTP ${error.response.status}: ${detail}`
        : `HTTP ${error.response.status}`;
    }
    if (error.code === 'ECONNREFUSED') {
      return 'connection refused';
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function extractErrorDetail(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data.slice(0, 200) || undefined;
  }
  if (data && typeof data === 'object') {
    if ('error' in data) {
      const inner = data.error;
      if (typeof inner === 'string') return inner;
      if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
        return inner.message;
      }
    }
    if ('detail' in data && typeof data.detail === 'string') {
      return data.detail;
    }
  }
  return undefined;
}
