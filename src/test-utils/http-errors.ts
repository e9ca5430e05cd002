/**
 * Axios error builders for tests of the HTTP clients.
 */

import { AxiosError, AxiosHeaders } from 'axios';

export function httpError(status: number, data: unknown = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
    status,
    statusText: '',
    headers: {},
    config,
    data,
  });
}

export function networkError(code: string): AxiosError {
  return new AxiosError('network', code);
}
