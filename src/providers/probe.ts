/**
 * Backend Liveness Probes
 *
 * One GET with a short timeout; no retries. Used only during resolution.
 */

import axios from 'axios';
import { describeHttpError } from '../utils/http.js';
import type { BackendKind } from './types.js';

export type ProbeResult = { ok: true } | { ok: false; reason: string };

export interface ProbeOptions {
  timeoutMs: number;
  apiKey?: string;
}

export type LivenessProbe = (
  kind: BackendKind,
  baseUrl: string,
  options: ProbeOptions
) => Promise<ProbeResult>;

/** Path answering a cheap GET for each backend */
export const LIVENESS_PATHS: Readonly<Record<BackendKind, string>> = {
  docker: '/models',
  ollama: '/api/tags',
  openai: '/models',
};

export const httpLivenessProbe: LivenessProbe = async (kind, baseUrl, options) => {
  const url = baseUrl.replace(/\/+$/, '') + LIVENESS_PATHS[kind];
  try {
    await axios.get(url, {
      timeout: options.timeoutMs,
      headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : undefined,
    });
    return { ok: true };
  } catch (error) {
    return { ok: false, reason: `${describeHttpError(error)} (${url})` };
  }
};
