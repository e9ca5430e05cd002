/**
 * Backend Resolver
 *
 * Resolves the LLM backend once per invocation:
 *
 *   1. explicit (--backend / KNOW_BACKEND): must pass its liveness probe
 *   2. local runners in order (Docker Model Runner, Ollama): first live one wins
 *   3. OpenAI, when OPENAI_API_KEY is present
 *
 * Otherwise BackendUnavailableError listing every attempt and its reason.
 */

import { BackendUnavailableError, type BackendAttempt } from '../errors/index.js';
import { SETUP_INSTRUCTIONS } from '../config/env.js';
import type { BackendSettings } from '../config/settings.js';
import type { Logger } from '../utils/logger.js';
import { httpLivenessProbe, type LivenessProbe } from './probe.js';
import { validateApiKey, validateBaseUrl } from './validation.js';
import { OpenAICompatibleBackend } from './openai.js';
import { OllamaBackend } from './ollama.js';
import {
  BACKEND_DEFAULTS,
  LOCAL_BACKENDS,
  type BackendConfiguration,
  type BackendHttpOptions,
  type BackendKind,
  type LLMBackend,
} from './types.js';

export interface ResolveBackendOptions {
  probe?: LivenessProbe;
  logger?: Logger;
}

function buildConfiguration(
  kind: BackendKind,
  baseUrl: string,
  settings: BackendSettings
): BackendConfiguration {
  const defaults = BACKEND_DEFAULTS[kind];
  return Object.freeze({
    kind,
    label: defaults.label,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    generationModel: settings.model ?? defaults.generationModel,
    embeddingModel: settings.embedModel ?? defaults.embeddingModel,
    apiKey: kind === 'openai' ? settings.apiKey : undefined,
  });
}

async function tryBackend(
  kind: BackendKind,
  baseUrl: string,
  settings: BackendSettings,
  probe: LivenessProbe
): Promise<{ ok: true } | { ok: false; attempt: BackendAttempt }> {
  for (const check of [validateBaseUrl(kind, baseUrl), validateApiKey(kind, settings.apiKey)]) {
    if (!check.valid) {
      return { ok: false, attempt: { backend: kind, reason: check.error } };
    }
  }

  const result = await probe(kind, baseUrl, {
    timeoutMs: settings.probeTimeoutMs,
    apiKey: kind === 'openai' ? settings.apiKey : undefined,
  });
  return result.ok ? { ok: true } : { ok: false, attempt: { backend: kind, reason: result.reason } };
}

/**
 * Resolve the backend configuration for this invocation.
 *
 * @throws BackendUnavailableError when no backend is usable
 */
export async function resolveBackend(
  settings: BackendSettings,
  options: ResolveBackendOptions = {}
): Promise<BackendConfiguration> {
  const probe = options.probe ?? httpLivenessProbe;
  const logger = options.logger;

  // 1. Explicit backend: validate and fail fast
  if (settings.kind !== undefined) {
    const kind = settings.kind;
    const baseUrl = settings.baseUrl ?? settings.endpoints[kind];
    logger?.debug?.(`Checking requested backend ${kind} at ${baseUrl}`);

    const result = await tryBackend(kind, baseUrl, settings, probe);
    if (!result.ok) {
      throw new BackendUnavailableError([result.attempt], SETUP_INSTRUCTIONS[kind].trim());
    }
    return buildConfiguration(kind, baseUrl, settings);
  }

  const attempts: BackendAttempt[] = [];

  // 2. Local runners, in order
  for (const kind of LOCAL_BACKENDS) {
    const baseUrl = settings.endpoints[kind];
    logger?.debug?.(`Probing ${BACKEND_DEFAULTS[kind].label} at ${baseUrl}`);

    const result = await probe(kind, baseUrl, { timeoutMs: settings.probeTimeoutMs });
    if (result.ok) {
      return buildConfiguration(kind, baseUrl, settings);
    }
    attempts.push({ backend: kind, reason: result.reason });
  }

  // 3. OpenAI when a key is present (no probe: a key is the opt-in)
  const keyCheck = validateApiKey('openai', settings.apiKey);
  if (keyCheck.valid) {
    return buildConfiguration('openai', settings.baseUrl ?? settings.endpoints.openai, settings);
  }
  attempts.push({ backend: 'openai', reason: keyCheck.error });

  throw new BackendUnavailableError(
    attempts,
    'Set up one of:\n' +
      [SETUP_INSTRUCTIONS.docker, SETUP_INSTRUCTIONS.ollama, SETUP_INSTRUCTIONS.openai]
        .map((s) => s.trim())
        .join('\n\n')
  );
}

/**
 * Build the client for a resolved configuration.
 */
export function createBackend(
  config: BackendConfiguration,
  http: BackendHttpOptions,
  logger?: Logger
): LLMBackend {
  switch (config.kind) {
    case 'ollama':
      return new OllamaBackend(config, http, logger);
    case 'docker':
    case 'openai':
      return new OpenAICompatibleBackend(config, http, logger);
  }
}

/**
 * Describe a configuration for logs and `status` (no API key).
 */
export function describeBackend(config: BackendConfiguration): Record<string, string> {
  return {
    backend: config.kind,
    label: config.label,
    baseUrl: config.baseUrl,
    generationModel: config.generationModel,
    embeddingModel: config.embeddingModel,
  };
}
