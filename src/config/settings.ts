/**
 * Settings Resolution
 *
 * Folds the three configuration sources into one immutable value:
 *
 *   command-line flags  >  environment (KNOW_*)  >  config.toml  >  defaults
 *
 * The result is deep-frozen and passed explicitly into every pipeline,
 * so nothing downstream reads process.env or the config file again.
 */

import type { BackendKind, Config } from './schema.js';
import type { EnvVars } from './env.js';

// ============================================================================
// TYPES
// ============================================================================

/** Overrides coming from global and per-command CLI flags */
export interface SettingsOverrides {
  backend?: BackendKind;
  baseUrl?: string;
  model?: string;
  embedModel?: string;
  collection?: string;
}

export interface BackendSettings {
  /** Explicitly requested backend; undefined means auto-detect */
  kind?: BackendKind;
  baseUrl?: string;
  model?: string;
  embedModel?: string;
  apiKey?: string;
  probeTimeoutMs: number;
  endpoints: Record<BackendKind, string>;
}

export interface ServiceSettings {
  qdrantUrl: string;
  qdrantApiKey?: string;
  doclingUrl: string;
  maxStartAttempts: number;
  startBackoffMs: number;
  probeTimeoutMs: number;
  composeFile?: string;
}

export interface IngestSettings {
  extensions: string[];
  chunkSize: number;
  chunkOverlap: number;
  embedBatchSize: number;
  embedConcurrency: number;
  ignorePatterns: string[];
}

export type EmptyContextPolicy = 'fail' | 'answer';

export interface RagSettings {
  topK: number;
  maxContextChars: number;
  minScore: number;
  emptyContext: EmptyContextPolicy;
}

export interface HttpSettings {
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
}

export interface Settings {
  collection: string;
  backend: BackendSettings;
  services: ServiceSettings;
  ingest: IngestSettings;
  rag: RagSettings;
  http: HttpSettings;
  server: { host: string; port: number };
}

// ============================================================================
// RESOLUTION
// ============================================================================

function deepFreeze(value: object): void {
  for (const entry of Object.values(value)) {
    if (entry !== null && typeof entry === 'object' && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  Object.freeze(value);
}

/**
 * Resolve the effective settings for one invocation.
 */
export function resolveSettings(
  config: Config,
  env: Readonly<Partial<EnvVars>>,
  overrides: SettingsOverrides = {}
): Readonly<Settings> {
  const settings: Settings = {
    collection: overrides.collection ?? env.KNOW_COLLECTION ?? config.collection,

    backend: {
      kind: overrides.backend ?? env.KNOW_BACKEND ?? config.backend.kind,
      baseUrl: overrides.baseUrl ?? env.KNOW_BASE_URL ?? config.backend.base_url,
      model: overrides.model ?? env.KNOW_MODEL ?? config.backend.model,
      embedModel: overrides.embedModel ?? env.KNOW_EMBED_MODEL ?? config.backend.embed_model,
      apiKey: env.OPENAI_API_KEY,
      probeTimeoutMs: config.backend.probe_timeout_ms,
      endpoints: {
        docker: config.backend.docker_url,
        ollama: env.OLLAMA_HOST ?? config.backend.ollama_url,
        openai: config.backend.openai_url,
      },
    },

    services: {
      qdrantUrl: env.KNOW_QDRANT_URL ?? config.services.qdrant_url,
      qdrantApiKey: env.QDRANT_API_KEY,
      doclingUrl: env.KNOW_DOCLING_URL ?? config.services.docling_url,
      maxStartAttempts: config.services.max_start_attempts,
      startBackoffMs: config.services.start_backoff_ms,
      probeTimeoutMs: config.services.probe_timeout_ms,
      composeFile: config.services.compose_file,
    },

    ingest: {
      extensions: config.ingest.extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()),
      chunkSize: config.ingest.chunk_size,
      chunkOverlap: config.ingest.chunk_overlap,
      embedBatchSize: config.ingest.embed_batch_size,
      embedConcurrency: config.ingest.embed_concurrency,
      ignorePatterns: [...config.ingest.ignore_patterns],
    },

    rag: {
      topK: config.rag.top_k,
      maxContextChars: config.rag.max_context_chars,
      minScore: config.rag.min_score,
      emptyContext: config.rag.empty_context,
    },

    http: {
      timeoutMs: config.http.timeout_ms,
      retries: config.http.retries,
      retryBackoffMs: config.http.retry_backoff_ms,
    },

    server: { ...config.server },
  };

  deepFreeze(settings);
  return settings;
}
