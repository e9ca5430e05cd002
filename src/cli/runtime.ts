/**
 * Per-invocation runtime
 *
 * Everything a command needs, resolved once from flags, environment and
 * config: settings, the service supervisor, the vector store, and lazily
 * the LLM backend. Ctrl+C aborts the runtime's signal.
 */

import { loadConfig } from '../config/loader.js';
import { loadEnv } from '../config/env.js';
import { resolveSettings, type Settings, type SettingsOverrides } from '../config/settings.js';
import { createBackend, resolveBackend } from '../providers/resolver.js';
import type { LLMBackend } from '../providers/types.js';
import { DoclingParser, type DocumentParser } from '../parser/docling.js';
import { createSupervisor } from '../services/index.js';
import type { ServiceSupervisor } from '../services/supervisor.js';
import { QdrantStore } from '../store/qdrant.js';
import type { VectorStore } from '../store/types.js';
import { DockerImageRegistry, type ArtifactRegistry } from '../transfer/registry.js';
import { scopedLogger } from '../utils/logger.js';
import type { CommandContext } from './types.js';

export interface Runtime {
  readonly settings: Readonly<Settings>;
  /** Aborted on SIGINT */
  readonly signal: AbortSignal;
  readonly supervisor: ServiceSupervisor;
  /** Start the vector engine if needed, then return the store */
  openStore(): Promise<VectorStore>;
  /** The store without starting anything (status, clean) */
  readonly store: VectorStore;
  /** Resolve the LLM backend; the first call probes, later calls reuse it */
  backend(): Promise<LLMBackend>;
  parser(): DocumentParser;
  registry(): ArtifactRegistry;
  /** Detach the SIGINT handler */
  close(): void;
}

/**
 * Config file named by --config or KNOW_CONFIG; undefined means the default.
 */
export function configPathFor(ctx: CommandContext): string | undefined {
  return ctx.options.config ?? loadEnv().KNOW_CONFIG;
}

/**
 * Resolve settings: flags > environment > config file > defaults.
 */
export function loadSettings(
  ctx: CommandContext,
  overrides: Pick<SettingsOverrides, 'collection'> = {}
): Readonly<Settings> {
  const env = loadEnv();
  const configPath = configPathFor(ctx);
  const config = loadConfig({ configPath, createIfMissing: configPath === undefined });

  return resolveSettings(config, env, {
    backend: ctx.options.backend,
    baseUrl: ctx.options.baseUrl,
    model: ctx.options.model,
    embedModel: ctx.options.embedModel,
    collection: overrides.collection,
  });
}

export function createRuntime(
  ctx: CommandContext,
  overrides: Pick<SettingsOverrides, 'collection'> = {}
): Runtime {
  const settings = loadSettings(ctx, overrides);

  const controller = new AbortController();
  const onSigint = (): void => {
    ctx.warn('Interrupted, stopping after the current step (Ctrl+C again to force)');
    controller.abort();
    process.removeListener('SIGINT', onSigint);
  };
  process.on('SIGINT', onSigint);

  const supervisor = createSupervisor(settings.services, {
    logger: scopedLogger(ctx, 'services'),
    onTransition: (t) =>
      ctx.debug(`${t.service}: ${t.from} -> ${t.to}${t.reason ? ` (${t.reason})` : ''}`),
  });

  const store = new QdrantStore({
    url: settings.services.qdrantUrl,
    apiKey: settings.services.qdrantApiKey,
    timeoutMs: settings.http.timeoutMs,
    retries: settings.http.retries,
    retryBackoffMs: settings.http.retryBackoffMs,
    logger: scopedLogger(ctx, 'qdrant'),
  });

  let backend: Promise<LLMBackend> | undefined;

  return {
    settings,
    signal: controller.signal,
    supervisor,
    store,

    async openStore() {
      await supervisor.ensureRunning('qdrant', controller.signal);
      return store;
    },

    backend() {
      if (backend === undefined) {
        backend = resolveBackend(settings.backend, { logger: ctx }).then((config) => {
          ctx.debug(`Backend: ${config.label} at ${config.baseUrl} (${config.generationModel}, ${config.embeddingModel})`);
          return createBackend(config, settings.http, scopedLogger(ctx, config.kind));
        });
      }
      return backend;
    },

    parser() {
      return new DoclingParser({
        url: settings.services.doclingUrl,
        timeoutMs: settings.http.timeoutMs,
        retries: settings.http.retries,
        retryBackoffMs: settings.http.retryBackoffMs,
        logger: scopedLogger(ctx, 'docling'),
        beforeRemoteParse: (signal) => supervisor.ensureRunning('docling', signal),
      });
    },

    registry() {
      return new DockerImageRegistry({ logger: scopedLogger(ctx, 'registry') });
    },

    close() {
      process.removeListener('SIGINT', onSigint);
    },
  };
}
