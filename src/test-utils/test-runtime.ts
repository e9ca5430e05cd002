/**
 * A CLI Runtime wired to the in-process stand-ins, for command tests.
 */

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { resolveSettings } from '../config/settings.js';
import type { Runtime } from '../cli/runtime.js';
import type { DocumentParser } from '../parser/docling.js';
import type { LLMBackend } from '../providers/types.js';
import { ServiceSupervisor } from '../services/supervisor.js';
import { HEALTH_PATHS, serviceDefinitions } from '../services/types.js';
import { FakeBackend } from './fake-backend.js';
import { InMemoryRegistry } from './fake-registry.js';
import { FakeContainerRuntime } from './fake-runtime.js';
import { InMemoryVectorStore } from './memory-store.js';

export interface TestRuntimeOptions {
  collection?: string;
  store?: InMemoryVectorStore;
  /** A backend, or the error backend() rejects with */
  backend?: LLMBackend | Error;
  registry?: InMemoryRegistry;
  containers?: FakeContainerRuntime;
}

export interface TestRuntime extends Runtime {
  readonly controller: AbortController;
  readonly containers: FakeContainerRuntime;
  closed: boolean;
}

/** Reads every document as UTF-8 text */
export const textParser: DocumentParser = {
  async parse(document) {
    return document.content.toString('utf-8');
  },
};

export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const settings = resolveSettings(DEFAULT_CONFIG, {}, { collection: options.collection });
  const store = options.store ?? new InMemoryVectorStore();
  const backend = options.backend ?? new FakeBackend();
  const registry = options.registry ?? new InMemoryRegistry();
  const containers = options.containers ?? new FakeContainerRuntime();
  const controller = new AbortController();

  const { qdrantUrl, doclingUrl } = settings.services;
  const supervisor = new ServiceSupervisor(serviceDefinitions(settings.services), containers, {
    maxStartAttempts: 2,
    startBackoffMs: 0,
    probeTimeoutMs: 10,
    probe: containers.probeFor({
      [`${qdrantUrl}${HEALTH_PATHS.qdrant}`]: 'qdrant',
      [`${doclingUrl}${HEALTH_PATHS.docling}`]: 'docling',
    }),
    sleep: async () => {},
  });

  const runtime: TestRuntime = {
    settings,
    signal: controller.signal,
    controller,
    containers,
    supervisor,
    store,
    closed: false,

    async openStore() {
      await supervisor.ensureRunning('qdrant', controller.signal);
      return store;
    },

    async backend() {
      if (backend instanceof Error) throw backend;
      return backend;
    },

    parser: () => textParser,
    registry: () => registry,

    close() {
      runtime.closed = true;
    },
  };
  return runtime;
}
