/**
 * Test Utilities Module
 *
 * In-process stand-ins for the vector engine, the LLM backend and the
 * container runtime, shared across the test suites.
 *
 * @example
 * ```typescript
 * import { InMemoryVectorStore, FakeBackend } from '../../test-utils/index.js';
 *
 * const store = new InMemoryVectorStore();
 * const backend = new FakeBackend();
 * ```
 */

export { InMemoryVectorStore, cosineSimilarity } from './memory-store.js';
export { FakeBackend, FEATURE_WORDS, FAKE_DIMENSION, featureVector, type FakeBackendOptions } from './fake-backend.js';
export { httpError, networkError } from './http-errors.js';
export { FakeContainerRuntime } from './fake-runtime.js';
export { InMemoryRegistry } from './fake-registry.js';
export { createTestRuntime, textParser, type TestRuntime, type TestRuntimeOptions } from './test-runtime.js';
export { seedCollection, SEED_TIMESTAMP } from './seed.js';
