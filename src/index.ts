/**
 * know - Library Entry Point
 *
 * The CLI (`know`) is the primary interface:
 * ```bash
 * know up                     # Start the vector and parsing engines
 * know ingest ./docs          # Ingest documents
 * know run "How long do refunds take?"
 * know serve --port 8080      # OpenAI-compatible API
 * ```
 *
 * The pipelines are exported for programs that embed them directly.
 *
 * @example
 * ```typescript
 * import { loadConfig, loadEnv, resolveSettings, resolveBackend, createBackend,
 *          QdrantStore, RagEngine } from 'know-rag';
 *
 * const settings = resolveSettings(loadConfig(), loadEnv());
 * const backend = createBackend(await resolveBackend(settings.backend), settings.http);
 * const store = new QdrantStore({ url: settings.services.qdrantUrl });
 * const engine = new RagEngine({ store, backend }, { ...settings.rag, collection: 'handbook' });
 *
 * const answer = await engine.answer('How long do refunds take?');
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

// Configuration
export {
  loadConfig,
  loadEnv,
  resolveSettings,
  getConfigPath,
  type Config,
  type Settings,
  type SettingsOverrides,
  type EmptyContextPolicy,
} from './config/index.js';

// Errors
export {
  CLIError,
  ValidationError,
  ConfigError,
  FileNotFoundError,
  BackendUnavailableError,
  ServiceStartFailedError,
  StoreError,
  RetrievalFailedError,
  GenerationFailedError,
  TransferError,
  ParseError,
  EmbedError,
  OperationCancelledError,
  describeError,
  formatError,
  getExitCode,
  type ErrorReport,
  type StoreErrorKind,
} from './errors/index.js';

// LLM backends
export {
  resolveBackend,
  createBackend,
  describeBackend,
  OpenAICompatibleBackend,
  OllamaBackend,
  type BackendKind,
  type BackendConfiguration,
  type LLMBackend,
  type ChatMessage,
} from './providers/index.js';

// Services
export {
  createSupervisor,
  ServiceSupervisor,
  DockerComposeRuntime,
  type ContainerRuntime,
  type ServiceName,
  type ServiceState,
  type ServiceStatus,
} from './services/index.js';

// Parsing, storage, ingestion
export { DoclingParser, type DocumentParser } from './parser/index.js';
export {
  QdrantStore,
  ensureCollection,
  type VectorStore,
  type VectorPoint,
  type PointPayload,
  type CollectionInfo,
} from './store/index.js';
export {
  ingest,
  scanPath,
  chunkText,
  pointId,
  type IngestOptions,
  type IngestReport,
  type FileOutcome,
} from './indexer/index.js';

// Retrieval and generation
export { RagEngine, formatCitations, type Answer, type AnswerOptions, type AnswerSource } from './rag/index.js';

// Transfer
export {
  pushCollection,
  pullCollection,
  DockerImageRegistry,
  type ArtifactRegistry,
  type CollectionArchive,
  type TransferResult,
} from './transfer/index.js';

// HTTP API
export { createApp, listen, close, type AnswerEngine, type ServerDependencies } from './server/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
