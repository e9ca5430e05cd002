/**
 * Ingestion Module
 *
 * Scan → Parse → Chunk → Embed → Upsert, idempotent per file.
 */

export { ingest, UPSERT_BATCH_SIZE, type IngestDependencies, type IngestOptions } from './pipeline.js';
export { scanPath, toSourcePath } from './scanner.js';
export { chunkText, validateChunkerOptions } from './chunker.js';
export { embedTexts, toBatches, type EmbedTextsOptions } from './embedder.js';
export { pointId, contentHash, POINT_ID_NAMESPACE } from './ids.js';
export { createIgnoreFilter, parseGitignoreContent, type IgnoreFilter } from './ignore.js';
export {
  DEFAULT_IGNORE_PATTERNS,
  type Chunk,
  type ChunkerOptions,
  type DiscoveredFile,
  type FileOutcome,
  type IngestFailure,
  type IngestReport,
  type ScanOptions,
} from './types.js';
