/**
 * Ingestion Pipeline
 *
 * Orchestrates: Scan → (skip unchanged) → Parse → Chunk → Embed → Upsert → Delete stale
 *
 * Per file, writes follow a logically atomic replace: every vector is
 * computed before the first upsert, and superseded points are deleted only
 * after the upsert succeeded. An interrupted run leaves each file either
 * fully old, fully new, or new plus leftover tail chunks that the next run
 * removes.
 *
 * Per-file problems (parse, embed, read) are collected, not thrown.
 * Vector engine failures, service start failures and cancellation abort.
 */

import { readFile } from 'node:fs/promises';

import { EmbedError, ParseError } from '../errors/index.js';
import { throwIfAborted } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import type { IngestSettings } from '../config/settings.js';
import type { LLMBackend } from '../providers/types.js';
import type { DocumentParser } from '../parser/docling.js';
import type { StoredPoint, VectorPoint, VectorStore } from '../store/types.js';
import { assertEmbeddingModel, ensureCollection } from '../store/collections.js';
import { scanPath } from './scanner.js';
import { chunkText } from './chunker.js';
import { embedTexts, toBatches } from './embedder.js';
import { contentHash, pointId } from './ids.js';
import type { DiscoveredFile, FileOutcome, IngestFailure, IngestReport } from './types.js';

/** Points per upsert request */
export const UPSERT_BATCH_SIZE = 128;

export interface IngestDependencies {
  store: VectorStore;
  backend: LLMBackend;
  parser: DocumentParser;
  logger?: Logger;
}

export interface IngestOptions {
  /** File or directory to ingest */
  path: string;
  collection: string;
  settings: Pick<
    IngestSettings,
    'extensions' | 'chunkSize' | 'chunkOverlap' | 'embedBatchSize' | 'embedConcurrency' | 'ignorePatterns'
  >;
  signal?: AbortSignal;

  // Progress callbacks
  onScanComplete?: (files: DiscoveredFile[]) => void;
  onFileStart?: (file: DiscoveredFile, index: number, total: number) => void;
  onFileComplete?: (file: DiscoveredFile, outcome: FileOutcome) => void;
  onWarning?: (message: string, source?: string) => void;

  /** @internal Clock for payload timestamps */
  now?: () => Date;
}

/**
 * Errors that fail one file and let the walk continue.
 */
function isPerFileError(error: unknown): error is Error {
  return error instanceof ParseError || error instanceof EmbedError;
}

function toFailure(source: string, error: Error): IngestFailure {
  return { source, category: error.name, message: error.message };
}

/**
 * Existing points are current when they were all produced from the same
 * bytes by the same model and the chunk set is complete.
 */
function isUnchanged(existing: StoredPoint[], hash: string, embeddingModel: string): boolean {
  if (existing.length === 0) return false;
  return existing.every(
    (point) =>
      point.payload.content_hash === hash &&
      point.payload.embedding_model === embeddingModel &&
      point.payload.chunk_count === existing.length
  );
}

/**
 * Ingest a file or directory into a collection.
 *
 * @example
 * ```typescript
 * const report = await ingest(
 *   { path: './docs', collection: 'handbook', settings: settings.ingest,
 *     onFileComplete: (file, outcome) => reporter.fileDone(file, outcome) },
 *   { store, backend, parser }
 * );
 * ```
 */
export async function ingest(options: IngestOptions, deps: IngestDependencies): Promise<IngestReport> {
  const startTime = performance.now();
  const { collection, settings, signal } = options;
  const { store, backend, parser, logger } = deps;
  const now = options.now ?? (() => new Date());
  const embeddingModel = backend.config.embeddingModel;

  const report: IngestReport = {
    collection,
    filesProcessed: 0,
    chunksWritten: 0,
    filesSkipped: 0,
    filesFailed: 0,
    staleChunksDeleted: 0,
    failures: [],
    durationMs: 0,
  };

  const warn = (message: string, source?: string): void => {
    logger?.debug?.(source ? `${message} (${source})` : message);
    options.onWarning?.(message, source);
  };

  // =========================================================================
  // SCAN
  // =========================================================================
  throwIfAborted(signal, 'Ingestion');
  const files = await scanPath(options.path, {
    extensions: settings.extensions,
    ignorePatterns: settings.ignorePatterns,
  });
  options.onScanComplete?.(files);
  logger?.debug?.(`Found ${files.length} file(s) under ${options.path}`);

  // Known up front so lookups on a missing collection are skipped
  let collectionExists = (await store.getCollection(collection, signal)) !== null;
  let collectionVerified = false;

  // =========================================================================
  // PER FILE
  // =========================================================================
  for (const [index, file] of files.entries()) {
    throwIfAborted(signal, 'Ingestion');
    options.onFileStart?.(file, index, files.length);

    let outcome: FileOutcome;
    try {
      outcome = await ingestFile(file);
    } catch (error) {
      if (!isPerFileError(error)) {
        throw error;
      }
      const failure = toFailure(file.path, error);
      report.failures.push(failure);
      report.filesFailed++;
      logger?.debug?.(`${failure.category}: ${failure.message}`);
      options.onFileComplete?.(file, { status: 'failed', failure });
      continue;
    }

    report.staleChunksDeleted += outcome.status === 'failed' ? 0 : outcome.staleDeleted;
    if (outcome.status === 'written') {
      report.filesProcessed++;
      report.chunksWritten += outcome.chunks;
    } else if (outcome.status === 'skipped') {
      report.filesSkipped++;
    }
    options.onFileComplete?.(file, outcome);
  }

  report.durationMs = Math.round(performance.now() - startTime);
  return report;

  // =========================================================================
  // ONE FILE
  // =========================================================================
  async function ingestFile(file: DiscoveredFile): Promise<FileOutcome> {
    const source = file.path;

    let content: Buffer;
    try {
      content = await readFile(file.path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(source, `cannot read file: ${reason}`, { cause: error });
    }
    const hash = contentHash(content);

    const existing = collectionExists ? await store.findBySource(collection, source, signal) : [];
    if (isUnchanged(existing, hash, embeddingModel)) {
      logger?.debug?.(`Unchanged: ${file.relativePath}`);
      return { status: 'skipped', reason: 'unchanged', staleDeleted: 0 };
    }

    const text = await parser.parse({ path: file.path, content }, signal);
    const chunks = chunkText(text, {
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
    });

    if (chunks.length === 0) {
      warn('Document produced no text; skipping', source);
      if (existing.length > 0) {
        await store.delete(
          collection,
          existing.map((point) => point.id),
          signal
        );
      }
      return { status: 'skipped', reason: 'empty', staleDeleted: existing.length };
    }

    // All vectors before any write
    const vectors = await embedTexts(
      backend,
      chunks.map((chunk) => chunk.text),
      { batchSize: settings.embedBatchSize, concurrency: settings.embedConcurrency, signal }
    );
    throwIfAborted(signal, 'Ingestion');

    const dimension = vectors[0]?.length ?? 0;
    if (!collectionVerified) {
      await ensureCollection(store, collection, dimension, signal);
      await assertEmbeddingModel(store, collection, embeddingModel, signal);
      collectionExists = true;
      collectionVerified = true;
    }

    const ingestedAt = now().toISOString();
    const points: VectorPoint[] = chunks.map((chunk, i) => ({
      id: pointId(source, chunk.index),
      vector: vectors[i] ?? [],
      payload: {
        collection,
        source,
        content_hash: hash,
        modified_at: file.modifiedAt,
        chunk_index: chunk.index,
        chunk_count: chunks.length,
        start_offset: chunk.startOffset,
        end_offset: chunk.endOffset,
        text: chunk.text,
        embedding_model: embeddingModel,
        ingested_at: ingestedAt,
      },
    }));

    for (const batch of toBatches(points, UPSERT_BATCH_SIZE)) {
      await store.upsert(collection, batch, signal);
    }

    // Only after the new set is committed
    const currentIds = new Set(points.map((point) => point.id));
    const stale = existing.filter((point) => !currentIds.has(point.id)).map((point) => point.id);
    if (stale.length > 0) {
      await store.delete(collection, stale, signal);
    }

    return { status: 'written', chunks: points.length, staleDeleted: stale.length };
  }
}

