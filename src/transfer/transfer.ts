/**
 * Collection push/pull
 *
 * push: scroll every point out of the store into an archive and hand it to
 * the registry. pull: fetch an archive and upsert it into a (possibly new)
 * collection, overwriting colliding ids.
 */

import { StoreError, TransferError } from '../errors/index.js';
import { UPSERT_BATCH_SIZE } from '../indexer/pipeline.js';
import { assertEmbeddingModel, ensureCollection } from '../store/collections.js';
import type { VectorPoint, VectorStore } from '../store/types.js';
import { throwIfAborted } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import {
  ARCHIVE_FORMAT,
  ARCHIVE_VERSION,
  decodeArchive,
  encodeArchive,
  type CollectionArchive,
} from './archive.js';
import { validateImageRef, type ArtifactRegistry } from './registry.js';

export interface TransferDependencies {
  store: VectorStore;
  registry: ArtifactRegistry;
  logger?: Logger;
}

export interface TransferOptions {
  signal?: AbortSignal;
  /** Called after each page (push) or batch (pull) */
  onProgress?: (done: number, total?: number) => void;
  /** @internal Clock for testing */
  now?: () => Date;
}

export interface TransferResult {
  collection: string;
  imageRef: string;
  points: number;
  dimension: number;
  embeddingModel: string;
  /** Compressed archive size */
  bytes: number;
}

// ============================================================================
// PUSH
// ============================================================================

export async function pushCollection(
  deps: TransferDependencies,
  collection: string,
  imageRef: string,
  options: TransferOptions = {}
): Promise<TransferResult> {
  const ref = validateImageRef(imageRef);
  const { store, registry, logger } = deps;

  const info = await store.getCollection(collection, options.signal);
  if (info === null) {
    throw new StoreError('not-found', `Collection '${collection}' does not exist`);
  }

  const points: VectorPoint[] = [];
  for await (const page of store.scroll(collection, undefined, options.signal)) {
    throwIfAborted(options.signal, 'Transfer');
    points.push(...page);
    options.onProgress?.(points.length, info.pointCount);
  }

  const first = points[0];
  if (first === undefined) {
    throw new TransferError(`Collection '${collection}' is empty; nothing to push`, 'Run: know ingest <path> first');
  }

  const archive: CollectionArchive = {
    format: ARCHIVE_FORMAT,
    version: ARCHIVE_VERSION,
    collection,
    dimension: info.dimension,
    distance: 'Cosine',
    embedding_model: first.payload.embedding_model,
    exported_at: (options.now ?? (() => new Date()))().toISOString(),
    points,
  };
  const data = encodeArchive(archive);
  logger?.debug?.(`Archive for '${collection}': ${points.length} points, ${data.length} bytes`);

  await registry.push(
    data,
    ref,
    { collection, embeddingModel: archive.embedding_model, dimension: archive.dimension },
    options.signal
  );

  return {
    collection,
    imageRef: ref,
    points: points.length,
    dimension: archive.dimension,
    embeddingModel: archive.embedding_model,
    bytes: data.length,
  };
}

// ============================================================================
// PULL
// ============================================================================

export async function pullCollection(
  deps: TransferDependencies,
  imageRef: string,
  collection: string,
  options: TransferOptions = {}
): Promise<TransferResult> {
  const ref = validateImageRef(imageRef);
  const { store, registry, logger } = deps;

  const data = await registry.pull(ref, options.signal);
  const archive = decodeArchive(data);
  if (archive.collection !== collection) {
    logger?.debug?.(`Importing archived collection '${archive.collection}' as '${collection}'`);
  }

  await ensureCollection(store, collection, archive.dimension, options.signal);
  await assertEmbeddingModel(store, collection, archive.embedding_model, options.signal);

  const total = archive.points.length;
  for (let i = 0; i < total; i += UPSERT_BATCH_SIZE) {
    throwIfAborted(options.signal, 'Transfer');
    const batch = archive.points.slice(i, i + UPSERT_BATCH_SIZE).map(
      (point): VectorPoint => ({
        id: point.id,
        vector: point.vector,
        payload: { ...point.payload, collection },
      })
    );
    await store.upsert(collection, batch, options.signal);
    options.onProgress?.(i + batch.length, total);
  }

  return {
    collection,
    imageRef: ref,
    points: total,
    dimension: archive.dimension,
    embeddingModel: archive.embedding_model,
    bytes: data.length,
  };
}
