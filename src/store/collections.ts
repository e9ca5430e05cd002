/**
 * Collection invariants shared by ingestion, retrieval and transfer.
 *
 * A collection's dimension is fixed at creation and every point carries the
 * embedding model that produced it; writing or querying with anything else
 * is a structural StoreError.
 */

import { StoreError } from '../errors/index.js';
import type { CollectionInfo, VectorStore } from './types.js';

/**
 * Return the collection, creating it with `dimension` if it does not exist.
 *
 * @throws StoreError('dimension-mismatch') if it exists with another dimension
 */
export async function ensureCollection(
  store: VectorStore,
  name: string,
  dimension: number,
  signal?: AbortSignal
): Promise<CollectionInfo> {
  const existing = await store.getCollection(name, signal);

  if (existing === null) {
    await store.createCollection(name, dimension, signal);
    return { name, dimension, pointCount: 0 };
  }

  assertDimension(existing, dimension);
  return existing;
}

/**
 * @throws StoreError('dimension-mismatch') when `dimension` differs from the collection's
 */
export function assertDimension(collection: CollectionInfo, dimension: number): void {
  if (collection.dimension !== dimension) {
    throw new StoreError(
      'dimension-mismatch',
      `Collection '${collection.name}' stores ${collection.dimension}-dimensional vectors, ` +
        `but the embedding has ${dimension} dimensions`
    );
  }
}

/**
 * The embedding model recorded on the collection's points, or null when empty.
 */
export async function getCollectionModel(
  store: VectorStore,
  name: string,
  signal?: AbortSignal
): Promise<string | null> {
  const sample = await store.samplePoint(name, signal);
  return sample?.payload.embedding_model ?? null;
}

/**
 * @throws StoreError('model-mismatch') when the collection was built by another embedding model
 */
export async function assertEmbeddingModel(
  store: VectorStore,
  name: string,
  embeddingModel: string,
  signal?: AbortSignal
): Promise<void> {
  const recorded = await getCollectionModel(store, name, signal);
  if (recorded !== null && recorded !== embeddingModel) {
    throw new StoreError(
      'model-mismatch',
      `Collection '${name}' was built with embedding model '${recorded}', not '${embeddingModel}'`
    );
  }
}
