/**
 * Fill an in-memory collection with single-chunk documents.
 */

import { pointId } from '../indexer/ids.js';
import { featureVector, FAKE_DIMENSION } from './fake-backend.js';
import type { InMemoryVectorStore } from './memory-store.js';

export const SEED_TIMESTAMP = '2026-01-01T00:00:00.000Z';

/**
 * @param documents - [source, text] pairs, one point each
 */
export async function seedCollection(
  store: InMemoryVectorStore,
  collection: string,
  documents: ReadonlyArray<readonly [string, string]>,
  embeddingModel = 'fake-embed'
): Promise<void> {
  if ((await store.getCollection(collection)) === null) {
    await store.createCollection(collection, FAKE_DIMENSION);
  }
  await store.upsert(
    collection,
    documents.map(([source, text]) => ({
      id: pointId(source, 0),
      vector: featureVector(text),
      payload: {
        collection,
        source,
        content_hash: 'hash',
        modified_at: SEED_TIMESTAMP,
        chunk_index: 0,
        chunk_count: 1,
        start_offset: 0,
        end_offset: text.length,
        text,
        embedding_model: embeddingModel,
        ingested_at: SEED_TIMESTAMP,
      },
    }))
  );
}
