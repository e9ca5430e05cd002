/**
 * Vector Store Module
 */

export {
  PointPayloadSchema,
  type PointPayload,
  type VectorPoint,
  type ScoredPoint,
  type StoredPoint,
  type CollectionInfo,
  type SearchOptions,
  type VectorStore,
} from './types.js';

export { QdrantStore, toStoreError, type QdrantStoreOptions } from './qdrant.js';

export {
  ensureCollection,
  assertDimension,
  getCollectionModel,
  assertEmbeddingModel,
} from './collections.js';
