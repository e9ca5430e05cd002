/**
 * Vector Store Types
 *
 * The pipelines talk to the vector engine only through VectorStore, so an
 * alternate engine (or the in-memory store used in tests) can be swapped
 * in without touching ingestion or retrieval.
 */

import { z } from 'zod';

// ============================================================================
// PAYLOAD
// ============================================================================

/**
 * Payload stored with every vector point.
 * Snake case because it is persisted in the vector engine and archives.
 */
export const PointPayloadSchema = z.object({
  collection: z.string(),
  source: z.string(),
  content_hash: z.string(),
  modified_at: z.string(),
  chunk_index: z.number().int().min(0),
  chunk_count: z.number().int().min(1),
  start_offset: z.number().int().min(0),
  end_offset: z.number().int().min(0),
  text: z.string(),
  embedding_model: z.string(),
  ingested_at: z.string(),
});

export type PointPayload = z.infer<typeof PointPayloadSchema>;

// ============================================================================
// POINTS
// ============================================================================

/** The persisted unit: id + vector + payload */
export interface VectorPoint {
  id: string;
  vector: number[];
  payload: PointPayload;
}

/** A point returned by similarity search */
export interface ScoredPoint {
  id: string;
  score: number;
  payload: PointPayload;
}

/** A point without its vector (lookups by source) */
export interface StoredPoint {
  id: string;
  payload: PointPayload;
}

export interface CollectionInfo {
  name: string;
  dimension: number;
  pointCount: number;
}

export interface SearchOptions {
  /** Drop hits scoring below this value */
  scoreThreshold?: number;
  signal?: AbortSignal;
}

// ============================================================================
// STORE
// ============================================================================

/**
 * Narrow capability interface over the vector engine.
 *
 * All failures surface as StoreError with a kind. An aborted `signal`
 * surfaces as OperationCancelledError, also while a request is in flight.
 */
export interface VectorStore {
  /** Readiness check, never throws */
  ping(): Promise<boolean>;

  /** Collection metadata, or null when it does not exist */
  getCollection(name: string, signal?: AbortSignal): Promise<CollectionInfo | null>;

  listCollections(signal?: AbortSignal): Promise<string[]>;

  /** Create a Cosine collection with a fixed vector dimension */
  createCollection(name: string, dimension: number, signal?: AbortSignal): Promise<void>;

  /** Returns false when the collection did not exist */
  deleteCollection(name: string, signal?: AbortSignal): Promise<boolean>;

  /** Insert or overwrite points by id */
  upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void>;

  search(
    collection: string,
    vector: number[],
    topK: number,
    options?: SearchOptions
  ): Promise<ScoredPoint[]>;

  delete(collection: string, ids: string[], signal?: AbortSignal): Promise<void>;

  /** Every point whose payload.source equals `source` */
  findBySource(collection: string, source: string, signal?: AbortSignal): Promise<StoredPoint[]>;

  /** Any one point of the collection (used to read its embedding model tag) */
  samplePoint(collection: string, signal?: AbortSignal): Promise<StoredPoint | null>;

  /** Iterate every point with its vector, page by page */
  scroll(collection: string, pageSize?: number, signal?: AbortSignal): AsyncIterable<VectorPoint[]>;
}
