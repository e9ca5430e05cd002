/**
 * In-memory VectorStore with the same invariants as the Qdrant store:
 * fixed dimension per collection, Cosine scoring, overwrite by id.
 */

import { StoreError } from '../errors/index.js';
import { throwIfAborted } from '../utils/retry.js';
import type {
  CollectionInfo,
  ScoredPoint,
  SearchOptions,
  StoredPoint,
  VectorPoint,
  VectorStore,
} from '../store/types.js';

interface MemoryCollection {
  dimension: number;
  points: Map<string, VectorPoint>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  readonly collections = new Map<string, MemoryCollection>();

  /** Total points passed to upsert, across all calls */
  pointsWritten = 0;
  /** Ids passed to delete, across all calls */
  readonly deletedIds: string[] = [];
  /** Flip to simulate the engine being down */
  available = true;

  async ping(): Promise<boolean> {
    return this.available;
  }

  async getCollection(name: string, signal?: AbortSignal): Promise<CollectionInfo | null> {
    this.assertAvailable(signal);
    const collection = this.collections.get(name);
    if (!collection) return null;
    return { name, dimension: collection.dimension, pointCount: collection.points.size };
  }

  async listCollections(signal?: AbortSignal): Promise<string[]> {
    this.assertAvailable(signal);
    return [...this.collections.keys()].sort();
  }

  async createCollection(name: string, dimension: number, signal?: AbortSignal): Promise<void> {
    this.assertAvailable(signal);
    if (this.collections.has(name)) {
      throw new StoreError('rejected', `Collection '${name}' already exists`);
    }
    this.collections.set(name, { dimension, points: new Map() });
  }

  async deleteCollection(name: string, signal?: AbortSignal): Promise<boolean> {
    this.assertAvailable(signal);
    return this.collections.delete(name);
  }

  async upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void> {
    const target = this.require(collection, signal);
    for (const point of points) {
      if (point.vector.length !== target.dimension) {
        throw new StoreError(
          'dimension-mismatch',
          `Vector dimension error: expected dim: ${target.dimension}, got ${point.vector.length}`
        );
      }
    }
    for (const point of points) {
      target.points.set(point.id, { ...point, vector: [...point.vector] });
    }
    this.pointsWritten += points.length;
  }

  async search(
    collection: string,
    vector: number[],
    topK: number,
    options: SearchOptions = {}
  ): Promise<ScoredPoint[]> {
    const target = this.require(collection, options.signal);
    if (vector.length !== target.dimension) {
      throw new StoreError(
        'dimension-mismatch',
        `Vector dimension error: expected dim: ${target.dimension}, got ${vector.length}`
      );
    }

    const threshold = options.scoreThreshold;
    return [...target.points.values()]
      .map((p) => ({ id: p.id, score: cosineSimilarity(vector, p.vector), payload: p.payload }))
      .filter((hit) => threshold === undefined || hit.score >= threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async delete(collection: string, ids: string[], signal?: AbortSignal): Promise<void> {
    const target = this.require(collection, signal);
    for (const id of ids) {
      target.points.delete(id);
      this.deletedIds.push(id);
    }
  }

  async findBySource(collection: string, source: string, signal?: AbortSignal): Promise<StoredPoint[]> {
    const target = this.require(collection, signal);
    return [...target.points.values()]
      .filter((p) => p.payload.source === source)
      .map((p) => ({ id: p.id, payload: p.payload }));
  }

  async samplePoint(collection: string, signal?: AbortSignal): Promise<StoredPoint | null> {
    const target = this.require(collection, signal);
    const first = target.points.values().next();
    return first.done ? null : { id: first.value.id, payload: first.value.payload };
  }

  async *scroll(collection: string, pageSize = 256, signal?: AbortSignal): AsyncGenerator<VectorPoint[]> {
    const points = [...this.require(collection, signal).points.values()];
    for (let i = 0; i < points.length; i += pageSize) {
      throwIfAborted(signal);
      yield points.slice(i, i + pageSize);
    }
  }

  /** Points of a collection whose payload.source matches, sorted by chunk index */
  pointsFor(collection: string, source: string): VectorPoint[] {
    const target = this.collections.get(collection);
    if (!target) return [];
    return [...target.points.values()]
      .filter((p) => p.payload.source === source)
      .sort((a, b) => a.payload.chunk_index - b.payload.chunk_index);
  }

  private require(name: string, signal?: AbortSignal): MemoryCollection {
    this.assertAvailable(signal);
    const collection = this.collections.get(name);
    if (!collection) {
      throw new StoreError('not-found', `Collection '${name}' not found`);
    }
    return collection;
  }

  private assertAvailable(signal?: AbortSignal): void {
    throwIfAborted(signal);
    if (!this.available) {
      throw new StoreError('unavailable', 'Vector engine is not reachable');
    }
  }
}
