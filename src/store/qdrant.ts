/**
 * Qdrant Vector Store
 *
 * VectorStore implementation over @qdrant/js-client-rest. Every call goes
 * through withRetry (transient failures only) and every failure is mapped
 * to a StoreError kind.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { StoreError, OperationCancelledError } from '../errors/index.js';
import { abortable, withRetry } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import {
  PointPayloadSchema,
  type CollectionInfo,
  type PointPayload,
  type ScoredPoint,
  type SearchOptions,
  type StoredPoint,
  type VectorPoint,
  type VectorStore,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_PAGE_SIZE = 256;

export interface QdrantStoreOptions {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
  retries?: number;
  retryBackoffMs?: number;
  logger?: Logger;
  /** @internal Inject a client for testing */
  client?: QdrantClient;
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** Qdrant puts its reason in `data.status.error` */
function detailOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'data' in error) {
    const data = error.data;
    if (typeof data === 'object' && data !== null && 'status' in data) {
      const status = data.status;
      if (typeof status === 'object' && status !== null && 'error' in status && typeof status.error === 'string') {
        return status.error;
      }
    }
  }
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Map a client error to a StoreError kind.
 */
export function toStoreError(error: unknown, operation: string): StoreError {
  if (error instanceof StoreError) {
    return error;
  }

  const status = statusOf(error);
  const detail = detailOf(error);
  const message = `${operation} failed: ${detail}`;

  if (status === 404) {
    return new StoreError('not-found', message, { cause: error });
  }
  if (status !== undefined && status >= 400 && status < 500) {
    const kind = /dimension/i.test(detail) ? 'dimension-mismatch' : 'rejected';
    return new StoreError(kind, message, { cause: error });
  }
  // 5xx, timeouts and connection failures
  return new StoreError('unavailable', message, { cause: error });
}

// ============================================================================
// PAYLOAD HELPERS
// ============================================================================

function toVector(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const vector: number[] = [];
  for (const n of value) {
    if (typeof n !== 'number') return null;
    vector.push(n);
  }
  return vector;
}

function toPayload(value: unknown): PointPayload | null {
  const result = PointPayloadSchema.safeParse(value);
  return result.success ? result.data : null;
}

function toOffset(value: unknown): string | number | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

// ============================================================================
// STORE
// ============================================================================

export class QdrantStore implements VectorStore {
  private readonly client: QdrantClient;
  private readonly retries: number;
  private readonly retryBackoffMs: number;
  private readonly logger?: Logger;

  constructor(options: QdrantStoreOptions) {
    this.client =
      options.client ??
      new QdrantClient({ url: options.url, apiKey: options.apiKey, timeout: options.timeoutMs });
    this.retries = options.retries ?? 2;
    this.retryBackoffMs = options.retryBackoffMs ?? 250;
    this.logger = options.logger;
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  async getCollection(name: string, signal?: AbortSignal): Promise<CollectionInfo | null> {
    try {
      const info = await this.call(`Reading collection '${name}'`, () => this.client.getCollection(name), signal);
      const vectors = info.config.params.vectors;
      const dimension =
        vectors && 'size' in vectors && typeof vectors.size === 'number' ? vectors.size : 0;
      return { name, dimension, pointCount: info.points_count ?? 0 };
    } catch (error) {
      if (error instanceof StoreError && error.kind === 'not-found') {
        return null;
      }
      throw error;
    }
  }

  async listCollections(signal?: AbortSignal): Promise<string[]> {
    const result = await this.call('Listing collections', () => this.client.getCollections(), signal);
    return result.collections.map((c) => c.name).sort();
  }

  async createCollection(name: string, dimension: number, signal?: AbortSignal): Promise<void> {
    await this.call(
      `Creating collection '${name}'`,
      () => this.client.createCollection(name, { vectors: { size: dimension, distance: 'Cosine' } }),
      signal
    );
  }

  async deleteCollection(name: string, signal?: AbortSignal): Promise<boolean> {
    if ((await this.getCollection(name, signal)) === null) {
      return false;
    }
    await this.call(`Deleting collection '${name}'`, () => this.client.deleteCollection(name), signal);
    return true;
  }

  async upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void> {
    if (points.length === 0) return;

    await this.call(
      `Upserting ${points.length} point(s) into '${collection}'`,
      () =>
        this.client.upsert(collection, {
          wait: true,
          points: points.map((p) => ({ id: p.id, vector: p.vector, payload: p.payload })),
        }),
      signal
    );
  }

  async search(
    collection: string,
    vector: number[],
    topK: number,
    options: SearchOptions = {}
  ): Promise<ScoredPoint[]> {
    const hits = await this.call(
      `Searching '${collection}'`,
      () =>
        this.client.search(collection, {
          vector,
          limit: topK,
          with_payload: true,
          score_threshold: options.scoreThreshold,
        }),
      options.signal
    );

    const results: ScoredPoint[] = [];
    for (const hit of hits) {
      const payload = toPayload(hit.payload);
      if (payload === null) {
        this.logger?.debug?.(`Skipping point ${String(hit.id)} with a foreign payload`);
        continue;
      }
      results.push({ id: String(hit.id), score: hit.score, payload });
    }
    return results;
  }

  async delete(collection: string, ids: string[], signal?: AbortSignal): Promise<void> {
    if (ids.length === 0) return;

    await this.call(
      `Deleting ${ids.length} point(s) from '${collection}'`,
      () => this.client.delete(collection, { wait: true, points: ids }),
      signal
    );
  }

  async findBySource(collection: string, source: string, signal?: AbortSignal): Promise<StoredPoint[]> {
    const found: StoredPoint[] = [];
    let offset: string | number | undefined;

    do {
      const page = await this.call(
        `Looking up '${source}'`,
        () =>
          this.client.scroll(collection, {
            filter: { must: [{ key: 'source', match: { value: source } }] },
            limit: DEFAULT_PAGE_SIZE,
            offset,
            with_payload: true,
            with_vector: false,
          }),
        signal
      );

      for (const point of page.points) {
        const payload = toPayload(point.payload);
        if (payload !== null) {
          found.push({ id: String(point.id), payload });
        }
      }
      offset = toOffset(page.next_page_offset);
    } while (offset !== undefined);

    return found;
  }

  async samplePoint(collection: string, signal?: AbortSignal): Promise<StoredPoint | null> {
    const page = await this.call(
      `Sampling '${collection}'`,
      () => this.client.scroll(collection, { limit: 1, with_payload: true, with_vector: false }),
      signal
    );
    const first = page.points[0];
    if (!first) return null;

    const payload = toPayload(first.payload);
    return payload ? { id: String(first.id), payload } : null;
  }

  async *scroll(
    collection: string,
    pageSize = DEFAULT_PAGE_SIZE,
    signal?: AbortSignal
  ): AsyncGenerator<VectorPoint[]> {
    let offset: string | number | undefined;

    do {
      const page = await this.call(
        `Exporting '${collection}'`,
        () =>
          this.client.scroll(collection, {
            limit: pageSize,
            offset,
            with_payload: true,
            with_vector: true,
          }),
        signal
      );

      const points: VectorPoint[] = [];
      for (const point of page.points) {
        const vector = toVector(point.vector);
        const payload = toPayload(point.payload);
        if (vector !== null && payload !== null) {
          points.push({ id: String(point.id), vector, payload });
        }
      }
      if (points.length > 0) {
        yield points;
      }
      offset = toOffset(page.next_page_offset);
    } while (offset !== undefined);
  }

  /**
   * Run a client call with retry on unavailability, mapping errors to StoreError.
   * The client takes no signal, so an abort releases the caller while the
   * request is still in flight.
   */
  private async call<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await withRetry(
        async () => {
          try {
            return await abortable(fn(), signal, operation);
          } catch (error) {
            if (error instanceof OperationCancelledError) throw error;
            throw toStoreError(error, operation);
          }
        },
        {
          retries: this.retries,
          initialDelayMs: this.retryBackoffMs,
          isRetryable: (error) => error instanceof StoreError && error.transient,
          signal,
          onRetry: (error, attempt, delayMs) =>
            this.logger?.debug?.(`${operation}: retry ${attempt} in ${delayMs}ms`),
        }
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      throw toStoreError(error, operation);
    }
  }
}
