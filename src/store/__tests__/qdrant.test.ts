/**
 * Tests for the Qdrant store: error mapping, retries and payload handling
 */

import { describe, it, expect, vi } from 'vitest';
import type { QdrantClient } from '@qdrant/js-client-rest';
import { QdrantStore, toStoreError } from '../qdrant.js';
import { OperationCancelledError, StoreError } from '../../errors/index.js';

function clientError(status: number, reason: string): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status, data: { status: { error: reason } } });
}

const PAYLOAD = {
  collection: 'handbook',
  source: '/docs/policy.md',
  content_hash: 'hash-1',
  modified_at: '2026-01-01T00:00:00.000Z',
  chunk_index: 0,
  chunk_count: 1,
  start_offset: 0,
  end_offset: 21,
  text: 'Refunds take 14 days.',
  embedding_model: 'fake-embed',
  ingested_at: '2026-01-01T00:00:00.000Z',
};

function storeWith(client: Partial<Record<keyof QdrantClient, unknown>>): QdrantStore {
  return new QdrantStore({
    url: 'http://localhost:6333',
    retries: 2,
    retryBackoffMs: 0,
    client: client as unknown as QdrantClient,
  });
}

describe('toStoreError', () => {
  it('maps 404 to not-found', () => {
    const error = toStoreError(clientError(404, "Collection `kb` doesn't exist!"), 'Reading collection');
    expect(error.kind).toBe('not-found');
    expect(error.message).toBe("Reading collection failed: Collection `kb` doesn't exist!");
  });

  it('recognizes dimension errors among 4xx responses', () => {
    const error = toStoreError(
      clientError(400, 'Wrong input: Vector dimension error: expected dim: 3, got 4'),
      'Searching'
    );
    expect(error.kind).toBe('dimension-mismatch');
  });

  it('maps other 4xx responses to rejected', () => {
    expect(toStoreError(clientError(400, 'Bad payload'), 'Upserting').kind).toBe('rejected');
  });

  it('treats 5xx and connection failures as unavailable', () => {
    expect(toStoreError(clientError(503, 'overloaded'), 'Searching').kind).toBe('unavailable');

    const refused = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:6333') });
    const error = toStoreError(refused, 'Listing collections');
    expect(error.kind).toBe('unavailable');
    expect(error.message).toBe('Listing collections failed: fetch failed (connect ECONNREFUSED 127.0.0.1:6333)');
  });

  it('passes StoreErrors through', () => {
    const original = new StoreError('model-mismatch', 'wrong model');
    expect(toStoreError(original, 'x')).toBe(original);
  });
});

describe('QdrantStore', () => {
  it('reads collection dimension and point count', async () => {
    const store = storeWith({
      getCollection: vi.fn(async () => ({
        config: { params: { vectors: { size: 768, distance: 'Cosine' } } },
        points_count: 42,
      })),
    });

    expect(await store.getCollection('handbook')).toEqual({ name: 'handbook', dimension: 768, pointCount: 42 });
  });

  it('returns null for a missing collection without retrying', async () => {
    const getCollection = vi.fn(async () => {
      throw clientError(404, 'Not found');
    });
    const store = storeWith({ getCollection });

    expect(await store.getCollection('nope')).toBeNull();
    expect(getCollection).toHaveBeenCalledTimes(1);
  });

  it('retries while the engine is unavailable', async () => {
    const getCollections = vi
      .fn()
      .mockRejectedValueOnce(clientError(503, 'starting'))
      .mockRejectedValueOnce(clientError(503, 'starting'))
      .mockResolvedValueOnce({ collections: [{ name: 'b' }, { name: 'a' }] });
    const store = storeWith({ getCollections });

    expect(await store.listCollections()).toEqual(['a', 'b']);
    expect(getCollections).toHaveBeenCalledTimes(3);
  });

  it('gives up after the retry budget', async () => {
    const getCollections = vi.fn(async () => {
      throw clientError(503, 'starting');
    });
    const store = storeWith({ getCollections });

    await expect(store.listCollections()).rejects.toMatchObject({ kind: 'unavailable' });
    expect(getCollections).toHaveBeenCalledTimes(3);
  });

  it('ping never throws', async () => {
    const store = storeWith({
      getCollections: vi.fn(async () => {
        throw new Error('fetch failed');
      }),
    });

    expect(await store.ping()).toBe(false);
  });

  it('creates Cosine collections', async () => {
    const createCollection = vi.fn(async () => true);
    const store = storeWith({ createCollection });

    await store.createCollection('handbook', 3);

    expect(createCollection).toHaveBeenCalledWith('handbook', { vectors: { size: 3, distance: 'Cosine' } });
  });

  it('skips search hits whose payload is not ours', async () => {
    const store = storeWith({
      search: vi.fn(async () => [
        { id: 'a', score: 0.9, payload: PAYLOAD },
        { id: 7, score: 0.8, payload: { title: 'foreign' } },
      ]),
    });

    const hits = await store.search('handbook', [1, 0, 0], 5);

    expect(hits).toEqual([{ id: 'a', score: 0.9, payload: PAYLOAD }]);
  });

  it('passes the score threshold to search', async () => {
    const search = vi.fn(async () => []);
    const store = storeWith({ search });

    await store.search('handbook', [1, 0, 0], 5, { scoreThreshold: 0.4 });

    expect(search).toHaveBeenCalledWith('handbook', {
      vector: [1, 0, 0],
      limit: 5,
      with_payload: true,
      score_threshold: 0.4,
    });
  });

  it('scrolls every page with vectors', async () => {
    const scroll = vi
      .fn()
      .mockResolvedValueOnce({ points: [{ id: 'a', vector: [1, 0, 0], payload: PAYLOAD }], next_page_offset: 'b' })
      .mockResolvedValueOnce({ points: [{ id: 'b', vector: [0, 1, 0], payload: PAYLOAD }], next_page_offset: null });
    const store = storeWith({ scroll });

    const pages: string[][] = [];
    for await (const page of store.scroll('handbook', 1)) {
      pages.push(page.map((p) => p.id));
    }

    expect(pages).toEqual([['a'], ['b']]);
    expect(scroll).toHaveBeenLastCalledWith('handbook', {
      limit: 1,
      offset: 'b',
      with_payload: true,
      with_vector: true,
    });
  });

  it('does not delete a collection that is not there', async () => {
    const deleteCollection = vi.fn(async () => true);
    const store = storeWith({
      getCollection: vi.fn(async () => {
        throw clientError(404, 'Not found');
      }),
      deleteCollection,
    });

    expect(await store.deleteCollection('nope')).toBe(false);
    expect(deleteCollection).not.toHaveBeenCalled();
  });

  it('releases the caller when the signal aborts mid-request', async () => {
    const getCollection = vi.fn(() => new Promise<never>(() => undefined));
    const store = storeWith({ getCollection });
    const controller = new AbortController();

    const pending = store.getCollection('handbook', controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
    expect(getCollection).toHaveBeenCalledTimes(1);
  });

  it('does not call the client when the signal is already aborted', async () => {
    const scroll = vi.fn(async () => ({ points: [], next_page_offset: null }));
    const store = storeWith({ scroll });
    const controller = new AbortController();
    controller.abort();

    await expect(store.samplePoint('handbook', controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(scroll).not.toHaveBeenCalled();
  });

  it('does not retry a request cancelled in flight', async () => {
    const controller = new AbortController();
    const upsert = vi.fn(() => {
      controller.abort();
      return new Promise<never>(() => undefined);
    });
    const store = storeWith({ upsert });

    const point = { id: '6f1c1f3e-1c1a-4d0e-9f43-2f1b8e6b7a10', vector: [0.1, 0.2], payload: PAYLOAD };
    await expect(store.upsert('handbook', [point], controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(upsert).toHaveBeenCalledTimes(1);
  });
});
