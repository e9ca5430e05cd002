/**
 * Tests for the RAG engine against an in-memory store and a fake backend
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RagEngine, type RagEngineConfig } from '../engine.js';
import { NO_CONTEXT_INSTRUCTIONS } from '../prompt.js';
import { InMemoryVectorStore } from '../../test-utils/memory-store.js';
import { FakeBackend, FAKE_DIMENSION, featureVector } from '../../test-utils/fake-backend.js';
import { RetrievalFailedError, StoreError, ValidationError } from '../../errors/index.js';
import { pointId } from '../../indexer/ids.js';

const CONFIG: RagEngineConfig = {
  collection: 'docs',
  topK: 5,
  maxContextChars: 6000,
  minScore: 0,
  emptyContext: 'fail',
};

async function seed(store: InMemoryVectorStore, docs: Record<string, string>, dimension = FAKE_DIMENSION): Promise<void> {
  await store.createCollection('docs', dimension);
  await store.upsert(
    'docs',
    Object.entries(docs).map(([source, text]) => ({
      id: pointId(source, 0),
      vector: featureVector(text).concat(new Array<number>(Math.max(0, dimension - FAKE_DIMENSION)).fill(0)).slice(0, dimension),
      payload: {
        collection: 'docs',
        source,
        content_hash: 'hash',
        modified_at: '2026-01-01T00:00:00.000Z',
        chunk_index: 0,
        chunk_count: 1,
        start_offset: 0,
        end_offset: text.length,
        text,
        embedding_model: 'fake-embed',
        ingested_at: '2026-01-01T00:00:00.000Z',
      },
    }))
  );
}

describe('RagEngine', () => {
  let store: InMemoryVectorStore;
  let backend: FakeBackend;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    backend = new FakeBackend();
  });

  it('answers from the best-matching chunk', async () => {
    await seed(store, {
      '/kb/a.txt': 'Refunds are processed within 14 days.',
      '/kb/b.txt': 'Shipping takes 3-5 days.',
    });
    const engine = new RagEngine({ store, backend }, CONFIG);

    const answer = await engine.answer('How long do refunds take?');

    expect(answer.noContext).toBe(false);
    expect(answer.chunks[0]?.source).toBe('/kb/a.txt');
    expect(answer.sources.map((s) => s.source)).toEqual(['/kb/a.txt', '/kb/b.txt']);
    expect(answer.model).toBe('fake-chat');
    expect(answer.text).toContain('Refunds are processed within 14 days.');

    const [system, user] = backend.generateCalls[0] ?? [];
    expect(system?.role).toBe('system');
    expect(system?.content).toContain(
      'Context:\n[Source: /kb/a.txt]\nRefunds are processed within 14 days.\n---\n[Source: /kb/b.txt]\nShipping takes 3-5 days.'
    );
    expect(user).toEqual({ role: 'user', content: 'How long do refunds take?' });
  });

  it('respects top_k per call', async () => {
    await seed(store, { '/a': 'refund', '/b': 'shipping', '/c': 'warranty' });
    const engine = new RagEngine({ store, backend }, CONFIG);

    const answer = await engine.answer('refund policy', { topK: 1 });

    expect(answer.chunks.map((c) => c.source)).toEqual(['/a']);
  });

  it('drops low-scoring chunks to fit the context budget and still answers', async () => {
    await seed(store, {
      '/a': 'Refund requests need the invoice number.',
      '/b': 'Shipping is free over 50 euros.',
    });
    const engine = new RagEngine({ store, backend }, { ...CONFIG, maxContextChars: 60 });

    const answer = await engine.answer('refund invoice');

    expect(answer.chunks.map((c) => c.source)).toEqual(['/a']);
    expect(answer.sources).toHaveLength(1);
    expect(backend.generateCalls).toHaveLength(1);
  });

  it('fails with RetrievalFailedError for a missing collection', async () => {
    const engine = new RagEngine({ store, backend }, CONFIG);

    const error = await engine.answer('anything?').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalFailedError);
    expect(error).toHaveProperty('message', "No relevant context in collection 'docs': collection does not exist");
    expect(backend.generateCalls).toHaveLength(0);
  });

  it('fails when the context budget cannot hold a single chunk', async () => {
    await seed(store, { '/kb/a.txt': 'refund' });
    const engine = new RagEngine({ store, backend }, { ...CONFIG, maxContextChars: 5 });

    const error = await engine.answer('refund?').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalFailedError);
    expect(error).toHaveProperty(
      'message',
      "No relevant context in collection 'docs': max_context_chars 5 leaves no room for a single chunk"
    );
    expect(backend.generateCalls).toHaveLength(0);
  });

  it('fails when no chunk reaches min_score', async () => {
    await seed(store, { '/a': 'refund' });
    const engine = new RagEngine({ store, backend }, { ...CONFIG, minScore: 0.9 });

    await expect(engine.answer('warranty?')).rejects.toThrow('no chunk scored at or above min_score 0.9');
  });

  it("answers without context under the 'answer' policy", async () => {
    await store.createCollection('docs', FAKE_DIMENSION);
    const engine = new RagEngine({ store, backend }, { ...CONFIG, emptyContext: 'answer' });

    const answer = await engine.answer('What is the capital of France?');

    expect(answer.noContext).toBe(true);
    expect(answer.sources).toEqual([]);
    expect(backend.generateCalls[0]?.[0]).toEqual({ role: 'system', content: NO_CONTEXT_INSTRUCTIONS });
  });

  it('lets a call override the empty-context policy', async () => {
    const engine = new RagEngine({ store, backend }, CONFIG);

    const answer = await engine.answer('hello?', { emptyContext: 'answer' });

    expect(answer.noContext).toBe(true);
  });

  it('rejects a query embedding of the wrong dimension', async () => {
    await seed(store, { '/a': 'refund' }, 4);
    const engine = new RagEngine({ store, backend }, CONFIG);

    const error = await engine.answer('refund?').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toHaveProperty('kind', 'dimension-mismatch');
    expect(error).toHaveProperty(
      'message',
      `Collection 'docs' stores 4-dimensional vectors, but the embedding has ${FAKE_DIMENSION} dimensions`
    );
  });

  it('rejects a collection built by another embedding model', async () => {
    await seed(store, { '/a': 'refund' });
    const engine = new RagEngine({ store, backend: new FakeBackend({ embeddingModel: 'other' }) }, CONFIG);

    const error = await engine.answer('refund?').catch((e: unknown) => e);

    expect(error).toHaveProperty('kind', 'model-mismatch');
  });

  it('rejects an empty question', async () => {
    const engine = new RagEngine({ store, backend }, CONFIG);

    await expect(engine.answer('   ')).rejects.toBeInstanceOf(ValidationError);
  });
});
