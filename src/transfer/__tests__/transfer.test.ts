/**
 * Tests for pushing and pulling collections through a registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { pullCollection, pushCollection } from '../transfer.js';
import { decodeArchive, encodeArchive } from '../archive.js';
import { StoreError, TransferError, ValidationError } from '../../errors/index.js';
import { InMemoryRegistry, InMemoryVectorStore } from '../../test-utils/index.js';
import type { VectorPoint } from '../../store/types.js';

function point(id: string, vector: number[], text: string, embeddingModel = 'fake-embed'): VectorPoint {
  return {
    id,
    vector,
    payload: {
      collection: 'handbook',
      source: '/docs/policy.md',
      content_hash: 'hash-1',
      modified_at: '2026-01-01T00:00:00.000Z',
      chunk_index: 0,
      chunk_count: 1,
      start_offset: 0,
      end_offset: text.length,
      text,
      embedding_model: embeddingModel,
      ingested_at: '2026-01-01T00:00:00.000Z',
    },
  };
}

const ID_1 = '0b6f3c1e-4a2d-5e8f-9a1b-2c3d4e5f6a01';
const ID_2 = '0b6f3c1e-4a2d-5e8f-9a1b-2c3d4e5f6a02';
const LOCAL_1 = '7d2e9a40-1b3c-5d4e-8f5a-6b7c8d9e0f11';

const FIXED_NOW = () => new Date('2026-01-02T03:04:05.000Z');

describe('pushCollection', () => {
  let store: InMemoryVectorStore;
  let registry: InMemoryRegistry;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    registry = new InMemoryRegistry();
    await store.createCollection('handbook', 3);
    await store.upsert('handbook', [
      point(ID_1, [1, 0, 0], 'Refunds take 14 days.'),
      point(ID_2, [0, 1, 0], 'Shipping takes 3-5 days.'),
    ]);
  });

  it('archives every point and pushes it', async () => {
    const progress: number[] = [];
    const result = await pushCollection({ store, registry }, 'handbook', 'alice/handbook:v1', {
      now: FIXED_NOW,
      onProgress: (done) => progress.push(done),
    });

    expect(result).toMatchObject({
      collection: 'handbook',
      imageRef: 'alice/handbook:v1',
      points: 2,
      dimension: 3,
      embeddingModel: 'fake-embed',
    });
    expect(progress).toEqual([2]);

    const image = registry.images.get('alice/handbook:v1');
    expect(image?.labels).toEqual({ collection: 'handbook', embeddingModel: 'fake-embed', dimension: 3 });
    expect(result.bytes).toBe(image?.archive.length);

    const archive = decodeArchive(image?.archive ?? Buffer.alloc(0));
    expect(archive.exported_at).toBe('2026-01-02T03:04:05.000Z');
    expect(archive.distance).toBe('Cosine');
    expect(archive.points.map((p) => p.id)).toEqual([ID_1, ID_2]);
    expect(archive.points[0]?.vector).toEqual([1, 0, 0]);
  });

  it('fails for a missing collection', async () => {
    await expect(pushCollection({ store, registry }, 'nope', 'alice/nope')).rejects.toMatchObject({
      name: 'StoreError',
      kind: 'not-found',
    });
  });

  it('refuses to push an empty collection', async () => {
    await store.createCollection('empty', 3);

    const result = pushCollection({ store, registry }, 'empty', 'alice/empty');

    await expect(result).rejects.toBeInstanceOf(TransferError);
    await expect(result).rejects.toThrow("Collection 'empty' is empty; nothing to push");
    expect(registry.images.size).toBe(0);
  });

  it('validates the image reference before touching the store', async () => {
    store.available = false;

    await expect(pushCollection({ store, registry }, 'handbook', 'handbook')).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

describe('pullCollection', () => {
  let source: InMemoryVectorStore;
  let target: InMemoryVectorStore;
  let registry: InMemoryRegistry;

  beforeEach(async () => {
    source = new InMemoryVectorStore();
    target = new InMemoryVectorStore();
    registry = new InMemoryRegistry();
    await source.createCollection('handbook', 3);
    await source.upsert('handbook', [
      point(ID_1, [1, 0, 0], 'Refunds take 14 days.'),
      point(ID_2, [0, 1, 0], 'Shipping takes 3-5 days.'),
    ]);
    await pushCollection({ store: source, registry }, 'handbook', 'alice/handbook', { now: FIXED_NOW });
  });

  it('creates the target collection and rewrites the collection field', async () => {
    const result = await pullCollection({ store: target, registry }, 'alice/handbook', 'team-kb');

    expect(result).toMatchObject({ collection: 'team-kb', points: 2, dimension: 3 });
    expect(await target.getCollection('team-kb')).toEqual({ name: 'team-kb', dimension: 3, pointCount: 2 });

    const pulled = target.pointsFor('team-kb', '/docs/policy.md');
    expect(pulled.map((p) => p.payload.collection)).toEqual(['team-kb', 'team-kb']);
    expect(pulled.map((p) => p.payload.text).sort()).toEqual(['Refunds take 14 days.', 'Shipping takes 3-5 days.']);
  });

  it('overwrites colliding ids when pulled twice', async () => {
    await pullCollection({ store: target, registry }, 'alice/handbook', 'team-kb');
    await pullCollection({ store: target, registry }, 'alice/handbook', 'team-kb');

    expect((await target.getCollection('team-kb'))?.pointCount).toBe(2);
  });

  it('keeps points the archive does not mention', async () => {
    await target.createCollection('team-kb', 3);
    await target.upsert('team-kb', [point(LOCAL_1, [0, 0, 1], 'Warranty is one year.')]);

    await pullCollection({ store: target, registry }, 'alice/handbook', 'team-kb');

    expect((await target.getCollection('team-kb'))?.pointCount).toBe(3);
  });

  it('refuses a target with another dimension', async () => {
    await target.createCollection('team-kb', 5);

    await expect(
      pullCollection({ store: target, registry }, 'alice/handbook', 'team-kb')
    ).rejects.toMatchObject({ kind: 'dimension-mismatch' });
  });

  it('refuses a target built with another embedding model', async () => {
    await target.createCollection('team-kb', 3);
    await target.upsert('team-kb', [point(LOCAL_1, [0, 0, 1], 'Warranty is one year.', 'other-embed')]);

    const result = pullCollection({ store: target, registry }, 'alice/handbook', 'team-kb');

    await expect(result).rejects.toBeInstanceOf(StoreError);
    await expect(result).rejects.toMatchObject({ kind: 'model-mismatch' });
  });

  it('writes nothing when an archive point has an invalid id', async () => {
    const { points, ...rest } = decodeArchive(registry.images.get('alice/handbook')?.archive ?? Buffer.alloc(0));
    const archive = { ...rest, points: points.map((p, i) => (i === 1 ? { ...p, id: 'id-2' } : p)) };
    registry.images.set('alice/renamed', {
      archive: encodeArchive(archive),
      labels: { collection: 'handbook', embeddingModel: 'fake-embed', dimension: 3 },
    });

    await expect(pullCollection({ store: target, registry }, 'alice/renamed', 'team-kb')).rejects.toBeInstanceOf(
      TransferError
    );
    expect(await target.listCollections()).toEqual([]);
  });

  it('writes nothing when the image holds no valid archive', async () => {
    registry.images.set('alice/broken', {
      archive: Buffer.from('not an archive'),
      labels: { collection: 'x', embeddingModel: 'fake-embed', dimension: 3 },
    });

    await expect(pullCollection({ store: target, registry }, 'alice/broken', 'team-kb')).rejects.toThrow(
      'Archive is not gzip data'
    );
    expect(await target.listCollections()).toEqual([]);
  });
});
