/**
 * Tests for batch embedding and point identity
 */

import { describe, it, expect } from 'vitest';
import { embedTexts, toBatches } from '../embedder.js';
import { pointId, contentHash } from '../ids.js';
import { FakeBackend, featureVector } from '../../test-utils/fake-backend.js';
import { EmbedError } from '../../errors/index.js';

describe('toBatches', () => {
  it('splits into fixed-size batches with a short tail', () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe('embedTexts', () => {
  it('returns one vector per text in input order', async () => {
    const backend = new FakeBackend();
    const texts = ['refund', 'shipping', 'warranty', 'password', 'invoice'];

    const vectors = await embedTexts(backend, texts, { batchSize: 2, concurrency: 3 });

    expect(vectors).toEqual(texts.map(featureVector));
    expect(backend.embedCalls).toHaveLength(3);
  });

  it('reports progress after each batch', async () => {
    const progress: number[] = [];

    await embedTexts(new FakeBackend(), ['a', 'b', 'c'], {
      batchSize: 1,
      concurrency: 1,
      onBatch: (embedded) => progress.push(embedded),
    });

    expect(progress).toEqual([1, 2, 3]);
  });

  it('fails as a whole when any batch fails', async () => {
    const backend = new FakeBackend({ failEmbedWhen: (text) => text === 'bad' });

    await expect(
      embedTexts(backend, ['ok', 'bad', 'ok'], { batchSize: 1, concurrency: 2 })
    ).rejects.toBeInstanceOf(EmbedError);
  });
});

describe('pointId', () => {
  it('is deterministic per source and chunk index', () => {
    expect(pointId('/docs/a.txt', 0)).toBe(pointId('/docs/a.txt', 0));
    expect(pointId('/docs/a.txt', 0)).not.toBe(pointId('/docs/a.txt', 1));
    expect(pointId('/docs/a.txt', 0)).not.toBe(pointId('/docs/b.txt', 0));
    expect(pointId('/docs/a.txt', 0)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('contentHash', () => {
  it('is the hex SHA-256 of the bytes', () => {
    expect(contentHash(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});
