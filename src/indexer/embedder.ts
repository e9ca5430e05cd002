/**
 * Batch Embedder
 *
 * Splits texts into batches and embeds them with bounded concurrency.
 * Either every vector is returned, in input order, or the call throws.
 */

import { EmbedError } from '../errors/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { throwIfAborted } from '../utils/retry.js';
import type { LLMBackend } from '../providers/types.js';

export interface EmbedTextsOptions {
  batchSize: number;
  concurrency: number;
  signal?: AbortSignal;
  /** Called after each batch with the number of texts embedded so far */
  onBatch?: (embedded: number, total: number) => void;
}

export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export async function embedTexts(
  backend: LLMBackend,
  texts: readonly string[],
  options: EmbedTextsOptions
): Promise<number[][]> {
  const batches = toBatches(texts, Math.max(1, options.batchSize));
  let embedded = 0;

  const results = await mapWithConcurrency(batches, options.concurrency, async (batch) => {
    throwIfAborted(options.signal, 'Embedding');
    const vectors = await backend.embed(batch, { signal: options.signal });
    embedded += batch.length;
    options.onBatch?.(embedded, texts.length);
    return vectors;
  });

  const vectors = results.flat();
  const dimension = vectors[0]?.length ?? 0;
  if (vectors.some((vector) => vector.length !== dimension)) {
    throw new EmbedError(
      `Embedding model '${backend.config.embeddingModel}' returned vectors of differing dimensions`
    );
  }
  return vectors;
}
