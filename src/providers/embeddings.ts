import { EmbedError } from '../errors/index.js';

/**
 * Check a backend's embedding response: one vector per input, all of the
 * same non-zero dimension.
 */
export function checkEmbeddings(vectors: number[][], expected: number, model: string): number[][] {
  if (vectors.length !== expected) {
    throw new EmbedError(
      `Embedding model '${model}' returned ${vectors.length} vector(s) for ${expected} input(s)`
    );
  }

  const dimension = vectors[0]?.length ?? 0;
  if (expected > 0 && dimension === 0) {
    throw new EmbedError(`Embedding model '${model}' returned empty vectors`);
  }
  if (vectors.some((v) => v.length !== dimension)) {
    throw new EmbedError(`Embedding model '${model}' returned vectors of differing dimensions`);
  }
  return vectors;
}
