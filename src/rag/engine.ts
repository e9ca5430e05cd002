/**
 * RAG Engine
 *
 * answer(question):
 *   1. read collection info (missing or empty -> no context)
 *   2. check the collection's embedding model
 *   3. embed the question; dimension must match the collection
 *   4. top-K search, drop hits below min_score
 *   5. assemble context within the character budget
 *   6. generate
 *
 * Stateless between calls: one engine serves concurrent requests.
 */

import { RetrievalFailedError, ValidationError } from '../errors/index.js';
import { throwIfAborted } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';
import type { RagSettings } from '../config/settings.js';
import type { LLMBackend } from '../providers/types.js';
import type { VectorStore } from '../store/types.js';
import { assertDimension, assertEmbeddingModel } from '../store/collections.js';
import { assembleContext } from './assembler.js';
import { buildMessages, buildNoContextMessages } from './prompt.js';
import type { Answer, AnswerOptions, AnswerSource, RetrievedChunk } from './types.js';

export interface RagEngineDependencies {
  store: VectorStore;
  backend: LLMBackend;
  logger?: Logger;
}

export interface RagEngineConfig extends RagSettings {
  /** Collection used when a call does not name one */
  collection: string;
}

/** Result of the retrieval half; `reason` is set when nothing was found */
export interface Retrieval {
  chunks: RetrievedChunk[];
  reason?: string;
}

/**
 * Deduplicate by source in rank order; the first hit per source has its best score.
 */
export function collectSources(chunks: readonly RetrievedChunk[]): AnswerSource[] {
  const seen = new Map<string, AnswerSource>();
  for (const chunk of chunks) {
    const existing = seen.get(chunk.source);
    if (existing === undefined) {
      seen.set(chunk.source, { source: chunk.source, score: chunk.score });
    } else if (chunk.score > existing.score) {
      existing.score = chunk.score;
    }
  }
  return [...seen.values()];
}

export class RagEngine {
  constructor(
    private readonly deps: RagEngineDependencies,
    private readonly config: Readonly<RagEngineConfig>
  ) {}

  get collection(): string {
    return this.config.collection;
  }

  /**
   * Retrieve the top-K chunks for a question.
   *
   * @throws StoreError on model or dimension mismatch, or when the engine is down
   * @throws EmbedError when the question cannot be embedded
   */
  async retrieve(question: string, options: AnswerOptions = {}): Promise<Retrieval> {
    const { store, backend, logger } = this.deps;
    const collection = options.collection ?? this.config.collection;
    const topK = options.topK ?? this.config.topK;

    const info = await store.getCollection(collection, options.signal);
    if (info === null) {
      return { chunks: [], reason: 'collection does not exist' };
    }
    if (info.pointCount === 0) {
      return { chunks: [], reason: 'collection is empty' };
    }

    await assertEmbeddingModel(store, collection, backend.config.embeddingModel, options.signal);

    throwIfAborted(options.signal, 'Query');
    const [vector] = await backend.embed([question], { signal: options.signal });
    if (vector === undefined) {
      return { chunks: [], reason: 'the question produced no embedding' };
    }
    // Never truncate or pad: a mismatch means the wrong model
    assertDimension(info, vector.length);

    throwIfAborted(options.signal, 'Query');
    const hits = await store.search(collection, vector, topK, {
      scoreThreshold: this.config.minScore,
      signal: options.signal,
    });

    const chunks = hits
      .filter((hit) => hit.score >= this.config.minScore)
      .map((hit) => ({
        id: hit.id,
        source: hit.payload.source,
        chunkIndex: hit.payload.chunk_index,
        text: hit.payload.text,
        score: hit.score,
      }));

    logger?.debug?.(`Retrieved ${chunks.length} chunk(s) from '${collection}' (top_k=${topK})`);

    return chunks.length > 0
      ? { chunks }
      : { chunks, reason: `no chunk scored at or above min_score ${this.config.minScore}` };
  }

  /**
   * Answer a question from the collection.
   *
   * @throws RetrievalFailedError when nothing is retrieved and the policy is 'fail'
   * @throws GenerationFailedError when the model call fails
   */
  async answer(question: string, options: AnswerOptions = {}): Promise<Answer> {
    const trimmed = question.trim();
    if (trimmed === '') {
      throw new ValidationError('Question is empty', ['Provide a question to answer']);
    }

    const { backend, logger } = this.deps;
    const collection = options.collection ?? this.config.collection;
    const policy = options.emptyContext ?? this.config.emptyContext;

    const retrieval = await this.retrieve(trimmed, options);
    const context = assembleContext(retrieval.chunks, this.config.maxContextChars);

    if (context.chunks.length === 0) {
      const reason =
        retrieval.reason ??
        (retrieval.chunks.length > 0
          ? `max_context_chars ${this.config.maxContextChars} leaves no room for a single chunk`
          : 'nothing retrieved');
      if (policy === 'fail') {
        throw new RetrievalFailedError(collection, reason);
      }

      logger?.warn(`No context from '${collection}' (${reason}); answering without sources`);
      const text = await backend.generate(buildNoContextMessages(trimmed), { signal: options.signal });
      return { text, sources: [], chunks: [], noContext: true, model: backend.config.generationModel };
    }

    if (context.dropped > 0 || context.truncated) {
      logger?.debug?.(
        `Context budget ${this.config.maxContextChars}: dropped ${context.dropped} chunk(s)` +
          (context.truncated ? ', truncated the top chunk' : '')
      );
    }

    throwIfAborted(options.signal, 'Query');
    const text = await backend.generate(buildMessages(trimmed, context.text), { signal: options.signal });

    return {
      text,
      sources: collectSources(context.chunks),
      chunks: context.chunks,
      noContext: false,
      model: backend.config.generationModel,
    };
  }
}
