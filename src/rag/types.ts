/**
 * Retrieval & Generation Types
 */

import type { EmptyContextPolicy } from '../config/settings.js';

/** A search hit, flattened from its stored payload */
export interface RetrievedChunk {
  id: string;
  source: string;
  chunkIndex: number;
  text: string;
  score: number;
}

/** One cited document, with the best score among its chunks */
export interface AnswerSource {
  source: string;
  score: number;
}

export interface Answer {
  text: string;
  /** Deduplicated by source, in rank order */
  sources: AnswerSource[];
  /** The chunks that made it into the context */
  chunks: RetrievedChunk[];
  /** True when the answer was generated without retrieved context */
  noContext: boolean;
  /** Generation model that produced the text */
  model: string;
}

export interface AnswerOptions {
  /** Defaults to the engine's collection */
  collection?: string;
  topK?: number;
  /** Overrides rag.empty_context for this call */
  emptyContext?: EmptyContextPolicy;
  signal?: AbortSignal;
}

export interface AssembledContext {
  /** Rendered context block for the system message */
  text: string;
  /** Chunks kept, by descending score */
  chunks: RetrievedChunk[];
  /** Chunks removed to fit the budget */
  dropped: number;
  /** Whether the single remaining chunk was cut to fit */
  truncated: boolean;
}
