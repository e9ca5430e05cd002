/**
 * LLM Backend Types
 *
 * Pipelines never look at which provider they talk to: they receive an
 * immutable BackendConfiguration (resolved once per invocation) and an
 * LLMBackend built from it.
 */

import type { BackendKind } from '../config/schema.js';

export type { BackendKind };

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Resolved backend selection. Frozen; never mutated after resolution.
 */
export interface BackendConfiguration {
  readonly kind: BackendKind;
  /** Human-readable backend name */
  readonly label: string;
  readonly baseUrl: string;
  readonly generationModel: string;
  readonly embeddingModel: string;
  /** Only set for the OpenAI backend. Never logged. */
  readonly apiKey?: string;
}

export interface BackendDefaults {
  label: string;
  generationModel: string;
  embeddingModel: string;
}

/** Default models per backend (overridable with KNOW_MODEL / KNOW_EMBED_MODEL) */
export const BACKEND_DEFAULTS: Readonly<Record<BackendKind, BackendDefaults>> = {
  docker: {
    label: 'Docker Model Runner',
    generationModel: 'ai/llama3.2:3B-Q8_0',
    embeddingModel: 'ai/mxbai-embed-large:335M-F16',
  },
  ollama: {
    label: 'Ollama',
    generationModel: 'llama3.2',
    embeddingModel: 'nomic-embed-text',
  },
  openai: {
    label: 'OpenAI',
    generationModel: 'gpt-4o',
    embeddingModel: 'text-embedding-3-small',
  },
};

/** Local runners, in auto-detection order */
export const LOCAL_BACKENDS: readonly BackendKind[] = ['docker', 'ollama'];

// ============================================================================
// CLIENT
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/** Network behavior shared by every backend client */
export interface BackendHttpOptions {
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
}

/**
 * Narrow capability interface over an LLM provider.
 *
 * embed: throws EmbedError (or OperationCancelledError)
 * generate: throws GenerationFailedError (or OperationCancelledError)
 */
export interface LLMBackend {
  readonly config: BackendConfiguration;
  embed(texts: string[], options?: RequestOptions): Promise<number[][]>;
  generate(messages: ChatMessage[], options?: RequestOptions): Promise<string>;
}
