/**
 * Deterministic LLM backend for pipeline and engine tests.
 *
 * Embeddings are keyword counts over a fixed vocabulary plus a bias
 * component, so texts sharing a keyword score higher under cosine.
 * Generation echoes the prompt it was given.
 */

import { EmbedError } from '../errors/index.js';
import type {
  BackendConfiguration,
  BackendKind,
  ChatMessage,
  LLMBackend,
  RequestOptions,
} from '../providers/types.js';

export const FEATURE_WORDS = [
  'refund',
  'shipping',
  'warranty',
  'password',
  'invoice',
  'delivery',
  'account',
  'battery',
] as const;

/** Vocabulary size + 1 bias component */
export const FAKE_DIMENSION = FEATURE_WORDS.length + 1;

export function featureVector(text: string): number[] {
  const lower = text.toLowerCase();
  const counts = FEATURE_WORDS.map((word) => lower.split(word).length - 1);
  return [...counts, 1];
}

export interface FakeBackendOptions {
  kind?: BackendKind;
  embeddingModel?: string;
  generationModel?: string;
  /** Embedding fails for any batch containing a text that matches */
  failEmbedWhen?: (text: string) => boolean;
  /** Override the generated answer */
  answer?: (messages: ChatMessage[]) => string;
  /** Pad vectors to this dimension (default FAKE_DIMENSION) */
  dimension?: number;
}

export class FakeBackend implements LLMBackend {
  readonly config: BackendConfiguration;
  readonly embedCalls: string[][] = [];
  readonly generateCalls: ChatMessage[][] = [];

  constructor(private readonly options: FakeBackendOptions = {}) {
    const kind = options.kind ?? 'ollama';
    this.config = Object.freeze({
      kind,
      label: 'Fake',
      baseUrl: 'http://fake.invalid',
      generationModel: options.generationModel ?? 'fake-chat',
      embeddingModel: options.embeddingModel ?? 'fake-embed',
    });
  }

  async embed(texts: string[], _options?: RequestOptions): Promise<number[][]> {
    this.embedCalls.push([...texts]);
    const failWhen = this.options.failEmbedWhen;
    if (failWhen && texts.some(failWhen)) {
      throw new EmbedError(`Embedding with '${this.config.embeddingModel}' on Fake failed: HTTP 500`);
    }
    const dimension = this.options.dimension ?? FAKE_DIMENSION;
    return texts.map((text) => {
      const vector = featureVector(text);
      while (vector.length < dimension) vector.push(0);
      return vector.slice(0, dimension);
    });
  }

  async generate(messages: ChatMessage[], _options?: RequestOptions): Promise<string> {
    this.generateCalls.push(messages.map((m) => ({ ...m })));
    if (this.options.answer) {
      return this.options.answer(messages);
    }
    return messages.map((m) => `${m.role}: ${m.content}`).join('\n');
  }
}
