/**
 * OpenAI-Compatible Backend
 *
 * Serves both the OpenAI API and Docker Model Runner, which exposes the
 * same wire shape under /engines/llama.cpp/v1:
 *
 *   POST {base}/embeddings        { model, input: string[] }
 *   POST {base}/chat/completions  { model, messages }
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { EmbedError, GenerationFailedError, OperationCancelledError } from '../errors/index.js';
import { createHttpClient, describeHttpError } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { postJson } from './request.js';
import { checkEmbeddings } from './embeddings.js';
import type {
  BackendConfiguration,
  BackendHttpOptions,
  ChatMessage,
  LLMBackend,
  RequestOptions,
} from './types.js';

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().min(0),
      embedding: z.array(z.number()),
    })
  ),
});

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

// ============================================================================
// BACKEND
// ============================================================================

export class OpenAICompatibleBackend implements LLMBackend {
  private readonly http: AxiosInstance;

  constructor(
    readonly config: BackendConfiguration,
    private readonly options: BackendHttpOptions,
    private readonly logger?: Logger,
    /** @internal Inject an HTTP client for testing */
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      createHttpClient({
        baseURL: config.baseUrl,
        timeoutMs: options.timeoutMs,
        headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : undefined,
      });
  }

  async embed(texts: string[], options: RequestOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: z.infer<typeof EmbeddingResponseSchema>;
    try {
      response = await postJson(
        this.http,
        '/embeddings',
        { model: this.config.embeddingModel, input: texts },
        EmbeddingResponseSchema,
        { ...this.options, signal: options.signal, logger: this.logger }
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      throw new EmbedError(
        `Embedding with '${this.config.embeddingModel}' on ${this.config.label} failed: ${describeHttpError(error)}`,
        { cause: error }
      );
    }

    // The API may return entries out of order; index is authoritative
    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((entry) => entry.embedding);
    return checkEmbeddings(vectors, texts.length, this.config.embeddingModel);
  }

  async generate(messages: ChatMessage[], options: RequestOptions = {}): Promise<string> {
    let response: z.infer<typeof ChatCompletionResponseSchema>;
    try {
      response = await postJson(
        this.http,
        '/chat/completions',
        { model: this.config.generationModel, messages },
        ChatCompletionResponseSchema,
        { ...this.options, signal: options.signal, logger: this.logger }
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      throw new GenerationFailedError(
        `Generation with '${this.config.generationModel}' on ${this.config.label} failed: ${describeHttpError(error)}`,
        { cause: error }
      );
    }

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new GenerationFailedError(
        `${this.config.label} returned an empty completion for '${this.config.generationModel}'`
      );
    }
    return content;
  }
}
