/**
 * Ollama Backend
 *
 * Native Ollama API (no API key, local inference):
 *
 *   POST {host}/api/embed  { model, input: string[] }            -> { embeddings }
 *   POST {host}/api/chat   { model, messages, stream: false }    -> { message: { content } }
 *
 * Models must be pulled first: `ollama pull <model>`.
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

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const OllamaChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

/** Append the pull hint Ollama users need when a model is missing */
function withPullHint(reason: string, model: string): string {
  return /not found|404/i.test(reason) ? `${reason} (run: ollama pull ${model})` : reason;
}

export class OllamaBackend implements LLMBackend {
  private readonly http: AxiosInstance;

  constructor(
    readonly config: BackendConfiguration,
    private readonly options: BackendHttpOptions,
    private readonly logger?: Logger,
    /** @internal Inject an HTTP client for testing */
    http?: AxiosInstance
  ) {
    this.http = http ?? createHttpClient({ baseURL: config.baseUrl, timeoutMs: options.timeoutMs });
  }

  async embed(texts: string[], options: RequestOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await postJson(
        this.http,
        '/api/embed',
        { model: this.config.embeddingModel, input: texts },
        OllamaEmbedResponseSchema,
        { ...this.options, signal: options.signal, logger: this.logger }
      );
      return checkEmbeddings(response.embeddings, texts.length, this.config.embeddingModel);
    } catch (error) {
      if (error instanceof OperationCancelledError || error instanceof EmbedError) throw error;
      throw new EmbedError(
        `Embedding with '${this.config.embeddingModel}' on Ollama failed: ${withPullHint(describeHttpError(error), this.config.embeddingModel)}`,
        { cause: error }
      );
    }
  }

  async generate(messages: ChatMessage[], options: RequestOptions = {}): Promise<string> {
    try {
      const response = await postJson(
        this.http,
        '/api/chat',
        { model: this.config.generationModel, messages, stream: false },
        OllamaChatResponseSchema,
        { ...this.options, signal: options.signal, logger: this.logger }
      );
      if (!response.message.content) {
        throw new GenerationFailedError(`Ollama returned an empty completion for '${this.config.generationModel}'`);
      }
      return response.message.content;
    } catch (error) {
      if (error instanceof OperationCancelledError || error instanceof GenerationFailedError) throw error;
      throw new GenerationFailedError(
        `Generation with '${this.config.generationModel}' on Ollama failed: ${withPullHint(describeHttpError(error), this.config.generationModel)}`,
        { cause: error }
      );
    }
  }
}
