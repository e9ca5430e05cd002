/**
 * Tests for the OpenAI-compatible and Ollama clients over a fake HTTP instance
 */

import { describe, it, expect, vi } from 'vitest';
import type { AxiosInstance } from 'axios';
import { OpenAICompatibleBackend } from '../openai.js';
import { OllamaBackend } from '../ollama.js';
import { EmbedError, GenerationFailedError, OperationCancelledError } from '../../errors/index.js';
import { httpError, networkError } from '../../test-utils/http-errors.js';
import type { BackendConfiguration } from '../types.js';

const HTTP = { timeoutMs: 1000, retries: 2, retryBackoffMs: 0 };

function fakeHttp(...responses: Array<unknown | Error>): { http: AxiosInstance; post: ReturnType<typeof vi.fn> } {
  const post = vi.fn();
  for (const response of responses) {
    if (response instanceof Error) {
      post.mockRejectedValueOnce(response);
    } else {
      post.mockResolvedValueOnce({ data: response });
    }
  }
  return { http: { post } as unknown as AxiosInstance, post };
}

const openaiConfig: BackendConfiguration = {
  kind: 'openai',
  label: 'OpenAI',
  baseUrl: 'https://api.openai.com/v1',
  generationModel: 'gpt-4o',
  embeddingModel: 'text-embedding-3-small',
  apiKey: 'test-secret',
};

const ollamaConfig: BackendConfiguration = {
  kind: 'ollama',
  label: 'Ollama',
  baseUrl: 'http://localhost:11434',
  generationModel: 'llama3.2',
  embeddingModel: 'nomic-embed-text',
};

describe('OpenAICompatibleBackend', () => {
  it('embeds a batch and orders vectors by index', async () => {
    const { http, post } = fakeHttp({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    const vectors = await backend.embed(['first', 'second']);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(post).toHaveBeenCalledWith(
      '/embeddings',
      { model: 'text-embedding-3-small', input: ['first', 'second'] },
      { signal: undefined }
    );
  });

  it('skips the request for an empty batch', async () => {
    const { http, post } = fakeHttp();
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.embed([])).resolves.toEqual([]);
    expect(post).not.toHaveBeenCalled();
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const { http } = fakeHttp({ data: [{ index: 0, embedding: [1, 0] }] });
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.embed(['a', 'b'])).rejects.toThrow(
      "Embedding model 'text-embedding-3-small' returned 1 vector(s) for 2 input(s)"
    );
  });

  it('rejects vectors of differing dimensions', async () => {
    const { http } = fakeHttp({
      data: [
        { index: 0, embedding: [1, 0] },
        { index: 1, embedding: [1, 0, 0] },
      ],
    });
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.embed(['a', 'b'])).rejects.toBeInstanceOf(EmbedError);
  });

  it('retries a 503 and succeeds', async () => {
    const { http, post } = fakeHttp(httpError(503), {
      choices: [{ message: { content: 'Fourteen days.' } }],
    });
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.generate([{ role: 'user', content: 'How long?' }])).resolves.toBe('Fourteen days.');
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('does not retry a 4xx and wraps it as a generation failure', async () => {
    const { http, post } = fakeHttp(httpError(401, { error: { message: 'Incorrect API key provided' } }));
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    const error = await backend.generate([{ role: 'user', content: 'q' }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailedError);
    expect(error).toHaveProperty(
      'message',
      "Generation with 'gpt-4o' on OpenAI failed: HTTP 401: Incorrect API key provided"
    );
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('does not retry 429', async () => {
    const { http, post } = fakeHttp(httpError(429));
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.embed(['a'])).rejects.toBeInstanceOf(EmbedError);
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('gives up after the retry budget', async () => {
    const { http, post } = fakeHttp(
      networkError('ECONNREFUSED'),
      networkError('ECONNREFUSED'),
      networkError('ECONNREFUSED')
    );
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.embed(['a'])).rejects.toThrow(
      "Embedding with 'text-embedding-3-small' on OpenAI failed: connection refused"
    );
    expect(post).toHaveBeenCalledTimes(3);
  });

  it('treats an empty completion as a generation failure', async () => {
    const { http } = fakeHttp({ choices: [{ message: { content: null } }] });
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.generate([{ role: 'user', content: 'q' }])).rejects.toThrow(
      "OpenAI returned an empty completion for 'gpt-4o'"
    );
  });

  it('reports a cancelled request as a cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const { http, post } = fakeHttp();
    const backend = new OpenAICompatibleBackend(openaiConfig, HTTP, undefined, http);

    await expect(backend.embed(['a'], { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(post).not.toHaveBeenCalled();
  });
});

describe('OllamaBackend', () => {
  it('embeds through /api/embed', async () => {
    const { http, post } = fakeHttp({ embeddings: [[0.5, 0.5]] });
    const backend = new OllamaBackend(ollamaConfig, HTTP, undefined, http);

    await expect(backend.embed(['hello'])).resolves.toEqual([[0.5, 0.5]]);
    expect(post).toHaveBeenCalledWith(
      '/api/embed',
      { model: 'nomic-embed-text', input: ['hello'] },
      { signal: undefined }
    );
  });

  it('generates through /api/chat without streaming', async () => {
    const { http, post } = fakeHttp({ message: { role: 'assistant', content: 'Hi there' } });
    const backend = new OllamaBackend(ollamaConfig, HTTP, undefined, http);
    const messages = [
      { role: 'system' as const, content: 'Be brief.' },
      { role: 'user' as const, content: 'Hello' },
    ];

    await expect(backend.generate(messages)).resolves.toBe('Hi there');
    expect(post).toHaveBeenCalledWith(
      '/api/chat',
      { model: 'llama3.2', messages, stream: false },
      { signal: undefined }
    );
  });

  it('suggests pulling a missing model', async () => {
    const { http } = fakeHttp(httpError(404, { error: 'model "nomic-embed-text" not found' }));
    const backend = new OllamaBackend(ollamaConfig, HTTP, undefined, http);

    await expect(backend.embed(['a'])).rejects.toThrow('(run: ollama pull nomic-embed-text)');
  });

  it('reports a malformed response as an embedding failure', async () => {
    const { http } = fakeHttp({ embedding: [1, 2] });
    const backend = new OllamaBackend(ollamaConfig, HTTP, undefined, http);

    const error = await backend.embed(['a']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbedError);
    expect(error).toHaveProperty('message', expect.stringContaining('Unexpected response from /api/embed'));
  });
});
