/**
 * Tests for backend resolution order and fail-fast behavior
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import { resolveBackend, createBackend, describeBackend } from '../resolver.js';
import type { LivenessProbe } from '../probe.js';
import { OllamaBackend } from '../ollama.js';
import { OpenAICompatibleBackend } from '../openai.js';
import { BackendUnavailableError } from '../../errors/index.js';
import type { BackendSettings } from '../../config/settings.js';
import type { BackendKind } from '../types.js';

const ENDPOINTS = {
  docker: 'http://localhost:12434/engines/llama.cpp/v1',
  ollama: 'http://localhost:11434',
  openai: 'https://api.openai.com/v1',
};

function settings(overrides: Partial<BackendSettings> = {}): BackendSettings {
  return { probeTimeoutMs: 100, endpoints: ENDPOINTS, ...overrides };
}

/** Probe where only the listed backends answer */
function probeWith(live: BackendKind[]): Mock<LivenessProbe> {
  return vi.fn<LivenessProbe>(async (kind) =>
    live.includes(kind) ? { ok: true } : { ok: false, reason: 'connection refused' }
  );
}

describe('resolveBackend (auto-detect)', () => {
  it('prefers Docker Model Runner over Ollama', async () => {
    const probe = probeWith(['docker', 'ollama']);

    const config = await resolveBackend(settings(), { probe });

    expect(config.kind).toBe('docker');
    expect(config.baseUrl).toBe(ENDPOINTS.docker);
    expect(config.generationModel).toBe('ai/llama3.2:3B-Q8_0');
    expect(config.embeddingModel).toBe('ai/mxbai-embed-large:335M-F16');
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('falls through to Ollama when Docker is down', async () => {
    const config = await resolveBackend(settings(), { probe: probeWith(['ollama']) });

    expect(config.kind).toBe('ollama');
    expect(config.label).toBe('Ollama');
    expect(config.generationModel).toBe('llama3.2');
    expect(config.embeddingModel).toBe('nomic-embed-text');
  });

  it('prefers a live local backend even when an API key is present', async () => {
    const config = await resolveBackend(settings({ apiKey: 'test-secret' }), {
      probe: probeWith(['ollama']),
    });

    expect(config.kind).toBe('ollama');
    expect(config.apiKey).toBeUndefined();
  });

  it('selects OpenAI when no local runner answers and a key is set', async () => {
    const probe = probeWith([]);

    const config = await resolveBackend(settings({ apiKey: 'test-secret' }), { probe });

    expect(config.kind).toBe('openai');
    expect(config.baseUrl).toBe(ENDPOINTS.openai);
    expect(config.apiKey).toBe('test-secret');
    expect(config.generationModel).toBe('gpt-4o');
    expect(config.embeddingModel).toBe('text-embedding-3-small');
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('applies --base-url to OpenAI only during auto-detection', async () => {
    const config = await resolveBackend(
      settings({ apiKey: 'test-secret', baseUrl: 'https://gateway.example.test/v1/' }),
      { probe: probeWith([]) }
    );

    expect(config.baseUrl).toBe('https://gateway.example.test/v1');
  });

  it('lists every attempt when nothing is usable', async () => {
    const error = await resolveBackend(settings(), { probe: probeWith([]) }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    if (!(error instanceof BackendUnavailableError)) return;
    expect(error.attempts).toEqual([
      { backend: 'docker', reason: 'connection refused' },
      { backend: 'ollama', reason: 'connection refused' },
      { backend: 'openai', reason: 'OPENAI_API_KEY is not set' },
    ]);
    expect(error.message).toBe(
      'No LLM backend available:\n' +
        '  - docker: connection refused\n' +
        '  - ollama: connection refused\n' +
        '  - openai: OPENAI_API_KEY is not set'
    );
    expect(error.hint).toContain('ollama pull llama3.2');
    expect(error.code).toBe(4);
  });

  it('applies model overrides', async () => {
    const config = await resolveBackend(settings({ model: 'mistral', embedModel: 'all-minilm' }), {
      probe: probeWith(['ollama']),
    });

    expect(config.generationModel).toBe('mistral');
    expect(config.embeddingModel).toBe('all-minilm');
  });

  it('returns a frozen configuration', async () => {
    const config = await resolveBackend(settings(), { probe: probeWith(['docker']) });

    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('resolveBackend (explicit)', () => {
  it('uses the requested backend when it answers', async () => {
    const probe = probeWith(['ollama']);

    const config = await resolveBackend(settings({ kind: 'ollama' }), { probe });

    expect(config.kind).toBe('ollama');
    expect(probe).toHaveBeenCalledWith('ollama', ENDPOINTS.ollama, { timeoutMs: 100, apiKey: undefined });
  });

  it('fails fast without falling back when the requested backend is down', async () => {
    const probe = probeWith(['ollama']);

    const error = await resolveBackend(settings({ kind: 'docker' }), { probe }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    if (!(error instanceof BackendUnavailableError)) return;
    expect(error.attempts).toEqual([{ backend: 'docker', reason: 'connection refused' }]);
    expect(error.hint).toContain('docker model pull');
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('probes the --base-url when given', async () => {
    const probe = probeWith(['ollama']);

    const config = await resolveBackend(
      settings({ kind: 'ollama', baseUrl: 'http://gpu-box:11434' }),
      { probe }
    );

    expect(config.baseUrl).toBe('http://gpu-box:11434');
    expect(probe).toHaveBeenCalledWith('ollama', 'http://gpu-box:11434', { timeoutMs: 100, apiKey: undefined });
  });

  it('rejects OpenAI without a key before probing', async () => {
    const probe = probeWith(['openai']);

    const error = await resolveBackend(settings({ kind: 'openai' }), { probe }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    if (!(error instanceof BackendUnavailableError)) return;
    expect(error.attempts).toEqual([{ backend: 'openai', reason: 'OPENAI_API_KEY is not set' }]);
    expect(probe).not.toHaveBeenCalled();
  });

  it('rejects a malformed base URL', async () => {
    const error = await resolveBackend(settings({ kind: 'ollama', baseUrl: 'localhost:11434' }), {
      probe: probeWith(['ollama']),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    if (!(error instanceof BackendUnavailableError)) return;
    expect(error.attempts[0]?.reason).toContain("Invalid ollama base URL 'localhost:11434'");
  });
});

describe('createBackend', () => {
  const http = { timeoutMs: 1000, retries: 0, retryBackoffMs: 0 };
  const base = { label: 'x', baseUrl: 'http://localhost:1', generationModel: 'g', embeddingModel: 'e' };

  it('builds the native client for Ollama', () => {
    expect(createBackend({ kind: 'ollama', ...base }, http)).toBeInstanceOf(OllamaBackend);
  });

  it('builds the OpenAI-compatible client for Docker and OpenAI', () => {
    expect(createBackend({ kind: 'docker', ...base }, http)).toBeInstanceOf(OpenAICompatibleBackend);
    expect(createBackend({ kind: 'openai', ...base, apiKey: 'test-secret' }, http)).toBeInstanceOf(
      OpenAICompatibleBackend
    );
  });
});

describe('describeBackend', () => {
  it('never includes the API key', () => {
    const described = describeBackend({
      kind: 'openai',
      label: 'OpenAI',
      baseUrl: ENDPOINTS.openai,
      generationModel: 'gpt-4o',
      embeddingModel: 'text-embedding-3-small',
      apiKey: 'test-secret',
    });

    expect(JSON.stringify(described)).not.toContain('test-secret');
    expect(described.backend).toBe('openai');
  });
});
