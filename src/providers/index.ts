/**
 * LLM Backend Module
 *
 * @example
 * ```typescript
 * const config = await resolveBackend(settings.backend);
 * const backend = createBackend(config, settings.http);
 * const [vector] = await backend.embed(['refund policy']);
 * ```
 */

export {
  BACKEND_DEFAULTS,
  LOCAL_BACKENDS,
  type BackendKind,
  type BackendConfiguration,
  type BackendDefaults,
  type BackendHttpOptions,
  type ChatMessage,
  type ChatRole,
  type LLMBackend,
  type RequestOptions,
} from './types.js';

export { resolveBackend, createBackend, describeBackend, type ResolveBackendOptions } from './resolver.js';
export { httpLivenessProbe, LIVENESS_PATHS, type LivenessProbe, type ProbeResult, type ProbeOptions } from './probe.js';
export { OpenAICompatibleBackend } from './openai.js';
export { OllamaBackend } from './ollama.js';
export { validateBaseUrl, validateApiKey, BaseUrlSchema, type ValidationResult } from './validation.js';
