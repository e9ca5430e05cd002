/**
 * Environment Variable Handler
 *
 * Loads KNOW_* overrides and API keys once per process.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { BackendKindSchema } from './schema.js';
import { ConfigError } from '../errors/index.js';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Empty strings count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

export const EnvSchema = z.object({
  KNOW_BACKEND: z
    .string()
    .optional()
    .transform((value) => (value?.trim() ? value.trim().toLowerCase() : undefined))
    .pipe(BackendKindSchema.optional()),
  KNOW_BASE_URL: optionalString,
  KNOW_MODEL: optionalString,
  KNOW_EMBED_MODEL: optionalString,
  KNOW_QDRANT_URL: optionalString,
  KNOW_DOCLING_URL: optionalString,
  KNOW_COLLECTION: optionalString,
  KNOW_CONFIG: optionalString,
  OPENAI_API_KEY: optionalString,
  OLLAMA_HOST: optionalString,
  QDRANT_API_KEY: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

const ENV_KEYS = Object.keys(EnvSchema.shape);

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Cached environment (read once, immutable for the rest of the invocation) */
let _envCache: Readonly<EnvVars> | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigError when KNOW_BACKEND names an unknown backend
 */
export function loadEnv(): Readonly<EnvVars> {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = Object.fromEntries(ENV_KEYS.map((key) => [key, process.env[key]]));
  const result = EnvSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment:\n${issues}`,
      'KNOW_BACKEND must be one of: docker, ollama, openai'
    );
  }

  _envCache = Object.freeze(result.data);
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check whether the OpenAI API key is configured, WITHOUT exposing it.
 */
export function hasOpenAIKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY);
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Backend-specific setup instructions, shown when no backend is usable.
 */
export const SETUP_INSTRUCTIONS: Record<'docker' | 'ollama' | 'openai', string> = {
  docker: `
Docker Model Runner:
  docker model pull ai/llama3.2:3B-Q8_0
  docker model pull ai/mxbai-embed-large:335M-F16
  Enable host-side TCP support (port 12434) in Docker Desktop settings`,

  ollama: `
Ollama:
  ollama pull llama3.2
  ollama pull nomic-embed-text`,

  openai: `
OpenAI:
  export OPENAI_API_KEY=<your key>`,
};
