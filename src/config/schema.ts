/**
 * Configuration Schema
 *
 * Defines the shape of ~/.know/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM backend kinds (used by config, env and the resolver)
 */
export const BackendKindSchema = z.enum(['docker', 'ollama', 'openai']);
export type BackendKind = z.infer<typeof BackendKindSchema>;

const UrlSchema = z.string().url();

/**
 * LLM backend selection and endpoints
 */
export const BackendConfigSchema = z.object({
  kind: BackendKindSchema.optional().describe('Force a backend instead of auto-detecting'),
  base_url: UrlSchema.optional().describe('Base URL override for the selected backend'),
  model: z.string().min(1).optional().describe('Generation model override'),
  embed_model: z.string().min(1).optional().describe('Embedding model override'),
  probe_timeout_ms: z
    .number()
    .int()
    .min(100)
    .max(60000)
    .describe('Liveness probe timeout when auto-detecting local backends'),
  docker_url: UrlSchema.describe('Docker Model Runner OpenAI-compatible endpoint'),
  ollama_url: UrlSchema.describe('Ollama endpoint'),
  openai_url: UrlSchema.describe('OpenAI API endpoint'),
});

/**
 * Backing services (vector engine, parsing engine) and their supervision
 */
export const ServicesConfigSchema = z.object({
  qdrant_url: UrlSchema,
  docling_url: UrlSchema,
  max_start_attempts: z.number().int().min(1).max(10),
  start_backoff_ms: z.number().int().min(0).max(60000),
  probe_timeout_ms: z.number().int().min(100).max(60000),
  compose_file: z.string().optional().describe('Path to a docker-compose.yml for the services'),
});

/**
 * Ingestion behavior
 */
const IngestShape = z.object({
  extensions: z.array(z.string().min(1)).min(1),
  chunk_size: z.number().int().min(32).max(32768),
  chunk_overlap: z.number().int().min(0),
  embed_batch_size: z.number().int().min(1).max(512),
  embed_concurrency: z.number().int().min(1).max(32),
  ignore_patterns: z.array(z.string()),
});

export const IngestConfigSchema = IngestShape.refine(
  (ingest) => ingest.chunk_overlap < ingest.chunk_size,
  { message: 'chunk_overlap must be smaller than chunk_size', path: ['chunk_overlap'] }
);

/**
 * Retrieval and generation
 */
export const RagConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100),
  max_context_chars: z.number().int().min(256),
  min_score: z.number().min(-1).max(1),
  empty_context: z
    .enum(['fail', 'answer'])
    .describe("What to do when retrieval finds nothing: 'fail' or answer without context"),
});

/**
 * Network behavior for every outbound HTTP call
 */
export const HttpConfigSchema = z.object({
  timeout_ms: z.number().int().min(1000).max(600000),
  retries: z.number().int().min(0).max(10),
  retry_backoff_ms: z.number().int().min(0).max(60000),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  collection: z.string().min(1).describe('Default collection name'),
  backend: BackendConfigSchema,
  services: ServicesConfigSchema,
  ingest: IngestConfigSchema,
  rag: RagConfigSchema,
  http: HttpConfigSchema,
  server: ServerConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = z.object({
  collection: z.string().min(1).optional(),
  backend: BackendConfigSchema.partial().optional(),
  services: ServicesConfigSchema.partial().optional(),
  ingest: IngestShape.partial().optional(),
  rag: RagConfigSchema.partial().optional(),
  http: HttpConfigSchema.partial().optional(),
  server: ServerConfigSchema.partial().optional(),
});
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
