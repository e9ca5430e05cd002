/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 * Local-first: Docker Model Runner / Ollama are probed before any cloud API
 */
export const DEFAULT_CONFIG: Config = {
  collection: 'know',

  backend: {
    probe_timeout_ms: 3000,
    docker_url: 'http://localhost:12434/engines/llama.cpp/v1',
    ollama_url: 'http://localhost:11434',
    openai_url: 'https://api.openai.com/v1',
  },

  services: {
    qdrant_url: 'http://localhost:6333',
    docling_url: 'http://localhost:5001',
    max_start_attempts: 3,
    start_backoff_ms: 1000,
    probe_timeout_ms: 2000,
  },

  ingest: {
    extensions: ['md', 'txt', 'pdf', 'docx', 'html'],
    chunk_size: 512,      // characters
    chunk_overlap: 64,
    embed_batch_size: 16,
    embed_concurrency: 4,
    ignore_patterns: [],
  },

  rag: {
    top_k: 5,
    max_context_chars: 6000,
    min_score: 0,
    empty_context: 'fail',
  },

  http: {
    timeout_ms: 60000,
    retries: 2,
    retry_backoff_ms: 250,
  },

  server: {
    host: '0.0.0.0',
    port: 8080,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.know/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# know configuration
# Location: ~/.know/config.toml
# Priority: command-line flags > KNOW_* environment variables > this file > defaults

# Default collection for ingest, run, serve, push and pull
collection = "${DEFAULT_CONFIG.collection}"

# LLM backend
# Leave kind unset to auto-detect: Docker Model Runner, then Ollama, then OpenAI (OPENAI_API_KEY)
[backend]
# kind = "ollama"
# model = "llama3.2"
# embed_model = "nomic-embed-text"
probe_timeout_ms = ${DEFAULT_CONFIG.backend.probe_timeout_ms}
docker_url = "${DEFAULT_CONFIG.backend.docker_url}"
ollama_url = "${DEFAULT_CONFIG.backend.ollama_url}"
openai_url = "${DEFAULT_CONFIG.backend.openai_url}"

# Backing services, started on demand with docker compose
[services]
qdrant_url = "${DEFAULT_CONFIG.services.qdrant_url}"
docling_url = "${DEFAULT_CONFIG.services.docling_url}"
max_start_attempts = ${DEFAULT_CONFIG.services.max_start_attempts}
start_backoff_ms = ${DEFAULT_CONFIG.services.start_backoff_ms}
probe_timeout_ms = ${DEFAULT_CONFIG.services.probe_timeout_ms}
# compose_file = "/path/to/docker-compose.yml"

[ingest]
extensions = ${JSON.stringify(DEFAULT_CONFIG.ingest.extensions)}
chunk_size = ${DEFAULT_CONFIG.ingest.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.ingest.chunk_overlap}
embed_batch_size = ${DEFAULT_CONFIG.ingest.embed_batch_size}
embed_concurrency = ${DEFAULT_CONFIG.ingest.embed_concurrency}
# Additional gitignore-style patterns, merged with .gitignore and built-in defaults
# ignore_patterns = ["drafts/", "*.tmp"]

[rag]
top_k = ${DEFAULT_CONFIG.rag.top_k}
max_context_chars = ${DEFAULT_CONFIG.rag.max_context_chars}
min_score = ${DEFAULT_CONFIG.rag.min_score}
# "fail" stops with an error when nothing relevant is found, "answer" replies without context
empty_context = "${DEFAULT_CONFIG.rag.empty_context}"

[http]
timeout_ms = ${DEFAULT_CONFIG.http.timeout_ms}
retries = ${DEFAULT_CONFIG.http.retries}
retry_backoff_ms = ${DEFAULT_CONFIG.http.retry_backoff_ms}

[server]
host = "${DEFAULT_CONFIG.server.host}"
port = ${DEFAULT_CONFIG.server.port}
`;
