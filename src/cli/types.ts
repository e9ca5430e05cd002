import type { BackendKind } from '../config/schema.js';

/**
 * Global CLI options available to all commands
 * These are parsed at the root level and passed down to subcommands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
  /** Force an LLM backend instead of auto-detecting */
  backend?: BackendKind;
  /** Base URL for the backend */
  baseUrl?: string;
  /** Generation model override */
  model?: string;
  /** Embedding model override */
  embedModel?: string;
  /** Config file instead of ~/.know/config.toml */
  config?: string;
}

/**
 * Context passed to all command handlers
 * Combines parsed options with runtime utilities
 *
 * Satisfies Logger, so it can be handed to library code directly.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Log a message (respects --json flag) */
  log: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  /** Log a warning to stderr */
  warn: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
}
