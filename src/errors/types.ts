/**
 * Error type definitions for the know CLI
 *
 * Every failure category of the orchestration engine has its own class:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - A category name (`error.name`) printed alongside the message
 */

/**
 * Base class for all CLI errors.
 *
 * hint: tells the user HOW to fix the problem
 * code: process exit code, lets scripts tell categories apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, options?: { cause?: unknown }) {
    super(message, options);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, bad values).
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: know config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/** One failed attempt while looking for an LLM backend */
export interface BackendAttempt {
  backend: string;
  reason: string;
}

/**
 * No usable LLM backend could be found.
 *
 * Exit code 4
 */
export class BackendUnavailableError extends CLIError {
  public readonly attempts: BackendAttempt[];

  constructor(attempts: BackendAttempt[], hint?: string) {
    const detail = attempts.map((a) => `  - ${a.backend}: ${a.reason}`).join('\n');
    super(
      attempts.length > 0
        ? `No LLM backend available:\n${detail}`
        : 'No LLM backend available',
      hint ??
        'Start Docker Model Runner or Ollama with the required models, or set OPENAI_API_KEY',
      4
    );
    this.name = 'BackendUnavailableError';
    this.attempts = attempts;
  }
}

/**
 * A backing service could not be brought healthy within its start budget.
 *
 * Exit code 5
 */
export class ServiceStartFailedError extends CLIError {
  public readonly service: string;
  public readonly attempts: number;

  constructor(service: string, attempts: number, reason: string) {
    super(
      `Service '${service}' failed to become healthy after ${attempts} start attempt(s): ${reason}`,
      'Check that Docker is running, then try: docker compose logs ' + service,
      5
    );
    this.name = 'ServiceStartFailedError';
    this.service = service;
    this.attempts = attempts;
  }
}

export type StoreErrorKind =
  | 'not-found'
  | 'dimension-mismatch'
  | 'model-mismatch'
  | 'unavailable'
  | 'rejected';

const STORE_HINTS: Record<StoreErrorKind, string> = {
  'not-found': 'Run: know ingest <path>  to create the collection',
  'dimension-mismatch':
    'The collection was built with a different embedding model. Run: know clean <collection>  and re-ingest',
  'model-mismatch':
    'Use the embedding model the collection was built with (--embed-model), or clean and re-ingest',
  unavailable: 'Check the vector engine with: know status',
  rejected: 'Run with --verbose for details from the vector engine',
};

/**
 * The vector engine rejected or failed an operation.
 *
 * Exit code 6
 */
export class StoreError extends CLIError {
  public readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options: { cause?: unknown; hint?: string } = {}) {
    const { hint = STORE_HINTS[kind], ...rest } = options;
    super(message, hint, 6, rest);
    this.name = 'StoreError';
    this.kind = kind;
  }

  /** Whether retrying the same operation later could succeed */
  get transient(): boolean {
    return this.kind === 'unavailable';
  }
}

/**
 * No usable context was retrieved and the policy forbids answering without it.
 *
 * Exit code 7
 */
export class RetrievalFailedError extends CLIError {
  public readonly collection: string;

  constructor(collection: string, reason: string) {
    super(
      `No relevant context in collection '${collection}': ${reason}`,
      'Ingest documents first (know ingest <path>), or pass --allow-no-context',
      7
    );
    this.name = 'RetrievalFailedError';
    this.collection = collection;
  }
}

/**
 * The LLM generation call failed after retries.
 *
 * Exit code 8
 */
export class GenerationFailedError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'Check the backend with: know status, or run with --verbose', 8, options);
    this.name = 'GenerationFailedError';
  }
}

/**
 * Pushing or pulling a collection artifact failed.
 *
 * Exit code 9
 */
export class TransferError extends CLIError {
  constructor(message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, hint ?? 'Check that Docker is running and you are logged in to the registry', 9, options);
    this.name = 'TransferError';
  }
}

/**
 * A single file could not be parsed. Local to that file.
 *
 * Exit code 10
 */
export class ParseError extends CLIError {
  public readonly filePath: string;
  public readonly reason: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${filePath}: ${reason}`, undefined, 10, options);
    this.name = 'ParseError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

/**
 * An embedding call failed. Local to the chunk or document being embedded.
 *
 * Exit code 11
 */
export class EmbedError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'Check that the embedding model is available on the backend', 11, options);
    this.name = 'EmbedError';
  }
}

/**
 * The operation was aborted (Ctrl+C, closed request).
 *
 * Exit code 130
 */
export class OperationCancelledError extends CLIError {
  constructor(operation = 'Operation') {
    super(`${operation} cancelled`, undefined, 130);
    this.name = 'OperationCancelledError';
  }
}
