/**
 * Ingestion Types
 *
 * Type definitions for scanning, chunking and the ingestion report.
 */

/**
 * Patterns never ingested, applied before .gitignore and user patterns.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  'node_modules/',
  '.git/',
  '.svn/',
  '.hg/',
  '.venv/',
  'venv/',
  '__pycache__/',
  'dist/',
  'build/',
  '.DS_Store',
  'Thumbs.db',
  '*.tmp',
  '*.swp',
  '~$*',
];

/**
 * A file selected for ingestion.
 */
export interface DiscoveredFile {
  /** Absolute path with forward slashes; also the `source` of its points */
  path: string;

  /** Path relative to the scanned root (the file name for single files) */
  relativePath: string;

  /** Lowercased extension without the dot */
  extension: string;

  size: number;

  /** Last modified timestamp (ISO 8601) */
  modifiedAt: string;
}

export interface ScanOptions {
  /** Extensions to include, without dot, matched case-insensitively */
  extensions: readonly string[];

  /** Extra gitignore-style patterns */
  ignorePatterns?: readonly string[];

  followSymlinks?: boolean;
}

/**
 * A bounded segment of a document. Offsets index into the parsed text.
 */
export interface Chunk {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface ChunkerOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Characters shared between consecutive chunks */
  chunkOverlap: number;
}

// ============================================================================
// REPORT
// ============================================================================

export interface IngestFailure {
  source: string;
  /** Error class name, e.g. ParseError */
  category: string;
  message: string;
}

export type FileOutcome =
  | { status: 'written'; chunks: number; staleDeleted: number }
  | { status: 'skipped'; reason: 'unchanged' | 'empty'; staleDeleted: number }
  | { status: 'failed'; failure: IngestFailure };

export interface IngestReport {
  collection: string;
  filesProcessed: number;
  chunksWritten: number;
  filesSkipped: number;
  filesFailed: number;
  staleChunksDeleted: number;
  failures: IngestFailure[];
  durationMs: number;
}
