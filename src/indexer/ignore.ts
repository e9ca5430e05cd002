/**
 * Gitignore Pattern Handling
 *
 * Uses the 'ignore' package, which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Additional patterns to ignore (merged with .gitignore) */
  additionalPatterns?: readonly string[];
}

/** Returns true when the path should be IGNORED */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Parse gitignore content into patterns, dropping blanks and comments.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Read the root .gitignore; a missing file yields no patterns.
 */
export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

/**
 * Build the ignore filter for a root directory.
 *
 * Pattern order (later wins on negation):
 * 1. DEFAULT_IGNORE_PATTERNS
 * 2. <root>/.gitignore
 * 3. additionalPatterns (ingest.ignore_patterns)
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [] } = options;

  const ig = ignore()
    .add([...DEFAULT_IGNORE_PATTERNS])
    .add(loadGitignoreFile(join(rootPath, '.gitignore')))
    .add([...additionalPatterns]);

  return (filePath: string): boolean => {
    let relativePath = filePath.startsWith(rootPath) ? relative(rootPath, filePath) : filePath;

    // ignore expects forward slashes
    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // Root itself is never ignored
    if (relativePath === '') {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
