/**
 * Text Chunker
 *
 * Fixed-size character windows with overlap. Each window end is pulled
 * back to the nearest paragraph, line, sentence or word boundary when one
 * exists past the overlap region.
 *
 * Invariants:
 * - every chunk is at most chunkSize characters
 * - text.slice(startOffset, endOffset) === chunk.text
 * - consecutive windows share chunkOverlap characters, one fewer where
 *   the overlap would start inside a surrogate pair
 * - no cut splits a surrogate pair (a one-unit window over an astral
 *   character takes the whole pair)
 * - whitespace-only windows are dropped; indexes stay dense (0..n-1)
 */

import { ValidationError } from '../errors/index.js';
import { splitsSurrogatePair } from '../utils/text.js';
import type { Chunk, ChunkerOptions } from './types.js';

/** Preferred break points, strongest first */
const SEPARATORS = ['\n\n', '\n', '. '] as const;

function findBreak(text: string, min: number, end: number): number {
  for (const separator of SEPARATORS) {
    const at = text.lastIndexOf(separator, end - separator.length);
    if (at >= min) {
      return at + separator.length;
    }
  }

  for (let i = end - 1; i >= min; i--) {
    if (/\s/.test(text.charAt(i))) {
      return i + 1;
    }
  }

  return end;
}

export function validateChunkerOptions(options: ChunkerOptions): void {
  const issues: string[] = [];
  if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
    issues.push('chunkSize must be a positive integer');
  }
  if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
    issues.push('chunkOverlap must be a non-negative integer');
  } else if (options.chunkOverlap >= options.chunkSize) {
    issues.push('chunkOverlap must be smaller than chunkSize');
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid chunker options', issues);
  }
}

/**
 * Split text into overlapping chunks.
 *
 * @example
 * ```ts
 * const chunks = chunkText(markdown, { chunkSize: 512, chunkOverlap: 64 });
 * ```
 */
export function chunkText(text: string, options: ChunkerOptions): Chunk[] {
  validateChunkerOptions(options);
  const { chunkSize, chunkOverlap } = options;

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      end = findBreak(text, start + chunkOverlap + 1, end);
      if (splitsSurrogatePair(text, end)) {
        end = end - 1 > start ? end - 1 : end + 1;
      }
    }

    const slice = text.slice(start, end);
    if (slice.trim() !== '') {
      chunks.push({ index: chunks.length, text: slice, startOffset: start, endOffset: end });
    }

    if (end >= text.length) break;
    const next = Math.max(end - chunkOverlap, start + 1);
    start = splitsSurrogatePair(text, next) ? next + 1 : next;
  }

  return chunks;
}
