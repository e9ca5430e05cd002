/**
 * Context Assembler
 *
 * Renders retrieved chunks into the context block handed to the model:
 *
 * ```
 * [Source: /docs/refunds.md]
 * Refunds are processed within 14 days.
 * ---
 * [Source: /docs/shipping.md]
 * Shipping takes 3-5 days.
 * ```
 *
 * Chunks are ordered by descending score. While the block exceeds the
 * character budget the lowest-scoring chunk is dropped; a lone chunk that
 * is still too large is truncated at a code point boundary. When the
 * budget cannot even hold that chunk's source header, nothing is kept.
 */

import { codePointBoundary } from '../utils/text.js';
import type { AssembledContext, RetrievedChunk } from './types.js';

export const CHUNK_SEPARATOR = '\n---\n';

export function sourceHeader(source: string): string {
  return `[Source: ${source}]\n`;
}

export function renderChunk(chunk: RetrievedChunk): string {
  return sourceHeader(chunk.source) + chunk.text;
}

export function renderContext(chunks: readonly RetrievedChunk[]): string {
  return chunks.map(renderChunk).join(CHUNK_SEPARATOR);
}

export function assembleContext(chunks: readonly RetrievedChunk[], maxChars: number): AssembledContext {
  // Array.prototype.sort is stable: equal scores keep retrieval order
  let kept = [...chunks].sort((a, b) => b.score - a.score);
  let text = renderContext(kept);

  while (kept.length > 1 && text.length > maxChars) {
    kept = kept.slice(0, -1);
    text = renderContext(kept);
  }

  const dropped = chunks.length - kept.length;
  const top = kept[0];

  if (kept.length === 1 && top !== undefined && text.length > maxChars) {
    const room = maxChars - sourceHeader(top.source).length;
    if (room < 1) {
      return { text: '', chunks: [], dropped: chunks.length, truncated: false };
    }
    const cut: RetrievedChunk = { ...top, text: top.text.slice(0, codePointBoundary(top.text, room)) };
    return { text: renderChunk(cut), chunks: [cut], dropped, truncated: true };
  }

  return { text, chunks: kept, dropped, truncated: false };
}
