/**
 * Citation Formatter
 *
 * Terminal rendering of answer sources:
 *
 * ```
 * [1] /docs/refunds.md (0.91)
 * [2] /docs/shipping.md (0.42)
 * ```
 */

import type { AnswerSource } from './types.js';

export function formatScore(score: number): string {
  return score.toFixed(2);
}

export function formatCitations(sources: readonly AnswerSource[], showScores = true): string {
  return sources
    .map((s, i) => (showScores ? `[${i + 1}] ${s.source} (${formatScore(s.score)})` : `[${i + 1}] ${s.source}`))
    .join('\n');
}
