/**
 * Retrieval & Generation Module
 *
 * @example
 * ```typescript
 * const engine = new RagEngine({ store, backend }, { ...settings.rag, collection: 'handbook' });
 * const answer = await engine.answer('How long do refunds take?');
 * console.log(answer.text);
 * console.log(formatCitations(answer.sources));
 * ```
 */

export { RagEngine, collectSources, type RagEngineConfig, type RagEngineDependencies, type Retrieval } from './engine.js';
export { assembleContext, renderChunk, renderContext, sourceHeader, CHUNK_SEPARATOR } from './assembler.js';
export { buildMessages, buildNoContextMessages, CONTEXT_INSTRUCTIONS, NO_CONTEXT_INSTRUCTIONS } from './prompt.js';
export { formatCitations, formatScore } from './citations.js';
export type { Answer, AnswerOptions, AnswerSource, AssembledContext, RetrievedChunk } from './types.js';
