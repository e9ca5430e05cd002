import type { ChatMessage } from '../providers/types.js';

export const CONTEXT_INSTRUCTIONS =
  "You are a helpful assistant. Answer the user's question using only the context provided below. " +
  "If the context doesn't contain relevant information, say so.";

export const NO_CONTEXT_INSTRUCTIONS =
  'You are a helpful assistant. No documents in the knowledge base matched this question. ' +
  'Answer from general knowledge and state that no sources were found.';

/**
 * Messages for a grounded answer: instructions and context in the system
 * message, the question alone as the user message.
 */
export function buildMessages(question: string, context: string): ChatMessage[] {
  return [
    { role: 'system', content: `${CONTEXT_INSTRUCTIONS}\n\nContext:\n${context}` },
    { role: 'user', content: question },
  ];
}

export function buildNoContextMessages(question: string): ChatMessage[] {
  return [
    { role: 'system', content: NO_CONTEXT_INSTRUCTIONS },
    { role: 'user', content: question },
  ];
}
