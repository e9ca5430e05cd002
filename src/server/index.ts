/**
 * API Server Module
 */

import type { Server } from 'node:http';
import type { Express } from 'express';

export {
  createApp,
  createChatCompletionHandler,
  createHealthHandler,
  modelsHandler,
  extractQuestion,
  toErrorResponse,
  ChatCompletionRequestSchema,
  MODEL_ID,
  type AnswerEngine,
  type ServerDependencies,
  type ChatCompletionRequest,
  type ApiErrorBody,
  type ErrorResponse,
} from './app.js';

/**
 * Listen on host:port; resolves once the socket is bound.
 */
export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

/** Stop accepting connections and wait for in-flight requests */
export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
