/**
 * OpenAI-compatible API
 *
 * A thin HTTP front end over the RAG engine so chat UIs that speak the
 * OpenAI chat-completions protocol can query a collection:
 *
 *   GET  /health
 *   GET  /v1/models
 *   POST /v1/chat/completions
 *
 * Each request runs its own `answer` call with its own AbortSignal; nothing
 * mutable is shared between requests.
 */

import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  BackendUnavailableError,
  EmbedError,
  GenerationFailedError,
  OperationCancelledError,
  RetrievalFailedError,
  ServiceStartFailedError,
  StoreError,
  ValidationError,
} from '../errors/index.js';
import type { BackendConfiguration } from '../providers/types.js';
import type { Answer, AnswerOptions } from '../rag/types.js';
import type { Logger } from '../utils/logger.js';

export const MODEL_ID = 'know-rag';

// ============================================================================
// TYPES
// ============================================================================

/** What the API needs from the engine (RagEngine satisfies it) */
export interface AnswerEngine {
  readonly collection: string;
  answer(question: string, options?: AnswerOptions): Promise<Answer>;
}

export interface ServerDependencies {
  engine: AnswerEngine;
  backend: BackendConfiguration;
  logger?: Logger;
  /** @internal Clock for testing */
  now?: () => Date;
}

const ContentPartSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

export const ChatCompletionRequestSchema = z.object({
  model: z.string().optional(),
  messages: z
    .array(
      z.object({
        role: z.string().min(1),
        content: z.union([z.string(), z.array(ContentPartSchema)]).nullable(),
      })
    )
    .min(1),
  stream: z.boolean().optional(),
  top_k: z.number().int().min(1).max(100).optional(),
});

export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;
type RequestMessage = ChatCompletionRequest['messages'][number];

export interface ApiErrorBody {
  error: { message: string; type: string; code: string };
}

export interface ErrorResponse {
  status: number;
  body: ApiErrorBody;
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

function errorBody(message: string, type: string, code: string): ApiErrorBody {
  return { error: { message, type, code } };
}

/** Shape of the errors express.json() passes to next() */
const BodyParserErrorSchema = z.object({ type: z.string(), status: z.number().int() });

/**
 * Map a failure to an HTTP status and an OpenAI-style error body.
 * Stacks never leave the process.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    const message = error.issues.length > 0 ? `${error.message}: ${error.issues.join('; ')}` : error.message;
    return { status: 400, body: errorBody(message, 'invalid_request_error', 'invalid_request') };
  }
  if (error instanceof RetrievalFailedError) {
    return { status: 404, body: errorBody(error.message, 'invalid_request_error', 'no_context') };
  }
  if (error instanceof StoreError) {
    switch (error.kind) {
      case 'not-found':
        return { status: 404, body: errorBody(error.message, 'invalid_request_error', 'collection_not_found') };
      case 'dimension-mismatch':
        return { status: 409, body: errorBody(error.message, 'invalid_request_error', 'dimension_mismatch') };
      case 'model-mismatch':
        return { status: 409, body: errorBody(error.message, 'invalid_request_error', 'model_mismatch') };
      case 'unavailable':
        return { status: 503, body: errorBody(error.message, 'server_error', 'store_unavailable') };
      case 'rejected':
        break;
    }
  }
  if (error instanceof EmbedError || error instanceof GenerationFailedError) {
    return { status: 502, body: errorBody(error.message, 'server_error', 'backend_error') };
  }
  if (error instanceof BackendUnavailableError || error instanceof ServiceStartFailedError) {
    return { status: 503, body: errorBody(error.message, 'server_error', 'service_unavailable') };
  }
  const bodyError = BodyParserErrorSchema.safeParse(error);
  if (bodyError.success && bodyError.data.type === 'entity.too.large') {
    return {
      status: 413,
      body: errorBody('Request body is too large', 'invalid_request_error', 'request_too_large'),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      status: 400,
      body: errorBody('Request body is not valid JSON', 'invalid_request_error', 'invalid_json'),
    };
  }
  return { status: 500, body: errorBody('Internal server error', 'server_error', 'internal_error') };
}

function sendError(res: Response, error: unknown, logger?: Logger): void {
  const { status, body } = toErrorResponse(error);
  if (status === 500) {
    logger?.warn(`Request failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  res.status(status).json(body);
}

// ============================================================================
// HANDLERS
// ============================================================================

function messageText(message: RequestMessage): string {
  const content = message.content;
  if (content === null) return '';
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' ? part.text ?? '' : ''))
    .join('');
}

/**
 * The question is the last user message; earlier turns are not used for retrieval.
 */
export function extractQuestion(messages: readonly RequestMessage[]): string | null {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'user') {
      return messageText(message);
    }
  }
  return null;
}

export function createHealthHandler(deps: ServerDependencies): RequestHandler {
  return (_req, res) => {
    res.json({
      status: 'ok',
      backend: deps.backend.kind,
      model: deps.backend.generationModel,
      collection: deps.engine.collection,
    });
  };
}

export const modelsHandler: RequestHandler = (_req, res) => {
  res.json({
    object: 'list',
    data: [{ id: MODEL_ID, object: 'model', owned_by: 'know' }],
  });
};

export function createChatCompletionHandler(
  deps: ServerDependencies
): (req: Request, res: Response) => Promise<void> {
  const now = deps.now ?? (() => new Date());

  return async (req, res) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const parsed = ChatCompletionRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(
          'Invalid chat completion request',
          parsed.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
        );
      }
      const body = parsed.data;
      if (body.stream === true) {
        throw new ValidationError('Streaming is not supported; send stream: false');
      }

      const question = extractQuestion(body.messages);
      if (question === null) {
        throw new ValidationError('No user message found');
      }

      const answer = await deps.engine.answer(question, {
        topK: body.top_k,
        signal: controller.signal,
      });

      res.json({
        id: `chatcmpl-${uuidv4()}`,
        object: 'chat.completion',
        created: Math.floor(now().getTime() / 1000),
        model: MODEL_ID,
        choices: [
          {
            index: 0,
            message: { role: 'assistant', content: answer.text },
            finish_reason: 'stop',
          },
        ],
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
        sources: answer.sources.map((s) => ({ source: s.source, score: s.score })),
        no_context: answer.noContext,
      });
    } catch (error) {
      if (error instanceof OperationCancelledError && controller.signal.aborted) {
        deps.logger?.debug?.('Client closed the connection; request cancelled');
        return;
      }
      sendError(res, error, deps.logger);
    }
  };
}

// ============================================================================
// APP
// ============================================================================

export function createApp(deps: ServerDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      deps.logger?.debug?.(`${req.method} ${req.path} ${res.statusCode} (${Date.now() - started}ms)`);
    });
    next();
  });

  const chat = createChatCompletionHandler(deps);

  app.get('/health', createHealthHandler(deps));
  app.get('/v1/models', modelsHandler);
  app.post('/v1/chat/completions', (req, res, next) => {
    chat(req, res).catch(next);
  });

  app.use((req, res) => {
    res
      .status(404)
      .json(errorBody(`Unknown route: ${req.method} ${req.path}`, 'invalid_request_error', 'not_found'));
  });

  // Four parameters mark this as express's error handler (body-parser failures land here)
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error, deps.logger);
  });

  return app;
}
