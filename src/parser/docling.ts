/**
 * Document Parsing Client
 *
 * Plain-text formats are decoded locally. Everything else is converted to
 * Markdown by docling-serve:
 *
 *   POST {docling}/v1/convert/file   multipart: files, to_formats=md, from_formats
 *     -> { document: { md_content } }
 *
 * The parsing engine is only started (via beforeRemoteParse) when a file
 * actually needs it.
 */

import * as path from 'node:path';
import axios, { type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { z } from 'zod';
import { OperationCancelledError, ParseError } from '../errors/index.js';
import { createHttpClient, describeHttpError, isTransientHttpError } from '../utils/http.js';
import { withRetry } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SourceDocument {
  /** Absolute path, used for the format and in error messages */
  path: string;
  content: Buffer;
}

export interface DocumentParser {
  /**
   * Convert a document to plain text / Markdown.
   *
   * @throws ParseError when the document cannot be converted
   */
  parse(document: SourceDocument, signal?: AbortSignal): Promise<string>;
}

export interface DoclingParserOptions {
  url: string;
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
  logger?: Logger;
  /** Runs before the first remote conversion (e.g. start the container) */
  beforeRemoteParse?: (signal?: AbortSignal) => Promise<unknown>;
  /** @internal Inject an HTTP client for testing */
  http?: AxiosInstance;
}

// ============================================================================
// FORMATS
// ============================================================================

/** Read as UTF-8 without conversion */
export const PLAIN_TEXT_EXTENSIONS: ReadonlySet<string> = new Set([
  'md',
  'markdown',
  'txt',
  'text',
  'rst',
  'csv',
  'json',
  'yaml',
  'yml',
  'log',
]);

/** Extension -> docling input format */
const DOCLING_FORMATS: Readonly<Record<string, string>> = {
  pdf: 'pdf',
  docx: 'docx',
  pptx: 'pptx',
  xlsx: 'xlsx',
  html: 'html',
  htm: 'html',
  xhtml: 'html',
  adoc: 'asciidoc',
  png: 'image',
  jpg: 'image',
  jpeg: 'image',
  tiff: 'image',
};

const ConvertResponseSchema = z.object({
  document: z.object({
    md_content: z.string().nullable(),
  }),
});

export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

export function isPlainText(filePath: string): boolean {
  return PLAIN_TEXT_EXTENSIONS.has(extensionOf(filePath));
}

function decodeUtf8(content: Buffer): string {
  const text = content.toString('utf-8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

// ============================================================================
// PARSER
// ============================================================================

export class DoclingParser implements DocumentParser {
  private readonly http: AxiosInstance;

  constructor(private readonly options: DoclingParserOptions) {
    this.http = options.http ?? createHttpClient({ baseURL: options.url, timeoutMs: options.timeoutMs });
  }

  async parse(document: SourceDocument, signal?: AbortSignal): Promise<string> {
    if (isPlainText(document.path)) {
      return decodeUtf8(document.content);
    }

    // Startup failures are not per-file problems: let them propagate
    await this.options.beforeRemoteParse?.(signal);

    const format = DOCLING_FORMATS[extensionOf(document.path)];
    const fileName = path.basename(document.path);
    this.options.logger?.debug?.(`Converting ${fileName} with docling${format ? ` (${format})` : ''}`);

    let data: unknown;
    try {
      data = await withRetry(
        async () => {
          // A form body is a one-shot stream: rebuild it for every attempt
          const form = new FormData();
          form.append('files', document.content, {
            filename: fileName,
            contentType: 'application/octet-stream',
          });
          form.append('to_formats', 'md');
          if (format) {
            form.append('from_formats', format);
          }

          const response = await this.http.post<unknown>('/v1/convert/file', form, {
            headers: form.getHeaders(),
            signal,
          });
          return response.data;
        },
        {
          retries: this.options.retries,
          initialDelayMs: this.options.retryBackoffMs,
          isRetryable: isTransientHttpError,
          signal,
          onRetry: (_error, attempt, delayMs) =>
            this.options.logger?.debug?.(`docling ${fileName}: retry ${attempt} in ${delayMs}ms`),
        }
      );
    } catch (error) {
      if (error instanceof OperationCancelledError || axios.isCancel(error) || signal?.aborted) {
        throw new OperationCancelledError('Parsing');
      }
      throw new ParseError(document.path, describeHttpError(error), { cause: error });
    }

    const parsed = ConvertResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ParseError(document.path, 'unexpected response from docling (missing document.md_content)');
    }
    return parsed.data.document.md_content ?? '';
  }
}
