/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings, then we validate with Zod for
 * type coercion ("5" -> 5), custom rules and readable error messages.
 */

import { z } from 'zod';
import { BackendKindSchema } from '../config/schema.js';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// SHARED
// ============================================================================

export const CollectionNameSchema = z
  .string()
  .min(1, 'Collection name cannot be empty')
  .max(100, 'Collection name too long (max 100 chars)')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Collection name can only contain letters, numbers, hyphens, and underscores');

function intInRange(label: string, min: number, max: number) {
  return z
    .string()
    .transform((val) => Number(val))
    .refine((val) => Number.isInteger(val) && val >= min && val <= max, {
      message: `${label} must be a whole number between ${min} and ${max}`,
    });
}

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
  backend: z
    .string()
    .transform((val) => val.toLowerCase())
    .pipe(BackendKindSchema)
    .optional(),
  baseUrl: z.string().url('--base-url must be a URL (e.g. http://localhost:11434)').optional(),
  model: z.string().min(1).optional(),
  embedModel: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
});

export type GlobalOptionsInput = z.input<typeof GlobalOptionsSchema>;
export type GlobalOptionsOutput = z.output<typeof GlobalOptionsSchema>;

// ============================================================================
// RUN COMMAND SCHEMA
// ============================================================================

export const RunOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
  topK: intInRange('top-k', 1, 100).optional(),
  allowNoContext: z.boolean().default(false),
});

export const QuestionSchema = z
  .string()
  .trim()
  .min(1, 'Question cannot be empty')
  .max(4000, 'Question too long (max 4000 chars)');

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
  extensions: z
    .string()
    .transform((val) =>
      val
        .split(',')
        .map((ext) => ext.trim().replace(/^\./, '').toLowerCase())
        .filter(Boolean)
    )
    .refine((exts) => exts.length > 0, { message: 'extensions must list at least one file type' })
    .refine((exts) => exts.every((ext) => /^[a-z0-9]+$/.test(ext)), {
      message: 'extensions must be alphanumeric (e.g., md,pdf,txt)',
    })
    .optional(),
});

// ============================================================================
// SERVE COMMAND SCHEMA
// ============================================================================

export const ServeOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
  port: intInRange('port', 1, 65535).optional(),
  host: z.string().min(1).optional(),
});

// ============================================================================
// TRANSFER COMMAND SCHEMA
// ============================================================================

export const TransferOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```typescript
 * const options = parseInput(IngestOptionsSchema, rawOptions, 'ingest options');
 * ```
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError(`Invalid ${label}`, issues);
}
