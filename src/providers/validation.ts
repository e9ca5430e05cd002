/**
 * Backend Endpoint Validators
 *
 * Validates base URLs and API key presence without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 */

import { z } from 'zod';
import type { BackendKind } from './types.js';

/**
 * Result of validating a backend endpoint.
 * Discriminated union for type-safe error handling.
 */
export type ValidationResult = { valid: true } | { valid: false; error: string };

/**
 * Base URL: http(s) only, no query string (paths are appended to it)
 */
export const BaseUrlSchema = z
  .string()
  .min(1, 'Base URL cannot be empty')
  .url('Base URL must be a valid URL (e.g., http://localhost:11434)')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Base URL must use http:// or https://'
  )
  .refine((url) => !url.includes('?'), 'Base URL must not contain a query string');

export function validateBaseUrl(kind: BackendKind, url: string): ValidationResult {
  const result = BaseUrlSchema.safeParse(url);
  if (!result.success) {
    return {
      valid: false,
      error: `Invalid ${kind} base URL '${url}': ${result.error.issues[0]?.message ?? 'invalid URL'}`,
    };
  }
  return { valid: true };
}

/**
 * The OpenAI backend needs a key; everything else runs without one.
 */
export function validateApiKey(kind: BackendKind, apiKey: string | undefined): ValidationResult {
  if (kind === 'openai' && !apiKey?.trim()) {
    return { valid: false, error: 'OPENAI_API_KEY is not set' };
  }
  return { valid: true };
}
