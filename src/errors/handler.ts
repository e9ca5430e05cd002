/**
 * Error reporting for the know CLI
 *
 * Every failure is first reduced to an ErrorReport (category, message,
 * exit code, hint and the category's own fields), then rendered as
 * colored text for the terminal or as JSON for scripts.
 */

import chalk from 'chalk';
import {
  BackendUnavailableError,
  CLIError,
  ParseError,
  RetrievalFailedError,
  ServiceStartFailedError,
  StoreError,
} from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Render as JSON instead of text */
  json?: boolean;
}

/** Category-specific fields, e.g. the StoreError kind or the failed service */
export type ErrorDetails = Record<string, string | number>;

/**
 * A failure reduced to what the user (or a script) needs to see.
 * Also the JSON shape written to stderr under --json.
 */
export interface ErrorReport {
  category: string;
  error: string;
  code: number;
  hint?: string;
  details?: ErrorDetails;
  stack?: string;
}

// ============================================================================
// DESCRIBE
// ============================================================================

function detailsOf(error: CLIError): ErrorDetails | undefined {
  if (error instanceof StoreError) {
    return { kind: error.kind };
  }
  if (error instanceof ServiceStartFailedError) {
    return { service: error.service, attempts: error.attempts };
  }
  if (error instanceof BackendUnavailableError) {
    return error.attempts.length > 0 ? { tried: error.attempts.map((a) => a.backend).join(', ') } : undefined;
  }
  if (error instanceof ParseError) {
    return { file: error.filePath };
  }
  if (error instanceof RetrievalFailedError) {
    return { collection: error.collection };
  }
  return undefined;
}

/**
 * Reduce any thrown value to an ErrorReport. Exit code 1 for anything
 * that is not a CLIError.
 */
export function describeError(error: unknown, verbose = false): ErrorReport {
  if (error instanceof CLIError) {
    return {
      category: error.name,
      error: error.message,
      code: error.code,
      hint: error.hint,
      details: detailsOf(error),
      stack: verbose ? error.stack : undefined,
    };
  }

  if (error instanceof Error) {
    return {
      category: 'Error',
      error: error.message,
      code: 1,
      hint: verbose ? undefined : 'Run with --verbose for more details',
      stack: verbose ? error.stack : undefined,
    };
  }

  return { category: 'Error', error: String(error), code: 1 };
}

// ============================================================================
// RENDER
// ============================================================================

/**
 * Format an error for stderr: `<Category>: message`, the category's
 * details, then the hint.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const report = describeError(error, options.verbose ?? false);

  if (options.json) {
    return JSON.stringify(report, null, 2);
  }

  const lines = [chalk.red(`${report.category}: `) + report.error];

  for (const [key, value] of Object.entries(report.details ?? {})) {
    lines.push(chalk.dim(`  ${key}: `) + String(value));
  }
  if (report.hint) {
    lines.push(chalk.dim('Hint: ') + report.hint);
  }
  if (report.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(report.stack));
  }

  return lines.join('\n');
}

export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its category's code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for uncaughtException / unhandledRejection.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
