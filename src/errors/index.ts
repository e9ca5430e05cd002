/**
 * Error handling module for the know CLI
 *
 * Usage:
 *   import { StoreError, handleError } from './errors/index.js';
 *
 *   throw new StoreError('dimension-mismatch', 'Query vector has 384 dimensions, collection has 768');
 */

// Error types
export {
  CLIError,
  ValidationError,
  ConfigError,
  FileNotFoundError,
  BackendUnavailableError,
  ServiceStartFailedError,
  StoreError,
  RetrievalFailedError,
  GenerationFailedError,
  TransferError,
  ParseError,
  EmbedError,
  OperationCancelledError,
  type BackendAttempt,
  type StoreErrorKind,
} from './types.js';

// Error handling utilities
export {
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorDetails,
  type ErrorReport,
} from './handler.js';
