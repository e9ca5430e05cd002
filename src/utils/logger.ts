/**
 * Logger Interface for Library Code
 *
 * Pipelines, clients and the supervisor accept a Logger via dependency
 * injection. The CLI passes its CommandContext (which satisfies Logger),
 * the server passes consoleLogger, tests pass silentLogger or a spy.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console logger. Both levels go to stderr so stdout stays clean for
 * answers and --json output.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.error(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Wrap a logger so every line carries a `[scope]` prefix.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const debug = logger.debug;
  return {
    warn: (message: string) => logger.warn(`[${scope}] ${message}`),
    debug: debug ? (message: string) => debug(`[${scope}] ${message}`) : undefined,
  };
}
