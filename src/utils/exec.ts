/**
 * Subprocess helpers for the docker CLI (compose and registry operations).
 */

import { execFile } from 'node:child_process';

export interface ExecOptions {
  timeout: number;
  maxBuffer?: number;
  cwd?: string;
  signal?: AbortSignal;
}

/**
 * Function signature for executing a subprocess.
 * Extracted as a type so tests can inject a fake.
 */
export type ExecFileFn = (
  cmd: string,
  args: string[],
  opts: ExecOptions
) => Promise<{ stdout: string; stderr: string }>;

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;

/** Default implementation wrapping child_process.execFile in a Promise */
export const defaultExecFile: ExecFileFn = (cmd, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(
      cmd,
      args,
      {
        timeout: opts.timeout,
        maxBuffer: opts.maxBuffer ?? DEFAULT_MAX_BUFFER,
        cwd: opts.cwd,
        signal: opts.signal,
      },
      (error, stdout, stderr) => {
        if (error) {
          // Attach stderr so describeExecError can read it
          Object.assign(error, { stderr });
          reject(error);
        } else {
          resolve({ stdout, stderr });
        }
      }
    );
  });

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Human-readable reason for a failed subprocess.
 */
export function describeExecError(cmd: string, error: unknown): string {
  if (isNodeError(error) && error.code === 'ENOENT') {
    return `${cmd} not found on PATH`;
  }
  if (error instanceof Error && 'killed' in error && error.killed === true) {
    return `${cmd} timed out`;
  }
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
    return error.stderr.trim().split('\n').slice(-3).join(' ');
  }
  return error instanceof Error ? error.message : String(error);
}
