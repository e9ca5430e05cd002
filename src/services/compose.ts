/**
 * Docker Compose Runtime
 *
 * Starts and stops the service containers with the docker CLI:
 *
 *   docker compose -f <file> up -d <service>
 *   docker compose -f <file> down
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { FileNotFoundError } from '../errors/index.js';
import { defaultExecFile, describeExecError, type ExecFileFn } from '../utils/exec.js';
import type { Logger } from '../utils/logger.js';
import type { ContainerRuntime, ServiceName } from './types.js';

const COMPOSE_FILE_NAME = 'docker-compose.yml';

/** docker-compose.yml shipped at the package root */
export const PACKAGED_COMPOSE_FILE = fileURLToPath(new URL(`../../${COMPOSE_FILE_NAME}`, import.meta.url));

/** Image pulls on first start can take a while */
const DEFAULT_COMPOSE_TIMEOUT_MS = 300_000;

/**
 * Pick the compose file: explicit setting, then ./docker-compose.yml, then
 * the packaged one.
 *
 * @throws FileNotFoundError when an explicit file does not exist
 */
export function resolveComposeFile(explicit?: string, cwd = process.cwd()): string {
  if (explicit !== undefined) {
    const resolved = path.resolve(cwd, explicit);
    if (!fs.existsSync(resolved)) {
      throw new FileNotFoundError(resolved);
    }
    return resolved;
  }

  const local = path.join(cwd, COMPOSE_FILE_NAME);
  return fs.existsSync(local) ? local : PACKAGED_COMPOSE_FILE;
}

export interface DockerComposeRuntimeOptions {
  composeFile: string;
  timeoutMs?: number;
  logger?: Logger;
  /** @internal Inject for testing */
  exec?: ExecFileFn;
}

export class DockerComposeRuntime implements ContainerRuntime {
  private readonly exec: ExecFileFn;
  private readonly timeoutMs: number;

  constructor(private readonly options: DockerComposeRuntimeOptions) {
    this.exec = options.exec ?? defaultExecFile;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMPOSE_TIMEOUT_MS;
  }

  async up(service: ServiceName, signal?: AbortSignal): Promise<void> {
    await this.compose(['up', '-d', service], signal);
  }

  async down(): Promise<void> {
    await this.compose(['down']);
  }

  private async compose(args: string[], signal?: AbortSignal): Promise<void> {
    const fullArgs = ['compose', '-f', this.options.composeFile, ...args];
    this.options.logger?.debug?.(`Running: docker ${fullArgs.join(' ')}`);

    try {
      await this.exec('docker', fullArgs, { timeout: this.timeoutMs, signal });
    } catch (error) {
      throw new Error(`docker compose ${args.join(' ')} failed: ${describeExecError('docker', error)}`, {
        cause: error,
      });
    }
  }
}
