/**
 * Artifact Registry
 *
 * Collections travel as single-layer OCI images built FROM scratch; the
 * archive sits at /know/collection.json.gz and a few labels describe it.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { OperationCancelledError, TransferError, ValidationError } from '../errors/index.js';
import { defaultExecFile, describeExecError, type ExecFileFn } from '../utils/exec.js';
import type { Logger } from '../utils/logger.js';
import { ARCHIVE_FILE_NAME } from './archive.js';

export const IMAGE_ARCHIVE_DIR = '/know';

/** Labels attached to a pushed image */
export interface ArchiveLabels {
  collection: string;
  embeddingModel: string;
  dimension: number;
}

/**
 * Narrow capability interface over the registry. Tests swap in an in-memory map.
 */
export interface ArtifactRegistry {
  push(archive: Buffer, imageRef: string, labels: ArchiveLabels, signal?: AbortSignal): Promise<void>;
  pull(imageRef: string, signal?: AbortSignal): Promise<Buffer>;
}

// ============================================================================
// IMAGE REFERENCES
// ============================================================================

const PATH_COMPONENT = '[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*';
const IMAGE_REF_PATTERN = new RegExp(
  `^(?:[a-zA-Z0-9.-]+(?::[0-9]+)?/)?${PATH_COMPONENT}(?:/${PATH_COMPONENT})*(?::[A-Za-z0-9_][A-Za-z0-9_.-]{0,127})?$`
);

const ImageRefSchema = z
  .string()
  .regex(IMAGE_REF_PATTERN, 'not a valid image reference')
  .refine((ref) => ref.replace(/:[^/]*$/, '').includes('/'), {
    message: 'must include a repository path (user/name[:tag])',
  });

/**
 * @throws ValidationError when the reference is malformed or has no repository path
 */
export function validateImageRef(imageRef: string): string {
  const result = ImageRefSchema.safeParse(imageRef.trim());
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new ValidationError(`Invalid image reference '${imageRef}'`, issues);
  }
  return result.data;
}

export function buildDockerfile(labels: ArchiveLabels): string {
  return [
    'FROM scratch',
    `COPY ${ARCHIVE_FILE_NAME} ${IMAGE_ARCHIVE_DIR}/${ARCHIVE_FILE_NAME}`,
    `LABEL know.collection=${JSON.stringify(labels.collection)} ` +
      `know.embedding_model=${JSON.stringify(labels.embeddingModel)} ` +
      `know.dimension="${labels.dimension}"`,
    '',
  ].join('\n');
}

// ============================================================================
// DOCKER IMPLEMENTATION
// ============================================================================

export interface DockerImageRegistryOptions {
  /** Per docker invocation (pushes can be slow) */
  timeoutMs?: number;
  logger?: Logger;
  /** @internal Inject a subprocess runner for testing */
  exec?: ExecFileFn;
  /** @internal Scratch directory root for testing */
  tmpDir?: string;
}

export class DockerImageRegistry implements ArtifactRegistry {
  private readonly exec: ExecFileFn;
  private readonly timeoutMs: number;
  private readonly tmpDir: string;

  constructor(private readonly options: DockerImageRegistryOptions = {}) {
    this.exec = options.exec ?? defaultExecFile;
    this.timeoutMs = options.timeoutMs ?? 600_000;
    this.tmpDir = options.tmpDir ?? os.tmpdir();
  }

  async push(
    archive: Buffer,
    imageRef: string,
    labels: ArchiveLabels,
    signal?: AbortSignal
  ): Promise<void> {
    const workDir = await fs.mkdtemp(path.join(this.tmpDir, 'know-push-'));
    try {
      await fs.writeFile(path.join(workDir, ARCHIVE_FILE_NAME), archive);
      await fs.writeFile(path.join(workDir, 'Dockerfile'), buildDockerfile(labels), 'utf-8');

      await this.docker(['build', '-t', imageRef, workDir], signal);
      await this.docker(['push', imageRef], signal);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  async pull(imageRef: string, signal?: AbortSignal): Promise<Buffer> {
    await this.docker(['pull', imageRef], signal);

    const workDir = await fs.mkdtemp(path.join(this.tmpDir, 'know-pull-'));
    const container = `know-pull-${uuidv4().slice(0, 8)}`;
    try {
      await this.docker(['create', '--name', container, imageRef, 'noop'], signal);
      try {
        const target = path.join(workDir, ARCHIVE_FILE_NAME);
        await this.docker(['cp', `${container}:${IMAGE_ARCHIVE_DIR}/${ARCHIVE_FILE_NAME}`, target], signal);
        return await fs.readFile(target);
      } finally {
        await this.removeContainer(container);
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  /** Cleanup runs even after an abort, so it takes no signal */
  private async removeContainer(container: string): Promise<void> {
    try {
      await this.exec('docker', ['rm', '-f', container], { timeout: this.timeoutMs });
    } catch (error) {
      this.options.logger?.warn(`Could not remove container ${container}: ${describeExecError('docker', error)}`);
    }
  }

  private async docker(args: string[], signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new OperationCancelledError('Transfer');
    }
    this.options.logger?.debug?.(`docker ${args.join(' ')}`);
    try {
      await this.exec('docker', args, { timeout: this.timeoutMs, signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Transfer');
      }
      throw new TransferError(`docker ${args[0] ?? ''} failed: ${describeExecError('docker', error)}`, undefined, {
        cause: error,
      });
    }
  }
}
