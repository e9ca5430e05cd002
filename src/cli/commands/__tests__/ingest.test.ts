/**
 * Tests for ingest command
 *
 * Tests cover:
 * - Command structure
 * - NDJSON progress events and the final report
 * - --extensions filtering
 * - Exit code 1 when a file fails
 * - Missing path and invalid options
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { createIngestCommand } from '../ingest.js';
import type { CommandContext } from '../../types.js';
import { createRuntime } from '../../runtime.js';
import type { ProgressEvent } from '../../utils/progress.js';
import { FileNotFoundError, ValidationError } from '../../../errors/index.js';
import type { IngestReport } from '../../../indexer/types.js';
import {
  createTestRuntime,
  FakeBackend,
  InMemoryVectorStore,
  type TestRuntime,
} from '../../../test-utils/index.js';

vi.mock('../../runtime.js', () => ({
  createRuntime: vi.fn(),
}));

describe('createIngestCommand', () => {
  let root: string;
  let mockContext: CommandContext;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let store: InMemoryVectorStore;
  let runtime: TestRuntime;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'know-cli-ingest-'));
    writeFileSync(join(root, 'refunds.txt'), 'Refunds are processed within 14 days.');
    writeFileSync(join(root, 'shipping.md'), '# Shipping\n\nShipping takes 3-5 days.');
    writeFileSync(join(root, 'notes.log'), 'not an ingested extension');

    mockContext = {
      options: { verbose: false, json: true },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    store = new InMemoryVectorStore();
    runtime = createTestRuntime({ store });
    vi.mocked(createRuntime).mockReturnValue(runtime);

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  async function ingestCmd(...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createIngestCommand(() => mockContext));
    program.exitOverride();
    await program.parseAsync(['node', 'test', 'ingest', ...args]);
  }

  function events(): ProgressEvent[] {
    return consoleLogSpy.mock.calls.map((call) => JSON.parse(String(call[0])) as ProgressEvent);
  }

  function finalReport(): IngestReport {
    const complete = events().find((e) => e.type === 'complete');
    return complete?.data['report'] as IngestReport;
  }

  describe('command structure', () => {
    it('creates command with a required path argument', () => {
      const cmd = createIngestCommand(() => mockContext);
      expect(cmd.name()).toBe('ingest');
      expect(cmd.registeredArguments[0]?.required).toBe(true);
    });

    it('has --extensions and --collection options', () => {
      const cmd = createIngestCommand(() => mockContext);
      expect(cmd.options.find((opt) => opt.long === '--extensions')?.short).toBe('-e');
      expect(cmd.options.find((opt) => opt.long === '--collection')?.short).toBe('-c');
    });
  });

  describe('ingesting a directory', () => {
    it('writes every matching file and reports it', async () => {
      await ingestCmd(root);

      expect(finalReport()).toMatchObject({
        collection: 'know',
        filesProcessed: 2,
        chunksWritten: 2,
        filesSkipped: 0,
        filesFailed: 0,
      });
      expect((await store.getCollection('know'))?.pointCount).toBe(2);
      expect(process.exitCode).toBeUndefined();
    });

    it('emits stage and per-file events', async () => {
      await ingestCmd(root);

      const types = events().map((e) => e.type);
      expect(types.slice(0, 3)).toEqual(['stage_start', 'stage_complete', 'stage_start']);
      expect(types.filter((t) => t === 'file_complete')).toHaveLength(2);
      expect(types.at(-1)).toBe('complete');

      const files = events()
        .filter((e) => e.type === 'file_complete')
        .map((e) => e.data['file']);
      expect(files.sort()).toEqual(['refunds.txt', 'shipping.md']);
    });

    it('skips unchanged files on a second run', async () => {
      await ingestCmd(root);
      consoleLogSpy.mockClear();

      await ingestCmd(root);

      expect(finalReport()).toMatchObject({ filesProcessed: 0, filesSkipped: 2, chunksWritten: 0 });
    });

    it('limits the walk to --extensions', async () => {
      await ingestCmd(root, '--extensions', 'md');

      expect(finalReport()).toMatchObject({ filesProcessed: 1 });
      expect(store.pointsFor('know', `${root}/refunds.txt`)).toHaveLength(0);
    });

    it('starts the vector engine first', async () => {
      await ingestCmd(root);
      expect(runtime.containers.upCalls).toEqual(['qdrant']);
    });
  });

  describe('failures', () => {
    it('sets exit code 1 when a file fails and keeps going', async () => {
      runtime = createTestRuntime({
        store,
        backend: new FakeBackend({ failEmbedWhen: (text) => text.includes('Shipping') }),
      });
      vi.mocked(createRuntime).mockReturnValue(runtime);

      await ingestCmd(root);

      const report = finalReport();
      expect(report.filesProcessed).toBe(1);
      expect(report.filesFailed).toBe(1);
      expect(report.failures[0]?.category).toBe('EmbedError');
      expect(process.exitCode).toBe(1);
    });

    it('throws FileNotFoundError for a missing path', async () => {
      await expect(ingestCmd(join(root, 'missing'))).rejects.toThrow(FileNotFoundError);
      expect(runtime.closed).toBe(true);
    });

    it('rejects non-alphanumeric extensions', async () => {
      await expect(ingestCmd(root, '--extensions', 'md,*.txt')).rejects.toThrow(ValidationError);
    });
  });
});
