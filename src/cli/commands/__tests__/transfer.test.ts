/**
 * Tests for push and pull commands
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { createPullCommand, createPushCommand } from '../transfer.js';
import type { CommandContext } from '../../types.js';
import { createRuntime } from '../../runtime.js';
import { TransferError, ValidationError } from '../../../errors/index.js';
import {
  createTestRuntime,
  InMemoryRegistry,
  InMemoryVectorStore,
  seedCollection,
} from '../../../test-utils/index.js';

vi.mock('../../runtime.js', () => ({
  createRuntime: vi.fn(),
}));

const IMAGE = 'registry.example.com/team/handbook:v1';

describe('push and pull commands', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: MockInstance<typeof console.log>;
  let registry: InMemoryRegistry;
  let source: InMemoryVectorStore;

  beforeEach(async () => {
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    registry = new InMemoryRegistry();
    source = new InMemoryVectorStore();
    await seedCollection(source, 'handbook', [
      ['/kb/a.txt', 'Refunds are processed within 14 days.'],
      ['/kb/b.txt', 'Shipping takes 3-5 days.'],
    ]);
    vi.mocked(createRuntime).mockReturnValue(createTestRuntime({ collection: 'handbook', store: source, registry }));

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function exec(command: Command, ...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(command);
    program.exitOverride();
    await program.parseAsync(['node', 'test', command.name(), ...args]);
  }

  const push = (...args: string[]) => exec(createPushCommand(() => mockContext), ...args);
  const pull = (...args: string[]) => exec(createPullCommand(() => mockContext), ...args);

  describe('command structure', () => {
    it('registers push and pull with an image argument', () => {
      for (const cmd of [createPushCommand(() => mockContext), createPullCommand(() => mockContext)]) {
        expect(cmd.registeredArguments[0]?.name()).toBe('image');
        expect(cmd.options.map((opt) => opt.long)).toEqual(['--collection']);
      }
      expect(createPushCommand(() => mockContext).name()).toBe('push');
      expect(createPullCommand(() => mockContext).name()).toBe('pull');
    });
  });

  describe('push', () => {
    it('publishes the collection under the image reference', async () => {
      await push(IMAGE, '--collection', 'handbook');

      expect(registry.images.get(IMAGE)?.labels).toEqual({
        collection: 'handbook',
        embeddingModel: 'fake-embed',
        dimension: 9,
      });
      expect(logOutput[0]).toContain('Pushed');
      expect(logOutput[0]).toContain('handbook');
      expect(logOutput[0]).toContain(IMAGE);
      expect(logOutput[1]).toContain('2 points, 9d, fake-embed');
    });

    it('prints the result as JSON', async () => {
      mockContext.options.json = true;

      await push(IMAGE);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toMatchObject({
        direction: 'push',
        collection: 'handbook',
        imageRef: IMAGE,
        points: 2,
        dimension: 9,
        embeddingModel: 'fake-embed',
      });
    });

    it('refuses an empty collection', async () => {
      await source.createCollection('empty', 9);
      vi.mocked(createRuntime).mockReturnValue(createTestRuntime({ collection: 'empty', store: source, registry }));

      await expect(push(IMAGE, '--collection', 'empty')).rejects.toThrow(TransferError);
      expect(registry.images.size).toBe(0);
    });

    it('rejects an image reference without a repository path', async () => {
      await expect(push('handbook')).rejects.toThrow(ValidationError);
    });
  });

  describe('pull', () => {
    it('imports a pushed collection under another name', async () => {
      await push(IMAGE);

      const target = new InMemoryVectorStore();
      vi.mocked(createRuntime).mockReturnValue(createTestRuntime({ collection: 'copy', store: target, registry }));
      logOutput = [];

      await pull(IMAGE, '--collection', 'copy');

      expect((await target.getCollection('copy'))?.pointCount).toBe(2);
      expect(target.pointsFor('copy', '/kb/a.txt')[0]?.payload.collection).toBe('copy');
      expect(logOutput[0]).toContain('Pulled');
      expect(logOutput[0]).toContain('copy');
    });

    it('fails when the image does not exist', async () => {
      await expect(pull('registry.example.com/team/missing:v1')).rejects.toThrow(TransferError);
    });
  });
});
