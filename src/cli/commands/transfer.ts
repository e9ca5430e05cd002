/**
 * Push / Pull Commands
 *
 * Share a collection as an OCI image:
 *   know push registry.example.com/team/handbook:v1
 *   know pull registry.example.com/team/handbook:v1 --collection handbook
 *
 * Both need a local Docker daemon and, for private registries, `docker login`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { CommandContext } from '../types.js';
import { createRuntime } from '../runtime.js';
import { parseInput, TransferOptionsSchema } from '../validation.js';
import { pullCollection, pushCollection, type TransferResult } from '../../transfer/transfer.js';

interface TransferCommandOptions {
  collection?: string;
}

type Direction = 'push' | 'pull';

function startSpinner(ctx: CommandContext, text: string): Ora | null {
  return !ctx.options.json && process.stdout.isTTY ? ora({ text, discardStdin: false }).start() : null;
}

function displayResult(ctx: CommandContext, direction: Direction, result: TransferResult): void {
  if (ctx.options.json) {
    console.log(JSON.stringify({ direction, ...result }, null, 2));
    return;
  }

  const verb = direction === 'push' ? 'Pushed' : 'Pulled';
  const arrow = direction === 'push' ? '->' : '<-';
  ctx.log(
    `${chalk.green('✓')} ${verb} ${chalk.cyan(result.collection)} ${arrow} ${chalk.bold(result.imageRef)}`
  );
  ctx.log(
    chalk.dim(
      `  ${result.points.toLocaleString()} points, ${result.dimension}d, ${result.embeddingModel}, ${(result.bytes / 1024).toFixed(1)} KB`
    )
  );
}

function createTransferCommand(direction: Direction, getContext: () => CommandContext): Command {
  const description =
    direction === 'push'
      ? 'Publish a collection to a container registry'
      : 'Import a collection from a container registry';

  return new Command(direction)
    .argument('<image>', 'Image reference (e.g. registry.example.com/team/handbook:v1)')
    .description(description)
    .option('-c, --collection <name>', direction === 'push' ? 'Collection to publish' : 'Collection to import into')
    .action(async (image: string, cmdOptions: TransferCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(TransferOptionsSchema, cmdOptions, `${direction} options`);

      const runtime = createRuntime(ctx, { collection: options.collection });
      const collection = runtime.settings.collection;

      try {
        const store = await runtime.openStore();
        const deps = { store, registry: runtime.registry(), logger: ctx };

        const spinner = startSpinner(
          ctx,
          direction === 'push' ? `Exporting ${collection}...` : `Pulling ${image}...`
        );
        const onProgress = (done: number, total?: number): void => {
          if (spinner) spinner.text = `${direction === 'push' ? 'Exporting' : 'Importing'} ${done}/${total ?? '?'} points`;
        };

        let result: TransferResult;
        try {
          result =
            direction === 'push'
              ? await pushCollection(deps, collection, image, { signal: runtime.signal, onProgress })
              : await pullCollection(deps, image, collection, { signal: runtime.signal, onProgress });
        } catch (error) {
          spinner?.fail(`${direction === 'push' ? 'Push' : 'Pull'} failed`);
          throw error;
        }
        spinner?.stop();

        displayResult(ctx, direction, result);
      } finally {
        runtime.close();
      }
    });
}

export function createPushCommand(getContext: () => CommandContext): Command {
  return createTransferCommand('push', getContext);
}

export function createPullCommand(getContext: () => CommandContext): Command {
  return createTransferCommand('pull', getContext);
}
