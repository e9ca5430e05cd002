/**
 * Service Commands
 *
 *   know up      - Start the vector and parsing engines and wait until healthy
 *   know down    - Stop them
 *   know clean   - Delete a collection and all its points
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { createRuntime } from '../runtime.js';
import { CollectionNameSchema, parseInput } from '../validation.js';
import { StoreError } from '../../errors/index.js';
import { SERVICE_NAMES } from '../../services/types.js';

export function createUpCommand(getContext: () => CommandContext): Command {
  return new Command('up')
    .description('Start the vector and parsing engines')
    .action(async () => {
      const ctx = getContext();
      const runtime = createRuntime(ctx);

      try {
        const { supervisor } = runtime;
        for (const service of SERVICE_NAMES) {
          ctx.debug(`Ensuring ${service} is running`);
          await supervisor.ensureRunning(service, runtime.signal);
        }

        const services = await supervisor.status();
        if (ctx.options.json) {
          console.log(JSON.stringify({ services }, null, 2));
          return;
        }
        for (const service of services) {
          ctx.log(`${chalk.green('✓')} ${service.name} ${chalk.dim(service.url)}`);
        }
      } finally {
        runtime.close();
      }
    });
}

export function createDownCommand(getContext: () => CommandContext): Command {
  return new Command('down')
    .description('Stop the vector and parsing engines')
    .action(async () => {
      const ctx = getContext();
      const runtime = createRuntime(ctx);

      try {
        await runtime.supervisor.down();
        if (ctx.options.json) {
          console.log(JSON.stringify({ stopped: [...SERVICE_NAMES] }));
        } else {
          ctx.log(`${chalk.green('✓')} Services stopped`);
        }
      } finally {
        runtime.close();
      }
    });
}

/**
 * Deleting what is already gone counts as success. An unreachable vector
 * engine does not: nothing can be said about what it stores.
 */
export function createCleanCommand(getContext: () => CommandContext): Command {
  return new Command('clean')
    .argument('[collection]', 'Collection to delete (default: the configured collection)')
    .description('Delete a collection and all of its points')
    .action(async (name: string | undefined) => {
      const ctx = getContext();
      const collection = name === undefined ? undefined : parseInput(CollectionNameSchema, name, 'collection name');
      const runtime = createRuntime(ctx, { collection });
      const target = runtime.settings.collection;

      try {
        if (!(await runtime.store.ping())) {
          throw new StoreError(
            'unavailable',
            `Vector engine is not reachable at ${runtime.settings.services.qdrantUrl}; collection '${target}' was not deleted`,
            { hint: 'Start it with: know up' }
          );
        }
        const deleted = await runtime.store.deleteCollection(target);

        if (ctx.options.json) {
          console.log(JSON.stringify({ collection: target, deleted }));
        } else if (deleted) {
          ctx.log(`${chalk.green('✓')} Deleted collection ${chalk.cyan(target)}`);
        } else {
          ctx.log(`Collection ${chalk.cyan(target)} does not exist; nothing to delete`);
        }
      } finally {
        runtime.close();
      }
    });
}
