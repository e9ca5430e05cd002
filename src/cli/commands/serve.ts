/**
 * Serve Command
 *
 * Expose a collection through an OpenAI-compatible API:
 *   know serve
 *   know serve --port 8080 --host 0.0.0.0 --collection handbook
 *
 * Runs until Ctrl+C.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { createRuntime } from '../runtime.js';
import { parseInput, ServeOptionsSchema } from '../validation.js';
import { RagEngine } from '../../rag/engine.js';
import { close, createApp, listen } from '../../server/index.js';

interface ServeCommandOptions {
  port?: string;
  host?: string;
  collection?: string;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

export function createServeCommand(getContext: () => CommandContext): Command {
  return new Command('serve')
    .description('Serve a collection over an OpenAI-compatible HTTP API')
    .option('-p, --port <number>', 'Port to listen on')
    .option('--host <host>', 'Interface to bind')
    .option('-c, --collection <name>', 'Collection to answer from')
    .action(async (cmdOptions: ServeCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(ServeOptionsSchema, cmdOptions, 'serve options');

      const runtime = createRuntime(ctx, { collection: options.collection });
      const { settings } = runtime;
      const host = options.host ?? settings.server.host;
      const port = options.port ?? settings.server.port;

      try {
        const backend = await runtime.backend();
        const store = await runtime.openStore();
        const engine = new RagEngine({ store, backend, logger: ctx }, { ...settings.rag, collection: settings.collection });

        const app = createApp({ engine, backend: backend.config, logger: ctx });
        const server = await listen(app, host, port);
        const url = `http://${host}:${port}`;

        if (ctx.options.json) {
          console.log(JSON.stringify({ url, collection: settings.collection, backend: backend.config.kind }));
        } else {
          ctx.log(`${chalk.green('✓')} Serving ${chalk.cyan(settings.collection)} at ${chalk.bold(url)}`);
          ctx.log(chalk.dim(`  POST ${url}/v1/chat/completions  (model: any)`));
          ctx.log(chalk.dim('  Press Ctrl+C to stop'));
        }

        await waitForAbort(runtime.signal);
        await close(server);
        ctx.log('Server stopped');
      } finally {
        runtime.close();
      }
    });
}
