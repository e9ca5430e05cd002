/**
 * Status Command
 *
 * Shows service health, the resolved backend and the collections:
 *   know status         - Human-readable report
 *   know status --json  - Output as JSON
 *
 * Never starts a service.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { configPathFor, createRuntime } from '../runtime.js';
import { getConfigPath } from '../../config/paths.js';
import { BackendUnavailableError } from '../../errors/index.js';
import { describeBackend } from '../../providers/resolver.js';
import type { ServiceStatus } from '../../services/types.js';
import { getCollectionModel } from '../../store/collections.js';
import type { VectorStore } from '../../store/types.js';

export interface CollectionSummary {
  name: string;
  points: number;
  dimension: number;
  embeddingModel: string | null;
}

export interface StatusJSON {
  services: ServiceStatus[];
  backend: Record<string, string> | { error: string };
  collection: string;
  collections: CollectionSummary[] | null;
  config: { path: string };
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(`${homeDir}/`)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

async function summarizeCollections(store: VectorStore): Promise<CollectionSummary[]> {
  const names = await store.listCollections();
  const summaries: CollectionSummary[] = [];

  for (const name of [...names].sort()) {
    const info = await store.getCollection(name);
    if (info === null) continue;
    summaries.push({
      name,
      points: info.pointCount,
      dimension: info.dimension,
      embeddingModel: await getCollectionModel(store, name),
    });
  }
  return summaries;
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show service health, backend and collections')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Fetching system status...');

      const runtime = createRuntime(ctx);
      try {
        const services = await runtime.supervisor.status();
        const qdrantUp = services.some((s) => s.name === 'qdrant' && s.reachable);

        let backend: StatusJSON['backend'];
        try {
          backend = describeBackend((await runtime.backend()).config);
        } catch (error) {
          if (!(error instanceof BackendUnavailableError)) throw error;
          backend = { error: error.message };
        }

        const collections = qdrantUp ? await summarizeCollections(runtime.store) : null;
        const configPath = configPathFor(ctx) ?? getConfigPath();

        if (ctx.options.json) {
          const output: StatusJSON = {
            services,
            backend,
            collection: runtime.settings.collection,
            collections,
            config: { path: configPath },
          };
          console.log(JSON.stringify(output, null, 2));
          return;
        }

        const lines: string[] = [];
        lines.push(chalk.bold('know Status'));
        lines.push(chalk.dim('─'.repeat(35)));

        for (const service of services) {
          const mark = service.reachable ? chalk.green('●') : chalk.red('○');
          const state = service.reachable ? 'up' : 'down';
          lines.push(`${mark} ${chalk.cyan(service.name.padEnd(10))} ${state.padEnd(5)} ${chalk.dim(service.url)}`);
        }

        lines.push('');
        if ('error' in backend) {
          lines.push(`${chalk.cyan('Backend:')}      ${chalk.red('unavailable')}`);
          lines.push(chalk.dim(`  ${backend.error}`));
        } else {
          lines.push(`${chalk.cyan('Backend:')}      ${backend.label} (${backend.baseUrl})`);
          lines.push(`${chalk.cyan('Generation:')}   ${backend.generationModel}`);
          lines.push(`${chalk.cyan('Embeddings:')}   ${backend.embeddingModel}`);
        }

        lines.push('');
        lines.push(`${chalk.cyan('Collection:')}   ${runtime.settings.collection}`);
        if (collections === null) {
          lines.push(chalk.dim('  Vector engine is not running. Run: know up'));
        } else if (collections.length === 0) {
          lines.push(chalk.yellow('  No collections yet.'));
          lines.push(`  Run ${chalk.cyan('know ingest <path>')} to get started.`);
        } else {
          for (const c of collections) {
            const model = c.embeddingModel ?? 'empty';
            lines.push(
              `  ${c.name.padEnd(20)} ${c.points.toLocaleString().padStart(8)} points  ${chalk.dim(`${c.dimension}d, ${model}`)}`
            );
          }
        }

        lines.push('');
        lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

        ctx.log(lines.join('\n'));
      } finally {
        runtime.close();
      }
    });
}
