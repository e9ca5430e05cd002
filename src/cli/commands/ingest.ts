/**
 * Ingest Command
 *
 * Adds a file or directory to a collection:
 *   know ingest ./docs
 *   know ingest ./docs --extensions md,pdf --collection handbook
 *   know ingest ./docs --json       NDJSON progress events
 *   know ingest ./docs --verbose    One line per file
 *
 * Unchanged files are skipped, edited files replace their old chunks.
 * Files that fail to parse or embed are reported and the run exits 1.
 */

import { Command } from 'commander';
import { relative, resolve } from 'node:path';
import type { CommandContext } from '../types.js';
import { createRuntime } from '../runtime.js';
import { IngestOptionsSchema, parseInput } from '../validation.js';
import { createProgressReporter } from '../utils/progress.js';
import { ingest } from '../../indexer/pipeline.js';

interface IngestCommandOptions {
  extensions?: string;
  collection?: string;
}

/**
 * Create the ingest command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<path>', 'File or directory to ingest')
    .description('Ingest documents into a collection')
    .option('-e, --extensions <list>', 'Comma-separated file extensions (e.g. md,txt,pdf)')
    .option('-c, --collection <name>', 'Target collection')
    .action(async (targetPath: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const options = parseInput(IngestOptionsSchema, cmdOptions, 'ingest options');
      const root = resolve(targetPath);

      const runtime = createRuntime(ctx, { collection: options.collection });
      const settings = runtime.settings;
      const extensions = options.extensions ?? settings.ingest.extensions;
      ctx.debug(`Extensions: ${extensions.join(', ')}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });
      const display = (file: string): string => relative(root, file) || file;

      try {
        const backend = await runtime.backend();
        const store = await runtime.openStore();

        reporter.startStage('scanning');
        const report = await ingest(
          {
            path: root,
            collection: settings.collection,
            settings: { ...settings.ingest, extensions },
            signal: runtime.signal,
            onScanComplete: (files) => {
              reporter.completeStage('scanning', files.length);
              reporter.startStage('ingesting', files.length);
            },
            onFileStart: (file, index) => reporter.updateProgress(index + 1, display(file.path)),
            onFileComplete: (file, outcome) => reporter.fileComplete(display(file.path), outcome),
            onWarning: (message, source) => reporter.warn(message, source && display(source)),
          },
          { store, backend, parser: runtime.parser(), logger: ctx }
        );
        reporter.completeStage('ingesting', report.filesProcessed + report.filesSkipped + report.filesFailed);
        reporter.showSummary(report);

        if (report.filesFailed > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        reporter.fail('Ingest aborted');
        throw error;
      } finally {
        runtime.close();
      }
    });
}
