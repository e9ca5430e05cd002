/**
 * Progress Reporter
 *
 * Progress display for `know ingest`. Output modes:
 * - Interactive: ora spinner with real-time updates
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: one line per stage for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) and long paths truncated.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { FileOutcome, IngestReport } from '../../indexer/types.js';

export type IngestStage = 'scanning' | 'ingesting';

const STAGE_LABELS: Record<IngestStage, string> = {
  scanning: 'Scanning',
  ingesting: 'Ingesting',
};

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-file output */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'file_complete'
  | 'warning'
  | 'error'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IngestStage;
  data: Record<string, unknown>;
}

/**
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 *
 * reporter.startStage('scanning');
 * reporter.completeStage('scanning', files.length);
 * reporter.startStage('ingesting', files.length);
 * reporter.updateProgress(1, 'docs/a.md');
 * reporter.fileComplete('docs/a.md', outcome);
 * reporter.completeStage('ingesting', files.length);
 * reporter.showSummary(report);
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;
  private stageStartTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(private readonly options: ProgressReporterOptions) {
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * @param total - Expected items (0 if unknown, as while scanning)
   */
  startStage(stage: IngestStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.stageStartTime = performance.now();

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', timestamp: timestamp(), stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(12)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number, currentFile?: string): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: timestamp(),
        stage: this.currentStage,
        data: { processed, total: this.currentTotal, currentFile },
      });
      return;
    }

    if (this.options.isInteractive && this.spinner) {
      const progressText =
        this.currentTotal > 0
          ? `${processed}/${this.currentTotal} (${Math.round((processed / this.currentTotal) * 100)}%)`
          : `Found ${processed} files`;
      this.spinner.text = currentFile
        ? `${progressText.padEnd(25)} ${chalk.dim(truncatePath(currentFile, ProgressReporter.MAX_PATH_LENGTH))}`
        : progressText;
    }
  }

  /**
   * Per-file result. Only visible with --verbose (or as an NDJSON event).
   */
  fileComplete(file: string, outcome: FileOutcome): void {
    if (this.options.json) {
      this.emitJson({ type: 'file_complete', timestamp: timestamp(), stage: 'ingesting', data: { file, ...outcome } });
      return;
    }
    if (!this.options.verbose) return;

    const line = describeOutcome(file, outcome);
    if (this.spinner) {
      // Print above the spinner without breaking it
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
    } else {
      console.log(line);
    }
  }

  completeStage(stage: IngestStage, processed: number): void {
    const durationMs = Math.round(performance.now() - this.stageStartTime);

    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: timestamp(),
        stage,
        data: { processed, total: this.currentTotal, durationMs },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(`${processed.toLocaleString()} files`);
    } else {
      console.log(`${STAGE_LABELS[stage]} complete: ${processed.toLocaleString()} files`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /** Stop the spinner without a success mark (the run failed) */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: timestamp(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    // Interactive runs only show warnings in verbose mode, to keep the spinner readable
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  showSummary(report: IngestReport): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', timestamp: timestamp(), data: { report } });
      return;
    }

    console.log('');
    if (report.filesFailed > 0) {
      console.log(chalk.yellow.bold(`Ingest finished with ${report.filesFailed} failed file(s)`));
    } else {
      console.log(chalk.green.bold('Ingest Complete ✓'));
    }
    console.log('');
    console.log(`  ${chalk.dim('Collection:')}       ${report.collection}`);
    console.log(`  ${chalk.dim('Files ingested:')}   ${report.filesProcessed.toLocaleString()}`);
    console.log(`  ${chalk.dim('Files unchanged:')}  ${report.filesSkipped.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks written:')}   ${report.chunksWritten.toLocaleString()}`);
    if (report.staleChunksDeleted > 0) {
      console.log(`  ${chalk.dim('Stale removed:')}    ${report.staleChunksDeleted.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(report.durationMs)}`);

    if (report.failures.length > 0) {
      console.log('');
      console.log(chalk.red('  Failures:'));
      for (const failure of report.failures) {
        console.log(`    ${chalk.red('✗')} ${failure.source}`);
        console.log(chalk.dim(`      ${failure.category}: ${failure.message}`));
      }
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }
}

// ============================================================================
// FORMATTING
// ============================================================================

function timestamp(): string {
  return new Date().toISOString();
}

export function describeOutcome(file: string, outcome: FileOutcome): string {
  switch (outcome.status) {
    case 'written':
      return `  ${chalk.green('+')} ${file} ${chalk.dim(`(${outcome.chunks} chunks)`)}`;
    case 'skipped':
      return `  ${chalk.dim('=')} ${file} ${chalk.dim(`(${outcome.reason})`)}`;
    case 'failed':
      return `  ${chalk.red('✗')} ${file} ${chalk.dim(`(${outcome.failure.category})`)}`;
  }
}

/**
 * Keep the tail of a long path, prefixed with ...
 */
export function truncatePath(path: string, maxLength: number): string {
  if (path.length <= maxLength) {
    return path;
  }
  return '...' + path.slice(-(maxLength - 3));
}

export function formatDuration(ms: number): string {
  const rounded = Math.round(ms);
  if (rounded < 1000) {
    return `${rounded}ms`;
  }
  if (rounded < 60000) {
    return `${(rounded / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(rounded / 60000);
  const seconds = ((rounded % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with defaults from the environment.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
