#!/usr/bin/env node
/**
 * know CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { GlobalOptionsSchema, parseInput } from './validation.js';
import { createRunCommand } from './commands/run.js';
import { createIngestCommand } from './commands/ingest.js';
import { createServeCommand } from './commands/serve.js';
import { createPushCommand, createPullCommand } from './commands/transfer.js';
import { createUpCommand, createDownCommand, createCleanCommand } from './commands/services.js';
import { createStatusCommand } from './commands/status.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// src/cli and dist/cli both sit two levels below package.json
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (raw !== null && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('know')
  .description('Ingest documents into a vector index and answer questions about them')
  .version(readVersion(), '-V, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('-v, --verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--backend <kind>', 'LLM backend: docker, ollama or openai (default: auto-detect)')
  .option('--base-url <url>', 'Base URL of the LLM backend')
  .option('--model <name>', 'Generation model')
  .option('--embed-model <name>', 'Embedding model')
  .option('--config <path>', 'Config file (default: ~/.know/config.toml)')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('know up')}                              Start the vector and parsing engines
  ${chalk.cyan('know ingest ./docs')}                   Ingest a directory
  ${chalk.cyan('know run "What is the refund policy?"')}  Ask a question
  ${chalk.cyan('know serve --port 8080')}               OpenAI-compatible API
  ${chalk.cyan('know push ghcr.io/team/handbook:v1')}   Share a collection
  ${chalk.cyan('know config set rag.top_k 8')}          Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Global options from the program. Raw until the preAction hook validates them.
 */
let validatedOptions: GlobalOptions | undefined;

function getGlobalOptions(): GlobalOptions {
  if (validatedOptions) {
    return validatedOptions;
  }
  const opts = program.opts<{ verbose?: boolean; json?: boolean }>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createRunCommand(getContext));
program.addCommand(createIngestCommand(getContext));
program.addCommand(createServeCommand(getContext));
program.addCommand(createPushCommand(getContext));
program.addCommand(createPullCommand(getContext));
program.addCommand(createUpCommand(getContext));
program.addCommand(createDownCommand(getContext));
program.addCommand(createCleanCommand(getContext));
program.addCommand(createStatusCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: know --help  to see available commands'
  );
});

// Validate global flags before any command runs
program.hook('preAction', () => {
  validatedOptions = parseInput(GlobalOptionsSchema, program.opts(), 'global options');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

main().catch((error: unknown) => handleError(error));
