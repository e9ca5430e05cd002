/**
 * Run Command
 *
 * Answer a question from the knowledge base:
 *   know run "What is the refund policy?"
 *   know ask how long does shipping take --top-k 8
 *   know run "..." --allow-no-context --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { createRuntime } from '../runtime.js';
import { parseInput, QuestionSchema, RunOptionsSchema } from '../validation.js';
import { RagEngine } from '../../rag/engine.js';
import { formatCitations } from '../../rag/citations.js';
import type { Answer } from '../../rag/types.js';

interface RunCommandOptions {
  collection?: string;
  topK?: string;
  allowNoContext?: boolean;
}

/**
 * JSON output shape for `know run --json`
 */
export interface RunJSON {
  question: string;
  answer: string;
  collection: string;
  model: string;
  noContext: boolean;
  sources: Array<{ source: string; score: number }>;
  metadata: { totalMs: number };
}

function displayAnswer(ctx: CommandContext, answer: Answer): void {
  ctx.log(answer.text.trim());
  ctx.log('');

  if (answer.noContext) {
    ctx.log(chalk.yellow('No relevant context was found; this answer is not based on your documents.'));
    return;
  }

  ctx.log(chalk.bold('Sources:'));
  ctx.log(chalk.dim(formatCitations(answer.sources)));
}

/**
 * Create the run command (alias: ask).
 */
export function createRunCommand(getContext: () => CommandContext): Command {
  return new Command('run')
    .alias('ask')
    .argument('<question...>', 'Question to answer (quotes optional)')
    .description('Answer a question using your knowledge base')
    .option('-c, --collection <name>', 'Collection to search')
    .option('-k, --top-k <number>', 'Number of chunks to retrieve')
    .option('--allow-no-context', 'Answer even when nothing relevant is retrieved')
    .action(async (words: string[], cmdOptions: RunCommandOptions) => {
      const ctx = getContext();
      const startTime = performance.now();

      const options = parseInput(RunOptionsSchema, cmdOptions, 'run options');
      const question = parseInput(QuestionSchema, words.join(' '), 'question');
      ctx.debug(`Question: "${question}"`);

      const runtime = createRuntime(ctx, { collection: options.collection });
      const collection = runtime.settings.collection;

      try {
        // ─────────────────────────────────────────────────────────────────
        // 1. Backend and vector engine
        // ─────────────────────────────────────────────────────────────────
        const backend = await runtime.backend();
        const store = await runtime.openStore();

        // ─────────────────────────────────────────────────────────────────
        // 2. Retrieve and generate
        // ─────────────────────────────────────────────────────────────────
        const engine = new RagEngine(
          { store, backend, logger: ctx },
          { ...runtime.settings.rag, collection }
        );

        const spinner =
          !ctx.options.json && process.stdout.isTTY
            ? ora({ text: `Searching ${collection}...`, discardStdin: false }).start()
            : null;

        let answer: Answer;
        try {
          answer = await engine.answer(question, {
            topK: options.topK,
            emptyContext: options.allowNoContext ? 'answer' : undefined,
            signal: runtime.signal,
          });
        } finally {
          spinner?.stop();
        }

        // ─────────────────────────────────────────────────────────────────
        // 3. Output
        // ─────────────────────────────────────────────────────────────────
        if (ctx.options.json) {
          const output: RunJSON = {
            question,
            answer: answer.text,
            collection,
            model: answer.model,
            noContext: answer.noContext,
            sources: answer.sources,
            metadata: { totalMs: Math.round(performance.now() - startTime) },
          };
          console.log(JSON.stringify(output, null, 2));
        } else {
          displayAnswer(ctx, answer);
        }
      } finally {
        runtime.close();
      }
    });
}
