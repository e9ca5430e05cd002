/**
 * Config Command
 *
 * Manages ~/.know/config.toml (or the file named by --config / KNOW_CONFIG):
 *   know config get <key>          - Get a specific value
 *   know config set <key> <value>  - Set a value
 *   know config list               - Show all configuration
 *   know config path               - Show config file location
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, setConfigValue, listConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { getExitCode } from '../../errors/index.js';
import type { CommandContext } from '../types.js';
import { configPathFor } from '../runtime.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., know config get rag.top_k)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key, configPathFor(ctx));

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('know config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., know config set rag.top_k 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      const configPath = configPathFor(ctx) ?? getConfigPath();

      try {
        setConfigValue(key, value, configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key, configPath) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const configPath = configPathFor(ctx);

      try {
        const entries = listConfig(configPath);

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Blank line between top-level sections
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.')[0] ?? '';
          if (group !== currentGroup) {
            if (currentGroup !== '') ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${configPath ?? getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = configPathFor(ctx) ?? getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) return value.map((item) => String(item)).join(',');
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = getExitCode(error);
}
