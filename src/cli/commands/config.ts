/**
 * Config Command
 *
 * Reads and edits ~/.ragent/config.toml by dot-separated key:
 *   ragent config get retrieval.top_k
 *   ragent config set rerank.enabled false
 *   ragent config list [section]
 *   ragent config path
 *   ragent config reset --force
 *
 * `set` validates the whole file against the schema before writing, so a
 * rejected value leaves config.toml untouched.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { loadConfig, getConfigValue, setConfigValue, listConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { CLIError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., ragent config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      try {
        const value = getConfigValue(loadConfig(), key);
        if (value === undefined) {
          unknownKey(ctx, key);
          return;
        }
        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., ragent config set retrieval.top_k 20)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      try {
        setConfigValue(key, value);
        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(loadConfig(), key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  configCmd
    .command('list [section]')
    .alias('ls')
    .description('List configuration values, optionally one section (e.g., ragent config list retrieval)')
    .action((section: string | undefined) => {
      const ctx = getContext();
      try {
        const entries = listConfig(loadConfig()).filter(
          ([key]) => section === undefined || key === section || key.startsWith(`${section}.`)
        );
        if (entries.length === 0) {
          unknownKey(ctx, section ?? '');
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold(section ? `Configuration (${section}):` : 'Configuration:'));
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.')[0] ?? '';
          if (group !== currentGroup) {
            ctx.log('');
            currentGroup = group;
          }
          const changed = formatValue(getConfigValue(DEFAULT_CONFIG, key)) !== formatValue(value);
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}${changed ? chalk.dim(' (changed)') : ''}`);
        }
        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Restore the default config.toml')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = getConfigPath();
        if (fs.existsSync(configPath)) {
          fs.unlinkSync(configPath);
        }
        // Writes the commented template again
        loadConfig({ configPath });

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  return configCmd;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function unknownKey(ctx: CommandContext, key: string): void {
  ctx.error(`Unknown config key: ${key}`);
  ctx.log('');
  ctx.log(`Run ${chalk.cyan('ragent config list')} to see all available keys.`);
  process.exitCode = 1;
}

/**
 * Config failures set the exit code instead of throwing, so `set` with a
 * bad value reports every schema issue and leaves the file as it was.
 */
function reportFailure(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const hint = error instanceof CLIError ? error.hint : undefined;

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message, hint }));
  } else {
    ctx.error(message);
    if (hint) {
      ctx.log(chalk.dim(hint));
    }
  }
  process.exitCode = 1;
}
