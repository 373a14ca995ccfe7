#!/usr/bin/env node
/**
 * ragent CLI Entry Point
 *
 * This is the main entry point for the `ragent` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createSearchCommand } from './commands/search.js';
import { createSessionCommand } from './commands/session.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const VERSION = process.env.RAGENT_VERSION ?? '0.1.0';

// Create the root program
const program = new Command();

// Configure the program
program
  .name('ragent')
  .description('Grounded question answering over an indexed corpus')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('ragent index ./corpus.jsonl')}            Embed a corpus and save the index
  ${chalk.cyan('ragent search "login function"')}         Rank chunks for a query
  ${chalk.cyan('ragent ask "How does auth work?"')}       Answer a question with citations
  ${chalk.cyan('ragent ask "And refresh?" -s auth')}      Continue a conversation
  ${chalk.cyan('ragent session list')}                    Show saved conversations
  ${chalk.cyan('ragent config set retrieval.top_k 20')}   Change a setting
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
        console.log(chalk.dim(`[debug] ${message}`));
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
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// ============================================================================
// COMMANDS
// ============================================================================

// Index command - embed a JSONL corpus into the vector index
program.addCommand(createIndexCommand(() => createContext(getGlobalOptions())));

// Search command - vector / hybrid retrieval with optional rerank and expansion
program.addCommand(createSearchCommand(() => createContext(getGlobalOptions())));

// Ask command - agent loop over the index, with per-session memory
program.addCommand(createAskCommand(() => createContext(getGlobalOptions())));

// Session command - list, export, import and clear conversations
program.addCommand(createSessionCommand(() => createContext(getGlobalOptions())));

// Config command - manage ~/.ragent/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: ragent --help  to see available commands`
  );
});

// Parse arguments and execute
async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Set up global error handlers for uncaught exceptions
  // These catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
