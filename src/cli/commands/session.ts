/**
 * Session Command
 *
 * Inspects and moves persisted conversations:
 *   ragent session list                  - Sessions, newest first
 *   ragent session show <id>             - Summary and live messages
 *   ragent session export <id> [-o file] - Export as JSON
 *   ragent session import <file>         - Replace a session from an export
 *   ragent session clear <id> --force    - Delete a session
 *
 * Only the session database is opened; no provider keys are needed.
 */

import * as fs from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { expandHome } from '../../config/paths.js';
import { openDatabase } from '../../database/connection.js';
import { SqliteSessionRepository } from '../../database/session-repository.js';
import { ConversationStore } from '../../conversation/store.js';
import { CLIError, FileNotFoundError, ValidationError } from '../../errors/index.js';

/**
 * Open the session store, run `task`, and close the database afterwards.
 */
async function withSessionStore<T>(
  ctx: CommandContext,
  task: (store: ConversationStore, repository: SqliteSessionRepository) => T | Promise<T>
): Promise<T> {
  const config = loadConfig();
  const databasePath = expandHome(config.storage.database_path);
  ctx.debug(`Session database: ${databasePath}`);

  const db = openDatabase(databasePath);
  const repository = new SqliteSessionRepository(db, ctx);
  const store = new ConversationStore({
    maxHistory: config.memory.max_history,
    summarizationThreshold: config.memory.summarization_threshold,
    repository,
    logger: ctx,
  });
  try {
    return await task(store, repository);
  } finally {
    await store.whenAllIdle();
    db.close();
  }
}

function sessionNotFound(sessionId: string): CLIError {
  return new CLIError(`Session not found: ${sessionId}`, 'Run: ragent session list  to see saved sessions');
}

function truncate(text: string, max: number): string {
  const line = text.replace(/\s+/g, ' ').trim();
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}

/**
 * Create the session command with all subcommands
 */
export function createSessionCommand(getContext: () => CommandContext): Command {
  const sessionCmd = new Command('session').description('Manage saved conversation sessions');

  // ragent session list
  sessionCmd
    .command('list')
    .alias('ls')
    .description('List saved sessions')
    .action(async () => {
      const ctx = getContext();
      const listings = await withSessionStore(ctx, (_store, repository) => repository.list());

      if (ctx.options.json) {
        console.log(JSON.stringify({ count: listings.length, sessions: listings }, null, 2));
        return;
      }
      if (listings.length === 0) {
        ctx.log(chalk.yellow('No saved sessions'));
        ctx.log(chalk.dim('Start one with: ragent ask "<question>" --session <id>'));
        return;
      }

      ctx.log(chalk.bold(`Sessions (${listings.length}):`));
      ctx.log('');
      for (const listing of listings) {
        const count = `${listing.messageCount} message${listing.messageCount === 1 ? '' : 's'}`;
        ctx.log(`  ${chalk.cyan(listing.sessionId)}  ${count}  ${chalk.dim(listing.updatedAt)}`);
      }
    });

  // ragent session show <id>
  sessionCmd
    .command('show <id>')
    .description('Show the summary and live messages of a session')
    .action(async (sessionId: string) => {
      const ctx = getContext();
      const session = await withSessionStore(ctx, (store) => store.getSession(sessionId));
      if (!session) {
        throw sessionNotFound(sessionId);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(session, null, 2));
        return;
      }

      ctx.log(chalk.bold(`Session ${session.sessionId}`) + chalk.dim(` (updated ${session.updatedAt})`));
      if (session.summary) {
        ctx.log('');
        ctx.log(chalk.dim('Summary:'));
        ctx.log(`  ${session.summary}`);
      }
      ctx.log('');
      for (const message of session.messages) {
        ctx.log(`  ${chalk.cyan(message.role.padEnd(9))} ${truncate(message.content, 100)}`);
      }
    });

  // ragent session export <id>
  sessionCmd
    .command('export <id>')
    .description('Export a session as JSON')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .action(async (sessionId: string, options: { output?: string }) => {
      const ctx = getContext();
      const exported = await withSessionStore(ctx, (store) => store.exportSession(sessionId));
      if (!exported) {
        throw sessionNotFound(sessionId);
      }

      const json = JSON.stringify(exported, null, 2);
      if (!options.output) {
        console.log(json);
        return;
      }

      const outputPath = resolve(options.output);
      fs.writeFileSync(outputPath, `${json}\n`, 'utf-8');
      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, sessionId, path: outputPath }));
      } else {
        ctx.log(`${chalk.green('✓')} Exported ${chalk.cyan(sessionId)} to ${outputPath}`);
      }
    });

  // ragent session import <file>
  sessionCmd
    .command('import <file>')
    .description('Import a session export, replacing a session with the same id')
    .action(async (file: string) => {
      const ctx = getContext();
      const inputPath = resolve(file);
      if (!fs.existsSync(inputPath)) {
        throw new FileNotFoundError(inputPath);
      }

      let data: unknown;
      try {
        data = JSON.parse(fs.readFileSync(inputPath, 'utf-8'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Invalid JSON in ${inputPath}`, [message]);
      }

      const result = await withSessionStore(ctx, (store) => {
        const sessionId = store.importSession(data);
        return { sessionId, messageCount: store.getHistory(sessionId).length };
      });

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, ...result }));
      } else {
        ctx.log(
          `${chalk.green('✓')} Imported ${chalk.cyan(result.sessionId)} (${result.messageCount} messages)`
        );
      }
    });

  // ragent session clear <id>
  sessionCmd
    .command('clear <id>')
    .alias('rm')
    .description('Delete a saved session')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(async (sessionId: string, options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This will permanently delete session "${sessionId}".`));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      const existed = await withSessionStore(ctx, (store) => {
        const found = store.getSession(sessionId) !== undefined;
        store.clear(sessionId);
        return found;
      });
      if (!existed) {
        throw sessionNotFound(sessionId);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, sessionId }));
      } else {
        ctx.log(`${chalk.green('✓')} Cleared session ${chalk.cyan(sessionId)}`);
      }
    });

  return sessionCmd;
}
