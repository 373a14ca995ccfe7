/**
 * Index Command
 *
 * Embeds a JSONL corpus and saves the vector index:
 *
 *   ragent index ./corpus.jsonl            # replace the saved index
 *   ragent index ./more.jsonl --append     # add to it
 *   ragent index ./corpus.jsonl --json     # NDJSON progress events
 *
 * Ctrl+C stops at the next batch boundary; nothing is saved then.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createAppContext, loadSavedIndex, shutdownAppContext } from '../../app/context.js';
import { runIndexPipeline } from '../../indexer/index.js';
import { CLIError } from '../../errors/index.js';
import { createProgressReporter } from '../utils/progress.js';

// ============================================================================
// Types
// ============================================================================

interface IndexCommandOptions {
  /** Keep the saved index and add the corpus to it */
  append?: boolean;
  /** Texts per embedding request (overrides embedding.batch_size) */
  batchSize?: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse and validate the --batch-size option.
 *
 * @throws CLIError if invalid
 */
function parseBatchSize(value: string): number {
  const batchSize = parseInt(value, 10);
  if (isNaN(batchSize) || batchSize < 1) {
    throw new CLIError(`Invalid --batch-size value: "${value}"`, 'Must be a positive integer');
  }
  return batchSize;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('<corpus>', 'JSONL file with one chunk per line')
    .description('Embed a corpus and save the vector index')
    .option('-a, --append', 'Add to the saved index instead of replacing it')
    .option('-b, --batch-size <number>', 'Texts per embedding request')
    .action(async (corpus: string, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const corpusPath = resolve(corpus);

      ctx.debug(`Corpus: ${corpusPath}`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const config = loadConfig();
      const batchSize = cmdOptions.batchSize
        ? parseBatchSize(cmdOptions.batchSize)
        : config.embedding.batch_size;

      const app = createAppContext(config, { logger: ctx, generator: null });
      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      // Cancel between batches on Ctrl+C
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        if (cmdOptions.append) {
          const manifest = await loadSavedIndex(app);
          ctx.debug(
            manifest
              ? `Appending to ${manifest.count} saved chunks (${manifest.model ?? 'unknown model'})`
              : 'No saved index yet, starting empty'
          );
        }

        const result = await runIndexPipeline({
          corpusPath,
          index: app.index,
          embedder: app.embedder,
          indexPath: app.indexPath,
          batchSize,
          signal: controller.signal,
          onStageStart: (stage, total) => reporter.startStage(stage, total),
          onProgress: (_stage, processed) => reporter.updateProgress(processed),
          onStageComplete: (_stage, stats) => reporter.completeStage(stats),
        });

        reporter.showSummary(result);
      } catch (error) {
        reporter.fail(error instanceof Error ? error.message : String(error));
        throw error;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        await shutdownAppContext(app);
      }
    });
}
