/**
 * Search Command
 *
 * Runs the retrieval pipeline against the saved index and prints the
 * ranked chunks:
 *
 *   ragent search "authentication middleware"
 *   ragent search "login" --top-k 5 --json
 *   ragent search "auth flow" --no-hybrid --rerank --expand
 *   ragent search "rotation" --doc handbook --doc runbook
 *
 * Flags override the matching retrieval.* config values for one run.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { createAppContext, loadSavedIndex, shutdownAppContext } from '../../app/context.js';
import { formatResults, formatResultsJSON } from '../../search/formatter.js';
import { IndexNotReadyError } from '../../search/errors.js';
import type { RetrievalResult } from '../../search/types.js';
import { CLIError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface SearchCommandOptions {
  /** Number of results to return (default: retrieval.top_k) */
  topK?: string;
  /** --hybrid / --no-hybrid; undefined keeps the config value */
  hybrid?: boolean;
  /** --rerank / --no-rerank */
  rerank?: boolean;
  /** --expand / --no-expand */
  expand?: boolean;
  /** Restrict results to these document ids */
  doc?: string[];
}

// ============================================================================
// Constants
// ============================================================================

const MAX_TOP_K = 100;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse and validate the --top-k option.
 *
 * @throws CLIError if invalid
 */
export function parseTopK(value: string): number {
  const topK = parseInt(value, 10);

  if (isNaN(topK) || topK < 1) {
    throw new CLIError(`Invalid --top-k value: "${value}"`, `Must be a positive integer (1-${MAX_TOP_K})`);
  }

  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top-k value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }

  return topK;
}

/**
 * Apply the --hybrid flag, which changes how the orchestrator is built.
 */
function withOverrides(config: Config, cmdOptions: SearchCommandOptions): Config {
  if (cmdOptions.hybrid === undefined) {
    return config;
  }
  return { ...config, retrieval: { ...config.retrieval, hybrid: cmdOptions.hybrid } };
}

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim('  - Use --expand to search with query paraphrases'));
  ctx.log(chalk.dim('  - Use --hybrid to add keyword matching'));
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the search command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search the indexed corpus')
    .option('-k, --top-k <number>', 'Number of results to return')
    .option('--hybrid', 'Fuse BM25 keyword scores with vector scores')
    .option('--no-hybrid', 'Vector similarity only')
    .option('-r, --rerank', 'Rerank candidates with the relevance model')
    .option('--no-rerank', 'Skip reranking')
    .option('-e, --expand', 'Also search with query paraphrases')
    .option('--no-expand', 'Search with the query as written')
    .option('-d, --doc <docId...>', 'Only return chunks from these documents')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      ctx.debug(`Query: "${query}"`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      // ─────────────────────────────────────────────────────────────────────
      // 1. Validate input
      // ─────────────────────────────────────────────────────────────────────
      const trimmedQuery = query.trim();
      if (!trimmedQuery) {
        throw new CLIError(
          'Search query cannot be empty',
          'Provide a search term, e.g.: ragent search "authentication"'
        );
      }

      const config = withOverrides(loadConfig(), cmdOptions);
      const topK = cmdOptions.topK ? parseTopK(cmdOptions.topK) : config.retrieval.top_k;
      const expand = cmdOptions.expand ?? config.retrieval.expand_query;
      ctx.debug(`Top-K: ${topK}, hybrid: ${config.retrieval.hybrid}, expand: ${expand}`);

      // ─────────────────────────────────────────────────────────────────────
      // 2. Build the pipeline and load the index
      // ─────────────────────────────────────────────────────────────────────
      // Only model-based expansion needs a generation provider
      const needsGenerator = expand && config.retrieval.expansion_mode === 'model';
      const app = createAppContext(config, {
        logger: ctx,
        ...(needsGenerator ? {} : { generator: null }),
      });

      try {
        const manifest = await loadSavedIndex(app);
        if (!manifest || app.index.size === 0) {
          throw new IndexNotReadyError('Vector index');
        }
        ctx.debug(`Loaded ${manifest.count} chunks (${manifest.model ?? 'unknown model'})`);

        // ───────────────────────────────────────────────────────────────────
        // 3. Retrieve
        // ───────────────────────────────────────────────────────────────────
        const retrieveOptions = { topK, rerank: cmdOptions.rerank, expand };
        const result: RetrievalResult =
          cmdOptions.doc && cmdOptions.doc.length > 0
            ? await app.retrieval.retrieveByDocument(trimmedQuery, cmdOptions.doc, topK, retrieveOptions)
            : await app.retrieval.retrieve(trimmedQuery, retrieveOptions);

        ctx.debug(
          `Found ${result.chunks.length} results in ${(result.latencySeconds * 1000).toFixed(0)}ms` +
            ` (${result.variants.length} variant(s), reranked: ${result.reranked})`
        );

        // ───────────────────────────────────────────────────────────────────
        // 4. Output
        // ───────────────────────────────────────────────────────────────────
        if (ctx.options.json) {
          const jsonOutput = {
            query: trimmedQuery,
            count: result.chunks.length,
            variants: result.variants,
            reranked: result.reranked,
            latencyMs: Math.round(result.latencySeconds * 1000),
            results: formatResultsJSON(result.chunks),
          };
          console.log(JSON.stringify(jsonOutput, null, 2));
        } else if (result.chunks.length === 0) {
          displayEmptyResults(ctx, trimmedQuery);
        } else {
          const count = result.chunks.length;
          ctx.log(chalk.bold(`Found ${count} result${count === 1 ? '' : 's'}`) + chalk.dim(` for "${trimmedQuery}"`));
          ctx.log('');
          ctx.log(formatResults(result.chunks));
        }
      } finally {
        await shutdownAppContext(app);
      }
    });
}
