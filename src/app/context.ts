/**
 * Application Context
 *
 * Builds every long-lived component once at startup and hands them out
 * as one explicit object. Commands receive the context instead of
 * reaching for module-level singletons; shutdownAppContext() releases
 * what it owns.
 *
 * ```
 * createAppContext(config)
 *   ├── VectorIndex ── RetrievalOrchestrator ── retrieve_knowledge tool
 *   ├── Reranker (HTTP model when rerank.endpoint is set)
 *   ├── QueryExpander
 *   ├── SQLite ── SqliteSessionRepository ── ConversationStore
 *   ├── ActionBudgetGuard
 *   └── AgentLoop (only with a generation provider)
 * ```
 */

import type Database from 'better-sqlite3';

import type { Config } from '../config/schema.js';
import { expandHome } from '../config/paths.js';
import { getEnv } from '../config/env.js';
import { FileNotFoundError } from '../errors/index.js';
import { openDatabase } from '../database/connection.js';
import { SqliteSessionRepository } from '../database/session-repository.js';
import { createEmbeddingProvider, createLLMProvider } from '../providers/llm.js';
import type { GenerationProvider } from '../providers/types.js';
import { VectorIndex, type IndexManifest } from '../search/vector-index.js';
import { Reranker, HttpRelevanceModel, type RelevanceModel } from '../search/reranker.js';
import { QueryExpander } from '../search/query-expander.js';
import { RetrievalOrchestrator } from '../search/orchestrator.js';
import type { EmbeddingProvider } from '../search/types.js';
import { ConversationStore } from '../conversation/store.js';
import { ExtractiveSummarizer, ModelSummarizer } from '../conversation/summarizer.js';
import { ActionBudgetGuard } from '../agent/budget.js';
import { ToolRegistry } from '../agent/tools/registry.js';
import { createRetrieveKnowledgeTool } from '../agent/tools/retrieve-knowledge-tool.js';
import { AgentLoop } from '../agent/agent-loop.js';
import { silentLogger, type Logger } from '../utils/index.js';

export interface AppContextOptions {
  logger?: Logger;
  /** Default: the configured OpenAI embedding provider */
  embedder?: EmbeddingProvider;
  /**
   * Default: the configured LLM provider. Pass null for commands that
   * never generate text; the context then has no agent.
   */
  generator?: GenerationProvider | null;
  /** Default: an HttpRelevanceModel when rerank.endpoint is set */
  relevanceModel?: RelevanceModel | null;
  /** Overrides storage.database_path (tests pass ':memory:') */
  databasePath?: string;
}

export interface AppContext {
  readonly config: Config;
  readonly logger: Logger;
  readonly index: VectorIndex;
  readonly embedder: EmbeddingProvider;
  readonly generator: GenerationProvider | null;
  readonly retrieval: RetrievalOrchestrator;
  readonly conversation: ConversationStore;
  readonly budget: ActionBudgetGuard;
  readonly tools: ToolRegistry;
  /** null when the context was built without a generation provider */
  readonly agent: AgentLoop | null;
  readonly database: Database.Database;
  /** Resolved directory of the saved index */
  readonly indexPath: string;
}

function createRelevanceModel(config: Config): RelevanceModel | null {
  const { endpoint, model, timeout_ms } = config.rerank;
  if (!endpoint) {
    return null;
  }
  return new HttpRelevanceModel({
    endpoint,
    model,
    apiKey: getEnv('RERANK_API_KEY'),
    timeoutMs: timeout_ms,
  });
}

/**
 * Build the application context from a resolved configuration.
 *
 * The saved index is not read here; call loadSavedIndex() where a
 * command needs it.
 *
 * @throws APIKeyError if a default provider needs a key that is missing
 * @throws DatabaseError if the session database cannot be opened
 */
export function createAppContext(config: Config, options: AppContextOptions = {}): AppContext {
  const logger = options.logger ?? silentLogger;
  const embedder = options.embedder ?? createEmbeddingProvider(config);
  const generator = options.generator === undefined ? createLLMProvider(config) : options.generator;

  const index = new VectorIndex({ dimensions: config.embedding.dimensions, logger });
  const reranker = new Reranker({
    model: options.relevanceModel === undefined ? createRelevanceModel(config) : options.relevanceModel,
    candidateCount: config.rerank.candidate_count,
    logger,
  });
  const expander = new QueryExpander({
    mode: config.retrieval.expansion_mode,
    maxVariants: config.retrieval.max_variants,
    generator,
    logger,
  });
  const retrieval = new RetrievalOrchestrator({
    index,
    embedder,
    reranker,
    expander,
    hybrid: config.retrieval.hybrid,
    alpha: config.retrieval.alpha,
    candidateMultiplier: config.retrieval.candidate_multiplier,
    defaults: {
      topK: config.retrieval.top_k,
      rerank: config.retrieval.rerank,
      expand: config.retrieval.expand_query,
    },
    logger,
  });

  const database = openDatabase(options.databasePath ?? expandHome(config.storage.database_path));
  const conversation = new ConversationStore({
    maxHistory: config.memory.max_history,
    summarizationThreshold: config.memory.summarization_threshold,
    summarizer:
      config.memory.summarizer === 'model' && generator
        ? new ModelSummarizer(generator)
        : new ExtractiveSummarizer(),
    repository: new SqliteSessionRepository(database, logger),
    logger,
  });

  const budget = new ActionBudgetGuard({
    maxActionsPerSession: config.budget.max_actions_per_session,
    maxActionsPerMinute: config.budget.max_actions_per_minute,
    resetAfterSeconds: config.budget.reset_after_seconds,
    sweepIntervalSeconds: config.budget.sweep_interval_seconds,
    logger,
  });

  const tools = new ToolRegistry(logger);
  tools.register(createRetrieveKnowledgeTool(retrieval));

  const agent = generator
    ? new AgentLoop({
        generator,
        retriever: retrieval,
        tools,
        budget,
        conversation,
        maxIterations: config.agent.max_iterations,
        topK: config.agent.retrieval_top_k,
        contextChunks: config.agent.context_chunks,
        historyTokens: config.memory.context_tokens,
        temperature: config.agent.temperature,
        maxTokens: config.agent.max_tokens,
        logger,
      })
    : null;

  return {
    config,
    logger,
    index,
    embedder,
    generator,
    retrieval,
    conversation,
    budget,
    tools,
    agent,
    database,
    indexPath: expandHome(config.storage.index_path),
  };
}

/**
 * Load the saved index into the context.
 *
 * @returns the manifest, or null when nothing has been indexed yet
 */
export async function loadSavedIndex(context: AppContext): Promise<IndexManifest | null> {
  try {
    return await context.index.load(context.indexPath);
  } catch (error) {
    if (error instanceof FileNotFoundError) {
      context.logger.debug?.(`No saved index at ${context.indexPath}`);
      return null;
    }
    throw error;
  }
}

/**
 * Stop the budget sweeper, let pending summaries finish, close the database.
 */
export async function shutdownAppContext(context: AppContext): Promise<void> {
  context.budget.dispose();
  await context.conversation.whenAllIdle();
  context.database.close();
}
