/**
 * ragent - Library Entry Point
 *
 * The CLI (`ragent`) covers indexing, search and Q&A. This module exposes
 * the same components for applications that embed them.
 *
 * ## Retrieval
 *
 * @example
 * ```typescript
 * import { VectorIndex, RetrievalOrchestrator, Reranker } from 'ragent';
 *
 * const index = new VectorIndex({ dimensions: embedder.dimensions });
 * index.add(vectors, chunks);
 *
 * const retrieval = new RetrievalOrchestrator({ index, embedder, hybrid: true, reranker: new Reranker() });
 * const { chunks: top } = await retrieval.retrieve('token rotation', { topK: 5 });
 * ```
 *
 * ## Agent
 *
 * @example
 * ```typescript
 * import { createAppContext, loadConfig, shutdownAppContext } from 'ragent';
 *
 * const app = createAppContext(loadConfig());
 * const result = await app.agent?.execute('How are tokens rotated?', 'session-1');
 * console.log(result?.answer, result?.citations);
 * await shutdownAppContext(app);
 * ```
 *
 * @packageDocumentation
 */

// Application wiring
export {
  createAppContext,
  loadSavedIndex,
  shutdownAppContext,
  type AppContext,
  type AppContextOptions,
} from './app/context.js';

// Retrieval pipeline
export {
  VectorIndex,
  ChunkSchema,
  KeywordIndex,
  tokenize,
  fuseScores,
  Reranker,
  HttpRelevanceModel,
  QueryExpander,
  RetrievalOrchestrator,
  DimensionMismatchError,
  IndexNotReadyError,
  formatResults,
  formatResultsJSON,
} from './search/index.js';
export type {
  Chunk,
  ChunkMetadata,
  ScoredChunk,
  RetrievalResult,
  RetrieveOptions,
  IndexManifest,
  RelevanceModel,
  ExpansionMode,
  BM25Config,
} from './search/index.js';

// Conversation memory
export {
  ConversationStore,
  ExtractiveSummarizer,
  ModelSummarizer,
  SessionExportSchema,
} from './conversation/index.js';
export type {
  Message,
  MessageRole,
  ContextMessage,
  SessionExport,
  SessionRepository,
  Summarizer,
} from './conversation/index.js';

// Agent loop and tools
export {
  AgentLoop,
  ActionBudgetGuard,
  ToolRegistry,
  syncTool,
  asyncTool,
  createRetrieveKnowledgeTool,
  extractCitations,
  formatCitations,
  BudgetExceededError,
  ToolExecutionError,
  ToolNotFoundError,
} from './agent/index.js';
export type {
  AgentEvent,
  AgentResult,
  AgentRunOptions,
  Citation,
  Tool,
  ToolContext,
  ToolInvocation,
} from './agent/index.js';

// Providers
export {
  AnthropicGenerationProvider,
  OpenAIGenerationProvider,
  OpenAIEmbeddingProvider,
  createGenerationProvider,
  createEmbeddingProvider,
  ProviderError,
} from './providers/index.js';
export type {
  EmbeddingProvider,
  GenerationProvider,
  GenerateOptions,
  GenerationOutcome,
  ToolSchema,
} from './providers/index.js';

// Indexing
export { runIndexPipeline, parseCorpus, readCorpus } from './indexer/index.js';
export type { IndexPipelineOptions, IndexPipelineResult } from './indexer/index.js';

// Persistence
export { openDatabase, IN_MEMORY, SqliteSessionRepository } from './database/index.js';

// Configuration
export { loadConfig, resolveConfig, DEFAULT_CONFIG } from './config/index.js';
export type { Config } from './config/index.js';

// Errors and logging
export {
  CLIError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  FileNotFoundError,
  ValidationError,
} from './errors/index.js';
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
