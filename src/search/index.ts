/**
 * Search Module
 *
 * The retrieval-ranking pipeline:
 * - VectorIndex: dense cosine search with snapshot isolation
 * - KeywordIndex: BM25 scores over the same snapshot ordering
 * - fuseScores: weighted linear fusion of both
 * - Reranker: pairwise relevance model with passthrough fallback
 * - QueryExpander: heuristic or model-generated query variants
 * - RetrievalOrchestrator: composes all of the above
 *
 * @example
 * ```typescript
 * import { VectorIndex, RetrievalOrchestrator } from './search/index.js';
 *
 * const index = new VectorIndex({ dimensions: 1536 });
 * index.add(vectors, chunks);
 *
 * const orchestrator = new RetrievalOrchestrator({ index, embedder, hybrid: true });
 * const { chunks } = await orchestrator.retrieve('database optimization', { topK: 5 });
 * ```
 *
 * @packageDocumentation
 */

export { VectorIndex, ChunkSchema } from './vector-index.js';
export type { IndexManifest, VectorIndexOptions } from './vector-index.js';

export { KeywordIndex, tokenize, DEFAULT_BM25_CONFIG } from './keyword-index.js';

export { fuseScores, DEFAULT_ALPHA } from './fusion.js';
export type { FusedChunk, FuseScoresInput } from './fusion.js';

export { Reranker, HttpRelevanceModel, DEFAULT_CANDIDATE_COUNT } from './reranker.js';
export type {
  RelevanceModel,
  RerankMode,
  RerankOutcome,
  RerankerOptions,
  HttpRelevanceModelOptions,
} from './reranker.js';

export {
  QueryExpander,
  toQuestion,
  heuristicVariants,
  parseParaphrases,
  DEFAULT_MAX_VARIANTS,
} from './query-expander.js';
export type { TextGenerator, ExpansionMode, QueryExpanderOptions } from './query-expander.js';

export { RetrievalOrchestrator, dedupeByChunkId } from './orchestrator.js';
export type { RetrievalOrchestratorOptions } from './orchestrator.js';

export { DimensionMismatchError, IndexNotReadyError } from './errors.js';

export {
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
  formatScore,
  truncateSnippet,
  describeSource,
} from './formatter.js';
export type { FormatOptions, FormattedResultJSON } from './formatter.js';

export type {
  Chunk,
  ChunkMetadata,
  ScoredChunk,
  RetrievalResult,
  IndexSnapshot,
  VectorHit,
  BM25Config,
  RetrieveOptions,
  EmbeddingProvider,
} from './types.js';
