/**
 * Retrieval Orchestrator
 *
 * Composes the retrieval-ranking pipeline into one retrieve() call:
 *
 *   query → variants → embed (one batch) → per variant: vector search
 *   (+ BM25 + fusion in hybrid mode) → merge + dedup by chunkId
 *   → rerank (or sort + truncate)
 *
 * Every variant asks for `candidateMultiplier × topK` candidates, leaving
 * room for losses in dedup and reranking. Embedding failures abort the
 * call as ProviderError; an empty corpus is an empty result, not an error.
 */

import { silentLogger, type Logger } from '../utils/index.js';
import { ValidationError } from '../errors/index.js';
import { ProviderError } from '../providers/errors.js';
import { fuseScores, DEFAULT_ALPHA } from './fusion.js';
import { KeywordIndex } from './keyword-index.js';
import type { QueryExpander } from './query-expander.js';
import type { Reranker } from './reranker.js';
import type { VectorIndex } from './vector-index.js';
import type {
  EmbeddingProvider,
  IndexSnapshot,
  RetrievalResult,
  RetrieveOptions,
  ScoredChunk,
} from './types.js';

/** Default candidates per variant, as a multiple of topK */
const DEFAULT_CANDIDATE_MULTIPLIER = 2;

/** retrieveByDocument() widens the unfiltered pass by this factor */
const DOCUMENT_FILTER_WIDENING = 3;

export interface RetrievalOrchestratorOptions {
  index: VectorIndex;
  embedder: EmbeddingProvider;
  reranker?: Reranker | null;
  expander?: QueryExpander | null;
  /** Fuse BM25 scores with vector scores (default: false) */
  hybrid?: boolean;
  /** Supply a pre-configured keyword index (one is created when hybrid is on) */
  keywordIndex?: KeywordIndex;
  /** Vector weight for hybrid fusion (default: 0.7) */
  alpha?: number;
  candidateMultiplier?: number;
  /** Defaults for per-call options */
  defaults?: {
    topK?: number;
    rerank?: boolean;
    expand?: boolean;
  };
  logger?: Logger;
}

/**
 * Remove later duplicates by chunkId, keeping the first occurrence.
 */
export function dedupeByChunkId(candidates: readonly ScoredChunk[]): ScoredChunk[] {
  const seen = new Set<string>();
  const unique: ScoredChunk[] = [];
  for (const candidate of candidates) {
    if (!seen.has(candidate.chunk.chunkId)) {
      seen.add(candidate.chunk.chunkId);
      unique.push(candidate);
    }
  }
  return unique;
}

export class RetrievalOrchestrator {
  private readonly index: VectorIndex;
  private readonly embedder: EmbeddingProvider;
  private readonly reranker: Reranker | null;
  private readonly expander: QueryExpander | null;
  private readonly keywordIndex: KeywordIndex | null;
  private readonly alpha: number;
  private readonly candidateMultiplier: number;
  private readonly defaults: Required<NonNullable<RetrievalOrchestratorOptions['defaults']>>;
  private readonly logger: Logger;

  constructor(options: RetrievalOrchestratorOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.reranker = options.reranker ?? null;
    this.expander = options.expander ?? null;
    this.logger = options.logger ?? silentLogger;
    this.keywordIndex = options.hybrid
      ? (options.keywordIndex ?? new KeywordIndex({}, this.logger))
      : null;
    this.alpha = options.alpha ?? DEFAULT_ALPHA;
    this.candidateMultiplier = options.candidateMultiplier ?? DEFAULT_CANDIDATE_MULTIPLIER;
    this.defaults = {
      topK: options.defaults?.topK ?? 10,
      rerank: options.defaults?.rerank ?? true,
      expand: options.defaults?.expand ?? false,
    };

    if (this.embedder.dimensions !== this.index.dimensions) {
      throw new ValidationError(
        `Embedding model "${this.embedder.model}" produces ${this.embedder.dimensions}-dimension vectors, index expects ${this.index.dimensions}`
      );
    }
  }

  /** Whether keyword fusion is enabled */
  get hybrid(): boolean {
    return this.keywordIndex !== null;
  }

  /**
   * Retrieve the top-k chunks for `query`.
   *
   * @throws ProviderError if the embedding provider fails
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const start = performance.now();
    const topK = options.topK ?? this.defaults.topK;
    const rerank = options.rerank ?? this.defaults.rerank;
    const expand = options.expand ?? this.defaults.expand;
    const { signal } = options;

    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }
    if (query.trim().length === 0 || this.index.size === 0) {
      return { chunks: [], latencySeconds: elapsedSeconds(start), variants: [], reranked: false };
    }

    // Step 1: Query variants (original first)
    const variants = expand && this.expander ? await this.expander.expand(query, { signal }) : [query];
    signal?.throwIfAborted();

    // Step 2: Embed every variant in one batch
    const embedStart = performance.now();
    const vectors = await this.embedVariants(variants, signal);
    const embedMs = performance.now() - embedStart;

    // Step 3: Search each variant against one snapshot
    const snapshot = this.index.snapshot();
    const perVariant = this.candidateMultiplier * topK;
    const candidates: ScoredChunk[] = [];
    variants.forEach((variant, i) => {
      const vector = vectors[i];
      if (vector) {
        candidates.push(...this.searchVariant(variant, vector, perVariant, snapshot));
      }
    });

    // Step 4: Dedup, keeping the first occurrence (original query first)
    const unique = dedupeByChunkId(candidates);

    // Step 5: Rerank with the original query, or sort and truncate
    let chunks: ScoredChunk[];
    let reranked = false;
    if (rerank && this.reranker) {
      const outcome = await this.reranker.rerank(query, unique, topK, { signal });
      chunks = outcome.results;
      reranked = outcome.mode === 'model';
    } else {
      chunks = [...unique].sort((a, b) => b.score - a.score).slice(0, topK);
    }

    const latencySeconds = elapsedSeconds(start);
    this.logger.debug?.(
      `retrieve: ${variants.length} variant(s), ${unique.length} unique candidates, ` +
        `${chunks.length} returned (embed ${embedMs.toFixed(0)}ms, total ${(latencySeconds * 1000).toFixed(0)}ms)`
    );
    return { chunks, latencySeconds, variants, reranked };
  }

  /**
   * Retrieve only chunks belonging to `docIds`.
   *
   * Runs a wider unfiltered pass without reranking, filters by document,
   * then reranks the survivors so ranking among allowed documents uses the
   * relevance model.
   */
  async retrieveByDocument(
    query: string,
    docIds: readonly string[],
    topK = 5,
    options: Omit<RetrieveOptions, 'topK'> = {}
  ): Promise<RetrievalResult> {
    const start = performance.now();
    const allowed = new Set(docIds);

    const wide = await this.retrieve(query, {
      ...options,
      topK: topK * DOCUMENT_FILTER_WIDENING,
      rerank: false,
    });
    const filtered = wide.chunks.filter((candidate) => allowed.has(candidate.chunk.docId));

    let chunks = filtered.slice(0, topK);
    let reranked = false;
    if ((options.rerank ?? this.defaults.rerank) && this.reranker && filtered.length > 0) {
      const outcome = await this.reranker.rerank(query, filtered, topK, { signal: options.signal });
      chunks = outcome.results;
      reranked = outcome.mode === 'model';
    }

    return { chunks, latencySeconds: elapsedSeconds(start), variants: wide.variants, reranked };
  }

  private async embedVariants(variants: string[], signal: AbortSignal | undefined): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.embedder.embed(variants, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw ProviderError.wrap(this.embedder.model, 'embed', error);
    }
    signal?.throwIfAborted();

    if (vectors.length !== variants.length) {
      throw new ProviderError(
        this.embedder.model,
        'embed',
        `returned ${vectors.length} vectors for ${variants.length} texts`
      );
    }
    return vectors;
  }

  private searchVariant(
    variant: string,
    vector: number[],
    limit: number,
    snapshot: IndexSnapshot
  ): ScoredChunk[] {
    const hits = this.index.search(vector, limit, snapshot);
    if (!this.keywordIndex) {
      return hits.map(({ chunk, score }) => ({ chunk, score }));
    }

    // Corpus changed since the last build: rebuild before scoring
    if (this.keywordIndex.isStale(snapshot)) {
      this.keywordIndex.build(snapshot);
    }
    return fuseScores({
      vectorHits: hits,
      keywordScores: this.keywordIndex.scores(variant),
      chunks: snapshot.chunks,
      alpha: this.alpha,
      limit,
    }).map(({ chunk, score }) => ({ chunk, score }));
  }
}

function elapsedSeconds(start: number): number {
  return (performance.now() - start) / 1000;
}
