/**
 * Reranker
 *
 * Reorders a candidate shortlist with a pairwise relevance model. Each
 * (query, chunk.content) pair is scored independently and the new score
 * REPLACES the fusion score.
 *
 * Without a model, or when the model call fails, the reranker degrades to
 * passing through the first k candidates unchanged. That is an explicit
 * mode, reported to the caller, not an error. There are no retries.
 *
 * @example
 * ```typescript
 * const reranker = new Reranker({
 *   model: new HttpRelevanceModel({ endpoint: 'http://localhost:8080/rerank' }),
 * });
 * const { results, mode } = await reranker.rerank(query, fused, 10);
 * ```
 */

import { z } from 'zod';

import { silentLogger, type Logger } from '../utils/index.js';
import type { ScoredChunk } from './types.js';

/** Default number of candidates sent to the relevance model */
export const DEFAULT_CANDIDATE_COUNT = 50;

/** Default scoring request timeout */
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Pairwise relevance model: one score per document, higher is better.
 */
export interface RelevanceModel {
  readonly name: string;
  score(query: string, documents: string[], options?: { signal?: AbortSignal }): Promise<number[]>;
}

export type RerankMode = 'model' | 'passthrough';

export interface RerankOutcome {
  results: ScoredChunk[];
  /** 'passthrough' when no model ran (none configured, or it failed) */
  mode: RerankMode;
}

export interface RerankerOptions {
  /** null/undefined = always passthrough */
  model?: RelevanceModel | null;
  /** Maximum candidates scored per call (default: 50) */
  candidateCount?: number;
  logger?: Logger;
}

export class Reranker {
  private readonly model: RelevanceModel | null;
  private readonly candidateCount: number;
  private readonly logger: Logger;

  constructor(options: RerankerOptions = {}) {
    this.model = options.model ?? null;
    this.candidateCount = options.candidateCount ?? DEFAULT_CANDIDATE_COUNT;
    this.logger = options.logger ?? silentLogger;
  }

  /** Whether a relevance model is configured */
  get hasModel(): boolean {
    return this.model !== null;
  }

  /**
   * Rerank `candidates` for `query` and return the top `topK`.
   *
   * Cancellation via `signal` is not a model failure: an AbortError is
   * rethrown instead of degrading to passthrough.
   */
  async rerank(
    query: string,
    candidates: readonly ScoredChunk[],
    topK: number,
    options: { signal?: AbortSignal } = {}
  ): Promise<RerankOutcome> {
    if (candidates.length === 0 || topK <= 0) {
      return { results: [], mode: this.model ? 'model' : 'passthrough' };
    }

    if (!this.model) {
      return { results: candidates.slice(0, topK), mode: 'passthrough' };
    }

    const shortlist = candidates.slice(0, this.candidateCount);
    let scores: number[];
    try {
      scores = await this.model.score(
        query,
        shortlist.map((candidate) => candidate.chunk.content),
        { signal: options.signal }
      );
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Reranker "${this.model.name}" failed, passing candidates through: ${message}`);
      return { results: candidates.slice(0, topK), mode: 'passthrough' };
    }

    if (scores.length !== shortlist.length || scores.some((score) => !Number.isFinite(score))) {
      this.logger.warn(
        `Reranker "${this.model.name}" returned ${scores.length} scores for ${shortlist.length} candidates, passing candidates through`
      );
      return { results: candidates.slice(0, topK), mode: 'passthrough' };
    }

    const rescored = shortlist.map((candidate, i) => ({
      chunk: candidate.chunk,
      score: scores[i] ?? 0,
    }));
    rescored.sort((a, b) => b.score - a.score);
    return { results: rescored.slice(0, topK), mode: 'model' };
  }
}

// ============================================================================
// HTTP relevance model
// ============================================================================

const ScoresResponseSchema = z.object({
  scores: z.array(z.number()),
});

export interface HttpRelevanceModelOptions {
  /** POST endpoint taking { query, candidates: {id, text}[], model? } */
  endpoint: string;
  /** Forwarded as `model` in the request body */
  model?: string;
  /** Sent as a Bearer token when set */
  apiKey?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to global fetch */
  fetch?: typeof fetch;
}

/**
 * Cross-encoder served over HTTP.
 *
 * Protocol:
 *   POST endpoint
 *   body: { query: string, candidates: { id: string, text: string }[], model?: string }
 *   resp: { scores: number[] }  // same length and order as candidates
 */
export class HttpRelevanceModel implements RelevanceModel {
  readonly name: string;
  private readonly options: HttpRelevanceModelOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRelevanceModelOptions) {
    this.options = options;
    this.name = options.model ?? options.endpoint;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async score(query: string, documents: string[], options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const timeout = AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await this.fetchImpl(this.options.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        query,
        candidates: documents.map((text, i) => ({ id: String(i), text })),
        model: this.options.model,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Relevance endpoint responded ${response.status} ${response.statusText}`);
    }

    const parsed = ScoresResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Relevance endpoint returned an unexpected body (expected { scores: number[] })');
    }
    return parsed.data.scores;
  }
}
