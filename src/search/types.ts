/**
 * Search Module Types
 *
 * Type definitions for the retrieval-ranking pipeline: chunks, scored
 * results, index snapshots, and the options each stage accepts.
 */

/**
 * Chunk metadata. Insertion order is preserved (source, filename,
 * chunk_index, heading, ...); values are JSON scalars.
 */
export type ChunkMetadata = Record<string, string | number | boolean | null>;

/**
 * Immutable unit of retrievable text.
 *
 * Created at ingestion time and owned by the indexes until `clear()`.
 */
export interface Chunk {
  /** Unique, stable identifier across the corpus */
  readonly chunkId: string;
  /** Owning document */
  readonly docId: string;
  /** The chunk text */
  readonly content: string;
  readonly metadata: Readonly<ChunkMetadata>;
  /** Cached embedding, when the ingester kept one */
  readonly embedding?: readonly number[];
}

/**
 * A chunk with a stage-specific score.
 *
 * Score meaning depends on who produced it: cosine similarity from the
 * vector index, fused [0,1] from ScoreFusion, or a relevance model score
 * from the Reranker. Never compare scores across stages.
 */
export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
}

/**
 * Ranked output of RetrievalOrchestrator.retrieve().
 */
export interface RetrievalResult {
  /** Highest score first, at most topK entries, unique chunkIds */
  chunks: ScoredChunk[];
  /** Wall-clock time for the whole call, in seconds */
  latencySeconds: number;
  /** Query variants that were searched (original first) */
  variants: string[];
  /** Whether a relevance model reordered the candidates */
  reranked: boolean;
}

/**
 * Consistent, read-only view of a VectorIndex at one point in time.
 *
 * Mutations never touch a published snapshot; they build a new one and
 * swap it in, so a search that started on a snapshot finishes on it.
 */
export interface IndexSnapshot {
  /** Increments on every add/clear/load */
  readonly version: number;
  readonly dimensions: number;
  readonly chunks: readonly Chunk[];
  /** L2-normalized vectors, row-major, `chunks.length * dimensions` long */
  readonly vectors: Float32Array;
  /** chunkId -> position in `chunks` */
  readonly positions: ReadonlyMap<string, number>;
}

/**
 * Vector search hit, keeping the position for alignment with KeywordIndex.
 */
export interface VectorHit extends ScoredChunk {
  readonly position: number;
}

/**
 * BM25 algorithm configuration.
 *
 * BM25 (Best Match 25) extends TF-IDF with term-frequency saturation and
 * document length normalization.
 */
export interface BM25Config {
  /**
   * Term frequency saturation parameter (default: 1.5).
   *
   * - Lower k1 (e.g., 0.5): Diminishing returns kick in earlier
   * - Higher k1 (e.g., 2.0): More weight to repeated terms
   */
  k1?: number;
  /**
   * Document length normalization parameter (default: 0.75).
   *
   * - b=0: No length normalization
   * - b=1: Full length normalization
   */
  b?: number;
  /**
   * Floor for terms whose IDF would be negative (they occur in more than
   * half the corpus), as a fraction of the mean IDF (default: 0.25).
   */
  epsilon?: number;
}

/**
 * Options for one retrieve() call. Unset fields fall back to the
 * orchestrator's configured defaults.
 */
export interface RetrieveOptions {
  topK?: number;
  rerank?: boolean;
  expand?: boolean;
  signal?: AbortSignal;
}

/**
 * Embedding provider contract consumed by the retrieval pipeline.
 *
 * Implementations batch internally; one call may embed many texts.
 */
export interface EmbeddingProvider {
  /** Vector length produced by this provider */
  readonly dimensions: number;
  /** Model identifier, recorded in the saved index manifest */
  readonly model: string;
  embed(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}
