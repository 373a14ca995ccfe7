/**
 * Indexing Types
 *
 * Shared between the index pipeline (which fires callbacks) and the CLI
 * progress reporter (which renders them).
 */

/**
 * Stages in the indexing pipeline.
 * Order matters - this is the sequence they occur in.
 */
export type IndexingStage = 'reading' | 'embedding' | 'saving';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  /** Which stage completed */
  stage: IndexingStage;

  /** Number of items processed */
  processed: number;

  /** Total items in this stage */
  total: number;

  /** Time taken in milliseconds */
  durationMs: number;

  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Final result of the indexing pipeline.
 */
export interface IndexPipelineResult {
  corpusPath: string;

  /** Directory the index was saved to */
  indexPath: string;

  /** Embedding model recorded in the manifest */
  model: string;

  /** Chunks read from the corpus file */
  chunksRead: number;

  /** Chunks embedded by the provider */
  chunksEmbedded: number;

  /** Chunks that arrived with a precomputed embedding */
  chunksPrecomputed: number;

  /** Chunks in the saved index, earlier ones included */
  totalChunks: number;

  /** Total time in milliseconds */
  totalDurationMs: number;

  /** Time breakdown by stage */
  stageDurations: Partial<Record<IndexingStage, number>>;
}
