/**
 * Index Pipeline
 *
 * Orchestrates the complete indexing workflow:
 * Read → Embed → Save
 *
 * It doesn't know HOW to display progress - that's the ProgressReporter's
 * job. It just fires callbacks at the right moments.
 *
 * Chunks are added to the in-memory index batch by batch; nothing is
 * written until every batch succeeded, so a failed or cancelled run
 * leaves the saved index as it was.
 */

import { CANCELLED_EXIT_CODE, CLIError, ValidationError } from '../errors/index.js';
import { ProviderError } from '../providers/errors.js';
import type { VectorIndex } from '../search/vector-index.js';
import type { EmbeddingProvider } from '../search/types.js';
import { readCorpus, toChunk, type CorpusRecord } from './corpus.js';
import type { IndexingStage, IndexPipelineResult, StageStats } from './types.js';

/** Default texts per embedding request */
const DEFAULT_BATCH_SIZE = 64;

/**
 * Options for running the index pipeline.
 */
export interface IndexPipelineOptions {
  /** JSONL corpus file */
  corpusPath: string;

  /** Index to add to; load a saved index first to append */
  index: VectorIndex;

  embedder: EmbeddingProvider;

  /** Directory the index is saved to */
  indexPath: string;

  /** Texts per embedding request (default: 64) */
  batchSize?: number;

  /**
   * When aborted, the pipeline stops at the next batch boundary and
   * saves nothing.
   */
  signal?: AbortSignal;

  // Progress callbacks
  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
}

/**
 * Error thrown when indexing is cancelled via AbortSignal.
 */
export class IndexingCancelledError extends CLIError {
  constructor() {
    super('Indexing cancelled', 'Nothing was saved; run the command again to index the corpus', CANCELLED_EXIT_CODE);
    this.name = 'IndexingCancelledError';
  }
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IndexingCancelledError();
  }
}

/**
 * Run the complete indexing pipeline.
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, verbose: false, isInteractive: true });
 *
 * const result = await runIndexPipeline({
 *   corpusPath: './corpus.jsonl',
 *   index,
 *   embedder,
 *   indexPath: expandHome(config.storage.index_path),
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed) => reporter.updateProgress(processed),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 * });
 *
 * reporter.showSummary(result);
 * ```
 *
 * @throws ValidationError for an invalid corpus or ids that are already indexed
 * @throws ProviderError if the embedding provider fails
 * @throws IndexingCancelledError if `signal` is aborted
 */
export async function runIndexPipeline(options: IndexPipelineOptions): Promise<IndexPipelineResult> {
  const { corpusPath, index, embedder, indexPath, signal, onStageStart, onProgress, onStageComplete } =
    options;
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<IndexingStage, number>> = {};

  // =========================================================================
  // STAGE 1: READING
  // =========================================================================
  checkCancelled(signal);
  const readStartTime = performance.now();
  onStageStart?.('reading', 0);

  const records = await readCorpus(corpusPath);
  const alreadyIndexed = records.filter((record) => index.getById(record.chunkId) !== undefined);
  if (alreadyIndexed.length > 0) {
    throw new ValidationError(
      `${alreadyIndexed.length} chunk id(s) in ${corpusPath} are already indexed`,
      alreadyIndexed.slice(0, 10).map((record) => record.chunkId)
    );
  }

  stageDurations.reading = Math.round(performance.now() - readStartTime);
  onStageComplete?.('reading', {
    stage: 'reading',
    processed: records.length,
    total: records.length,
    durationMs: stageDurations.reading,
  });

  // =========================================================================
  // STAGE 2: EMBEDDING
  // =========================================================================
  checkCancelled(signal);
  const embedStartTime = performance.now();
  onStageStart?.('embedding', records.length);

  let chunksEmbedded = 0;
  let processed = 0;
  for (let start = 0; start < records.length; start += batchSize) {
    checkCancelled(signal);
    const batch = records.slice(start, start + batchSize);
    const vectors = await embedBatch(batch, embedder, signal);
    index.add(vectors, batch.map(toChunk));

    chunksEmbedded += batch.filter((record) => record.embedding === undefined).length;
    processed += batch.length;
    onProgress?.('embedding', processed, records.length);
  }

  stageDurations.embedding = Math.round(performance.now() - embedStartTime);
  onStageComplete?.('embedding', {
    stage: 'embedding',
    processed,
    total: records.length,
    durationMs: stageDurations.embedding,
    details: { embedded: chunksEmbedded, precomputed: records.length - chunksEmbedded },
  });

  // =========================================================================
  // STAGE 3: SAVING
  // =========================================================================
  checkCancelled(signal);
  const saveStartTime = performance.now();
  onStageStart?.('saving', index.size);

  const manifest = await index.save(indexPath, embedder.model);

  stageDurations.saving = Math.round(performance.now() - saveStartTime);
  onStageComplete?.('saving', {
    stage: 'saving',
    processed: manifest.count,
    total: manifest.count,
    durationMs: stageDurations.saving,
  });

  return {
    corpusPath,
    indexPath,
    model: embedder.model,
    chunksRead: records.length,
    chunksEmbedded,
    chunksPrecomputed: records.length - chunksEmbedded,
    totalChunks: manifest.count,
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
  };
}

/**
 * Vectors for one batch, in record order. Records with a precomputed
 * embedding keep it; the rest are embedded in a single request.
 */
async function embedBatch(
  batch: readonly CorpusRecord[],
  embedder: EmbeddingProvider,
  signal: AbortSignal | undefined
): Promise<number[][]> {
  const pending = batch.filter((record) => record.embedding === undefined);
  let computed: number[][] = [];

  if (pending.length > 0) {
    try {
      computed = await embedder.embed(
        pending.map((record) => record.content),
        { signal }
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new IndexingCancelledError();
      }
      throw ProviderError.wrap(embedder.model, 'embed', error);
    }
    if (computed.length !== pending.length) {
      throw new ProviderError(
        embedder.model,
        'embed',
        `returned ${computed.length} vectors for ${pending.length} texts`
      );
    }
  }

  let next = 0;
  return batch.map((record) => record.embedding ?? computed[next++] ?? []);
}
