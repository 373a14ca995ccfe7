/**
 * Indexer Module
 *
 * Reads a JSONL corpus, embeds it in batches and saves the vector index.
 *
 * @example
 * ```ts
 * import { runIndexPipeline } from './indexer/index.js';
 *
 * const result = await runIndexPipeline({ corpusPath, index, embedder, indexPath });
 * console.log(`Indexed ${result.chunksRead} chunks`);
 * ```
 */

export { runIndexPipeline, IndexingCancelledError, type IndexPipelineOptions } from './pipeline.js';
export { parseCorpus, readCorpus, toChunk, CorpusRecordSchema, type CorpusRecord } from './corpus.js';
export type { IndexingStage, StageStats, IndexPipelineResult } from './types.js';
