/**
 * Index Pipeline Tests
 *
 * Runs the pipeline against a temporary corpus file and index directory
 * with a deterministic fake embedder.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { runIndexPipeline, IndexingCancelledError } from '../pipeline.js';
import { VectorIndex } from '../../search/vector-index.js';
import { ProviderError } from '../../providers/errors.js';
import { ValidationError } from '../../errors/index.js';
import { FakeEmbeddingProvider, makeChunk } from '../../test-utils/index.js';

describe('runIndexPipeline', () => {
  let tempDir: string;
  let corpusPath: string;
  let indexPath: string;
  let embedder: FakeEmbeddingProvider;
  let index: VectorIndex;

  function writeCorpus(records: unknown[]): void {
    fs.writeFileSync(corpusPath, records.map((record) => JSON.stringify(record)).join('\n'));
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragent-pipeline-'));
    corpusPath = path.join(tempDir, 'corpus.jsonl');
    indexPath = path.join(tempDir, 'index');
    embedder = new FakeEmbeddingProvider(3);
    index = new VectorIndex({ dimensions: 3 });
    writeCorpus([
      { chunkId: 'c1', docId: 'd1', content: 'alpha' },
      { chunkId: 'c2', docId: 'd1', content: 'beta' },
      { chunkId: 'c3', docId: 'd2', content: 'gamma' },
    ]);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('embeds in batches and saves the index', async () => {
    const onProgress = vi.fn();

    const result = await runIndexPipeline({
      corpusPath,
      index,
      embedder,
      indexPath,
      batchSize: 2,
      onProgress,
    });

    expect(embedder.calls).toEqual([['alpha', 'beta'], ['gamma']]);
    expect(onProgress.mock.calls).toEqual([
      ['embedding', 2, 3],
      ['embedding', 3, 3],
    ]);
    expect(result).toMatchObject({
      corpusPath,
      indexPath,
      model: 'fake-embedding',
      chunksRead: 3,
      chunksEmbedded: 3,
      chunksPrecomputed: 0,
      totalChunks: 3,
    });

    const reloaded = new VectorIndex({ dimensions: 3 });
    const manifest = await reloaded.load(indexPath);
    expect(manifest.count).toBe(3);
    expect(manifest.model).toBe('fake-embedding');
  });

  it('reports stages in order', async () => {
    const stages: Array<[string, number]> = [];

    await runIndexPipeline({
      corpusPath,
      index,
      embedder,
      indexPath,
      onStageStart: (stage, total) => stages.push([stage, total]),
    });

    expect(stages).toEqual([
      ['reading', 0],
      ['embedding', 3],
      ['saving', 3],
    ]);
  });

  it('uses precomputed embeddings without calling the provider for them', async () => {
    writeCorpus([
      { chunkId: 'c1', docId: 'd1', content: 'alpha', embedding: [1, 0, 0] },
      { chunkId: 'c2', docId: 'd1', content: 'beta' },
    ]);

    const result = await runIndexPipeline({ corpusPath, index, embedder, indexPath });

    expect(embedder.calls).toEqual([['beta']]);
    expect(result.chunksEmbedded).toBe(1);
    expect(result.chunksPrecomputed).toBe(1);
    expect(index.search([1, 0, 0], 1)[0]?.chunk.chunkId).toBe('c1');
  });

  it('appends to an index that already holds chunks', async () => {
    index.add([[0, 0, 1]], [makeChunk('c0')]);

    const result = await runIndexPipeline({ corpusPath, index, embedder, indexPath });

    expect(result.chunksRead).toBe(3);
    expect(result.totalChunks).toBe(4);
  });

  it('rejects chunk ids that are already indexed and saves nothing', async () => {
    index.add([[0, 0, 1]], [makeChunk('c2')]);

    await expect(runIndexPipeline({ corpusPath, index, embedder, indexPath })).rejects.toThrow(
      ValidationError
    );
    expect(embedder.calls).toEqual([]);
    expect(fs.existsSync(indexPath)).toBe(false);
  });

  it('wraps embedding failures as ProviderError', async () => {
    embedder.failWith = new Error('rate limited');

    await expect(runIndexPipeline({ corpusPath, index, embedder, indexPath })).rejects.toThrow(
      new ProviderError('fake-embedding', 'embed', 'rate limited')
    );
    expect(fs.existsSync(indexPath)).toBe(false);
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runIndexPipeline({ corpusPath, index, embedder, indexPath, signal: controller.signal })
    ).rejects.toThrow(IndexingCancelledError);
    expect(embedder.calls).toEqual([]);
  });
});
