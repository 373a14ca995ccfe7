/**
 * Tests for index command
 *
 * Tests cover:
 * - Command structure and options
 * - Embedding a corpus into a fresh index
 * - --append and --batch-size
 * - NDJSON progress events with --json
 * - Invalid input (batch size, corpus, missing file)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { createIndexCommand } from '../index.js';
import * as configLoader from '../../../config/loader.js';
import * as appContext from '../../../app/context.js';
import type { Config } from '../../../config/schema.js';
import { IN_MEMORY } from '../../../database/connection.js';
import { VectorIndex } from '../../../search/vector-index.js';
import { FileNotFoundError, ValidationError } from '../../../errors/index.js';
import { FakeEmbeddingProvider, makeChunk } from '../../../test-utils/index.js';
import {
  createMockCommandContext,
  createTestConfig,
  saveTestIndex,
  TEST_DIMENSIONS,
  type MockCommandContext,
} from './helpers.js';

vi.mock('../../../config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../config/loader.js')>()),
  loadConfig: vi.fn(),
}));

vi.mock('../../../app/context.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../../../app/context.js')>();
  return { ...original, createAppContext: vi.fn(original.createAppContext) };
});

describe('createIndexCommand', () => {
  let tempDir: string;
  let corpusPath: string;
  let config: Config;
  let ctx: MockCommandContext;
  let embedder: FakeEmbeddingProvider;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function writeCorpus(lines: string[]): void {
    fs.writeFileSync(corpusPath, lines.join('\n'));
  }

  async function loadIndex(): Promise<VectorIndex> {
    const index = new VectorIndex({ dimensions: TEST_DIMENSIONS });
    await index.load(config.storage.index_path);
    return index;
  }

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragent-index-'));
    corpusPath = path.join(tempDir, 'corpus.jsonl');
    config = createTestConfig(tempDir);
    ctx = createMockCommandContext();
    embedder = new FakeEmbeddingProvider(TEST_DIMENSIONS);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    vi.mocked(configLoader.loadConfig).mockReturnValue(config);

    const actual = await vi.importActual<typeof import('../../../app/context.js')>('../../../app/context.js');
    vi.mocked(appContext.createAppContext).mockImplementation((resolved, options = {}) =>
      actual.createAppContext(resolved, {
        ...options,
        embedder,
        relevanceModel: null,
        databasePath: IN_MEMORY,
      })
    );

    writeCorpus([
      JSON.stringify({ chunkId: 'c1', docId: 'd1', content: 'alpha' }),
      JSON.stringify({ chunkId: 'c2', docId: 'd1', content: 'beta' }),
      JSON.stringify({ chunkId: 'c3', docId: 'd2', content: 'gamma' }),
    ]);
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  async function runCommand(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createIndexCommand(() => ctx));
    await program.parseAsync(['node', 'test', 'index', ...args]);
  }

  describe('command structure', () => {
    it('creates a command named "index" with a required corpus', () => {
      const command = createIndexCommand(() => ctx);

      expect(command.name()).toBe('index');
      expect(command.registeredArguments[0]?.name()).toBe('corpus');
      expect(command.registeredArguments[0]?.required).toBe(true);
    });

    it('has --append and --batch-size options', () => {
      const command = createIndexCommand(() => ctx);
      const append = command.options.find((option) => option.long === '--append');
      const batchSize = command.options.find((option) => option.long === '--batch-size');

      expect(append?.short).toBe('-a');
      expect(batchSize?.short).toBe('-b');
    });
  });

  it('embeds the corpus and saves the index', async () => {
    await runCommand([corpusPath]);

    const index = await loadIndex();
    expect(index.size).toBe(3);
    expect(index.getById('c2')?.content).toBe('beta');
  });

  it('builds the context without a generator', async () => {
    await runCommand([corpusPath]);

    const [, options] = vi.mocked(appContext.createAppContext).mock.calls[0] ?? [];
    expect(options?.generator).toBeNull();
  });

  it('uses --batch-size for embedding requests', async () => {
    await runCommand([corpusPath, '--batch-size', '2']);

    expect(embedder.calls).toEqual([['alpha', 'beta'], ['gamma']]);
  });

  it('replaces the saved index by default', async () => {
    await saveTestIndex(config, [{ vector: [0, 0, 0, 1], chunk: makeChunk('old') }]);

    await runCommand([corpusPath]);

    const index = await loadIndex();
    expect(index.size).toBe(3);
    expect(index.getById('old')).toBeUndefined();
  });

  it('adds to the saved index with --append', async () => {
    await saveTestIndex(config, [{ vector: [0, 0, 0, 1], chunk: makeChunk('old') }]);

    await runCommand([corpusPath, '--append']);

    const index = await loadIndex();
    expect(index.size).toBe(4);
    expect(index.getById('old')?.chunkId).toBe('old');
  });

  it('emits NDJSON progress events with --json', async () => {
    ctx = createMockCommandContext({ json: true });

    await runCommand([corpusPath]);

    const events = consoleLogSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
    const types = events.map((event: { type: string }) => event.type);
    expect(types[0]).toBe('stage_start');
    expect(types[types.length - 1]).toBe('complete');
    expect(events[events.length - 1].data.result.totalChunks).toBe(3);
    expect(
      events
        .filter((event: { type: string }) => event.type === 'stage_complete')
        .map((event: { stage: string }) => event.stage)
    ).toEqual(['reading', 'embedding', 'saving']);
  });

  it('rejects an invalid --batch-size', async () => {
    await expect(runCommand([corpusPath, '--batch-size', '0'])).rejects.toThrow(
      'Invalid --batch-size value: "0"'
    );
    expect(appContext.createAppContext).not.toHaveBeenCalled();
  });

  it('rejects a corpus with invalid lines and saves nothing', async () => {
    writeCorpus([JSON.stringify({ chunkId: 'c1', docId: 'd1', content: 'alpha' }), '{not json']);

    await expect(runCommand([corpusPath])).rejects.toThrow(ValidationError);
    expect(fs.existsSync(config.storage.index_path)).toBe(false);
  });

  it('throws FileNotFoundError for a missing corpus', async () => {
    await expect(runCommand([path.join(tempDir, 'missing.jsonl')])).rejects.toThrow(FileNotFoundError);
  });
});
