/**
 * Application context tests
 *
 * Builds the context from configuration with in-process fakes for the
 * providers and an in-memory session database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { createAppContext, loadSavedIndex, shutdownAppContext, type AppContext } from '../context.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import { IN_MEMORY } from '../../database/connection.js';
import { ValidationError } from '../../errors/index.js';
import {
  FakeEmbeddingProvider,
  createMockGenerationProvider,
  makeChunk,
} from '../../test-utils/index.js';

describe('createAppContext', () => {
  let tempDir: string;
  let config: Config;
  const opened: AppContext[] = [];

  function build(overrides: Parameters<typeof createAppContext>[1] = {}): AppContext {
    const context = createAppContext(config, {
      embedder: new FakeEmbeddingProvider(4, { auth: [1, 0, 0, 0] }),
      generator: createMockGenerationProvider(),
      relevanceModel: null,
      databasePath: IN_MEMORY,
      ...overrides,
    });
    opened.push(context);
    return context;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragent-context-'));
    config = {
      ...DEFAULT_CONFIG,
      embedding: { ...DEFAULT_CONFIG.embedding, dimensions: 4 },
      budget: { ...DEFAULT_CONFIG.budget, sweep_interval_seconds: 0 },
      storage: { ...DEFAULT_CONFIG.storage, index_path: path.join(tempDir, 'index') },
    };
  });

  afterEach(async () => {
    for (const context of opened.splice(0)) {
      if (context.database.open) {
        await shutdownAppContext(context);
      }
    }
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('registers the retrieval tool and builds an agent', () => {
    const context = build();

    expect(context.tools.listTools().map((tool) => tool.name)).toEqual(['retrieve_knowledge']);
    expect(context.agent).not.toBeNull();
    expect(context.retrieval.hybrid).toBe(true);
    expect(context.budget.maxActionsPerSession).toBe(10);
    expect(context.conversation.summarizationThreshold).toBe(20);
  });

  it('has no agent without a generation provider', () => {
    const context = build({ generator: null });

    expect(context.generator).toBeNull();
    expect(context.agent).toBeNull();
  });

  it('rejects an embedder whose dimension differs from the index', () => {
    expect(() => build({ embedder: new FakeEmbeddingProvider(3) })).toThrow(ValidationError);
  });

  it('retrieves from chunks added to the index', async () => {
    const context = build();
    context.index.add(
      [
        [1, 0, 0, 0],
        [0, 1, 0, 0],
      ],
      [makeChunk('c1'), makeChunk('c2')]
    );

    const result = await context.retrieval.retrieve('auth', { topK: 1 });

    expect(result.chunks.map((candidate) => candidate.chunk.chunkId)).toEqual(['c1']);
    expect(result.reranked).toBe(false);
  });

  describe('loadSavedIndex', () => {
    it('returns null when nothing was indexed', async () => {
      const context = build();

      await expect(loadSavedIndex(context)).resolves.toBeNull();
      expect(context.index.size).toBe(0);
    });

    it('loads an index saved by an earlier context', async () => {
      const writer = build();
      writer.index.add([[0, 0, 1, 0]], [makeChunk('saved')]);
      await writer.index.save(writer.indexPath, 'fake-embedding');

      const reader = build();
      const manifest = await loadSavedIndex(reader);

      expect(manifest?.count).toBe(1);
      expect(manifest?.model).toBe('fake-embedding');
      expect(reader.index.getById('saved')?.chunkId).toBe('saved');
    });
  });

  it('closes the database on shutdown', async () => {
    const context = build();
    context.conversation.addMessage('s1', 'user', 'hello');

    await shutdownAppContext(context);

    expect(context.database.open).toBe(false);
  });
});
