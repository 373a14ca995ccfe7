/**
 * Tests for ask command
 *
 * The agent loop runs for real against a saved index, with a mock
 * generation provider and an in-memory session database.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { createAskCommand } from '../ask.js';
import * as configLoader from '../../../config/loader.js';
import * as appContext from '../../../app/context.js';
import type { Config } from '../../../config/schema.js';
import { IN_MEMORY } from '../../../database/connection.js';
import {
  FakeEmbeddingProvider,
  createMockGenerationProvider,
  makeChunk,
  streamOf,
  type MockGenerationProvider,
} from '../../../test-utils/index.js';
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

const ANSWER = 'Tokens rotate daily [c1].';

describe('createAskCommand', () => {
  let tempDir: string;
  let config: Config;
  let ctx: MockCommandContext;
  let generator: MockGenerationProvider;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let stdoutWriteSpy: MockInstance<typeof process.stdout.write>;
  let written: string[];

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragent-ask-'));
    config = createTestConfig(tempDir);
    ctx = createMockCommandContext();
    written = [];
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });

    generator = createMockGenerationProvider();
    vi.mocked(configLoader.loadConfig).mockReturnValue(config);

    const actual = await vi.importActual<typeof import('../../../app/context.js')>('../../../app/context.js');
    vi.mocked(appContext.createAppContext).mockImplementation((resolved, options = {}) =>
      actual.createAppContext(resolved, {
        ...options,
        embedder: new FakeEmbeddingProvider(TEST_DIMENSIONS, { 'How are tokens rotated?': [1, 0, 0, 0] }),
        generator,
        relevanceModel: null,
        databasePath: IN_MEMORY,
      })
    );

    await saveTestIndex(config, [
      { vector: [1, 0, 0, 0], chunk: makeChunk('c1', 'Tokens rotate every day.', 'ops', { filename: 'rotation.md' }) },
      { vector: [0, 1, 0, 0], chunk: makeChunk('c2', 'Deploys run on Fridays.', 'ops') },
    ]);
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
    stdoutWriteSpy.mockRestore();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  async function runCommand(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createAskCommand(() => ctx));
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  function lastContext(): appContext.AppContext | undefined {
    const results = vi.mocked(appContext.createAppContext).mock.results;
    const last = results[results.length - 1];
    return last?.type === 'return' ? last.value : undefined;
  }

  describe('command structure', () => {
    it('creates a command named "ask" with a required question', () => {
      const command = createAskCommand(() => ctx);

      expect(command.name()).toBe('ask');
      expect(command.registeredArguments[0]?.name()).toBe('question');
      expect(command.registeredArguments[0]?.required).toBe(true);
    });

    it('defaults --session to "default"', () => {
      const command = createAskCommand(() => ctx);
      const session = command.options.find((option) => option.long === '--session');

      expect(session?.short).toBe('-s');
      expect(session?.defaultValue).toBe('default');
    });
  });

  it('prints the answer and its sources', async () => {
    generator.generate.mockResolvedValueOnce('NO').mockResolvedValueOnce(ANSWER);

    await runCommand(['How are tokens rotated?']);

    expect(ctx.logOutput[0]).toBe(ANSWER);
    expect(ctx.logOutput).toContain('[1] rotation.md (c1)');
    expect(ctx.warnings).toEqual([]);
  });

  it('records the turn in the session', async () => {
    generator.generate.mockResolvedValueOnce('NO').mockResolvedValueOnce(ANSWER);

    await runCommand(['How are tokens rotated?', '--session', 'ops-review']);

    const history = lastContext()?.conversation.getHistory('ops-review') ?? [];
    expect(history.map((message) => [message.role, message.content])).toEqual([
      ['user', 'How are tokens rotated?'],
      ['assistant', ANSWER],
    ]);
  });

  it('prints JSON output with --json', async () => {
    ctx = createMockCommandContext({ json: true });
    generator.generate.mockResolvedValueOnce('NO').mockResolvedValueOnce(ANSWER);

    await runCommand(['How are tokens rotated?']);

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.question).toBe('How are tokens rotated?');
    expect(output.sessionId).toBe('default');
    expect(output.answer).toBe(ANSWER);
    expect(output.mode).toBe('simple');
    expect(output.citations).toEqual([
      { chunkId: 'c1', docId: 'ops', source: 'Unknown', filename: 'rotation.md', chunkIndex: 0 },
    ]);
    expect(output.toolsUsed).toEqual([]);
    expect(output.metadata.iterations).toBe(0);
    expect(output.metadata.chunksUsed).toBe(2);
    expect(output.metadata.provider).toBe('mock');
    expect(output.metadata.model).toBe('mock-model');
  });

  it('reports tools used by the agentic path', async () => {
    ctx = createMockCommandContext({ json: true });
    generator.generate.mockResolvedValueOnce('YES');
    generator.generateWithTools
      .mockResolvedValueOnce({
        type: 'tool_use',
        calls: [{ name: 'retrieve_knowledge', input: { query: 'token rotation' } }],
      })
      .mockResolvedValueOnce({ type: 'final_answer', text: ANSWER });

    await runCommand(['How are tokens rotated?']);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.mode).toBe('agentic');
    expect(output.metadata.iterations).toBe(2);
    expect(output.toolsUsed).toEqual([{ toolName: 'retrieve_knowledge', iteration: 1, status: 'success' }]);
  });

  it('streams the answer with --stream', async () => {
    generator.generateStream.mockImplementation(() => streamOf(['Tokens rotate ', 'daily [c1].']));

    await runCommand(['How are tokens rotated?', '--stream']);

    expect(written).toContain('Tokens rotate ');
    expect(written).toContain('daily [c1].');
    expect(ctx.logOutput).toContain('[1] rotation.md (c1)');
    expect(process.exitCode).toBeUndefined();
  });

  it('sets the exit code when the stream ends in an error', async () => {
    generator.generateStream.mockImplementation(async function* () {
      yield* [];
      throw new Error('overloaded');
    });

    await runCommand(['How are tokens rotated?', '--stream']);

    expect(ctx.errorOutput).toEqual(['mock stream failed: overloaded']);
    expect(process.exitCode).toBe(8);
  });

  it('warns when there is no saved index', async () => {
    fs.rmSync(config.storage.index_path, { recursive: true, force: true });
    generator.generate.mockResolvedValueOnce('NO').mockResolvedValueOnce('I do not know.');

    await runCommand(['How are tokens rotated?']);

    expect(ctx.warnings).toEqual([
      'No index found, answering without retrieved context. Run: ragent index <corpus.jsonl>',
    ]);
    expect(ctx.logOutput[0]).toBe('I do not know.');
  });

  it('rejects an empty question', async () => {
    await expect(runCommand([''])).rejects.toThrow('Question cannot be empty');
    expect(appContext.createAppContext).not.toHaveBeenCalled();
  });
});
