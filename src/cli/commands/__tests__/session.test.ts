/**
 * Tests for session command
 *
 * Uses a session database file in a temp directory, so each subcommand
 * sees what the previous one wrote.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { createSessionCommand } from '../session.js';
import * as configLoader from '../../../config/loader.js';
import { FileNotFoundError, ValidationError } from '../../../errors/index.js';
import { createMockCommandContext, createTestConfig, type MockCommandContext } from './helpers.js';

vi.mock('../../../config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../config/loader.js')>()),
  loadConfig: vi.fn(),
}));

const EXPORT = {
  sessionId: 's1',
  messages: [
    { role: 'user', content: 'How do tokens rotate?', timestamp: '2026-01-01T00:00:00.000Z' },
    { role: 'assistant', content: 'Daily [c1].', timestamp: '2026-01-01T00:00:01.000Z' },
  ],
  summary: 'Asked about tokens.',
  exportedAt: '2026-01-01T00:00:02.000Z',
};

describe('createSessionCommand', () => {
  let tempDir: string;
  let exportPath: string;
  let ctx: MockCommandContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragent-session-'));
    exportPath = path.join(tempDir, 's1.json');
    fs.writeFileSync(exportPath, JSON.stringify(EXPORT));
    ctx = createMockCommandContext();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.mocked(configLoader.loadConfig).mockReturnValue(createTestConfig(tempDir));
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  async function runCommand(args: string[], context: MockCommandContext = ctx): Promise<void> {
    const program = new Command();
    program.addCommand(createSessionCommand(() => context));
    await program.parseAsync(['node', 'test', 'session', ...args]);
  }

  function lastJson(): unknown {
    const calls = consoleLogSpy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1]?.[0]));
  }

  it('has list, show, export, import and clear subcommands', () => {
    const command = createSessionCommand(() => ctx);

    expect(command.commands.map((sub) => sub.name())).toEqual(['list', 'show', 'export', 'import', 'clear']);
  });

  it('reports when there are no sessions', async () => {
    await runCommand(['list']);

    expect(ctx.logOutput[0]).toContain('No saved sessions');
  });

  it('imports an export and lists it', async () => {
    await runCommand(['import', exportPath]);
    await runCommand(['list'], createMockCommandContext({ json: true }));

    expect(lastJson()).toMatchObject({
      count: 1,
      sessions: [{ sessionId: 's1', messageCount: 2 }],
    });
  });

  it('shows a session as JSON', async () => {
    await runCommand(['import', exportPath]);

    await runCommand(['show', 's1'], createMockCommandContext({ json: true }));

    expect(lastJson()).toMatchObject({
      sessionId: 's1',
      state: 'active',
      summary: 'Asked about tokens.',
      messages: [
        { role: 'user', content: 'How do tokens rotate?' },
        { role: 'assistant', content: 'Daily [c1].' },
      ],
    });
  });

  it('exports a session to a file', async () => {
    const outputPath = path.join(tempDir, 'out.json');
    await runCommand(['import', exportPath]);

    await runCommand(['export', 's1', '--output', outputPath]);

    const exported = JSON.parse(fs.readFileSync(outputPath, 'utf-8'));
    expect(exported.sessionId).toBe('s1');
    expect(exported.messages).toEqual(EXPORT.messages);
    expect(exported.summary).toBe('Asked about tokens.');
  });

  it('exports to stdout without --output', async () => {
    await runCommand(['import', exportPath]);

    await runCommand(['export', 's1']);

    expect(lastJson()).toMatchObject({ sessionId: 's1', messages: EXPORT.messages });
  });

  it('throws for an unknown session', async () => {
    await expect(runCommand(['show', 'nope'])).rejects.toThrow('Session not found: nope');
  });

  describe('clear', () => {
    it('requires --force', async () => {
      await runCommand(['import', exportPath]);

      await runCommand(['clear', 's1']);

      expect(process.exitCode).toBe(1);
      await runCommand(['show', 's1'], createMockCommandContext({ json: true }));
      expect(lastJson()).toMatchObject({ sessionId: 's1' });
    });

    it('deletes the session with --force', async () => {
      await runCommand(['import', exportPath]);

      await runCommand(['clear', 's1', '--force']);

      await expect(runCommand(['show', 's1'])).rejects.toThrow('Session not found: s1');
    });
  });

  describe('import errors', () => {
    it('rejects a missing file', async () => {
      await expect(runCommand(['import', path.join(tempDir, 'missing.json')])).rejects.toThrow(
        FileNotFoundError
      );
    });

    it('rejects a file that is not JSON', async () => {
      fs.writeFileSync(exportPath, '{oops');

      await expect(runCommand(['import', exportPath])).rejects.toThrow(ValidationError);
    });

    it('rejects JSON that is not a session export', async () => {
      fs.writeFileSync(exportPath, JSON.stringify({ sessionId: '', messages: [] }));

      await expect(runCommand(['import', exportPath])).rejects.toThrow('Invalid session export');
    });
  });
});
