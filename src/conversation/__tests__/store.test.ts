/**
 * ConversationStore Tests
 *
 * Verifies:
 * - Condensation keeps the newest maxHistory messages and summarizes the rest
 * - Messages added during condensation stay live
 * - Summarizer failure falls back to the extractive summary
 * - getContext() token budgeting and summary placement
 * - Export/import, persistence and per-session exclusivity
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { ConversationStore } from '../store.js';
import type { Message, Summarizer } from '../types.js';
import { ValidationError } from '../../errors/index.js';
import { openDatabase, IN_MEMORY, SqliteSessionRepository } from '../../database/index.js';
import { createRecordingLogger } from '../../test-utils/index.js';

// ============================================================================
// Test Helpers
// ============================================================================

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

function addMany(store: ConversationStore, sessionId: string, count: number, offset = 0): void {
  for (let i = offset; i < offset + count; i++) {
    store.addMessage(sessionId, i % 2 === 0 ? 'user' : 'assistant', `message ${i}`);
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ============================================================================
// Tests
// ============================================================================

describe('ConversationStore', () => {
  describe('condensation', () => {
    it('condenses 25 messages into a summary plus the newest 10', async () => {
      const store = new ConversationStore({ summarizationThreshold: 20, maxHistory: 10 });

      addMany(store, 's', 25);
      expect(store.getState('s')).toBe('summarizing');
      await store.whenIdle('s');

      const history = store.getHistory('s');
      expect(history).toHaveLength(10);
      expect(history.map((m) => m.content)).toEqual(
        Array.from({ length: 10 }, (_, i) => `message ${i + 15}`)
      );
      expect(store.getSummary('s')).toBe(
        Array.from({ length: 15 }, (_, i) => `${i % 2 === 0 ? 'user' : 'assistant'}: message ${i}`).join('\n')
      );
      expect(store.getState('s')).toBe('active');
    });

    it('does not condense at or below the threshold', async () => {
      const store = new ConversationStore();

      addMany(store, 's', 20);
      await store.whenIdle('s');

      expect(store.getHistory('s')).toHaveLength(20);
      expect(store.getSummary('s')).toBeNull();
    });

    it('keeps messages added while the summarizer runs', async () => {
      const called = deferred<readonly Message[]>();
      const release = deferred<string>();
      const summarizer: Summarizer = {
        name: 'slow',
        summarize: async (messages) => {
          called.resolve(messages);
          return release.promise;
        },
      };
      const store = new ConversationStore({ summarizer });

      addMany(store, 's', 21);
      const condensed = await called.promise;
      addMany(store, 's', 2, 21);
      release.resolve('first eleven');
      await store.whenIdle('s');

      expect(condensed).toHaveLength(11);
      expect(store.getSummary('s')).toBe('first eleven');
      expect(store.getHistory('s').map((m) => m.content)).toEqual(
        Array.from({ length: 12 }, (_, i) => `message ${i + 11}`)
      );
    });

    it('passes the previous summary into the next condensation', async () => {
      const summarize = vi.fn<Summarizer['summarize']>(async (messages, previous) =>
        `${previous ?? 'none'} + ${messages.length}`
      );
      const store = new ConversationStore({ summarizer: { name: 'counting', summarize } });

      addMany(store, 's', 21);
      await store.whenIdle('s');
      addMany(store, 's', 11, 21);
      await store.whenIdle('s');

      expect(store.getSummary('s')).toBe('none + 11 + 11');
      expect(store.getHistory('s')).toHaveLength(10);
    });

    it('falls back to the extractive summary when the summarizer fails', async () => {
      const logger = createRecordingLogger();
      const store = new ConversationStore({
        summarizer: { name: 'broken', summarize: async () => Promise.reject(new Error('timeout')) },
        logger,
      });

      addMany(store, 's', 21);
      await store.whenIdle('s');

      expect(store.getHistory('s')).toHaveLength(10);
      expect(store.getSummary('s')).toMatch(/^user: message 0\nassistant: message 1\n/);
      expect(logger.warnings).toEqual([
        'Summarizer "broken" failed, using extractive summary: timeout',
      ]);
    });

    it('discards the result when the session is cleared meanwhile', async () => {
      const release = deferred<string>();
      const store = new ConversationStore({
        summarizer: { name: 'slow', summarize: async () => release.promise },
      });

      addMany(store, 's', 21);
      await new Promise((resolve) => setTimeout(resolve, 0));
      store.clear('s');
      release.resolve('late summary');
      await store.whenIdle('s');

      expect(store.getSession('s')).toBeUndefined();
    });
  });

  describe('getContext', () => {
    function storeWithContext(): ConversationStore {
      const store = new ConversationStore();
      store.importSession({
        sessionId: 's',
        summary: 'short summary here',
        exportedAt: '2026-01-01T00:00:00.000Z',
        messages: [
          { role: 'user', content: 'a b c d e f g h i j', timestamp: 't1' },
          { role: 'assistant', content: 'a b c', timestamp: 't2' },
          { role: 'user', content: 'x y z', timestamp: 't3' },
        ],
      });
      return store;
    }

    it('fills backward and stops at the first overflow', () => {
      const store = new ConversationStore();
      store.addMessage('s', 'user', 'a b c d e f g h i j');
      store.addMessage('s', 'assistant', 'a b c');
      store.addMessage('s', 'user', 'x y z');

      expect(store.getContext('s', 8).map((m) => m.content)).toEqual(['a b c', 'x y z']);
      // two 3-word messages estimate to 7.8 tokens
      expect(store.getContext('s', 7).map((m) => m.content)).toEqual(['x y z']);
    });

    it('keeps many short messages within the budget', () => {
      const store = new ConversationStore();
      store.importSession({
        sessionId: 's',
        exportedAt: '2026-01-01T00:00:00.000Z',
        messages: Array.from({ length: 10 }, (_, i) => ({
          role: i % 2 === 0 ? 'user' : 'assistant',
          content: `word${i}`,
          timestamp: `t${i}`,
        })),
      });

      const context = store.getContext('s', 10);
      const estimated = context.reduce((sum, m) => sum + m.content.split(/\s+/).length * 1.3, 0);

      expect(context.map((m) => m.content)).toEqual(['word3', 'word4', 'word5', 'word6', 'word7', 'word8', 'word9']);
      expect(estimated).toBeLessThanOrEqual(10);
    });

    it('prepends the summary when it fits', () => {
      const context = storeWithContext().getContext('s', 12);

      expect(context).toEqual([
        { role: 'system', content: 'Previous conversation summary: short summary here', timestamp: null },
        { role: 'assistant', content: 'a b c', timestamp: 't2' },
        { role: 'user', content: 'x y z', timestamp: 't3' },
      ]);
    });

    it('omits the summary when it would exhaust the budget', () => {
      const context = storeWithContext().getContext('s', 9);

      expect(context.map((m) => m.role)).toEqual(['assistant', 'user']);
    });

    it('returns [] for unknown sessions', () => {
      expect(new ConversationStore().getContext('missing')).toEqual([]);
    });
  });

  describe('export and import', () => {
    it('exports role, content and timestamp with the summary', async () => {
      const store = new ConversationStore({ now: () => FIXED_NOW });
      addMany(store, 's', 21);
      await store.whenIdle('s');

      const exported = store.exportSession('s');

      expect(exported?.sessionId).toBe('s');
      expect(exported?.exportedAt).toBe('2026-03-01T12:00:00.000Z');
      expect(exported?.messages[0]).toEqual({
        role: 'assistant',
        content: 'message 11',
        timestamp: '2026-03-01T12:00:00.000Z',
      });
      expect(exported?.summary).toContain('user: message 0');
    });

    it('omits the summary key when there is none', () => {
      const store = new ConversationStore({ now: () => FIXED_NOW });
      store.addMessage('s', 'user', 'hi');

      expect(store.exportSession('s')).toEqual({
        sessionId: 's',
        messages: [{ role: 'user', content: 'hi', timestamp: '2026-03-01T12:00:00.000Z' }],
        exportedAt: '2026-03-01T12:00:00.000Z',
      });
    });

    it('round-trips through importSession', () => {
      const source = new ConversationStore();
      source.addMessage('s', 'user', 'hi');
      source.addMessage('s', 'assistant', 'hello');
      const exported = source.exportSession('s');

      const target = new ConversationStore();
      target.importSession(exported);

      expect(target.getHistory('s').map((m) => [m.role, m.content])).toEqual([
        ['user', 'hi'],
        ['assistant', 'hello'],
      ]);
    });

    it('rejects malformed exports', () => {
      const store = new ConversationStore();

      expect(() => store.importSession({ sessionId: 's', messages: [{ role: 'robot' }] })).toThrow(
        ValidationError
      );
      expect(store.getSession('s')).toBeUndefined();
    });
  });

  describe('persistence', () => {
    const databases: Array<{ close(): void }> = [];

    afterEach(() => {
      databases.splice(0).forEach((db) => db.close());
    });

    it('restores sessions from the repository in a new store', async () => {
      const db = openDatabase(IN_MEMORY);
      databases.push(db);
      const repository = new SqliteSessionRepository(db);

      const first = new ConversationStore({ repository });
      addMany(first, 's', 21);
      await first.whenIdle('s');

      const second = new ConversationStore({ repository });

      expect(second.getHistory('s')).toHaveLength(10);
      expect(second.getSummary('s')).toBe(first.getSummary('s'));
      expect(second.listSessions()).toEqual(['s']);
    });

    it('clear() removes the persisted session', () => {
      const db = openDatabase(IN_MEMORY);
      databases.push(db);
      const repository = new SqliteSessionRepository(db);
      const store = new ConversationStore({ repository });
      store.addMessage('s', 'user', 'hi');

      store.clear('s');

      expect(repository.load('s')).toBeUndefined();
      expect(store.getHistory('s')).toEqual([]);
    });
  });

  describe('runExclusive', () => {
    it('holds condensation back until the exclusive task finishes', async () => {
      const store = new ConversationStore();
      const release = deferred<void>();

      const exclusive = store.runExclusive('s', async () => {
        addMany(store, 's', 21);
        await release.promise;
        return store.getHistory('s').length;
      });
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(store.getState('s')).toBe('summarizing');
      release.resolve();
      expect(await exclusive).toBe(21);
      await store.whenIdle('s');
      expect(store.getHistory('s')).toHaveLength(10);
    });
  });

  it('rejects a threshold below maxHistory', () => {
    expect(() => new ConversationStore({ maxHistory: 10, summarizationThreshold: 5 })).toThrow(
      ValidationError
    );
  });
});
