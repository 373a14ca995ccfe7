/**
 * Conversation Store
 *
 * Per-session message history with background condensation. Once a
 * session holds more than `summarizationThreshold` live messages, the
 * oldest ones are folded into a running summary until `maxHistory`
 * remain:
 *
 *   [summary][m0 … m(n-maxHistory-1)][… last maxHistory]
 *            └──── condensed ───────┘
 *
 * addMessage() never waits for condensation. Condensation jobs run
 * through a per-session serializer, so a session is condensed by at most
 * one job at a time, and only the prefix that was summarized is removed:
 * messages added while the summarizer runs stay live.
 */

import { setImmediate as nextTick } from 'node:timers/promises';

import { KeyedSerializer, estimateTokens, silentLogger, type Logger } from '../utils/index.js';
import { ValidationError } from '../errors/index.js';
import { ExtractiveSummarizer } from './summarizer.js';
import {
  SessionExportSchema,
  type ContextMessage,
  type Message,
  type MessageMetadata,
  type MessageRole,
  type SessionExport,
  type SessionRecord,
  type SessionRepository,
  type SessionState,
  type SessionView,
  type Summarizer,
} from './types.js';

/** Live messages kept after condensation */
export const DEFAULT_MAX_HISTORY = 10;

/** Live message count above which condensation starts */
export const DEFAULT_SUMMARIZATION_THRESHOLD = 20;

/** Default token budget for getContext() */
export const DEFAULT_CONTEXT_TOKENS = 2000;

export interface ConversationStoreOptions {
  maxHistory?: number;
  summarizationThreshold?: number;
  /** Default: ExtractiveSummarizer */
  summarizer?: Summarizer;
  /** Sessions are written through after every change when set */
  repository?: SessionRepository | null;
  logger?: Logger;
  /** Injected for tests */
  now?: () => Date;
}

interface SessionData {
  sessionId: string;
  state: SessionState;
  summary: string | null;
  messages: Message[];
  updatedAt: string;
}

export class ConversationStore {
  readonly maxHistory: number;
  readonly summarizationThreshold: number;
  private readonly summarizer: Summarizer;
  private readonly fallback = new ExtractiveSummarizer();
  private readonly repository: SessionRepository | null;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sessions = new Map<string, SessionData>();
  private readonly serializer = new KeyedSerializer();

  constructor(options: ConversationStoreOptions = {}) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.summarizationThreshold = options.summarizationThreshold ?? DEFAULT_SUMMARIZATION_THRESHOLD;
    this.summarizer = options.summarizer ?? this.fallback;
    this.repository = options.repository ?? null;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.maxHistory) || this.maxHistory < 1) {
      throw new ValidationError(`maxHistory must be a positive integer, got ${this.maxHistory}`);
    }
    if (this.summarizationThreshold < this.maxHistory) {
      throw new ValidationError(
        `summarizationThreshold (${this.summarizationThreshold}) must not be below maxHistory (${this.maxHistory})`
      );
    }
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Append a message, creating the session on first use. Queues a
   * condensation job when the session crosses the threshold.
   */
  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    metadata: MessageMetadata = {}
  ): Message {
    const session = this.getOrCreate(sessionId);
    const message: Message = {
      role,
      content,
      timestamp: this.now().toISOString(),
      metadata,
    };
    session.messages.push(message);
    session.updatedAt = message.timestamp;
    this.persist(session);

    if (session.state === 'active' && session.messages.length > this.summarizationThreshold) {
      this.scheduleCondense(session);
    }
    return message;
  }

  /**
   * Forget a session, in memory and in the repository. A condensation job
   * already running for it discards its result.
   */
  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.repository?.delete(sessionId);
  }

  /**
   * Replace a session with exported data.
   *
   * @throws ValidationError if `data` is not a valid session export
   */
  importSession(data: unknown): string {
    const parsed = SessionExportSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid session export',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }

    const { sessionId, messages, summary } = parsed.data;
    const session: SessionData = {
      sessionId,
      state: 'active',
      summary: summary ?? null,
      messages: messages.map((message) => ({ ...message, metadata: {} })),
      updatedAt: this.now().toISOString(),
    };
    this.sessions.set(sessionId, session);
    this.persist(session);

    if (session.messages.length > this.summarizationThreshold) {
      this.scheduleCondense(session);
    }
    return sessionId;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /** Live messages, oldest first (empty for unknown sessions) */
  getHistory(sessionId: string): readonly Message[] {
    return this.lookup(sessionId)?.messages.slice() ?? [];
  }

  getSummary(sessionId: string): string | null {
    return this.lookup(sessionId)?.summary ?? null;
  }

  getState(sessionId: string): SessionState | undefined {
    return this.lookup(sessionId)?.state;
  }

  getSession(sessionId: string): SessionView | undefined {
    const session = this.lookup(sessionId);
    if (!session) {
      return undefined;
    }
    return {
      sessionId: session.sessionId,
      state: session.state,
      summary: session.summary,
      messages: session.messages.slice(),
      updatedAt: session.updatedAt,
    };
  }

  /**
   * The most recent messages that fit in `maxTokens`, oldest first.
   *
   * Messages are taken newest-first and the scan stops at the first one
   * that would overflow. The summary is prepended as a system message only
   * when it fits in the remaining budget.
   */
  getContext(sessionId: string, maxTokens: number = DEFAULT_CONTEXT_TOKENS): ContextMessage[] {
    const session = this.lookup(sessionId);
    if (!session) {
      return [];
    }

    const context: ContextMessage[] = [];
    let total = 0;
    for (let i = session.messages.length - 1; i >= 0; i--) {
      const message = session.messages[i];
      if (!message) {
        continue;
      }
      const tokens = estimateTokens(message.content);
      if (total + tokens > maxTokens) {
        break;
      }
      context.unshift({ role: message.role, content: message.content, timestamp: message.timestamp });
      total += tokens;
    }

    if (session.summary) {
      const summaryTokens = estimateTokens(session.summary);
      if (total + summaryTokens < maxTokens) {
        context.unshift({
          role: 'system',
          content: `Previous conversation summary: ${session.summary}`,
          timestamp: null,
        });
      }
    }
    return context;
  }

  exportSession(sessionId: string): SessionExport | undefined {
    const session = this.lookup(sessionId);
    if (!session) {
      return undefined;
    }
    return {
      sessionId,
      messages: session.messages.map(({ role, content, timestamp }) => ({ role, content, timestamp })),
      ...(session.summary !== null && { summary: session.summary }),
      exportedAt: this.now().toISOString(),
    };
  }

  /** Session ids held in memory, plus persisted ones when a repository is set */
  listSessions(): string[] {
    const ids = new Set(this.sessions.keys());
    for (const listing of this.repository?.list() ?? []) {
      ids.add(listing.sessionId);
    }
    return [...ids];
  }

  // ==========================================================================
  // Coordination
  // ==========================================================================

  /**
   * Run `task` with exclusive access to the session: queued behind any
   * condensation job, and ahead of jobs queued while it runs.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.serializer.run(sessionId, task);
  }

  /** Resolves once no condensation job is queued or running for the session */
  whenIdle(sessionId: string): Promise<void> {
    return this.serializer.whenIdle(sessionId);
  }

  /** Resolves once no session has a condensation job queued or running */
  whenAllIdle(): Promise<void> {
    return this.serializer.whenAllIdle();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private lookup(sessionId: string): SessionData | undefined {
    const cached = this.sessions.get(sessionId);
    if (cached || !this.repository) {
      return cached;
    }

    const record = this.repository.load(sessionId);
    if (!record) {
      return undefined;
    }
    const session: SessionData = { ...record, state: 'active' };
    this.sessions.set(sessionId, session);
    return session;
  }

  private getOrCreate(sessionId: string): SessionData {
    const existing = this.lookup(sessionId);
    if (existing) {
      return existing;
    }
    const session: SessionData = {
      sessionId,
      state: 'active',
      summary: null,
      messages: [],
      updatedAt: this.now().toISOString(),
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  private persist(session: SessionData): void {
    this.repository?.save({
      sessionId: session.sessionId,
      summary: session.summary,
      messages: session.messages,
      updatedAt: session.updatedAt,
    } satisfies SessionRecord);
  }

  private scheduleCondense(session: SessionData): void {
    session.state = 'summarizing';
    void this.serializer.run(session.sessionId, () => this.condense(session)).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Condensing session ${session.sessionId} failed: ${message}`);
    });
  }

  private async condense(session: SessionData): Promise<void> {
    // Let the caller of addMessage() finish its synchronous work first
    await nextTick();

    try {
      const cut = session.messages.length - this.maxHistory;
      if (cut <= 0 || this.sessions.get(session.sessionId) !== session) {
        return;
      }

      const prefix = session.messages.slice(0, cut);
      const summary = await this.summarize(prefix, session.summary);

      // Cleared or replaced while the summarizer ran
      if (this.sessions.get(session.sessionId) !== session) {
        return;
      }
      session.summary = summary;
      session.messages.splice(0, cut);
      session.updatedAt = this.now().toISOString();
      this.persist(session);
      this.logger.debug?.(
        `Condensed ${cut} message(s) of session ${session.sessionId}, ${session.messages.length} live`
      );
    } finally {
      session.state = 'active';
      if (
        this.sessions.get(session.sessionId) === session &&
        session.messages.length > this.summarizationThreshold
      ) {
        this.scheduleCondense(session);
      }
    }
  }

  private async summarize(prefix: Message[], previous: string | null): Promise<string> {
    try {
      return await this.summarizer.summarize(prefix, previous);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Summarizer "${this.summarizer.name}" failed, using extractive summary: ${message}`);
      return this.fallback.summarize(prefix, previous);
    }
  }
}
