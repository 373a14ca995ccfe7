/**
 * Action Budget Guard
 *
 * Per-session throttle on tool invocations with two limits:
 * - a lifetime cap (`maxActionsPerSession`)
 * - a sliding one-minute window (`maxActionsPerMinute`)
 *
 * A session idle for longer than `resetAfterSeconds` starts over on its
 * next check. The window is pruned on every check, so the optional sweep
 * timer only frees memory held by idle sessions.
 *
 * checkBudget() and increment() are synchronous: a caller that checks and
 * increments without awaiting in between cannot be interleaved by another
 * run of the same session.
 *
 * @example
 * ```typescript
 * const guard = new ActionBudgetGuard({ maxActionsPerMinute: 5 });
 * if (guard.checkBudget(sessionId)) {
 *   guard.increment(sessionId);
 *   await registry.executeTool(name, input);
 * }
 * ```
 */

import { silentLogger, type Logger } from '../utils/index.js';
import type { BudgetLimit } from './errors.js';

export const WINDOW_MS = 60_000;

export interface ActionBudgetOptions {
  maxActionsPerSession?: number;
  maxActionsPerMinute?: number;
  /** Idle time after which a session's counters reset (default: 3600) */
  resetAfterSeconds?: number;
  /** Period of the idle-entry sweep; 0 or unset disables it */
  sweepIntervalSeconds?: number;
  /** Clock in milliseconds, injected for tests */
  now?: () => number;
  logger?: Logger;
}

export type BudgetDecision = { allowed: true } | { allowed: false; limit: BudgetLimit };

interface SessionBudget {
  lifetimeCount: number;
  /** Invocation times inside the current window, oldest first */
  windowTimestamps: number[];
  lastActivity: number;
}

export class ActionBudgetGuard {
  readonly maxActionsPerSession: number;
  readonly maxActionsPerMinute: number;
  private readonly resetAfterMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, SessionBudget>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: ActionBudgetOptions = {}) {
    this.maxActionsPerSession = options.maxActionsPerSession ?? 10;
    this.maxActionsPerMinute = options.maxActionsPerMinute ?? 20;
    this.resetAfterMs = (options.resetAfterSeconds ?? 3600) * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;

    const sweepSeconds = options.sweepIntervalSeconds ?? 0;
    if (sweepSeconds > 0) {
      this.sweeper = setInterval(() => this.sweep(), sweepSeconds * 1000);
      this.sweeper.unref();
    }
  }

  /**
   * Whether the session may invoke one more tool right now.
   */
  checkBudget(sessionId: string): boolean {
    return this.check(sessionId).allowed;
  }

  /**
   * Like checkBudget(), but names the limit that blocked the call.
   */
  check(sessionId: string): BudgetDecision {
    const now = this.now();
    const budget = this.sessions.get(sessionId);
    if (!budget) {
      return this.maxActionsPerSession > 0 && this.maxActionsPerMinute > 0
        ? { allowed: true }
        : { allowed: false, limit: this.maxActionsPerSession > 0 ? 'minute' : 'session' };
    }

    if (now - budget.lastActivity > this.resetAfterMs) {
      this.reset(sessionId);
      return this.check(sessionId);
    }

    if (budget.lifetimeCount >= this.maxActionsPerSession) {
      return { allowed: false, limit: 'session' };
    }

    budget.windowTimestamps = budget.windowTimestamps.filter((ts) => now - ts < WINDOW_MS);
    if (budget.windowTimestamps.length >= this.maxActionsPerMinute) {
      return { allowed: false, limit: 'minute' };
    }
    return { allowed: true };
  }

  /**
   * Record one tool invocation.
   */
  increment(sessionId: string): void {
    const now = this.now();
    const budget = this.sessions.get(sessionId);
    if (budget) {
      budget.lifetimeCount += 1;
      budget.windowTimestamps.push(now);
      budget.lastActivity = now;
    } else {
      this.sessions.set(sessionId, { lifetimeCount: 1, windowTimestamps: [now], lastActivity: now });
    }
  }

  reset(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  /** Lifetime actions left for the session */
  remaining(sessionId: string): number {
    const budget = this.sessions.get(sessionId);
    const idle = budget !== undefined && this.now() - budget.lastActivity > this.resetAfterMs;
    const used = budget && !idle ? budget.lifetimeCount : 0;
    return Math.max(0, this.maxActionsPerSession - used);
  }

  /** Number of sessions with recorded activity */
  get trackedSessions(): number {
    return this.sessions.size;
  }

  /**
   * Drop every session idle beyond the reset TTL.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, budget] of this.sessions) {
      if (now - budget.lastActivity > this.resetAfterMs) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug?.(`Budget sweep: dropped ${removed} idle session(s)`);
    }
    return removed;
  }

  /** Stop the sweep timer */
  dispose(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}
