/**
 * Agent Module Errors
 *
 * Tool failures are non-fatal to the agent loop: they are recorded on
 * the invocation trail and reported as `tool_error` events.
 */

import { CLIError } from '../errors/index.js';

/**
 * Thrown when a tool name is not registered.
 *
 * Exit code 9: Tool error
 */
export class ToolNotFoundError extends CLIError {
  public readonly toolName: string;

  constructor(toolName: string, available: readonly string[] = []) {
    super(
      `Tool not found: ${toolName}`,
      available.length > 0 ? `Registered tools: ${available.join(', ')}` : 'No tools are registered',
      9
    );
    this.name = 'ToolNotFoundError';
    this.toolName = toolName;
  }
}

/**
 * Wraps any failure thrown by a tool handler, including input validation.
 *
 * Exit code 9: Tool error
 */
export class ToolExecutionError extends CLIError {
  public readonly toolName: string;
  /** Whatever the handler threw */
  public readonly cause: unknown;

  constructor(toolName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Tool "${toolName}" failed: ${detail}`, undefined, 9);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
    this.cause = cause;
  }
}

export type BudgetLimit = 'session' | 'minute';

/**
 * A tool call was blocked by the session's action budget.
 *
 * Exit code 10: Budget exhausted
 */
export class BudgetExceededError extends CLIError {
  public readonly sessionId: string;
  public readonly limit: BudgetLimit;

  constructor(sessionId: string, limit: BudgetLimit) {
    super(
      limit === 'session'
        ? `Session ${sessionId} has used all of its tool actions`
        : `Session ${sessionId} exceeded its tool actions per minute`,
      limit === 'session' ? 'Start a new session or wait for the budget to reset' : 'Wait a minute and try again',
      10
    );
    this.name = 'BudgetExceededError';
    this.sessionId = sessionId;
    this.limit = limit;
  }
}
