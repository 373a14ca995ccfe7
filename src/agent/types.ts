/**
 * Agent Module Types
 */

import type { Citation } from './citations.js';

/**
 * How a run answered: one grounded generation, or the tool loop.
 */
export type AgentMode = 'simple' | 'agentic';

export type ToolFailureKind = 'not_found' | 'execution' | 'budget_exceeded';

export type ToolOutcome =
  | { readonly status: 'success'; readonly result: unknown }
  | { readonly status: 'failure'; readonly error: string; readonly kind: ToolFailureKind };

/**
 * One requested tool call and what came of it. Frozen once recorded.
 */
export interface ToolInvocation {
  readonly toolName: string;
  readonly input: Readonly<Record<string, unknown>>;
  readonly iteration: number;
  readonly outcome: ToolOutcome;
}

export interface AgentResult {
  answer: string;
  citations: Citation[];
  toolsUsed: ToolInvocation[];
  /** Generation rounds in the tool loop (0 for simple answers) */
  iterations: number;
  /** Chunks retrieved for the question */
  chunksUsed: number;
  mode: AgentMode;
}

export interface AgentRunOptions {
  signal?: AbortSignal;
}

/**
 * Lifecycle events of one run, in emission order:
 *
 *   agent_start → intent_analysis → retrieval_start → retrieval_complete
 *   → (iteration_start → (tool_call → tool_result | tool_error)*)*
 *   → content_delta* → citations → done
 *
 * `error` replaces everything after the point of failure.
 */
export type AgentEvent =
  | { type: 'agent_start'; query: string; sessionId: string }
  | { type: 'intent_analysis'; needsTools: boolean }
  | { type: 'retrieval_start' }
  | { type: 'retrieval_complete'; chunksRetrieved: number }
  | { type: 'iteration_start'; iteration: number }
  | { type: 'tool_call'; iteration: number; toolName: string; input: Record<string, unknown> }
  | { type: 'tool_result'; iteration: number; toolName: string; result: unknown }
  | { type: 'tool_error'; iteration: number; toolName: string; error: string; kind: ToolFailureKind }
  | { type: 'content_delta'; delta: string }
  | { type: 'citations'; citations: Citation[] }
  | { type: 'done'; result: AgentResult }
  | { type: 'error'; message: string; code?: number };

export type AgentEventType = AgentEvent['type'];
