/**
 * Agent Module
 *
 * Bounded tool-use loop over the retrieval pipeline: intent gating,
 * budget-gated tool calls, citations and a streaming event channel.
 */

export {
  AgentLoop,
  MAX_ITERATIONS_MESSAGE,
  BUDGET_EXHAUSTED_MESSAGE,
  type AgentLoopOptions,
} from './agent-loop.js';
export { ActionBudgetGuard, WINDOW_MS, type ActionBudgetOptions, type BudgetDecision } from './budget.js';
export { extractCitations, extractCitationIds, formatCitations, toCitation, type Citation } from './citations.js';
export { BudgetExceededError, ToolExecutionError, ToolNotFoundError, type BudgetLimit } from './errors.js';
export { EventChannel } from './event-channel.js';
export {
  SYSTEM_PROMPT,
  AGENT_SYSTEM_PROMPT,
  buildAgentPrompt,
  buildIntentPrompt,
  buildRagPrompt,
  parseIntentAnswer,
} from './prompts.js';
export * from './tools/index.js';
export type {
  AgentEvent,
  AgentEventType,
  AgentMode,
  AgentResult,
  AgentRunOptions,
  ToolFailureKind,
  ToolInvocation,
  ToolOutcome,
} from './types.js';
