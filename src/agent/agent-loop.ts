/**
 * Agent Loop
 *
 * Answers one question per run, as a small state machine:
 *
 * ```
 * INTENT_CHECK ──no──▶ SIMPLE_RAG ─────────────────────────────┐
 *      │                 retrieve → generate → citations        │
 *      └─yes─▶ AGENTIC_ITERATE (≤ maxIterations)                ├─▶ DONE
 *                retrieve → [prompt → generateWithTools         │
 *                  → tool calls (budget-gated) → context]*      │
 *                → final answer | fallback → citations ─────────┘
 * ```
 *
 * execute() and stream() share the same run; stream() delivers each
 * transition as an AgentEvent through an EventChannel, and cancelling the
 * channel aborts whatever provider call or tool is in flight.
 *
 * Tool failures (unknown tool, handler error, budget) are recorded on the
 * trail and never end the run. Provider failures end it as ProviderError.
 * Runs for the same session are serialized.
 */

import { KeyedSerializer, silentLogger, type Logger } from '../utils/index.js';
import { CLIError, ValidationError } from '../errors/index.js';
import { ProviderError, isAbortError, type ProviderOperation } from '../providers/errors.js';
import type { GenerateOptions, GenerationProvider } from '../providers/types.js';
import type { ConversationStore, ContextMessage } from '../conversation/index.js';
import type { RetrievalOrchestrator } from '../search/orchestrator.js';
import type { RetrievalResult } from '../search/types.js';
import type { ActionBudgetGuard } from './budget.js';
import { extractCitations } from './citations.js';
import { BudgetExceededError, ToolNotFoundError } from './errors.js';
import { EventChannel } from './event-channel.js';
import {
  AGENT_SYSTEM_PROMPT,
  SYSTEM_PROMPT,
  buildAgentPrompt,
  buildIntentPrompt,
  buildRagPrompt,
  parseIntentAnswer,
} from './prompts.js';
import type { ToolRegistry } from './tools/registry.js';
import type {
  AgentEvent,
  AgentResult,
  AgentRunOptions,
  ToolFailureKind,
  ToolInvocation,
} from './types.js';

export const MAX_ITERATIONS_MESSAGE = "I couldn't complete the task within the allowed iterations.";
export const BUDGET_EXHAUSTED_MESSAGE =
  'The tool budget for this session has been exhausted. Please try again later.';

export interface AgentLoopOptions {
  generator: GenerationProvider;
  retriever: Pick<RetrievalOrchestrator, 'retrieve'>;
  tools: ToolRegistry;
  budget: ActionBudgetGuard;
  /** History source and sink; runs are not remembered without one */
  conversation?: ConversationStore | null;
  /** Generation rounds before giving up (default: 5) */
  maxIterations?: number;
  /** Chunks retrieved per question (default: 5) */
  topK?: number;
  /** Retrieved chunks seeded into the agentic context (default: 3) */
  contextChunks?: number;
  /** Token budget for conversation history (default: 2000) */
  historyTokens?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

interface RunSink {
  emit(event: AgentEvent): void;
  streaming: boolean;
}

const discard: RunSink = { emit: () => undefined, streaming: false };

function describeResult(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  try {
    return JSON.stringify(result) ?? String(result);
  } catch {
    return String(result);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AgentLoop {
  readonly maxIterations: number;
  private readonly generator: GenerationProvider;
  private readonly retriever: Pick<RetrievalOrchestrator, 'retrieve'>;
  private readonly tools: ToolRegistry;
  private readonly budget: ActionBudgetGuard;
  private readonly conversation: ConversationStore | null;
  private readonly topK: number;
  private readonly contextChunks: number;
  private readonly historyTokens: number;
  private readonly generation: Pick<GenerateOptions, 'temperature' | 'maxTokens'>;
  private readonly logger: Logger;
  private readonly serializer = new KeyedSerializer();

  constructor(options: AgentLoopOptions) {
    this.generator = options.generator;
    this.retriever = options.retriever;
    this.tools = options.tools;
    this.budget = options.budget;
    this.conversation = options.conversation ?? null;
    this.maxIterations = options.maxIterations ?? 5;
    this.topK = options.topK ?? 5;
    this.contextChunks = options.contextChunks ?? 3;
    this.historyTokens = options.historyTokens ?? 2000;
    this.generation = { temperature: options.temperature, maxTokens: options.maxTokens };
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new ValidationError(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
  }

  /**
   * Answer `query` for `sessionId`.
   *
   * @throws ProviderError if generation or retrieval fails
   */
  execute(query: string, sessionId: string, options: AgentRunOptions = {}): Promise<AgentResult> {
    return this.exclusive(sessionId, () => this.run(query, sessionId, discard, options.signal));
  }

  /**
   * Answer `query` as a stream of lifecycle events ending in `done` or
   * `error`. Breaking out of the iteration, or aborting `options.signal`,
   * cancels the run; no event follows the cancellation.
   */
  stream(query: string, sessionId: string, options: AgentRunOptions = {}): EventChannel<AgentEvent> {
    const channel = new EventChannel<AgentEvent>();
    const signal = options.signal ? AbortSignal.any([options.signal, channel.signal]) : channel.signal;
    signal.addEventListener('abort', () => channel.cancel(signal.reason), { once: true });

    const sink: RunSink = {
      emit: (event) => {
        if (!signal.aborted) {
          channel.push(event);
        }
      },
      streaming: true,
    };

    void this.exclusive(sessionId, () => this.run(query, sessionId, sink, signal)).then(
      () => channel.close(),
      (error: unknown) => {
        if (!signal.aborted) {
          this.logger.debug?.(`Agent run for session ${sessionId} failed: ${errorMessage(error)}`);
          channel.push({
            type: 'error',
            message: errorMessage(error),
            ...(error instanceof CLIError && { code: error.code }),
          });
        }
        channel.close();
      }
    );
    return channel;
  }

  // ==========================================================================
  // States
  // ==========================================================================

  private exclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.conversation
      ? this.conversation.runExclusive(sessionId, task)
      : this.serializer.run(sessionId, task);
  }

  private async run(
    query: string,
    sessionId: string,
    sink: RunSink,
    signal: AbortSignal | undefined
  ): Promise<AgentResult> {
    if (query.trim().length === 0) {
      throw new ValidationError('Question must not be empty');
    }
    signal?.throwIfAborted();
    sink.emit({ type: 'agent_start', query, sessionId });

    const history = this.conversation?.getContext(sessionId, this.historyTokens) ?? [];

    const needsTools = await this.analyzeIntent(query, signal);
    sink.emit({ type: 'intent_analysis', needsTools });

    const result = needsTools
      ? await this.runAgentic(query, sessionId, history, sink, signal)
      : await this.runSimple(query, history, sink, signal);

    signal?.throwIfAborted();
    if (this.conversation) {
      this.conversation.addMessage(sessionId, 'user', query);
      this.conversation.addMessage(sessionId, 'assistant', result.answer, {
        mode: result.mode,
        citations: result.citations.map((citation) => citation.chunkId),
        tools: result.toolsUsed.map((invocation) => invocation.toolName),
      });
    }

    sink.emit({ type: 'done', result });
    return result;
  }

  /**
   * One YES/NO classification call. Skipped (answer: no) when there are
   * no tools to use.
   */
  private async analyzeIntent(query: string, signal: AbortSignal | undefined): Promise<boolean> {
    if (this.tools.size === 0) {
      return false;
    }
    const answer = await this.callProvider('generate', signal, () =>
      this.generator.generate(buildIntentPrompt(query), { maxTokens: 10, signal })
    );
    return parseIntentAnswer(answer);
  }

  private async runSimple(
    query: string,
    history: readonly ContextMessage[],
    sink: RunSink,
    signal: AbortSignal | undefined
  ): Promise<AgentResult> {
    const retrieval = await this.retrieve(query, sink, signal);
    const prompt = buildRagPrompt(query, retrieval.chunks, history);
    const options: GenerateOptions = { ...this.generation, system: SYSTEM_PROMPT, signal };

    let answer: string;
    if (sink.streaming) {
      answer = await this.callProvider('stream', signal, async () => {
        let text = '';
        for await (const delta of this.generator.generateStream(prompt, options)) {
          signal?.throwIfAborted();
          text += delta;
          sink.emit({ type: 'content_delta', delta });
        }
        return text;
      });
    } else {
      answer = await this.callProvider('generate', signal, () => this.generator.generate(prompt, options));
    }

    const citations = extractCitations(
      answer,
      retrieval.chunks.map(({ chunk }) => chunk)
    );
    sink.emit({ type: 'citations', citations });

    return {
      answer,
      citations,
      toolsUsed: [],
      iterations: 0,
      chunksUsed: retrieval.chunks.length,
      mode: 'simple',
    };
  }

  private async runAgentic(
    query: string,
    sessionId: string,
    history: readonly ContextMessage[],
    sink: RunSink,
    signal: AbortSignal | undefined
  ): Promise<AgentResult> {
    const retrieval = await this.retrieve(query, sink, signal);
    let context = retrieval.chunks
      .slice(0, this.contextChunks)
      .map(({ chunk }) => `[${chunk.chunkId}]\n${chunk.content}`)
      .join('\n\n');

    const schemas = this.tools.getToolSchemas();
    const toolsUsed: ToolInvocation[] = [];
    let answer: string | null = null;
    let iterations = 0;

    while (answer === null && iterations < this.maxIterations) {
      iterations++;
      const iteration = iterations;
      sink.emit({ type: 'iteration_start', iteration });

      const outcome = await this.callProvider('tools', signal, () =>
        this.generator.generateWithTools(buildAgentPrompt(query, schemas, context, history), schemas, {
          ...this.generation,
          system: AGENT_SYSTEM_PROMPT,
          signal,
        })
      );

      if (outcome.type === 'final_answer') {
        answer = outcome.text;
        break;
      }

      let blocked = 0;
      for (const call of outcome.calls) {
        sink.emit({ type: 'tool_call', iteration, toolName: call.name, input: call.input });

        const record = (invocation: Omit<ToolInvocation, 'toolName' | 'input' | 'iteration'>) => {
          toolsUsed.push(Object.freeze({ toolName: call.name, input: call.input, iteration, ...invocation }));
        };
        const fail = (error: string, kind: ToolFailureKind) => {
          record({ outcome: { status: 'failure', error, kind } });
          sink.emit({ type: 'tool_error', iteration, toolName: call.name, error, kind });
          context += `\n\nTool: ${call.name}\nError: ${error}`;
        };

        const decision = this.budget.check(sessionId);
        if (!decision.allowed) {
          blocked++;
          fail(new BudgetExceededError(sessionId, decision.limit).message, 'budget_exceeded');
          continue;
        }
        if (!this.tools.has(call.name)) {
          fail(new ToolNotFoundError(call.name).message, 'not_found');
          continue;
        }

        this.budget.increment(sessionId);
        try {
          const result = await this.tools.executeTool(call.name, call.input, { sessionId, signal });
          record({ outcome: { status: 'success', result } });
          sink.emit({ type: 'tool_result', iteration, toolName: call.name, result });
          context += `\n\nTool: ${call.name}\nResult: ${describeResult(result)}`;
        } catch (error) {
          if (signal?.aborted) {
            throw error;
          }
          fail(errorMessage(error), 'execution');
        }
      }

      if (outcome.calls.length > 0 && blocked === outcome.calls.length) {
        this.logger.warn(`Tool budget exhausted for session ${sessionId}`);
        answer = BUDGET_EXHAUSTED_MESSAGE;
      }
    }

    if (answer === null) {
      this.logger.warn(`Agent stopped after ${this.maxIterations} iterations without a final answer`);
      answer = MAX_ITERATIONS_MESSAGE;
    }

    if (answer.length > 0) {
      sink.emit({ type: 'content_delta', delta: answer });
    }
    const citations = extractCitations(
      answer,
      retrieval.chunks.map(({ chunk }) => chunk)
    );
    sink.emit({ type: 'citations', citations });

    return {
      answer,
      citations,
      toolsUsed,
      iterations,
      chunksUsed: retrieval.chunks.length,
      mode: 'agentic',
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async retrieve(query: string, sink: RunSink, signal: AbortSignal | undefined): Promise<RetrievalResult> {
    sink.emit({ type: 'retrieval_start' });
    const retrieval = await this.retriever.retrieve(query, { topK: this.topK, rerank: true, signal });
    signal?.throwIfAborted();
    sink.emit({ type: 'retrieval_complete', chunksRetrieved: retrieval.chunks.length });
    return retrieval;
  }

  /**
   * Await a provider call, wrapping failures as ProviderError. Aborts
   * pass through unchanged.
   */
  private async callProvider<T>(
    operation: ProviderOperation,
    signal: AbortSignal | undefined,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      const value = await call();
      signal?.throwIfAborted();
      return value;
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      throw ProviderError.wrap(this.generator.name, operation, error);
    }
  }
}
