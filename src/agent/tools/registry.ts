/**
 * Tool Registry
 *
 * Named capabilities the agent may invoke. Every tool implements the same
 * `Tool` interface; `syncTool()` and `asyncTool()` adapt plain handlers to
 * it, so executeTool() never branches on calling convention.
 *
 * Registering a name twice replaces the earlier tool (last writer wins).
 * The overwrite is logged.
 */

import { z } from 'zod';

import { silentLogger, type Logger } from '../../utils/index.js';
import { ValidationError } from '../../errors/index.js';
import type { ToolParameterSchema, ToolSchema } from '../../providers/types.js';
import { ToolExecutionError, ToolNotFoundError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-invocation context handed to every tool.
 */
export interface ToolContext {
  sessionId?: string;
  signal?: AbortSignal;
}

/**
 * A named capability with a typed input and one invoke() method.
 */
export interface Tool<TOutput = unknown> {
  readonly name: string;
  readonly description: string;
  /** JSON Schema advertised to the model */
  readonly parameters: ToolParameterSchema;
  /**
   * Validate `input` and run the tool.
   *
   * @throws ValidationError if `input` does not match the tool's schema
   */
  invoke(input: unknown, context: ToolContext): Promise<TOutput>;
}

export interface ToolDefinition<TInput, TOutput> {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
  /** Checked before the handler runs */
  input: z.ZodType<TInput>;
  handler: (input: TInput, context: ToolContext) => TOutput;
}

export type SyncToolDefinition<TInput, TOutput> = ToolDefinition<TInput, TOutput>;
export type AsyncToolDefinition<TInput, TOutput> = ToolDefinition<TInput, Promise<TOutput>>;

const ObjectInputSchema = z.record(z.unknown());

/** Handler signature accepted by registerHandler(), sync or async */
export type ToolHandler = (input: Record<string, unknown>, context: ToolContext) => unknown;

// ============================================================================
// Adapters
// ============================================================================

function parseInput<TInput>(name: string, schema: z.ZodType<TInput>, input: unknown): TInput {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid input for tool "${name}"`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Adapt a synchronous handler to the Tool interface.
 */
export function syncTool<TInput, TOutput>(definition: SyncToolDefinition<TInput, TOutput>): Tool<TOutput> {
  const { name, description, parameters, input, handler } = definition;
  return {
    name,
    description,
    parameters,
    invoke: async (raw, context) => handler(parseInput(name, input, raw), context),
  };
}

/**
 * Adapt an asynchronous handler to the Tool interface.
 */
export function asyncTool<TInput, TOutput>(definition: AsyncToolDefinition<TInput, TOutput>): Tool<TOutput> {
  const { name, description, parameters, input, handler } = definition;
  return {
    name,
    description,
    parameters,
    invoke: async (raw, context) => handler(parseInput(name, input, raw), context),
  };
}

// ============================================================================
// Registry
// ============================================================================

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Add a tool. An existing tool with the same name is replaced.
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool "${tool.name}" registered again, replacing the earlier definition`);
    }
    this.tools.set(tool.name, tool);
    this.logger.debug?.(`Registered tool: ${tool.name}`);
  }

  /**
   * Register a bare handler (sync or async) taking a JSON object.
   *
   * @example
   * ```typescript
   * registry.registerHandler('echo', 'Return the input', { type: 'object', properties: {} },
   *   (input) => input);
   * ```
   */
  registerHandler(
    name: string,
    description: string,
    parameters: ToolParameterSchema,
    handler: ToolHandler
  ): void {
    this.register(
      asyncTool({
        name,
        description,
        parameters,
        input: ObjectInputSchema,
        handler: async (input, context) => handler(input, context),
      })
    );
  }

  /**
   * Run a registered tool.
   *
   * Cancellation is not a tool failure: when `context.signal` has fired,
   * the handler's rejection is rethrown as is.
   *
   * @throws ToolNotFoundError if `name` is not registered
   * @throws ToolExecutionError wrapping whatever the tool threw
   */
  async executeTool(name: string, input: unknown, context: ToolContext = {}): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name, [...this.tools.keys()]);
    }

    try {
      return await tool.invoke(input, context);
    } catch (error) {
      if (context.signal?.aborted) {
        throw error;
      }
      throw new ToolExecutionError(name, error);
    }
  }

  /** Provider-agnostic descriptions for generation requests */
  getToolSchemas(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      schema: tool.parameters,
    }));
  }

  listTools(): Array<{ name: string; description: string }> {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }
}
