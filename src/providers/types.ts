/**
 * Provider Contracts
 *
 * The core only ever talks to these interfaces. Vendor SDK shapes stay
 * inside the adapters (anthropic.ts, openai.ts), which normalize every
 * tool-capable response into a GenerationOutcome.
 */

export type { EmbeddingProvider } from '../search/types.js';

/**
 * JSON Schema for a tool's input object, in the form both Anthropic
 * (`input_schema`) and OpenAI (`function.parameters`) accept.
 */
export interface ToolParameterSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  [keyword: string]: unknown;
}

/**
 * Provider-agnostic tool description included in generation requests.
 */
export interface ToolSchema {
  name: string;
  description: string;
  schema: ToolParameterSchema;
}

/**
 * One tool invocation requested by the model.
 */
export interface ToolCallRequest {
  /** Vendor call id, when the vendor assigns one */
  id?: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * Normalized result of a tool-capable generation call.
 *
 * The agent loop only ever sees this variant, never vendor shapes.
 */
export type GenerationOutcome =
  | { type: 'final_answer'; text: string }
  | { type: 'tool_use'; calls: ToolCallRequest[]; text?: string };

export interface GenerateOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * Text generation provider.
 *
 * Implementations wrap failures in ProviderError and never retry.
 */
export interface GenerationProvider {
  readonly name: string;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  /** Lazy, finite, not restartable */
  generateStream(prompt: string, options?: GenerateOptions): AsyncIterable<string>;
  generateWithTools(
    prompt: string,
    tools: readonly ToolSchema[],
    options?: GenerateOptions
  ): Promise<GenerationOutcome>;
}
