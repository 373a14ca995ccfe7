/**
 * Anthropic Claude Generation Provider
 *
 * Adapts `@anthropic-ai/sdk` Messages API calls to GenerationProvider.
 * Vendor response shapes never leave this file: tool-capable responses
 * are normalized by normalizeAnthropicMessage().
 *
 * SECURITY: API key is retrieved only after validation passes.
 * Never logs or exposes the key in error messages.
 */

import Anthropic from '@anthropic-ai/sdk';

import { ProviderError, isAbortError } from './errors.js';
import { getProviderKey } from './validation.js';
import type {
  GenerateOptions,
  GenerationOutcome,
  GenerationProvider,
  ToolCallRequest,
  ToolSchema,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Options for creating an Anthropic provider.
 */
export interface AnthropicProviderOptions {
  /**
   * Model to use for completions.
   * @default 'claude-sonnet-4-20250514'
   */
  model?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000 (60 seconds)
   */
  timeout?: number;

  /**
   * Default max tokens per response.
   * @default 2000
   */
  maxTokens?: number;

  /** Explicit API key; skips the ANTHROPIC_API_KEY lookup */
  apiKey?: string;
}

/**
 * The subset of a Messages API response the normalizer reads.
 */
export interface AnthropicMessageLike {
  stop_reason: string | null;
  content: ReadonlyArray<{
    type: string;
    text?: string;
    id?: string;
    name?: string;
    input?: unknown;
  }>;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default model for Anthropic */
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_TIMEOUT_MS = 60_000;

// ============================================================================
// NORMALIZATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize a Messages API response into a GenerationOutcome.
 *
 * Any tool_use block (or stop_reason "tool_use") makes it a tool request;
 * text blocks alongside it are kept as the model's preamble.
 *
 * @example
 * ```typescript
 * normalizeAnthropicMessage({
 *   stop_reason: 'end_turn',
 *   content: [{ type: 'text', text: 'Hello' }],
 * });
 * // => { type: 'final_answer', text: 'Hello' }
 * ```
 */
export function normalizeAnthropicMessage(message: AnthropicMessageLike): GenerationOutcome {
  const text = message.content
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '')
    .join('');

  const calls: ToolCallRequest[] = [];
  for (const block of message.content) {
    if (block.type !== 'tool_use' || typeof block.name !== 'string') {
      continue;
    }
    calls.push({
      id: block.id,
      name: block.name,
      input: isRecord(block.input) ? block.input : {},
    });
  }

  if (calls.length > 0) {
    return text ? { type: 'tool_use', calls, text } : { type: 'tool_use', calls };
  }
  if (message.stop_reason === 'tool_use') {
    throw new ProviderError('anthropic', 'tools', 'stop_reason was "tool_use" but no tool_use block was returned');
  }
  return { type: 'final_answer', text };
}

// ============================================================================
// PROVIDER
// ============================================================================

/**
 * GenerationProvider backed by the Anthropic Messages API.
 *
 * The client is created with `maxRetries: 0`; failures surface once, as
 * ProviderError. Cancellation rejects with the SDK's abort error unchanged.
 */
export class AnthropicGenerationProvider implements GenerationProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(options: AnthropicProviderOptions = {}) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = new Anthropic({
      apiKey: options.apiKey ?? getProviderKey('anthropic'),
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const message = await this.client.messages.create(this.buildParams(prompt, options), {
        signal: options.signal,
      });
      const outcome = normalizeAnthropicMessage(message);
      return outcome.type === 'final_answer' ? outcome.text : (outcome.text ?? '');
    } catch (error) {
      throw this.wrap('generate', error);
    }
  }

  async *generateStream(prompt: string, options: GenerateOptions = {}): AsyncGenerator<string> {
    try {
      const stream = await this.client.messages.create(
        { ...this.buildParams(prompt, options), stream: true },
        { signal: options.signal }
      );
      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    } catch (error) {
      throw this.wrap('stream', error);
    }
  }

  async generateWithTools(
    prompt: string,
    tools: readonly ToolSchema[],
    options: GenerateOptions = {}
  ): Promise<GenerationOutcome> {
    try {
      const message = await this.client.messages.create(
        {
          ...this.buildParams(prompt, options),
          tools: tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            input_schema: tool.schema,
          })),
        },
        { signal: options.signal }
      );
      return normalizeAnthropicMessage(message);
    } catch (error) {
      throw this.wrap('tools', error);
    }
  }

  private buildParams(prompt: string, options: GenerateOptions) {
    return {
      model: this.model,
      max_tokens: options.maxTokens ?? this.maxTokens,
      messages: [{ role: 'user' as const, content: prompt }],
      ...(options.system !== undefined && { system: options.system }),
      ...(options.temperature !== undefined && { temperature: options.temperature }),
    };
  }

  private wrap(operation: 'generate' | 'stream' | 'tools', error: unknown): unknown {
    if (isAbortError(error)) {
      return error;
    }
    return ProviderError.wrap(this.name, operation, error);
  }
}
