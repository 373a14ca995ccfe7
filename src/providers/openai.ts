/**
 * OpenAI Providers
 *
 * GenerationProvider over Chat Completions and EmbeddingProvider over the
 * Embeddings API, both through the `openai` SDK. OPENAI_BASE_URL points
 * them at any OpenAI-compatible server.
 *
 * SECURITY: API key is retrieved only after validation passes.
 * Never logs or exposes the key in error messages.
 */

import OpenAI from 'openai';

import { getEnv } from '../config/env.js';
import { ProviderError, isAbortError, type ProviderOperation } from './errors.js';
import { getProviderKey } from './validation.js';
import type { EmbeddingProvider } from '../search/types.js';
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

export interface OpenAIClientOptions {
  /**
   * Explicit API key to use.
   * If provided, skips environment variable lookup (OPENAI_API_KEY).
   */
  apiKey?: string;

  /**
   * Custom base URL for the API (default: OPENAI_BASE_URL, then the SDK's).
   * Useful for OpenRouter, Azure OpenAI, local proxies.
   */
  baseURL?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000 (60 seconds)
   */
  timeout?: number;
}

export interface OpenAIProviderOptions extends OpenAIClientOptions {
  /**
   * Model to use for chat completions.
   * @default 'gpt-4o'
   */
  model?: string;

  /** @default 2000 */
  maxTokens?: number;
}

export interface OpenAIEmbeddingOptions extends OpenAIClientOptions {
  /** @default 'text-embedding-3-small' */
  model?: string;
  /** @default 1536 */
  dimensions?: number;
  /** Texts per request (default: 64) */
  batchSize?: number;
}

/**
 * The subset of a chat completion the normalizer reads.
 */
export interface OpenAICompletionLike {
  choices: ReadonlyArray<{
    finish_reason?: string | null;
    message: {
      content: string | null;
      tool_calls?: ReadonlyArray<{
        id: string;
        function: { name: string; arguments: string };
      }>;
    };
  }>;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default chat model */
export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

/** Default embedding model */
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

const DEFAULT_EMBEDDING_DIMENSIONS = 1536;
const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_TIMEOUT_MS = 60_000;

// ============================================================================
// HELPERS
// ============================================================================

function createClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey ?? getProviderKey('openai'),
    baseURL: options.baseURL ?? getEnv('OPENAI_BASE_URL'),
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    maxRetries: 0,
  });
}

function wrapError(provider: string, operation: ProviderOperation, error: unknown): unknown {
  if (isAbortError(error)) {
    return error;
  }
  return ProviderError.wrap(provider, operation, error);
}

function parseArguments(name: string, raw: string): Record<string, unknown> {
  if (raw.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ProviderError(
      'openai',
      'tools',
      `arguments for tool "${name}" are not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ProviderError('openai', 'tools', `arguments for tool "${name}" are not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Normalize a chat completion into a GenerationOutcome.
 *
 * @throws ProviderError when there is no choice or tool arguments are malformed
 *
 * @example
 * ```typescript
 * normalizeOpenAICompletion({
 *   choices: [{ message: { content: null, tool_calls: [
 *     { id: 'call_1', function: { name: 'echo', arguments: '{"x":1}' } },
 *   ] } }],
 * });
 * // => { type: 'tool_use', calls: [{ id: 'call_1', name: 'echo', input: { x: 1 } }] }
 * ```
 */
export function normalizeOpenAICompletion(completion: OpenAICompletionLike): GenerationOutcome {
  const choice = completion.choices[0];
  if (!choice) {
    throw new ProviderError('openai', 'tools', 'response contained no choices');
  }

  const text = choice.message.content ?? '';
  const calls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    input: parseArguments(call.function.name, call.function.arguments),
  }));

  if (calls.length > 0) {
    return text ? { type: 'tool_use', calls, text } : { type: 'tool_use', calls };
  }
  return { type: 'final_answer', text };
}

// ============================================================================
// GENERATION
// ============================================================================

/**
 * GenerationProvider backed by OpenAI Chat Completions.
 */
export class OpenAIGenerationProvider implements GenerationProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(options: OpenAIProviderOptions = {}) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = createClient(options);
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(this.buildParams(prompt, options), {
        signal: options.signal,
      });
      return completion.choices[0]?.message.content ?? '';
    } catch (error) {
      throw wrapError(this.name, 'generate', error);
    }
  }

  async *generateStream(prompt: string, options: GenerateOptions = {}): AsyncGenerator<string> {
    try {
      const stream = await this.client.chat.completions.create(
        { ...this.buildParams(prompt, options), stream: true },
        { signal: options.signal }
      );
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw wrapError(this.name, 'stream', error);
    }
  }

  async generateWithTools(
    prompt: string,
    tools: readonly ToolSchema[],
    options: GenerateOptions = {}
  ): Promise<GenerationOutcome> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          ...this.buildParams(prompt, options),
          tools: tools.map((tool) => ({
            type: 'function' as const,
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.schema,
            },
          })),
          tool_choice: 'auto' as const,
        },
        { signal: options.signal }
      );
      return normalizeOpenAICompletion(completion);
    } catch (error) {
      throw wrapError(this.name, 'tools', error);
    }
  }

  private buildParams(prompt: string, options: GenerateOptions) {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.system !== undefined) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    return {
      model: this.model,
      messages,
      max_tokens: options.maxTokens ?? this.maxTokens,
      ...(options.temperature !== undefined && { temperature: options.temperature }),
    };
  }
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

/**
 * EmbeddingProvider backed by the OpenAI Embeddings API.
 *
 * Texts are sent in batches of `batchSize`; results come back in input
 * order. Every returned vector is checked against `dimensions`.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: OpenAI;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbeddingOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.client = createClient(options);
  }

  async embed(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const data = await this.request(batch, options.signal);

      const ordered = [...data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new ProviderError(
          this.model,
          'embed',
          `returned ${ordered.length} vectors for ${batch.length} texts`
        );
      }
      for (const item of ordered) {
        if (item.embedding.length !== this.dimensions) {
          throw new ProviderError(
            this.model,
            'embed',
            `returned a ${item.embedding.length}-dimension vector, expected ${this.dimensions}`
          );
        }
        vectors.push(item.embedding);
      }
    }

    return vectors;
  }

  private async request(
    batch: string[],
    signal: AbortSignal | undefined
  ): Promise<Array<{ embedding: number[]; index: number }>> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: batch,
          // Only the v3 models accept a dimensions override
          ...(this.model.startsWith('text-embedding-3') && { dimensions: this.dimensions }),
        },
        { signal }
      );
      return response.data;
    } catch (error) {
      throw wrapError(this.model, 'embed', error);
    }
  }
}
