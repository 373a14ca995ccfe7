/**
 * LLM Provider Factory
 *
 * Central entry point for creating providers from configuration.
 * Dispatches to the vendor adapter named by config.default_provider and
 * validates the matching API key before any client is built.
 *
 * USAGE:
 * ```typescript
 * import { loadConfig } from '../config/index.js';
 * import { createLLMProvider } from '../providers/index.js';
 *
 * const config = loadConfig();
 * const provider = createLLMProvider(config);
 * const answer = await provider.generate('Hello!');
 * ```
 */

import type { Config, LLMProviderType } from '../config/schema.js';
import { APIKeyError } from '../errors/index.js';
import { AnthropicGenerationProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
import { OpenAIEmbeddingProvider, OpenAIGenerationProvider, DEFAULT_OPENAI_MODEL } from './openai.js';
import { validateProviderKey } from './validation.js';
import type { EmbeddingProvider } from '../search/types.js';
import type { GenerationProvider } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/** Supported generation provider types */
export type ProviderType = LLMProviderType;

export interface GenerationProviderOptions {
  /** Model override (default: the provider's default model) */
  model?: string;
  /** Default max tokens per response */
  maxTokens?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/** Default model per provider */
export const DEFAULT_MODELS: Record<ProviderType, string> = {
  anthropic: DEFAULT_ANTHROPIC_MODEL,
  openai: DEFAULT_OPENAI_MODEL,
};

const ENV_VARS: Record<ProviderType, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

// ============================================================================
// FACTORIES
// ============================================================================

function assertKey(provider: ProviderType): void {
  const validation = validateProviderKey(provider);
  if (!validation.valid) {
    throw new APIKeyError(provider, ENV_VARS[provider], validation.error);
  }
}

/**
 * Create a generation provider of the given type.
 *
 * @throws APIKeyError if the provider's key is missing or malformed
 */
export function createGenerationProvider(
  type: ProviderType,
  options: GenerationProviderOptions = {}
): GenerationProvider {
  assertKey(type);

  switch (type) {
    case 'anthropic':
      return new AnthropicGenerationProvider(options);
    case 'openai':
      return new OpenAIGenerationProvider(options);
  }
}

/**
 * Create the configured generation provider.
 *
 * A default_model that belongs to another vendor (e.g. a Claude model with
 * default_provider = "openai") is replaced by that provider's default.
 */
export function createLLMProvider(config: Config): GenerationProvider {
  const type = config.default_provider;
  const modelMatches =
    type === 'anthropic'
      ? config.default_model.startsWith('claude')
      : !config.default_model.startsWith('claude');

  return createGenerationProvider(type, {
    model: modelMatches ? config.default_model : DEFAULT_MODELS[type],
    maxTokens: config.agent.max_tokens,
  });
}

/**
 * Create the configured embedding provider.
 *
 * @throws APIKeyError if OPENAI_API_KEY is missing or malformed
 */
export function createEmbeddingProvider(config: Config): EmbeddingProvider {
  assertKey(config.embedding.provider);

  return new OpenAIEmbeddingProvider({
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    batchSize: config.embedding.batch_size,
    timeout: config.embedding.timeout_ms,
  });
}
