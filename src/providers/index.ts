/**
 * Providers Module
 *
 * Generation and embedding providers behind vendor-neutral interfaces,
 * plus API key validation.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createLLMProvider, createEmbeddingProvider } from './providers/index.js';
 * const llm = createLLMProvider(config);
 * const embedder = createEmbeddingProvider(config);
 * ```
 */

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export {
  validateProviderKey,
  validateAnthropicKey,
  validateOpenAIKey,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
} from './validation.js';
export type { ValidationResult, KeyedProvider } from './validation.js';

// ============================================================================
// PROVIDERS
// ============================================================================

export {
  AnthropicGenerationProvider,
  normalizeAnthropicMessage,
  DEFAULT_ANTHROPIC_MODEL,
} from './anthropic.js';
export type { AnthropicProviderOptions, AnthropicMessageLike } from './anthropic.js';

export {
  OpenAIGenerationProvider,
  OpenAIEmbeddingProvider,
  normalizeOpenAICompletion,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_EMBEDDING_MODEL,
} from './openai.js';
export type {
  OpenAIProviderOptions,
  OpenAIEmbeddingOptions,
  OpenAICompletionLike,
} from './openai.js';

// ============================================================================
// FACTORIES
// ============================================================================

export {
  createGenerationProvider,
  createLLMProvider,
  createEmbeddingProvider,
  DEFAULT_MODELS,
} from './llm.js';
export type { ProviderType, GenerationProviderOptions } from './llm.js';

// ============================================================================
// CONTRACTS & ERRORS
// ============================================================================

export { ProviderError, isAbortError } from './errors.js';
export type { ProviderOperation } from './errors.js';

export type {
  EmbeddingProvider,
  GenerationProvider,
  GenerateOptions,
  GenerationOutcome,
  ToolCallRequest,
  ToolParameterSchema,
  ToolSchema,
} from './types.js';
