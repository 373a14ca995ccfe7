/**
 * API Key Validators
 *
 * Validates API key format without exposing key values.
 * Each provider has specific format requirements.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';
import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a provider's API key.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

export type KeyedProvider = 'anthropic' | 'openai';

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * Anthropic API key format: sk-ant-api03-... (variable length)
 *
 * We check the common prefix only to be forward-compatible.
 */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-ant-'),
    'Invalid Anthropic API key format (should start with "sk-ant-")'
  );

/**
 * OpenAI API key format: sk-... (legacy, sk-proj-..., sk-svcacct-...)
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-'),
    'Invalid OpenAI API key format (should start with "sk-")'
  );

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

function checkKey(
  key: string | undefined,
  envVar: string,
  schema: z.ZodType<string> | null,
  setupInstructions: string
): ValidationResult {
  if (!key) {
    return { valid: false, error: `${envVar} environment variable is not set`, setupInstructions };
  }
  if (!schema) {
    return { valid: true };
  }

  const result = schema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions,
    };
  }
  return { valid: true };
}

/**
 * Validate that the Anthropic API key exists and has the correct format.
 */
export function validateAnthropicKey(): ValidationResult {
  return checkKey(
    getEnv('ANTHROPIC_API_KEY'),
    'ANTHROPIC_API_KEY',
    AnthropicKeySchema,
    SETUP_INSTRUCTIONS.anthropic
  );
}

/**
 * Validate that the OpenAI API key exists and has the correct format.
 *
 * With OPENAI_BASE_URL set the key belongs to a compatible server whose key
 * format is unknown, so only presence is checked.
 */
export function validateOpenAIKey(): ValidationResult {
  const compatible = getEnv('OPENAI_BASE_URL') !== undefined;
  return checkKey(
    getEnv('OPENAI_API_KEY'),
    'OPENAI_API_KEY',
    compatible ? null : OpenAIKeySchema,
    SETUP_INSTRUCTIONS.openai
  );
}

/**
 * Validate the API key for a given provider.
 *
 * @example
 * ```typescript
 * const result = validateProviderKey(config.default_provider);
 * if (!result.valid) {
 *   console.error(result.error);
 *   console.error(result.setupInstructions);
 * }
 * ```
 */
export function validateProviderKey(provider: KeyedProvider): ValidationResult {
  switch (provider) {
    case 'anthropic':
      return validateAnthropicKey();
    case 'openai':
      return validateOpenAIKey();
  }
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Get the API key for a provider, validating it first.
 *
 * This is the ONLY function that returns the actual key value.
 * Use it only when passing to an API client, never for logging.
 *
 * @throws APIKeyError if the key is missing or malformed
 */
export function getProviderKey(provider: KeyedProvider): string {
  const envVar = provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
  const validation = validateProviderKey(provider);
  if (!validation.valid) {
    throw new APIKeyError(provider, envVar, validation.error);
  }

  const key = getEnv(envVar);
  if (!key) {
    throw new APIKeyError(provider, envVar);
  }
  return key;
}
