/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to provider API keys.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence and format validity are reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema. Keys are optional at load time; the
 * provider factories validate only the key they actually need.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  RERANK_API_KEY: z.string().optional(),
  RAGENT_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Loaded once at first access; cleared by _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

function blankToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate key presence - that happens when a provider is created.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    ANTHROPIC_API_KEY: blankToUndefined(process.env.ANTHROPIC_API_KEY),
    OPENAI_API_KEY: blankToUndefined(process.env.OPENAI_API_KEY),
    OPENAI_BASE_URL: blankToUndefined(process.env.OPENAI_BASE_URL),
    RERANK_API_KEY: blankToUndefined(process.env.RERANK_API_KEY),
    RAGENT_HOME: blankToUndefined(process.env.RAGENT_HOME),
  };
  const result = EnvSchema.safeParse(raw);

  // A malformed OPENAI_BASE_URL is dropped rather than failing every command
  _envCache = result.success ? result.data : { ...raw, OPENAI_BASE_URL: undefined };
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured (non-empty) WITHOUT exposing it.
 */
export function hasApiKey(provider: 'anthropic' | 'openai'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'anthropic':
      return Boolean(env.ANTHROPIC_API_KEY);
    case 'openai':
      return Boolean(env.OPENAI_API_KEY);
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Provider-specific setup instructions, shown when a required key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<'anthropic' | 'openai', string> = {
  anthropic: `
To use Anthropic (Claude) models:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable (or add it to .env):

   export ANTHROPIC_API_KEY="sk-ant-..."
`.trim(),

  openai: `
To use OpenAI models and embeddings:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable (or add it to .env):

   export OPENAI_API_KEY="sk-..."

3. (Optional) Point at an OpenAI-compatible server:

   export OPENAI_BASE_URL="https://api.example.com/v1"
`.trim(),
};
