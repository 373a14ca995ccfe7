/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `ragent config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  RetrievalConfigSchema,
  MemoryConfigSchema,
  AgentConfigSchema,
  BudgetConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, LLMProviderType } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  deepMerge,
  getConfigValue,
  setConfigValue,
  listConfig,
  type LoadConfigOptions,
} from './loader.js';

// Paths
export { getRagentDir, getConfigPath, expandHome } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
