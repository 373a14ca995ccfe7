/**
 * Configuration Schema
 *
 * Defines the shape of ~/.ragent/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM provider type (used in multiple schemas)
 */
export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['openai']).describe('Embedding provider'),
  model: z.string().describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .min(1)
    .describe('Vector dimension produced by the model (must match the saved index)'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .default(64)
    .describe('Number of texts to embed per request'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(60000)
    .describe('Timeout in milliseconds for one embedding request'),
});

/**
 * Retrieval pipeline configuration
 * Controls fan-out, fusion and reranking for retrieve()
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of chunks to return'),
  hybrid: z.boolean().describe('Fuse BM25 keyword scores with vector scores'),
  alpha: z
    .number()
    .min(0)
    .max(1)
    .describe('Vector weight in hybrid fusion (keyword weight is 1 - alpha)'),
  candidate_multiplier: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Candidates requested per variant, as a multiple of top_k'),
  rerank: z.boolean().describe('Rerank the merged candidate set'),
  expand_query: z.boolean().describe('Search with query paraphrases as well'),
  expansion_mode: z
    .enum(['heuristic', 'model'])
    .describe('heuristic rewrites locally; model asks the LLM for paraphrases'),
  max_variants: z
    .number()
    .int()
    .min(1)
    .max(8)
    .describe('Upper bound on query variants, original included'),
});

/**
 * Reranker configuration
 * Without an endpoint the reranker runs in passthrough mode
 */
export const RerankConfigSchema = z.object({
  endpoint: z.string().url().optional().describe('Relevance scoring endpoint (POST {query, candidates})'),
  model: z.string().optional().describe('Model name forwarded to the endpoint'),
  candidate_count: z
    .number()
    .int()
    .min(1)
    .max(500)
    .describe('Maximum candidates sent to the relevance model'),
  timeout_ms: z.number().int().min(100).max(120000).describe('Scoring request timeout'),
});

/**
 * Conversation memory configuration
 */
export const MemoryConfigSchema = z.object({
  max_history: z.number().int().min(1).describe('Live messages kept after summarization'),
  summarization_threshold: z
    .number()
    .int()
    .min(2)
    .describe('Message count above which older messages are summarized'),
  context_tokens: z.number().int().min(1).describe('Token budget for history in prompts'),
  summarizer: z
    .enum(['extractive', 'model'])
    .describe('extractive concatenates locally; model asks the LLM'),
});

/**
 * Agent loop configuration
 */
export const AgentConfigSchema = z.object({
  max_iterations: z.number().int().min(1).max(50).describe('Tool-use iterations before giving up'),
  retrieval_top_k: z.number().int().min(1).max(50).describe('Chunks retrieved per question'),
  context_chunks: z
    .number()
    .int()
    .min(0)
    .max(50)
    .describe('Retrieved chunks seeded into the agentic context'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  max_tokens: z.number().int().min(1).describe('Maximum tokens per generation'),
});

/**
 * Tool budget configuration (per session)
 */
export const BudgetConfigSchema = z.object({
  max_actions_per_session: z.number().int().min(0),
  max_actions_per_minute: z.number().int().min(0),
  reset_after_seconds: z.number().int().min(1).describe('Idle time after which a session budget resets'),
  sweep_interval_seconds: z
    .number()
    .int()
    .min(0)
    .describe('Idle-entry sweep interval (0 disables the sweeper)'),
});

/**
 * Storage locations
 */
export const StorageConfigSchema = z.object({
  index_path: z.string().describe('Directory holding the saved vector index'),
  database_path: z.string().describe('SQLite file for persisted sessions'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_model: z.string().describe('Default LLM model'),
  default_provider: LLMProviderTypeSchema.describe('LLM provider to use'),
  embedding: EmbeddingConfigSchema,
  retrieval: RetrievalConfigSchema,
  rerank: RerankConfigSchema,
  memory: MemoryConfigSchema,
  agent: AgentConfigSchema,
  budget: BudgetConfigSchema,
  storage: StorageConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
