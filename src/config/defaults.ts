/**
 * Default Configuration Values
 *
 * Used when no config.toml exists (first run) and for every field a
 * user's config.toml leaves out. The loader merges user config ON TOP
 * of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_model: 'claude-sonnet-4-20250514',
  default_provider: 'anthropic',

  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimensions: 1536,
    batch_size: 64,
    timeout_ms: 60000,
  },

  retrieval: {
    top_k: 10,
    hybrid: true,
    alpha: 0.7, // lean toward vector similarity
    candidate_multiplier: 2,
    rerank: true,
    expand_query: false,
    expansion_mode: 'heuristic',
    max_variants: 4,
  },

  // No endpoint: reranking degrades to passthrough until one is set
  rerank: {
    candidate_count: 50,
    timeout_ms: 10000,
  },

  memory: {
    max_history: 10,
    summarization_threshold: 20,
    context_tokens: 2000,
    summarizer: 'extractive',
  },

  agent: {
    max_iterations: 5,
    retrieval_top_k: 5,
    context_chunks: 3,
    temperature: 0.7,
    max_tokens: 2000,
  },

  budget: {
    max_actions_per_session: 10,
    max_actions_per_minute: 20,
    reset_after_seconds: 3600,
    sweep_interval_seconds: 300,
  },

  storage: {
    index_path: '~/.ragent/index',
    database_path: '~/.ragent/sessions.db',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.ragent/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# ragent configuration
# Location: ~/.ragent/config.toml (or $RAGENT_HOME/config.toml)

# LLM Settings
default_model = "${DEFAULT_CONFIG.default_model}"
default_provider = "${DEFAULT_CONFIG.default_provider}"

# Embedding Settings
# dimensions must match the saved index; re-index after changing the model
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Retrieval Settings
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
hybrid = ${DEFAULT_CONFIG.retrieval.hybrid}
alpha = ${DEFAULT_CONFIG.retrieval.alpha}
candidate_multiplier = ${DEFAULT_CONFIG.retrieval.candidate_multiplier}
rerank = ${DEFAULT_CONFIG.retrieval.rerank}
expand_query = ${DEFAULT_CONFIG.retrieval.expand_query}
expansion_mode = "${DEFAULT_CONFIG.retrieval.expansion_mode}"
max_variants = ${DEFAULT_CONFIG.retrieval.max_variants}

# Reranker
# Point endpoint at a cross-encoder service to enable model reranking
[rerank]
# endpoint = "http://localhost:8080/rerank"
# model = "cross-encoder/ms-marco-MiniLM-L-6-v2"
candidate_count = ${DEFAULT_CONFIG.rerank.candidate_count}
timeout_ms = ${DEFAULT_CONFIG.rerank.timeout_ms}

# Conversation Memory
[memory]
max_history = ${DEFAULT_CONFIG.memory.max_history}
summarization_threshold = ${DEFAULT_CONFIG.memory.summarization_threshold}
context_tokens = ${DEFAULT_CONFIG.memory.context_tokens}
summarizer = "${DEFAULT_CONFIG.memory.summarizer}"

# Agent Loop
[agent]
max_iterations = ${DEFAULT_CONFIG.agent.max_iterations}
retrieval_top_k = ${DEFAULT_CONFIG.agent.retrieval_top_k}
context_chunks = ${DEFAULT_CONFIG.agent.context_chunks}
temperature = ${DEFAULT_CONFIG.agent.temperature}
max_tokens = ${DEFAULT_CONFIG.agent.max_tokens}

# Tool Budget (per session)
[budget]
max_actions_per_session = ${DEFAULT_CONFIG.budget.max_actions_per_session}
max_actions_per_minute = ${DEFAULT_CONFIG.budget.max_actions_per_minute}
reset_after_seconds = ${DEFAULT_CONFIG.budget.reset_after_seconds}
sweep_interval_seconds = ${DEFAULT_CONFIG.budget.sweep_interval_seconds}

# Storage
[storage]
index_path = "${DEFAULT_CONFIG.storage.index_path}"
database_path = "${DEFAULT_CONFIG.storage.database_path}"
`;
