/**
 * Conversation Module
 *
 * Session history with background summarization, for the agent loop.
 */

export {
  ConversationStore,
  DEFAULT_MAX_HISTORY,
  DEFAULT_SUMMARIZATION_THRESHOLD,
  DEFAULT_CONTEXT_TOKENS,
  type ConversationStoreOptions,
} from './store.js';
export { ExtractiveSummarizer, ModelSummarizer } from './summarizer.js';
export {
  MessageRoleSchema,
  MessageMetadataSchema,
  SessionExportSchema,
  type Message,
  type MessageRole,
  type MessageMetadata,
  type ContextMessage,
  type SessionState,
  type SessionView,
  type SessionRecord,
  type SessionListing,
  type SessionRepository,
  type SessionExport,
  type Summarizer,
} from './types.js';
