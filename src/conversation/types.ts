/**
 * Conversation Types
 *
 * Messages, sessions, the persisted record shape and the export format.
 * Zod schemas validate everything that crosses a trust boundary
 * (imports, database rows).
 */

import { z } from 'zod';

export const MessageRoleSchema = z.enum(['user', 'assistant', 'system', 'tool']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const MessageMetadataSchema = z.record(z.unknown());
export type MessageMetadata = z.infer<typeof MessageMetadataSchema>;

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly metadata: MessageMetadata;
}

/**
 * A message as returned by getContext(). The synthetic summary message
 * has no timestamp.
 */
export interface ContextMessage {
  role: MessageRole;
  content: string;
  timestamp: string | null;
}

/**
 * - active: accepting messages, no condensation queued
 * - summarizing: a condensation job is queued or running
 */
export type SessionState = 'active' | 'summarizing';

/**
 * Read-only view of a session.
 */
export interface SessionView {
  sessionId: string;
  state: SessionState;
  summary: string | null;
  messages: readonly Message[];
  updatedAt: string;
}

/**
 * What a SessionRepository stores and returns.
 */
export interface SessionRecord {
  sessionId: string;
  summary: string | null;
  messages: Message[];
  updatedAt: string;
}

export interface SessionListing {
  sessionId: string;
  messageCount: number;
  updatedAt: string;
}

/**
 * Durable session storage. Implementations are synchronous (SQLite).
 */
export interface SessionRepository {
  save(record: SessionRecord): void;
  load(sessionId: string): SessionRecord | undefined;
  /** @returns true if a session was deleted */
  delete(sessionId: string): boolean;
  list(): SessionListing[];
}

/**
 * Produces the new summary from the previous one plus the messages being
 * condensed out of the live history.
 */
export interface Summarizer {
  readonly name: string;
  summarize(
    messages: readonly Message[],
    previousSummary: string | null,
    options?: { signal?: AbortSignal }
  ): Promise<string>;
}

// ============================================================================
// Export format
// ============================================================================

export const SessionExportSchema = z.object({
  sessionId: z.string().min(1),
  messages: z.array(
    z.object({
      role: MessageRoleSchema,
      content: z.string(),
      timestamp: z.string(),
    })
  ),
  summary: z.string().optional(),
  exportedAt: z.string(),
});

export type SessionExport = z.infer<typeof SessionExportSchema>;
