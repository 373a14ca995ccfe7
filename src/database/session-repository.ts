/**
 * SQLite Session Repository
 *
 * Persists conversation sessions for ConversationStore. A save replaces
 * the session's message rows wholesale inside one transaction, so a
 * condensed session never leaves stale prefix rows behind.
 */

import type Database from 'better-sqlite3';
import { DatabaseError } from '../errors/index.js';
import { safeJsonParse, silentLogger, type Logger } from '../utils/index.js';
import { MessageMetadataSchema } from '../conversation/types.js';
import type {
  Message,
  SessionListing,
  SessionRecord,
  SessionRepository,
} from '../conversation/types.js';
import {
  MessageRowSchema,
  SessionListingRowSchema,
  SessionRowSchema,
  validateRow,
  validateRows,
} from './validation.js';

export class SqliteSessionRepository implements SessionRepository {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(db: Database.Database, logger: Logger = silentLogger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Insert or replace a session and all of its live messages.
   *
   * @throws DatabaseError if the write fails
   */
  save(record: SessionRecord): void {
    const upsertSession = this.db.prepare(`
      INSERT INTO sessions (session_id, summary, updated_at)
      VALUES (@sessionId, @summary, @updatedAt)
      ON CONFLICT(session_id) DO UPDATE SET
        summary = excluded.summary,
        updated_at = excluded.updated_at
    `);
    const deleteMessages = this.db.prepare('DELETE FROM messages WHERE session_id = ?');
    const insertMessage = this.db.prepare(`
      INSERT INTO messages (session_id, position, role, content, timestamp, metadata)
      VALUES (@sessionId, @position, @role, @content, @timestamp, @metadata)
    `);

    try {
      this.db.transaction(() => {
        upsertSession.run({
          sessionId: record.sessionId,
          summary: record.summary,
          updatedAt: record.updatedAt,
        });
        deleteMessages.run(record.sessionId);
        record.messages.forEach((message, position) => {
          insertMessage.run({
            sessionId: record.sessionId,
            position,
            role: message.role,
            content: message.content,
            timestamp: message.timestamp,
            metadata: Object.keys(message.metadata).length > 0 ? JSON.stringify(message.metadata) : null,
          });
        });
      })();
    } catch (error) {
      throw new DatabaseError(
        `Failed to save session ${record.sessionId}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Load a session with its messages in order.
   *
   * @throws SchemaValidationError if a row does not match the schema
   */
  load(sessionId: string): SessionRecord | undefined {
    const row = this.db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(sessionId);
    if (!row) {
      return undefined;
    }
    const session = validateRow(SessionRowSchema, row, `sessions.session_id=${sessionId}`);

    const messageRows = validateRows(
      MessageRowSchema,
      this.db.prepare('SELECT * FROM messages WHERE session_id = ? ORDER BY position').all(sessionId),
      `messages.session_id=${sessionId}`
    );
    const messages: Message[] = messageRows.map((message) => ({
      role: message.role,
      content: message.content,
      timestamp: message.timestamp,
      metadata: safeJsonParse(message.metadata, MessageMetadataSchema, {}, (error) => {
        this.logger.warn(
          `Corrupt metadata in session ${sessionId} message ${message.position}: ${error.message}`
        );
      }),
    }));

    return {
      sessionId: session.session_id,
      summary: session.summary,
      messages,
      updatedAt: session.updated_at,
    };
  }

  /**
   * Delete a session; its messages go with it (ON DELETE CASCADE).
   */
  delete(sessionId: string): boolean {
    const result = this.db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId);
    return result.changes > 0;
  }

  /**
   * All sessions, most recently updated first.
   */
  list(): SessionListing[] {
    const rows = this.db
      .prepare(
        `SELECT s.session_id, s.updated_at, COUNT(m.position) AS message_count
         FROM sessions s
         LEFT JOIN messages m ON m.session_id = s.session_id
         GROUP BY s.session_id
         ORDER BY s.updated_at DESC, s.session_id`
      )
      .all();

    return validateRows(SessionListingRowSchema, rows, 'sessions').map((row) => ({
      sessionId: row.session_id,
      messageCount: row.message_count,
      updatedAt: row.updated_at,
    }));
  }
}
