import type { MessageRecord, PendingMessage, SessionRecord, SessionStatus } from './session.js';

/**
 * Storage for sessions and their messages.
 *
 * Applications implement this interface to integrate with their persistence layer.
 * Every call is awaited by the caller before it moves on.
 *
 * @example
 * ```typescript
 * class PostgresPersistenceAdapter implements PersistenceAdapter {
 *   async bulkInsertMessages(sessionId, records) {
 *     await this.pool.query('BEGIN');
 *     // ... insert rows in order
 *     await this.pool.query('COMMIT');
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface PersistenceAdapter {
  // ========================================
  // Session Operations
  // ========================================

  createSession(session: SessionRecord): Promise<void>;

  /**
   * @returns The session, or null if not found
   */
  getSession(sessionId: string): Promise<SessionRecord | null>;

  /**
   * All sessions, newest first
   */
  listSessions(): Promise<SessionRecord[]>;

  updateSessionStatus(sessionId: string, status: SessionStatus): Promise<void>;

  /**
   * Remove the session record. Messages must be removed first.
   */
  deleteSession(sessionId: string): Promise<void>;

  // ========================================
  // Message Operations
  // ========================================

  /**
   * Insert all records in order, atomically: either every row is written or none is.
   */
  bulkInsertMessages(sessionId: string, records: PendingMessage[]): Promise<void>;

  /**
   * Messages of a session in insertion order
   */
  listMessages(sessionId: string): Promise<MessageRecord[]>;

  deleteMessagesForSession(sessionId: string): Promise<void>;
}
