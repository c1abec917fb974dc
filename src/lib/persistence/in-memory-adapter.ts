import type { PersistenceAdapter } from '../../types/persistence-adapter.js';
import type { MessageRecord, PendingMessage, SessionRecord, SessionStatus } from '../../types/session.js';

/**
 * In-memory implementation of PersistenceAdapter for development and tests.
 * All data is lost when the process exits.
 */
export class InMemoryPersistenceAdapter implements PersistenceAdapter {
  private sessions = new Map<string, SessionRecord>();
  private messages: MessageRecord[] = [];
  private nextMessageId = 1;

  // ========================================
  // Session Operations
  // ========================================

  async createSession(session: SessionRecord): Promise<void> {
    this.sessions.set(session.id, { ...session });
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async listSessions(): Promise<SessionRecord[]> {
    // Map preserves insertion order; reverse for newest first on equal timestamps
    return Array.from(this.sessions.values())
      .reverse()
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((session) => ({ ...session }));
  }

  async updateSessionStatus(sessionId: string, status: SessionStatus): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (session) {
      this.sessions.set(sessionId, { ...session, status });
    }
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  // ========================================
  // Message Operations
  // ========================================

  async bulkInsertMessages(sessionId: string, records: PendingMessage[]): Promise<void> {
    for (const record of records) {
      this.messages.push({
        id: this.nextMessageId++,
        sessionId,
        content: record.content,
        createdAt: record.createdAt,
      });
    }
  }

  async listMessages(sessionId: string): Promise<MessageRecord[]> {
    return this.messages
      .filter((message) => message.sessionId === sessionId)
      .map((message) => ({ ...message }));
  }

  async deleteMessagesForSession(sessionId: string): Promise<void> {
    this.messages = this.messages.filter((message) => message.sessionId !== sessionId);
  }
}
