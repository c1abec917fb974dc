import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { PersistenceAdapter } from '../../types/persistence-adapter.js';
import type { MessageRecord, PendingMessage, SessionRecord, SessionStatus } from '../../types/session.js';

interface SessionRow {
  id: string;
  status: SessionStatus;
  created_at: number;
  store_screenshots: number;
  screenshot_scale: number | null;
  screenshot_quality: number | null;
}

interface MessageRow {
  id: number;
  session_id: string;
  content: string;
  created_at: number;
}

function toSessionRecord(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    status: row.status,
    createdAt: row.created_at,
    storeScreenshots: row.store_screenshots === 1,
    screenshotScale: row.screenshot_scale ?? 2,
    screenshotQuality: row.screenshot_quality ?? 70,
  };
}

function toMessageRecord(row: MessageRow): MessageRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    content: row.content,
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of PersistenceAdapter.
 * Pass `:memory:` for a throwaway database.
 */
export class SqlitePersistenceAdapter implements PersistenceAdapter {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      // Ensure the directory exists
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);

    // WAL for concurrent readers while a run writes
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');

    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL DEFAULT 'active',
        created_at INTEGER NOT NULL,
        store_screenshots INTEGER NOT NULL DEFAULT 0,
        screenshot_scale INTEGER DEFAULT 2,
        screenshot_quality INTEGER DEFAULT 70
      );

      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_session_id ON messages(session_id);
    `);
  }

  // ========================================
  // Session Operations
  // ========================================

  async createSession(session: SessionRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO sessions (id, status, created_at, store_screenshots, screenshot_scale, screenshot_quality)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        session.id,
        session.status,
        session.createdAt,
        session.storeScreenshots ? 1 : 0,
        session.screenshotScale,
        session.screenshotQuality
      );
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const row = this.db
      .prepare(`SELECT * FROM sessions WHERE id = ?`)
      .get(sessionId) as SessionRow | undefined;

    return row ? toSessionRecord(row) : null;
  }

  async listSessions(): Promise<SessionRecord[]> {
    const rows = this.db
      .prepare(`SELECT * FROM sessions ORDER BY created_at DESC, rowid DESC`)
      .all() as SessionRow[];

    return rows.map(toSessionRecord);
  }

  async updateSessionStatus(sessionId: string, status: SessionStatus): Promise<void> {
    this.db.prepare(`UPDATE sessions SET status = ? WHERE id = ?`).run(status, sessionId);
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.db.prepare(`DELETE FROM sessions WHERE id = ?`).run(sessionId);
  }

  // ========================================
  // Message Operations
  // ========================================

  async bulkInsertMessages(sessionId: string, records: PendingMessage[]): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO messages (session_id, content, created_at) VALUES (?, ?, ?)`
    );
    const insertAll = this.db.transaction((batch: PendingMessage[]) => {
      for (const record of batch) {
        insert.run(sessionId, record.content, record.createdAt);
      }
    });

    insertAll(records);
  }

  async listMessages(sessionId: string): Promise<MessageRecord[]> {
    const rows = this.db
      .prepare(`SELECT * FROM messages WHERE session_id = ? ORDER BY id ASC`)
      .all(sessionId) as MessageRow[];

    return rows.map(toMessageRecord);
  }

  async deleteMessagesForSession(sessionId: string): Promise<void> {
    this.db.prepare(`DELETE FROM messages WHERE session_id = ?`).run(sessionId);
  }

  /**
   * Close the database connection.
   * Call this during graceful shutdown.
   */
  close(): void {
    this.db.close();
  }
}
