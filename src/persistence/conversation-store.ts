// Conversation Store - SQLite-backed session and message log

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { EventEmitter } from 'node:events';
import type { MessageRole } from '../llm/types.js';
import type {
  ConversationRepository,
  PersistenceEvent,
  SessionSummary,
  StoredMessage,
} from './types.js';

export const DEFAULT_HISTORY_LIMIT = 50;
export const DEFAULT_SESSION_LIMIT = 100;

export const IN_MEMORY_DB = ':memory:';

export interface ConversationStoreOptions {
  /** Clock for created_at / updated_at / timestamp columns. */
  now?: () => Date;
}

interface MessageRow {
  role: MessageRole;
  content: string;
  timestamp: string;
}

interface SessionRow {
  session_id: string;
  created_at: string;
  updated_at: string;
  message_count: number;
}

export class ConversationStore extends EventEmitter implements ConversationRepository {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options: ConversationStoreOptions = {}) {
    super();
    this.now = options.now ?? (() => new Date());
    if (dbPath !== IN_MEMORY_DB) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS conversations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES sessions(session_id) ON DELETE CASCADE,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        timestamp TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_conversations_session ON conversations(session_id);
    `);
  }

  saveMessage(sessionId: string, role: MessageRole, content: string): void {
    const timestamp = this.now().toISOString();

    const upsertSession = this.db.prepare<[string, string, string]>(`
      INSERT INTO sessions (session_id, created_at, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(session_id) DO UPDATE SET updated_at = excluded.updated_at
    `);
    const insertMessage = this.db.prepare<[string, string, string, string]>(
      'INSERT INTO conversations (session_id, role, content, timestamp) VALUES (?, ?, ?, ?)'
    );

    const transaction = this.db.transaction(() => {
      upsertSession.run(sessionId, timestamp, timestamp);
      insertMessage.run(sessionId, role, content, timestamp);
    });
    transaction();

    this.emitEvent('message:save', { sessionId, role });
  }

  getHistory(sessionId: string, limit: number = DEFAULT_HISTORY_LIMIT): StoredMessage[] {
    return this.db
      .prepare<[string, number], MessageRow>(
        `SELECT role, content, timestamp FROM conversations
         WHERE session_id = ? ORDER BY id ASC LIMIT ?`
      )
      .all(sessionId, limit)
      .map((row) => ({ role: row.role, content: row.content, timestamp: row.timestamp }));
  }

  clearHistory(sessionId: string): void {
    this.db.prepare<[string]>('DELETE FROM conversations WHERE session_id = ?').run(sessionId);
    this.emitEvent('history:clear', { sessionId });
  }

  listSessions(limit: number = DEFAULT_SESSION_LIMIT): SessionSummary[] {
    return this.db
      .prepare<[number], SessionRow>(
        `SELECT s.session_id, s.created_at, s.updated_at,
           (SELECT COUNT(*) FROM conversations c WHERE c.session_id = s.session_id) AS message_count
         FROM sessions s
         ORDER BY s.updated_at DESC, s.rowid DESC
         LIMIT ?`
      )
      .all(limit)
      .map((row) => ({
        sessionId: row.session_id,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        messageCount: row.message_count,
      }));
  }

  deleteSession(sessionId: string): boolean {
    const removed = this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM conversations WHERE session_id = ?').run(sessionId);
      return this.db.prepare<[string]>('DELETE FROM sessions WHERE session_id = ?').run(sessionId).changes > 0;
    })();

    if (removed) this.emitEvent('session:delete', { sessionId });
    return removed;
  }

  close(): void {
    this.db.close();
  }

  private emitEvent(type: PersistenceEvent['type'], details: Record<string, unknown>): void {
    this.emit('persistence', {
      type,
      timestamp: Date.now(),
      details,
    } satisfies PersistenceEvent);
  }
}
