// Persistence types

import type { MessageRole } from '../llm/types.js';

export interface StoredMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
}

export interface SessionSummary {
  sessionId: string;
  createdAt: string;
  updatedAt: string;
  messageCount: number;
}

/**
 * Durable, session-keyed message log. Independent of the in-memory history a
 * ConversationLoop keeps; nothing reads it back into a loop.
 */
export interface ConversationRepository {
  saveMessage(sessionId: string, role: MessageRole, content: string): void;
  /** Oldest first; the first `limit` messages in insertion order. */
  getHistory(sessionId: string, limit?: number): StoredMessage[];
  /** Removes the messages; the session itself is kept. */
  clearHistory(sessionId: string): void;
  /** Most recently updated first. */
  listSessions(limit?: number): SessionSummary[];
  deleteSession(sessionId: string): boolean;
  close(): void;
}

export interface PersistenceEvent {
  type: 'message:save' | 'history:clear' | 'session:delete';
  timestamp: number;
  details: Record<string, unknown>;
}
