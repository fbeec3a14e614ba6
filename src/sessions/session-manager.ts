// Session Manager - session-keyed conversation loops owned by the hosting process

import type { ConversationLoop } from '../agents/conversation-loop.js';

export type LoopFactory = (sessionId: string) => ConversationLoop;

export interface SessionManagerOptions {
  /** Loops untouched for longer than this are dropped by pruneIdle(). */
  idleTimeoutMs?: number;
  now?: () => number;
}

export interface SessionInfo {
  sessionId: string;
  createdAt: number;
  lastActiveAt: number;
  messageCount: number;
}

interface SessionEntry {
  loop: ConversationLoop;
  createdAt: number;
  lastActiveAt: number;
}

export class SessionManager {
  private sessions = new Map<string, SessionEntry>();
  private factory: LoopFactory;
  private idleTimeoutMs?: number;
  private now: () => number;

  constructor(factory: LoopFactory, options: SessionManagerOptions = {}) {
    this.factory = factory;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  getOrCreate(sessionId: string): ConversationLoop {
    const existing = this.sessions.get(sessionId);
    const now = this.now();
    if (existing) {
      existing.lastActiveAt = now;
      return existing.loop;
    }

    const loop = this.factory(sessionId);
    this.sessions.set(sessionId, { loop, createdAt: now, lastActiveAt: now });
    return loop;
  }

  get(sessionId: string): ConversationLoop | undefined {
    return this.sessions.get(sessionId)?.loop;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Returns false when the session has no loop. */
  clearHistory(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;
    entry.loop.clearHistory();
    entry.lastActiveAt = this.now();
    return true;
  }

  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  list(): SessionInfo[] {
    return [...this.sessions.entries()].map(([sessionId, entry]) => ({
      sessionId,
      createdAt: entry.createdAt,
      lastActiveAt: entry.lastActiveAt,
      messageCount: entry.loop.historyLength,
    }));
  }

  /**
   * Drop loops idle past the timeout, skipping any with a turn in flight.
   * Returns the removed session ids.
   */
  pruneIdle(): string[] {
    if (this.idleTimeoutMs === undefined) return [];
    const cutoff = this.now() - this.idleTimeoutMs;
    const removed: string[] = [];

    for (const [sessionId, entry] of this.sessions) {
      if (entry.lastActiveAt < cutoff && entry.loop.getState() === 'done') {
        this.sessions.delete(sessionId);
        removed.push(sessionId);
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
