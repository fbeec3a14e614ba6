import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { existsSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { ConversationStore, IN_MEMORY_DB } from '../src/persistence/conversation-store.js';
import type { PersistenceEvent } from '../src/persistence/types.js';

function makeClock(start = Date.UTC(2024, 0, 1, 12, 0, 0)) {
  let current = start;
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('ConversationStore', () => {
  let store: ConversationStore;
  let clock: ReturnType<typeof makeClock>;

  beforeEach(() => {
    clock = makeClock();
    store = new ConversationStore(IN_MEMORY_DB, { now: clock.now });
  });

  afterEach(() => {
    store.close();
  });

  it('should return messages in insertion order', () => {
    store.saveMessage('s1', 'user', 'Hello');
    clock.advance(1000);
    store.saveMessage('s1', 'assistant', 'Hi there');

    expect(store.getHistory('s1')).toEqual([
      { role: 'user', content: 'Hello', timestamp: '2024-01-01T12:00:00.000Z' },
      { role: 'assistant', content: 'Hi there', timestamp: '2024-01-01T12:00:01.000Z' },
    ]);
  });

  it('should keep insertion order for identical timestamps', () => {
    store.saveMessage('s1', 'user', 'one');
    store.saveMessage('s1', 'assistant', 'two');
    store.saveMessage('s1', 'user', 'three');

    expect(store.getHistory('s1').map((m) => m.content)).toEqual(['one', 'two', 'three']);
  });

  it('should apply the history limit to the oldest messages', () => {
    for (let i = 0; i < 5; i++) store.saveMessage('s1', 'user', `m${i}`);

    expect(store.getHistory('s1', 2).map((m) => m.content)).toEqual(['m0', 'm1']);
  });

  it('should return an empty history for unknown sessions', () => {
    expect(store.getHistory('nope')).toEqual([]);
  });

  it('should bump updated_at on every save', () => {
    store.saveMessage('s1', 'user', 'a');
    clock.advance(60_000);
    store.saveMessage('s1', 'assistant', 'b');

    expect(store.listSessions()).toEqual([
      {
        sessionId: 's1',
        createdAt: '2024-01-01T12:00:00.000Z',
        updatedAt: '2024-01-01T12:01:00.000Z',
        messageCount: 2,
      },
    ]);
  });

  it('should list sessions newest first with a limit', () => {
    store.saveMessage('old', 'user', 'a');
    clock.advance(1000);
    store.saveMessage('new', 'user', 'b');
    clock.advance(1000);
    store.saveMessage('mid', 'user', 'c');
    clock.advance(1000);
    store.saveMessage('old', 'assistant', 'd');

    expect(store.listSessions().map((s) => s.sessionId)).toEqual(['old', 'mid', 'new']);
    expect(store.listSessions(1).map((s) => s.sessionId)).toEqual(['old']);
  });

  it('should clear messages but keep the session', () => {
    store.saveMessage('s1', 'user', 'a');
    store.saveMessage('s1', 'assistant', 'b');

    store.clearHistory('s1');

    expect(store.getHistory('s1')).toEqual([]);
    expect(store.listSessions()).toEqual([
      expect.objectContaining({ sessionId: 's1', messageCount: 0 }),
    ]);
  });

  it('should leave other sessions untouched when clearing one', () => {
    store.saveMessage('s1', 'user', 'a');
    store.saveMessage('s2', 'user', 'b');
    store.saveMessage('s2', 'assistant', 'c');

    store.clearHistory('s1');

    expect(store.getHistory('s1')).toEqual([]);
    expect(store.getHistory('s2').map((m) => [m.role, m.content])).toEqual([
      ['user', 'b'],
      ['assistant', 'c'],
    ]);
  });

  it('should delete a session and its messages', () => {
    store.saveMessage('s1', 'user', 'a');
    store.saveMessage('s2', 'user', 'b');

    expect(store.deleteSession('s1')).toBe(true);
    expect(store.deleteSession('s1')).toBe(false);
    expect(store.getHistory('s1')).toEqual([]);
    expect(store.listSessions().map((s) => s.sessionId)).toEqual(['s2']);
  });

  it('should emit persistence events', () => {
    const events: PersistenceEvent[] = [];
    store.on('persistence', (e: PersistenceEvent) => events.push(e));

    store.saveMessage('s1', 'user', 'a');
    store.clearHistory('s1');
    store.deleteSession('s1');

    expect(events.map((e) => e.type)).toEqual(['message:save', 'history:clear', 'session:delete']);
  });
});

describe('ConversationStore on disk', () => {
  const dir = join(tmpdir(), 'loopwise-store-test-' + Date.now());

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create the database directory and reopen saved data', () => {
    const dbPath = join(dir, 'nested', 'conversations.db');
    const first = new ConversationStore(dbPath);
    first.saveMessage('s1', 'user', 'persisted');
    first.close();

    expect(existsSync(dbPath)).toBe(true);

    const second = new ConversationStore(dbPath);
    expect(second.getHistory('s1').map((m) => m.content)).toEqual(['persisted']);
    second.close();
  });
});
