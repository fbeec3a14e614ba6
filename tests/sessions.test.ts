import { describe, it, expect, beforeEach } from 'vitest';
import { SessionManager } from '../src/sessions/session-manager.js';
import { ConversationLoop } from '../src/agents/conversation-loop.js';
import type { TransportResult } from '../src/llm/types.js';
import { MockTransport, textReply } from './helpers/mock-transport.js';

describe('SessionManager', () => {
  let transport: MockTransport;
  let now: number;
  let created: string[];
  let manager: SessionManager;

  beforeEach(() => {
    transport = new MockTransport();
    now = 1_000_000;
    created = [];
    manager = new SessionManager(
      (sessionId) => {
        created.push(sessionId);
        return new ConversationLoop(transport, { model: 'test-model' });
      },
      { idleTimeoutMs: 60_000, now: () => now }
    );
  });

  it('should create one loop per session id', () => {
    const a = manager.getOrCreate('a');
    const again = manager.getOrCreate('a');
    const b = manager.getOrCreate('b');

    expect(again).toBe(a);
    expect(b).not.toBe(a);
    expect(created).toEqual(['a', 'b']);
    expect(manager.size).toBe(2);
  });

  it('should look up without creating', () => {
    expect(manager.get('missing')).toBeUndefined();
    expect(manager.has('missing')).toBe(false);
    expect(created).toEqual([]);
  });

  it('should clear the history of a known session only', async () => {
    transport.completions.push(textReply('ok'));
    const loop = manager.getOrCreate('a');
    await loop.converse('Hi');

    expect(manager.clearHistory('a')).toBe(true);
    expect(loop.getHistory()).toEqual([]);
    expect(manager.clearHistory('missing')).toBe(false);
  });

  it('should list sessions with message counts', async () => {
    transport.completions.push(textReply('ok'));
    await manager.getOrCreate('a').converse('Hi');
    now += 5000;
    manager.getOrCreate('b');

    expect(manager.list()).toEqual([
      { sessionId: 'a', createdAt: 1_000_000, lastActiveAt: 1_000_000, messageCount: 2 },
      { sessionId: 'b', createdAt: 1_005_000, lastActiveAt: 1_005_000, messageCount: 0 },
    ]);
  });

  it('should prune sessions idle past the timeout', () => {
    manager.getOrCreate('stale');
    now += 30_000;
    manager.getOrCreate('fresh');
    now += 40_000;

    expect(manager.pruneIdle()).toEqual(['stale']);
    expect(manager.has('stale')).toBe(false);
    expect(manager.has('fresh')).toBe(true);
  });

  it('should not prune a session with a turn in flight', async () => {
    let release: (value: TransportResult<unknown>) => void = () => {};
    transport.completions.push(
      () =>
        new Promise<TransportResult<unknown>>((resolve) => {
          release = resolve;
        })
    );
    const turn = manager.getOrCreate('busy').converse('slow');
    now += 120_000;

    expect(manager.pruneIdle()).toEqual([]);

    release(textReply('done'));
    await turn;
    expect(manager.pruneIdle()).toEqual(['busy']);
  });

  it('should remove a session', () => {
    manager.getOrCreate('a');
    expect(manager.remove('a')).toBe(true);
    expect(manager.remove('a')).toBe(false);
  });
});
