// Chat Service - the request-response surface shared by the HTTP server and the console

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging/logger.js';
import type { ChatMessage } from '../llm/types.js';
import type { FinishReason, TurnResult } from '../agents/conversation-loop.js';
import type { SessionManager } from '../sessions/session-manager.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type {
  ConversationRepository,
  SessionSummary,
  StoredMessage,
} from '../persistence/types.js';
import { PersistenceUnavailableError, TurnInProgressError, errorMessage } from './errors.js';

export const APP_NAME = 'Loopwise';
export const APP_VERSION = '1.0.0';

export interface ChatServiceOptions {
  sessions: SessionManager;
  /** Builds the registry a new session would get; used to list tools without a session. */
  createToolRegistry: () => ToolRegistry;
  model: string;
  store?: ConversationRepository;
  logger: Logger;
}

export interface SendMessageInput {
  message: string;
  sessionId?: string;
  stream?: boolean;
  onToken?: (token: string) => void;
}

export interface SendMessageResult {
  response: string;
  sessionId: string;
  finishReason: FinishReason;
  iterations: number;
}

export interface ToolSummary {
  name: string;
  description: string;
}

export interface ServiceInfo {
  name: string;
  version: string;
  status: 'running';
  model: string;
  tools: number;
  database: 'enabled' | 'disabled';
}

export class ChatService {
  private sessions: SessionManager;
  private createToolRegistry: () => ToolRegistry;
  private store?: ConversationRepository;
  private logger: Logger;
  readonly model: string;

  constructor(options: ChatServiceOptions) {
    this.sessions = options.sessions;
    this.createToolRegistry = options.createToolRegistry;
    this.store = options.store;
    this.logger = options.logger;
    this.model = options.model;
  }

  get hasStore(): boolean {
    return this.store !== undefined;
  }

  info(): ServiceInfo {
    return {
      name: APP_NAME,
      version: APP_VERSION,
      status: 'running',
      model: this.model,
      tools: this.createToolRegistry().size,
      database: this.store ? 'enabled' : 'disabled',
    };
  }

  /**
   * Run one turn on the session's loop. A session id is generated when none is
   * given. User and assistant messages are persisted when a store is attached;
   * a failed save is logged and does not affect the reply.
   */
  async sendMessage(input: SendMessageInput): Promise<SendMessageResult> {
    const sessionId = input.sessionId ?? uuidv4();
    const loop = this.sessions.getOrCreate(sessionId);
    if (loop.getState() !== 'done') throw new TurnInProgressError();

    this.persist(sessionId, 'user', input.message);

    const onToken = input.onToken;
    if (onToken) loop.on('token', onToken);

    let result: TurnResult;
    try {
      result = await loop.converse(input.message, { stream: input.stream ?? false });
    } finally {
      if (onToken) loop.off('token', onToken);
    }

    this.persist(sessionId, 'assistant', result.content);

    this.logger.info(
      { sessionId, finishReason: result.finishReason, iterations: result.iterations, mode: result.mode },
      'turn finished'
    );

    return {
      response: result.content,
      sessionId,
      finishReason: result.finishReason,
      iterations: result.iterations,
    };
  }

  /** In-memory history; empty for an unknown session. */
  getHistory(sessionId: string | undefined): ChatMessage[] {
    if (!sessionId) return [];
    return this.sessions.get(sessionId)?.getHistory() ?? [];
  }

  /** Clears the in-memory history. Returns false for an unknown session. */
  clearHistory(sessionId: string): boolean {
    return this.sessions.clearHistory(sessionId);
  }

  /** Writes the session's in-memory history to a JSON file. */
  async saveHistory(sessionId: string, path: string): Promise<void> {
    await this.sessions.getOrCreate(sessionId).saveHistory(path);
  }

  /** Replaces the session's in-memory history from a JSON file. */
  async loadHistory(sessionId: string, path: string): Promise<number> {
    return this.sessions.getOrCreate(sessionId).loadHistory(path);
  }

  listSessions(limit?: number): SessionSummary[] {
    return this.requireStore().listSessions(limit);
  }

  getSessionHistory(sessionId: string, limit?: number): StoredMessage[] {
    return this.requireStore().getHistory(sessionId, limit);
  }

  clearSession(sessionId: string): void {
    this.requireStore().clearHistory(sessionId);
  }

  /** Deletes the persisted session and drops its in-memory loop. */
  deleteSession(sessionId: string): boolean {
    const removed = this.requireStore().deleteSession(sessionId);
    this.sessions.remove(sessionId);
    return removed;
  }

  listTools(sessionId?: string): ToolSummary[] {
    const registry = (sessionId ? this.sessions.get(sessionId)?.tools : undefined) ?? this.createToolRegistry();
    return registry.listAll().map((tool) => ({ name: tool.name, description: tool.description }));
  }

  private requireStore(): ConversationRepository {
    if (!this.store) throw new PersistenceUnavailableError();
    return this.store;
  }

  private persist(sessionId: string, role: 'user' | 'assistant', content: string): void {
    if (!this.store) return;
    try {
      this.store.saveMessage(sessionId, role, content);
    } catch (err) {
      this.logger.warn({ sessionId, role, err: errorMessage(err) }, 'failed to persist message');
    }
  }
}
