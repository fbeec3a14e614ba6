// Bootstrap - wires transport, tools, sessions, persistence and logging from config

import type { LoopwiseConfig } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import type { Transport, TransportErrorEvent, TransportResponseEvent } from '../llm/transport.js';
import { HttpTransport } from '../llm/http-transport.js';
import { ConversationLoop, type LoopStep } from '../agents/conversation-loop.js';
import { ToolRegistry, type ToolEvent } from '../tools/tool-registry.js';
import { registerBuiltinTools, registerDevTools } from '../tools/builtin-tools.js';
import { SessionManager } from '../sessions/session-manager.js';
import { ConversationStore } from '../persistence/conversation-store.js';
import type { ConversationRepository } from '../persistence/types.js';
import { ChatService } from './chat-service.js';
import { errorMessage } from './errors.js';

export interface Runtime {
  service: ChatService;
  sessions: SessionManager;
  transport: Transport;
  store?: ConversationRepository;
  /** Stops the idle sweep and closes the store. */
  close(): void;
}

export interface BootstrapOptions {
  logger: Logger;
  /** Replaces the HTTP transport; used by tests. */
  transport?: Transport;
  /** Replaces the SQLite store; `null` runs without persistence. */
  store?: ConversationRepository | null;
  /** Periodically prune idle sessions. Off for one-shot CLI commands. */
  pruneIdleSessions?: boolean;
}

export function createToolRegistryFactory(config: LoopwiseConfig, logger: Logger): () => ToolRegistry {
  return () => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry);
    if (config.tools.devTools) {
      registerDevTools(registry, {
        workspaceRoot: config.tools.workspaceRoot,
        execTimeoutMs: config.tools.execTimeoutMs,
      });
    }

    registry.on('tool:event', (event: ToolEvent) => {
      if (event.phase === 'error') {
        logger.warn({ tool: event.toolName, err: event.error, durationMs: event.durationMs }, 'tool failed');
      } else if (event.phase === 'complete') {
        logger.info({ tool: event.toolName, durationMs: event.durationMs }, 'tool executed');
      }
    });
    return registry;
  };
}

function openStore(config: LoopwiseConfig, logger: Logger): ConversationRepository | undefined {
  if (!config.persistence.enabled) {
    logger.info('persistence disabled');
    return undefined;
  }
  try {
    const store = new ConversationStore(config.persistence.dbPath);
    logger.info({ dbPath: config.persistence.dbPath }, 'conversation store opened');
    return store;
  } catch (err) {
    logger.warn({ dbPath: config.persistence.dbPath, err: errorMessage(err) }, 'conversation store unavailable, continuing without persistence');
    return undefined;
  }
}

export function bootstrap(config: LoopwiseConfig, options: BootstrapOptions): Runtime {
  const { logger } = options;

  const transport =
    options.transport ??
    new HttpTransport({ apiKey: config.transport.apiKey, baseUrl: config.transport.baseUrl });

  transport.on('response', (event: TransportResponseEvent) => {
    logger.debug({ model: event.model, status: event.status, durationMs: event.durationMs }, 'completion response');
  });
  transport.on('transport_error', (event: TransportErrorEvent) => {
    logger.warn({ model: event.model, status: event.status, err: event.error }, 'completion request failed');
  });

  const store = options.store === null ? undefined : (options.store ?? openStore(config, logger));
  const createToolRegistry = createToolRegistryFactory(config, logger);

  const sessions = new SessionManager(
    (sessionId) => {
      const loop = new ConversationLoop(
        transport,
        {
          model: config.transport.model,
          maxIterations: config.loop.maxIterations,
          systemPrompt: config.loop.systemPrompt,
        },
        createToolRegistry()
      );
      loop.on('step', (step: LoopStep) => {
        logger.debug({ sessionId, step: step.type, iteration: step.iteration, ...step.data }, 'loop step');
      });
      return loop;
    },
    { idleTimeoutMs: config.sessions.idleTimeoutMs }
  );

  const service = new ChatService({
    sessions,
    createToolRegistry,
    model: config.transport.model,
    store,
    logger,
  });

  let sweep: NodeJS.Timeout | undefined;
  if (options.pruneIdleSessions) {
    sweep = setInterval(() => {
      const removed = sessions.pruneIdle();
      if (removed.length > 0) logger.info({ count: removed.length }, 'pruned idle sessions');
    }, Math.min(config.sessions.idleTimeoutMs, 60_000));
    sweep.unref();
  }

  return {
    service,
    sessions,
    transport,
    store,
    close: () => {
      if (sweep) clearInterval(sweep);
      store?.close();
    },
  };
}
