// HTTP Server - express routes over the chat service

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import type { ChatService } from '../core/chat-service.js';
import type { Logger } from '../logging/logger.js';
import { PersistenceUnavailableError, TurnInProgressError, errorMessage } from '../core/errors.js';

export const ENDPOINTS: Record<string, string> = {
  '/': 'API information (this page)',
  '/health': 'Health check',
  '/chat': 'POST - Send message to agent',
  '/history': 'GET - Get in-memory conversation history of a session',
  '/clear': 'POST - Clear in-memory conversation history of a session',
  '/sessions': 'GET - List all persisted sessions',
  '/sessions/<session_id>/history': 'GET - Get persisted conversation history',
  '/clear/<session_id>': 'POST - Clear persisted session history',
  'DELETE /sessions/<session_id>': 'Delete a persisted session',
  '/tools': 'GET - List registered tools',
};

const chatBodySchema = z.object({
  message: z.string({ required_error: 'Missing message in request body' }),
  session_id: z.string().min(1).optional(),
  stream: z.boolean().optional(),
});

const clearBodySchema = z.object({
  session_id: z.string({ required_error: 'Missing session_id in request body' }).min(1),
});

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

const sessionQuerySchema = z.object({
  session_id: z.string().min(1).optional(),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void> | void;

// Express 4 does not forward rejected promises to the error middleware
function asyncHandler(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: error.issues.map((issue) => issue.message).join('; '),
    success: false,
  });
}

export function statusFor(err: unknown): number {
  if (err instanceof PersistenceUnavailableError) return 503;
  if (err instanceof TurnInProgressError) return 409;
  if (err instanceof SyntaxError) return 400;
  return 500;
}

export function createApp(service: ChatService, logger: Logger): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({ ...service.info(), endpoints: ENDPOINTS });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      agent: 'ready',
      database: service.hasStore ? 'connected' : 'disconnected',
    });
  });

  app.post(
    '/chat',
    asyncHandler(async (req, res) => {
      const body = chatBodySchema.safeParse(req.body ?? {});
      if (!body.success) return badRequest(res, body.error);

      const result = await service.sendMessage({
        message: body.data.message,
        sessionId: body.data.session_id,
        stream: body.data.stream,
      });
      res.json({
        response: result.response,
        session_id: result.sessionId,
        finish_reason: result.finishReason,
        iterations: result.iterations,
        success: true,
      });
    })
  );

  app.get(
    '/history',
    asyncHandler((req, res) => {
      const query = sessionQuerySchema.safeParse(req.query);
      if (!query.success) return badRequest(res, query.error);

      const history = service.getHistory(query.data.session_id);
      res.json({ history, count: history.length, success: true });
    })
  );

  app.post(
    '/clear',
    asyncHandler((req, res) => {
      const body = clearBodySchema.safeParse(req.body ?? {});
      if (!body.success) return badRequest(res, body.error);

      const cleared = service.clearHistory(body.data.session_id);
      res.json({
        message: cleared
          ? 'In-memory conversation history cleared'
          : `No in-memory conversation for session ${body.data.session_id}`,
        success: true,
      });
    })
  );

  app.get(
    '/sessions',
    asyncHandler((req, res) => {
      const query = limitQuerySchema.safeParse(req.query);
      if (!query.success) return badRequest(res, query.error);

      const sessions = service.listSessions(query.data.limit).map((s) => ({
        session_id: s.sessionId,
        created_at: s.createdAt,
        updated_at: s.updatedAt,
        message_count: s.messageCount,
      }));
      res.json({ sessions, count: sessions.length, success: true });
    })
  );

  app.get(
    '/sessions/:sessionId/history',
    asyncHandler((req, res) => {
      const query = limitQuerySchema.safeParse(req.query);
      if (!query.success) return badRequest(res, query.error);

      const sessionId = req.params.sessionId;
      const history = service.getSessionHistory(sessionId, query.data.limit);
      res.json({ session_id: sessionId, history, count: history.length, success: true });
    })
  );

  app.post(
    '/clear/:sessionId',
    asyncHandler((req, res) => {
      const sessionId = req.params.sessionId;
      service.clearSession(sessionId);
      res.json({ message: `Session ${sessionId} history cleared`, success: true });
    })
  );

  app.delete(
    '/sessions/:sessionId',
    asyncHandler((req, res) => {
      const sessionId = req.params.sessionId;
      const deleted = service.deleteSession(sessionId);
      res.json({
        message: deleted ? `Session ${sessionId} deleted` : `Session ${sessionId} not found`,
        deleted,
        success: true,
      });
    })
  );

  app.get(
    '/tools',
    asyncHandler((req, res) => {
      const query = sessionQuerySchema.safeParse(req.query);
      if (!query.success) return badRequest(res, query.error);

      const tools = service.listTools(query.data.session_id);
      res.json({ tools, count: tools.length, success: true });
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    if (status === 500) {
      logger.error({ err: errorMessage(err), method: req.method, path: req.path }, 'request failed');
    }
    res.status(status).json({ error: errorMessage(err), success: false });
  });

  return app;
}

/** Listen on host:port; resolves once the socket is bound. */
export function startServer(
  app: express.Express,
  host: string,
  port: number,
  logger: Logger
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      logger.info({ host, port }, 'server listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}
