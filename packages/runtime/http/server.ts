import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import { AuditLogger } from '../audit.js';
import { CommentsController } from '../controllers/comments.js';
import { PostsController } from '../controllers/posts.js';
import type { Connection } from '../db/connection.js';
import { isApiError, NotFound, type ErrorBody } from '../errors.js';
import { parseStorableId } from '../ids.js';
import { loggerOptions, type LogSettings } from '../logger.js';
import { validate } from '../schemas.js';
import { createStore } from '../store/index.js';
import { createAuthenticator, issueMockToken, type AuthConfig } from './auth.js';

export interface ServerOptions {
  db: Connection;
  auth: AuthConfig | null;
  /** Omit to run without request logging (tests). */
  log?: LogSettings;
  corsOrigins?: string[] | true;
  auditLogFile?: string;
  now?: () => Date;
}

interface IdParams {
  id: string;
}

const mockTokenSchema = z.object({
  sub: z.number().int().positive().optional(),
  username: z.string().min(1).optional(),
  roles: z.array(z.string()).optional(),
  expiresInSeconds: z.number().int().optional(),
});

// Ids outside the key column's range can never match a row.
export function parseId(raw: string): number {
  const id = parseStorableId(raw);
  if (id === null) {
    throw new NotFound();
  }
  return id;
}

function frameworkErrorBody(error: FastifyError): ErrorBody {
  return {
    error: 'validation_error',
    message: error.statusCode === 400 ? 'Malformed request body.' : error.message,
  };
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.log ? loggerOptions(options.log) : false,
    routerOptions: { ignoreTrailingSlash: true },
  });

  await server.register(cors, {
    origin: options.corsOrigins ?? true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  });

  const { db } = options;
  const store = createStore(db);
  const audit = new AuditLogger({ db, logFilePath: options.auditLogFile, logger: server.log });
  const ctx = { store, audit, logger: server.log, now: options.now };
  const posts = new PostsController(ctx);
  const comments = new CommentsController(ctx);
  const authenticate = createAuthenticator(options.auth);

  if (!options.auth) {
    server.log.warn('No AUTH_PROVIDER configured; every request is anonymous.');
  }

  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (isApiError(error)) {
      return reply.code(error.statusCode).send(error.toBody());
    }
    const status = error.statusCode ?? 500;
    if (status >= 400 && status < 500) {
      return reply.code(status).send(frameworkErrorBody(error));
    }
    request.log.error({ err: error }, 'Unhandled error');
    const body: ErrorBody = { error: 'internal_error', message: 'Internal server error' };
    return reply.code(500).send(body);
  });

  server.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send(new NotFound().toBody());
  });

  server.get('/health', async () => ({ status: 'ok' }));

  // Readiness probe: verifies the store answers
  server.get('/ready', async (request, reply) => {
    try {
      await db.query('SELECT 1 AS ok');
      return { status: 'ok', db: true };
    } catch (err) {
      request.log.warn({ err }, 'Readiness check failed');
      return reply.code(503).send({ status: 'error', db: false });
    }
  });

  const auth = options.auth;
  if (auth?.provider === 'mock') {
    server.post('/auth/mock/token', async request => {
      const overrides = validate(mockTokenSchema, request.body);
      const result = await issueMockToken(auth, overrides);
      return { ...result, provider: 'mock' };
    });
  }

  server.get('/posts/', async request => {
    const caller = await authenticate(request);
    return posts.list(caller);
  });

  server.post('/posts/', async (request, reply) => {
    const caller = await authenticate(request);
    const created = await posts.create(caller, request.body);
    return reply.code(201).send(created);
  });

  server.get<{ Params: IdParams }>('/posts/:id/', async request => {
    const caller = await authenticate(request);
    return posts.retrieve(caller, parseId(request.params.id));
  });

  server.put<{ Params: IdParams }>('/posts/:id/', async request => {
    const caller = await authenticate(request);
    return posts.update(caller, parseId(request.params.id), request.body, { partial: false });
  });

  server.patch<{ Params: IdParams }>('/posts/:id/', async request => {
    const caller = await authenticate(request);
    return posts.update(caller, parseId(request.params.id), request.body, { partial: true });
  });

  server.delete<{ Params: IdParams }>('/posts/:id/', async (request, reply) => {
    const caller = await authenticate(request);
    await posts.delete(caller, parseId(request.params.id));
    return reply.code(204).send();
  });

  server.post('/comments/', async (request, reply) => {
    const caller = await authenticate(request);
    const created = await comments.create(caller, request.body);
    return reply.code(201).send(created);
  });

  server.get<{ Params: IdParams }>('/comments/:id/', async request => {
    const caller = await authenticate(request);
    return comments.retrieve(caller, parseId(request.params.id));
  });

  server.put<{ Params: IdParams }>('/comments/:id/', async request => {
    const caller = await authenticate(request);
    return comments.update(caller, parseId(request.params.id), request.body, { partial: false });
  });

  server.patch<{ Params: IdParams }>('/comments/:id/', async request => {
    const caller = await authenticate(request);
    return comments.update(caller, parseId(request.params.id), request.body, { partial: true });
  });

  server.delete<{ Params: IdParams }>('/comments/:id/', async (request, reply) => {
    const caller = await authenticate(request);
    await comments.delete(caller, parseId(request.params.id));
    return reply.code(204).send();
  });

  return server;
}
