/**
 * Fastify application factory. The database and logger are injected so tests
 * can run the full HTTP surface against an in-memory database.
 */

import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { DbExecutor, Logger } from '@tasklane/core';
import { registerTaskRoutes } from './routes/tasks.js';
import { handleError } from './errors.js';

export interface AppOptions {
  db: DbExecutor;
  logger: Logger;
}

export function buildApp({ db, logger }: AppOptions): FastifyInstance {
  const loggerInstance: FastifyBaseLogger = logger;
  const app = Fastify({ loggerInstance });

  app.setErrorHandler(handleError);
  app.setNotFoundHandler(async (_req, reply) => reply.code(404).send({ detail: 'Not Found' }));

  app.get('/health', async () => ({ status: 'ok' }));
  registerTaskRoutes(app, db);

  return app;
}

export { toTaskResponse } from './serializers.js';
export type { TaskResponse, TagResponse } from './serializers.js';
