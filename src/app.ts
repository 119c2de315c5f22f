import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import type { Knex } from 'knex';
import type { Redis } from 'ioredis';
import type { SchemaContextService } from './ai/schemaContext.js';
import type { ChatService } from './services/chatService.js';
import type { RateLimiter } from './middleware/rateLimiter.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { chatQueryRoutes } from './routes/chat/query.js';
import { schemaRoutes } from './routes/schema.js';
import { healthRoutes } from './routes/health.js';
import { logger } from './utils/logger.js';

export const APP_VERSION = '1.0.0';

export interface AppDeps {
  readonlyDb: Knex;
  schemaContextService: SchemaContextService;
  chatService: ChatService;
  corsOrigins: string[];
  redis?: Redis;
  rateLimiter?: RateLimiter;
  startTime?: number;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  fastify.addHook('onRequest', async (request) => {
    logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request received');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.info(
      { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode },
      'Request completed',
    );
  });

  await fastify.register(cors, {
    origin: deps.corsOrigins.length ? deps.corsOrigins : '*',
    credentials: true,
  });

  registerErrorHandler(fastify);

  await fastify.register(
    async (instance) => healthRoutes(instance, {
      readonlyDb: deps.readonlyDb,
      redis: deps.redis,
      schemaContextService: deps.schemaContextService,
      startTime: deps.startTime ?? Date.now(),
      version: APP_VERSION,
    }),
  );

  await fastify.register(
    async (instance) => schemaRoutes(instance, { schemaContextService: deps.schemaContextService }),
  );

  await fastify.register(
    async (instance) => chatQueryRoutes(instance, { chatService: deps.chatService, rateLimiter: deps.rateLimiter }),
  );

  return fastify;
}
