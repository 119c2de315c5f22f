import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';
import type { Redis } from 'ioredis';
import type { SchemaContextService } from '../ai/schemaContext.js';

interface HealthDeps {
  readonlyDb: Knex;
  redis?: Redis;
  schemaContextService: SchemaContextService;
  startTime: number;
  version: string;
}

type ComponentStatus = 'connected' | 'disconnected' | 'disabled';

export async function healthRoutes(fastify: FastifyInstance, deps: HealthDeps) {
  fastify.get('/health', async (_request, reply) => {
    let dbStatus: ComponentStatus = 'disconnected';
    let redisStatus: ComponentStatus = deps.redis ? 'disconnected' : 'disabled';

    try {
      await deps.readonlyDb.raw('SELECT 1');
      dbStatus = 'connected';
    } catch {
      dbStatus = 'disconnected';
    }

    if (deps.redis) {
      try {
        const pong = await deps.redis.ping();
        redisStatus = pong === 'PONG' ? 'connected' : 'disconnected';
      } catch {
        redisStatus = 'disconnected';
      }
    }

    const schemaLoaded = deps.schemaContextService.isLoaded();
    const isHealthy = dbStatus === 'connected' && redisStatus !== 'disconnected' && schemaLoaded;
    const statusCode = isHealthy ? 200 : 503;

    return reply.status(statusCode).send({
      status: isHealthy ? 'ok' : 'degraded',
      version: deps.version,
      uptime: Math.floor((Date.now() - deps.startTime) / 1000),
      db: dbStatus,
      redis: redisStatus,
      schema: schemaLoaded ? 'loaded' : 'missing',
    });
  });
}
