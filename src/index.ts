import OpenAI from 'openai';
import { Redis as IORedis } from 'ioredis';
import { config } from './config.js';
import { buildApp } from './app.js';
import { logger } from './utils/logger.js';
import { createReadonlyDb } from './db/readonlyConnection.js';
import { createSchemaContextService } from './ai/schemaContext.js';
import { createModelResolver } from './ai/modelResolver.js';
import { createSqlGenerator } from './ai/sqlGenerator.js';
import { createQueryExecutor } from './ai/queryExecutor.js';
import { createChatService } from './services/chatService.js';
import { createRateLimiter } from './middleware/rateLimiter.js';

async function main() {
  const startTime = Date.now();

  // Read-only database (schema introspection + guarded queries)
  const readonlyDb = createReadonlyDb(config.database);

  // Redis is optional; without it chat is not rate-limited.
  const redis = config.redis.url
    ? new IORedis(config.redis.url, {
        maxRetriesPerRequest: 3,
        retryStrategy(times: number) {
          if (times > 3) return null;
          return Math.min(times * 200, 2000);
        },
      })
    : undefined;

  const rateLimiter = redis
    ? createRateLimiter({
        redis,
        config: {
          maxRequests: config.rateLimit.chatMaxRequests,
          windowSeconds: config.rateLimit.chatWindowSeconds,
        },
      })
    : undefined;

  // Schema is loaded once and reused for every prompt.
  const schemaContextService = createSchemaContextService({ db: readonlyDb });
  await schemaContextService.load();

  // AI services
  const openai = new OpenAI({ apiKey: config.openai.apiKey });
  const modelResolver = createModelResolver({ openai, configuredModel: config.openai.model });
  const sqlGenerator = createSqlGenerator({ openai, modelResolver });
  const queryExecutor = createQueryExecutor({ readonlyDb });
  const chatService = createChatService({ sqlGenerator, schemaContextService, queryExecutor });

  const fastify = await buildApp({
    readonlyDb,
    schemaContextService,
    chatService,
    corsOrigins: config.corsOrigins,
    redis,
    rateLimiter,
    startTime,
  });

  async function shutdown(signal: string) {
    logger.info({ signal }, 'Shutting down gracefully...');
    await fastify.close();
    await readonlyDb.destroy();
    redis?.disconnect();
    logger.info('Server shut down');
    process.exit(0);
  }

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err, signal }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, 'Server started');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
