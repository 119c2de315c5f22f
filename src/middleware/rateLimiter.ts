/**
 * Redis-backed per-client rate limiter for chat questions (fixed window counter).
 *
 * Each question increments `ratelimit:<client>:chat`; the key expires after the
 * window. Requests beyond the maximum get a RateLimitError carrying retryAfter.
 */

import type { Redis as IORedisType } from 'ioredis';
import { RateLimitError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RateLimiterConfig {
  maxRequests: number;
  windowSeconds: number;
}

export interface RateLimiterDeps {
  redis: IORedisType;
  config: RateLimiterConfig;
}

/**
 * INCR and EXPIRE in one step, so a crash in between cannot leave a key
 * without a TTL. The TTL is set on the first hit of each window only.
 */
const INCR_WITH_EXPIRE_LUA = `
local current = redis.call('INCR', KEYS[1])
if tonumber(current) == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return current
`;

export function createRateLimiter(deps: RateLimiterDeps) {
  const { redis, config } = deps;

  async function checkLimit(clientId: string): Promise<void> {
    const key = `ratelimit:${clientId}:chat`;

    try {
      const current = Number(
        await redis.eval(INCR_WITH_EXPIRE_LUA, 1, key, config.windowSeconds),
      );

      if (current > config.maxRequests) {
        const ttl = await redis.ttl(key);
        const retryAfter = ttl > 0 ? ttl : config.windowSeconds;

        logger.warn(
          { clientId, current, max: config.maxRequests, retryAfter },
          'Rate limit exceeded for client',
        );

        throw new RateLimitError(
          "You've sent too many questions. Please wait a moment.",
          { retryAfter },
        );
      }
    } catch (err) {
      if (err instanceof RateLimitError) {
        throw err;
      }

      // Redis being down must not take chat down with it.
      logger.error({ err, clientId }, 'Rate limiter Redis error, allowing request');
    }
  }

  return { checkLimit };
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;
