import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { registerErrorHandler } from '../../../src/middleware/errorHandler.js';
import {
  DatabaseError,
  GenerationError,
  RateLimitError,
  SqlValidationError,
} from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';

// ── Helpers ─────────────────────────────────────────────────────────

async function buildApp(thrown: () => Error): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  registerErrorHandler(app);

  app.get('/boom', async () => {
    throw thrown();
  });

  app.post(
    '/validated',
    {
      schema: {
        body: {
          type: 'object',
          required: ['question'],
          properties: { question: { type: 'string' } },
        },
      },
    },
    async () => ({ ok: true }),
  );

  await app.ready();
  return app;
}

describe('registerErrorHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('answers a rejected statement with 400 and its reason', async () => {
    const app = await buildApp(
      () => new SqlValidationError('ForbiddenToken', 'Forbidden token detected: drop', 'drop'),
    );

    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      success: false,
      error: {
        code: 'SQL_REJECTED',
        message: 'Forbidden token detected: drop',
        reason: 'ForbiddenToken',
        token: 'drop',
      },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('sets Retry-After for rate limit errors', async () => {
    const app = await buildApp(() => new RateLimitError('Slow down', { retryAfter: 17 }));

    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(429);
    expect(response.headers['retry-after']).toBe('17');
    expect(JSON.parse(response.body)).toEqual({
      success: false,
      error: { code: 'RATE_LIMIT_ERROR', message: 'Slow down', retryAfter: 17 },
    });
  });

  it('uses the status code of an operational error', async () => {
    const app = await buildApp(() => new GenerationError('The model returned an empty response'));

    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(502);
    expect(JSON.parse(response.body).error).toEqual({
      code: 'GENERATION_FAILED',
      message: 'The model returned an empty response',
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('logs server-side database errors at error level', async () => {
    const app = await buildApp(() => new DatabaseError('Database query failed: boom'));

    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body).error.code).toBe('DATABASE_ERROR');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('hides the message of unexpected errors', async () => {
    const app = await buildApp(() => new Error('secret internals'));

    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
  });

  it('maps schema validation failures to VALIDATION_ERROR', async () => {
    const app = await buildApp(() => new Error('unused'));

    const response = await app.inject({ method: 'POST', url: '/validated', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
  });

  it('answers unknown routes with 404', async () => {
    const app = await buildApp(() => new Error('unused'));

    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body)).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route not found' },
    });
  });
});
