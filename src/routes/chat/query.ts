/**
 * Chat route — POST /chat
 *
 * Takes a natural-language question, runs it through generation, the SQL guard
 * and the read-only executor, and returns the normalized SQL with its rows.
 * Rate-limited per client address when a limiter is configured.
 */

import type { FastifyInstance } from 'fastify';
import type { ChatService } from '../../services/chatService.js';
import type { RateLimiter } from '../../middleware/rateLimiter.js';

export interface ChatQueryDeps {
  chatService: ChatService;
  rateLimiter?: RateLimiter;
}

export const MAX_QUESTION_LENGTH = 2000;

const chatQuerySchema = {
  body: {
    type: 'object' as const,
    required: ['question'],
    additionalProperties: false,
    properties: {
      question: { type: 'string' as const, minLength: 1, maxLength: MAX_QUESTION_LENGTH },
    },
  },
};

export async function chatQueryRoutes(fastify: FastifyInstance, deps: ChatQueryDeps) {
  const { chatService, rateLimiter } = deps;

  fastify.post<{ Body: { question: string } }>('/chat', { schema: chatQuerySchema }, async (request, reply) => {
    if (rateLimiter) {
      await rateLimiter.checkLimit(request.ip);
    }

    const result = await chatService.ask(request.body.question);

    return reply.status(200).send({
      success: true,
      data: result,
    });
  });
}
