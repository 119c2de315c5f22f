/**
 * SQL generator — asks the chat model for a single SQL Server SELECT.
 *
 * The returned text is a candidate only; it has not been checked and must go
 * through the SQL guard before anything executes it.
 */

import type { OpenAI } from 'openai';
import type { ModelResolver } from './modelResolver.js';
import { buildSystemPrompt, buildUserPrompt } from './prompts/system.js';
import type { SqlGenerator } from './types.js';
import { AppError, GenerationError, ValidationError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const TEMPERATURE = 0;
const TOP_P = 0.1;
const MAX_TOKENS = 512;
const TIMEOUT_MS = 30_000;

export interface SqlGeneratorDeps {
  openai: OpenAI;
  modelResolver: ModelResolver;
}

export function createSqlGenerator(deps: SqlGeneratorDeps): SqlGenerator {
  const { openai, modelResolver } = deps;
  const systemPrompt = buildSystemPrompt();

  async function generate(question: string, schemaContext: string): Promise<string> {
    if (!question || !question.trim()) {
      throw new ValidationError('Question is required');
    }

    const model = await modelResolver.resolve();

    let content: string | null | undefined;
    try {
      const completion = await openai.chat.completions.create(
        {
          model,
          temperature: TEMPERATURE,
          top_p: TOP_P,
          max_tokens: MAX_TOKENS,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: buildUserPrompt(question, schemaContext) },
          ],
        },
        { timeout: TIMEOUT_MS },
      );
      content = completion.choices[0]?.message?.content;
    } catch (err) {
      if (err instanceof AppError) throw err;

      logger.error({ err, model }, 'SQL generator: completion request failed');
      throw new GenerationError(
        `Model request failed using model '${model}'. Check OPENAI_MODEL and OPENAI_API_KEY.`,
        { cause: toError(err) },
      );
    }

    const sql = (content ?? '').trim();
    if (!sql) {
      throw new GenerationError('The model returned an empty response');
    }

    logger.debug({ model, sqlLength: sql.length }, 'SQL generator: candidate received');
    return sql;
  }

  return { generate };
}
