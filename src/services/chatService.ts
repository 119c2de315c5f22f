/**
 * Chat Service — question → candidate SQL → guard → read-only execution.
 *
 * A candidate the guard rejects never reaches the executor; the rejection is
 * rethrown as-is so the HTTP layer can answer 400 with its reason.
 */

import type { QueryExecutor } from '../ai/queryExecutor.js';
import type { SchemaContextService } from '../ai/schemaContext.js';
import { validateAndNormalizeSql } from '../ai/sqlGuard.js';
import type { SqlGenerator } from '../ai/types.js';
import { SqlValidationError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ChatServiceDeps {
  sqlGenerator: SqlGenerator;
  schemaContextService: SchemaContextService;
  queryExecutor: QueryExecutor;
}

export interface ChatResponse {
  question: string;
  sql: string;
  columns: string[];
  rows: unknown[][];
  rowCount: number;
  durationMs: number;
  truncated: boolean;
}

const SQL_PREVIEW_LENGTH = 200;

export function createChatService(deps: ChatServiceDeps) {
  const { sqlGenerator, schemaContextService, queryExecutor } = deps;

  async function ask(question: string): Promise<ChatResponse> {
    if (!question || !question.trim()) {
      throw new ValidationError('Question is required');
    }

    logger.info({ questionLength: question.trim().length }, 'Chat service: processing question');

    const candidate = await sqlGenerator.generate(question, schemaContextService.getPromptContext());

    let sql: string;
    try {
      sql = validateAndNormalizeSql(candidate);
    } catch (err) {
      if (err instanceof SqlValidationError) {
        logger.warn(
          { reason: err.reason, token: err.token, sqlPreview: candidate.substring(0, SQL_PREVIEW_LENGTH) },
          'Chat service: candidate SQL rejected',
        );
      }
      throw err;
    }

    const execution = await queryExecutor.execute(sql);

    logger.info(
      { rowCount: execution.rowCount, durationMs: execution.durationMs, truncated: execution.truncated },
      'Chat service: question answered',
    );

    return {
      question,
      sql,
      columns: execution.columns,
      rows: execution.rows,
      rowCount: execution.rowCount,
      durationMs: execution.durationMs,
      truncated: execution.truncated,
    };
  }

  return { ask };
}

export type ChatService = ReturnType<typeof createChatService>;
