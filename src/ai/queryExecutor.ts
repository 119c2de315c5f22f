/**
 * Query Executor — runs guard-approved SQL against the read-only connection.
 *
 * Column names and values are read positionally from the driver, so duplicate
 * or unnamed columns (`o.Id, c.Id`, `COUNT(*)`) each keep their own slot.
 * Returns at most MAX_ROWS rows. Driver failures are turned into DatabaseError
 * with a message a client can show.
 */

import type { Knex } from 'knex';
import { Request } from 'tedious';
import type { QueryExecutionResult } from './types.js';
import { DatabaseError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const MAX_ROWS = 100;

export interface QueryExecutorDeps {
  readonlyDb: Knex;
}

/** The part of knex's mssql client that hands out pooled tedious connections. */
interface ConnectionPool {
  acquireConnection(): Promise<unknown>;
  releaseConnection(connection: unknown): Promise<unknown>;
}

interface StatementConnection {
  execSql(request: Request): void;
}

interface StatementResult {
  columns: string[];
  rows: unknown[][];
  totalRows: number;
}

function isStatementConnection(value: unknown): value is StatementConnection {
  return (
    typeof value === 'object' &&
    value !== null &&
    'execSql' in value &&
    typeof value.execSql === 'function'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** tedious sends an array of metadata, or a name-keyed object under useColumnNames. */
export function readColumnNames(metadata: unknown): string[] {
  const entries = Array.isArray(metadata)
    ? metadata
    : isRecord(metadata)
      ? Object.values(metadata)
      : [];
  return entries.map((entry) =>
    isRecord(entry) && typeof entry.colName === 'string' ? entry.colName : '',
  );
}

/** A row is a list of `{ value, metadata }` cells, one per column. */
export function readRowValues(row: unknown): unknown[] {
  const cells = Array.isArray(row) ? row : isRecord(row) ? Object.values(row) : [];
  return cells.map((cell) => (isRecord(cell) && 'value' in cell ? cell.value : cell));
}

function runStatement(connection: StatementConnection, sql: string): Promise<StatementResult> {
  return new Promise((resolve, reject) => {
    let columns: string[] = [];
    const rows: unknown[][] = [];
    let totalRows = 0;

    // No parameters: the guard output is executed as-is.
    const request = new Request(sql, (err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve({ columns, rows, totalRows });
    });

    request.on('columnMetadata', (metadata: unknown) => {
      columns = readColumnNames(metadata);
    });

    request.on('row', (row: unknown) => {
      totalRows += 1;
      if (rows.length < MAX_ROWS) {
        rows.push(readRowValues(row));
      }
    });

    connection.execSql(request);
  });
}

export function createQueryExecutor(deps: QueryExecutorDeps) {
  const { readonlyDb } = deps;
  const pool: ConnectionPool = readonlyDb.client;

  async function withConnection<T>(run: (connection: StatementConnection) => Promise<T>): Promise<T> {
    const connection = await pool.acquireConnection();
    try {
      if (!isStatementConnection(connection)) {
        throw new Error('Read-only pool returned an unusable connection');
      }
      return await run(connection);
    } finally {
      await pool.releaseConnection(connection);
    }
  }

  async function execute(sql: string): Promise<QueryExecutionResult> {
    if (!sql || !sql.trim()) {
      throw new DatabaseError('Cannot execute empty SQL query.');
    }

    logger.info({ sqlLength: sql.length }, 'Query executor: starting execution');

    const startTime = Date.now();

    try {
      const result = await withConnection((connection) => runStatement(connection, sql));
      const durationMs = Date.now() - startTime;

      const truncated = result.totalRows > MAX_ROWS;
      if (truncated) {
        logger.warn(
          { originalCount: result.totalRows, maxRows: MAX_ROWS },
          'Query executor: result set truncated',
        );
      }

      const { columns, rows } = result;

      logger.info({ durationMs, rowCount: rows.length }, 'Query executor: execution completed');

      return { columns, rows, rowCount: rows.length, durationMs, truncated };
    } catch (err) {
      const durationMs = Date.now() - startTime;
      const cause = toError(err);

      logger.error(
        { durationMs, error: cause.message, sql },
        'Query executor: execution failed',
      );

      if (/timeout|failed to complete in/i.test(cause.message)) {
        throw new DatabaseError(
          'The query took too long to execute. Try asking a simpler question.',
          { cause },
        );
      }

      if (/permission was denied|permission denied/i.test(cause.message)) {
        throw new DatabaseError('Query execution failed due to a permissions error.', { cause });
      }

      if (/incorrect syntax|invalid column name|invalid object name/i.test(cause.message)) {
        throw new DatabaseError(
          'The generated query referenced something invalid. Please try rephrasing your question.',
          { cause },
        );
      }

      throw new DatabaseError(`Database query failed: ${cause.message}`, { cause });
    }
  }

  return { execute };
}

export type QueryExecutor = ReturnType<typeof createQueryExecutor>;
