/**
 * Shared types for the question → SQL → rows flow.
 */

import type { SqlRejectionReason } from '../utils/errors.js';

export interface SqlRejection {
  reason: SqlRejectionReason;
  message: string;
  /** Set only for ForbiddenToken. */
  token?: string;
}

export type SqlGuardResult =
  | { ok: true; sql: string }
  | ({ ok: false } & SqlRejection);

export interface ColumnInfo {
  name: string;
  dataType: string;
  isNullable: boolean;
  maxLength: number | null;
  precision: number | null;
  scale: number | null;
}

export interface TableInfo {
  schema: string;
  name: string;
  /** BASE TABLE or VIEW */
  tableType: string;
  columns: ColumnInfo[];
}

export interface DatabaseSchema {
  tables: TableInfo[];
}

export interface QueryExecutionResult {
  columns: string[];
  rows: unknown[][];
  rowCount: number;
  durationMs: number;
  truncated: boolean;
}

/**
 * Anything that can turn a question plus schema description into candidate SQL.
 * The text it returns is untrusted and goes through the guard.
 */
export interface SqlGenerator {
  generate(question: string, schemaContext: string): Promise<string>;
}
