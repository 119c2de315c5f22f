/**
 * Schema context service — reads tables and columns from INFORMATION_SCHEMA once
 * and keeps them for prompting and for the schema endpoints.
 */

import type { Knex } from 'knex';
import type { ColumnInfo, DatabaseSchema, TableInfo } from './types.js';
import { AppError, SchemaNotLoadedError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface TableRow {
  TABLE_SCHEMA: string;
  TABLE_NAME: string;
  TABLE_TYPE: string;
}

interface ColumnRow {
  TABLE_SCHEMA: string;
  TABLE_NAME: string;
  COLUMN_NAME: string;
  DATA_TYPE: string;
  IS_NULLABLE: string;
  CHARACTER_MAXIMUM_LENGTH: number | null;
  NUMERIC_PRECISION: number | null;
  NUMERIC_SCALE: number | null;
}

const LENGTH_TYPES = new Set(['varchar', 'nvarchar', 'char', 'nchar', 'varbinary', 'binary']);
const DECIMAL_TYPES = new Set(['decimal', 'numeric']);

function tableKey(schema: string, name: string): string {
  return `${schema}\u0000${name}`;
}

export async function loadSchema(db: Knex): Promise<DatabaseSchema> {
  const [tableRows, columnRows] = await Promise.all([
    db('INFORMATION_SCHEMA.TABLES')
      .select<TableRow[]>('TABLE_SCHEMA', 'TABLE_NAME', 'TABLE_TYPE')
      .whereIn('TABLE_TYPE', ['BASE TABLE', 'VIEW'])
      .orderBy(['TABLE_SCHEMA', 'TABLE_NAME']),
    db('INFORMATION_SCHEMA.COLUMNS')
      .select<ColumnRow[]>(
        'TABLE_SCHEMA',
        'TABLE_NAME',
        'COLUMN_NAME',
        'DATA_TYPE',
        'IS_NULLABLE',
        'CHARACTER_MAXIMUM_LENGTH',
        'NUMERIC_PRECISION',
        'NUMERIC_SCALE',
      )
      .orderBy(['TABLE_SCHEMA', 'TABLE_NAME', 'ORDINAL_POSITION']),
  ]);

  const columnsByTable = new Map<string, ColumnInfo[]>();
  for (const row of columnRows) {
    const key = tableKey(row.TABLE_SCHEMA, row.TABLE_NAME);
    const columns = columnsByTable.get(key) ?? [];
    columns.push({
      name: row.COLUMN_NAME,
      dataType: row.DATA_TYPE,
      isNullable: String(row.IS_NULLABLE).toUpperCase() === 'YES',
      maxLength: row.CHARACTER_MAXIMUM_LENGTH,
      precision: row.NUMERIC_PRECISION,
      scale: row.NUMERIC_SCALE,
    });
    columnsByTable.set(key, columns);
  }

  const tables: TableInfo[] = tableRows.map((row) => ({
    schema: row.TABLE_SCHEMA,
    name: row.TABLE_NAME,
    tableType: row.TABLE_TYPE,
    columns: columnsByTable.get(tableKey(row.TABLE_SCHEMA, row.TABLE_NAME)) ?? [],
  }));

  // Stable order keeps prompts deterministic.
  tables.sort((a, b) => {
    const bySchema = compareText(a.schema.toLowerCase(), b.schema.toLowerCase());
    return bySchema !== 0 ? bySchema : compareText(a.name.toLowerCase(), b.name.toLowerCase());
  });

  return { tables };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function formatColumnType(column: ColumnInfo): string {
  const type = column.dataType.toLowerCase();
  if (LENGTH_TYPES.has(type) && column.maxLength !== null) {
    // -1 is how SQL Server reports (MAX).
    return column.maxLength === -1
      ? `${column.dataType}(MAX)`
      : `${column.dataType}(${column.maxLength})`;
  }
  if (DECIMAL_TYPES.has(type) && column.precision !== null && column.scale !== null) {
    return `${column.dataType}(${column.precision},${column.scale})`;
  }
  return column.dataType;
}

/** Compact, deterministic rendering of the schema for the model prompt. */
export function toPromptString(schema: DatabaseSchema): string {
  const lines: string[] = [];
  for (const table of schema.tables) {
    lines.push(`[${table.schema}].[${table.name}] (${table.tableType})`);
    for (const column of table.columns) {
      const nullable = column.isNullable ? 'NULL' : 'NOT NULL';
      lines.push(`  - ${column.name}: ${formatColumnType(column)} ${nullable}`);
    }
    lines.push('');
  }
  return lines.join('\n').trim();
}

export interface SchemaContextDeps {
  db: Knex;
}

export function createSchemaContextService(deps: SchemaContextDeps) {
  const { db } = deps;

  let schema: DatabaseSchema | null = null;
  let promptContext = '';

  async function load(): Promise<DatabaseSchema> {
    try {
      const loaded = await loadSchema(db);
      schema = loaded;
      promptContext = toPromptString(loaded);
      logger.info({ tableCount: loaded.tables.length }, 'Schema context loaded');
      return loaded;
    } catch (err) {
      throw new AppError('Failed to load database schema', { cause: toError(err) });
    }
  }

  function getSchema(): DatabaseSchema {
    if (!schema) {
      throw new SchemaNotLoadedError();
    }
    return schema;
  }

  function getPromptContext(): string {
    getSchema();
    return promptContext;
  }

  function listTableNames(): string[] {
    return getSchema().tables.map((table) => `[${table.schema}].[${table.name}]`);
  }

  function isLoaded(): boolean {
    return schema !== null;
  }

  return { load, getSchema, getPromptContext, listTableNames, isLoaded };
}

export type SchemaContextService = ReturnType<typeof createSchemaContextService>;
