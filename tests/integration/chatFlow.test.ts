/**
 * End-to-end chat flow through the real app, guard, executor and schema
 * service. Only the database and the model are stand-ins.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { FastifyInstance } from 'fastify';

jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

jest.mock('tedious', () => jest.requireActual('../helpers/tedious.js'));

import { buildApp } from '../../src/app.js';
import { createSchemaContextService } from '../../src/ai/schemaContext.js';
import { createQueryExecutor } from '../../src/ai/queryExecutor.js';
import { createChatService } from '../../src/services/chatService.js';
import { createFakePool } from '../helpers/tedious.js';

// ── In-process database stand-in ────────────────────────────────────

const TABLE_ROWS = [{ TABLE_SCHEMA: 'dbo', TABLE_NAME: 'Customers', TABLE_TYPE: 'BASE TABLE' }];

const COLUMN_ROWS = [
  {
    TABLE_SCHEMA: 'dbo',
    TABLE_NAME: 'Customers',
    COLUMN_NAME: 'Name',
    DATA_TYPE: 'nvarchar',
    IS_NULLABLE: 'YES',
    CHARACTER_MAXIMUM_LENGTH: 200,
    NUMERIC_PRECISION: null,
    NUMERIC_SCALE: null,
  },
];

function makeChain(rows: unknown[]) {
  return {
    select: jest.fn().mockReturnThis(),
    whereIn: jest.fn().mockReturnThis(),
    orderBy: jest.fn<() => Promise<unknown[]>>().mockResolvedValue(rows),
  };
}

function createFakeDb() {
  const client = createFakePool();
  const table = (name: string) =>
    makeChain(name === 'INFORMATION_SCHEMA.TABLES' ? TABLE_ROWS : COLUMN_ROWS);
  return Object.assign(table, { client });
}

function executedStatements(db: ReturnType<typeof createFakeDb>): string[] {
  return db.client.connection.execSql.mock.calls.map(([request]) => request.sqlText);
}

// ── Setup ───────────────────────────────────────────────────────────

describe('chat flow', () => {
  let app: FastifyInstance;
  let db: ReturnType<typeof createFakeDb>;
  let generate: jest.Mock<(question: string, schemaContext: string) => Promise<string>>;

  beforeEach(async () => {
    jest.clearAllMocks();
    db = createFakeDb();
    generate = jest.fn<(question: string, schemaContext: string) => Promise<string>>();

    const schemaContextService = createSchemaContextService({ db: db as never });
    await schemaContextService.load();

    const chatService = createChatService({
      sqlGenerator: { generate },
      schemaContextService,
      queryExecutor: createQueryExecutor({ readonlyDb: db as never }),
    });

    app = await buildApp({
      readonlyDb: db as never,
      schemaContextService,
      chatService,
      corsOrigins: [],
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers a question with guarded SQL and its rows', async () => {
    generate.mockResolvedValue('```sql\nSELECT Name FROM dbo.Customers;\n```');
    db.client.respondWith({ columns: ['Name'], rows: [['Ada'], ['Grace']] });

    const response = await app.inject({
      method: 'POST',
      url: '/chat',
      payload: { question: 'Who are our customers?' },
    });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.success).toBe(true);
    expect(body.data).toMatchObject({
      question: 'Who are our customers?',
      sql: 'SELECT TOP (100) Name FROM dbo.Customers',
      columns: ['Name'],
      rows: [['Ada'], ['Grace']],
      rowCount: 2,
      truncated: false,
    });
    expect(executedStatements(db)).toEqual(['SELECT TOP (100) Name FROM dbo.Customers']);
  });

  it('passes the loaded schema to the generator', async () => {
    generate.mockResolvedValue('SELECT Name FROM dbo.Customers');

    await app.inject({ method: 'POST', url: '/chat', payload: { question: 'Names?' } });

    expect(generate).toHaveBeenCalledWith(
      'Names?',
      '[dbo].[Customers] (BASE TABLE)\n  - Name: nvarchar(200) NULL',
    );
  });

  it('never executes a rejected candidate', async () => {
    generate.mockResolvedValue('SELECT * FROM dbo.Customers; DROP TABLE dbo.Customers;');

    const response = await app.inject({
      method: 'POST',
      url: '/chat',
      payload: { question: 'Remove everyone' },
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error).toEqual({
      code: 'SQL_REJECTED',
      message: 'Multiple statements are not allowed',
      reason: 'MultipleStatements',
    });
    expect(executedStatements(db)).toEqual([]);
  });

  it('lists tables from the loaded schema', async () => {
    const response = await app.inject({ method: 'GET', url: '/tables' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body).data.tables).toEqual(['[dbo].[Customers]']);
  });
});
