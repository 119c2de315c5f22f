/**
 * Read-only SQL Server connection for guarded, model-generated queries.
 *
 * The login configured here should hold SELECT permissions only; the SQL guard
 * is one layer, not the sole control. Every request is bounded by the configured
 * query timeout.
 */

import knex, { type Knex } from 'knex';
import type { DatabaseConfig } from '../config.js';
import { logger } from '../utils/logger.js';

const CONNECT_TIMEOUT_MS = 5000;
const POOL_MIN = 0;
const POOL_MAX = 5;

export function assertDatabaseConfig(dbConfig: DatabaseConfig): string {
  if (!dbConfig.database) {
    throw new Error('Missing required environment variable: MSSQL_DATABASE');
  }
  if (!dbConfig.username) {
    throw new Error('Missing required environment variable: MSSQL_USERNAME');
  }
  if (dbConfig.password === undefined) {
    throw new Error('Missing required environment variable: MSSQL_PASSWORD');
  }
  return dbConfig.password;
}

export function createReadonlyDb(dbConfig: DatabaseConfig): Knex {
  const password = assertDatabaseConfig(dbConfig);
  const requestTimeoutMs = dbConfig.queryTimeoutSeconds * 1000;

  const db = knex({
    client: 'mssql',
    connection: {
      server: dbConfig.server,
      port: dbConfig.port,
      database: dbConfig.database,
      user: dbConfig.username,
      password,
      connectionTimeout: CONNECT_TIMEOUT_MS,
      requestTimeout: requestTimeoutMs,
      options: {
        encrypt: dbConfig.encrypt,
        trustServerCertificate: dbConfig.trustServerCertificate,
      },
    },
    pool: { min: POOL_MIN, max: POOL_MAX },
  });

  logger.info(
    {
      server: dbConfig.server,
      database: dbConfig.database,
      poolMax: POOL_MAX,
      requestTimeoutMs,
    },
    'Read-only database connection pool created',
  );

  return db;
}
