import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';

dotenvConfig({ path: resolve(__dirname, '..', '.env') });

export interface DatabaseConfig {
  server: string;
  port: number;
  database: string;
  username: string;
  password: string | undefined;
  encrypt: boolean;
  trustServerCertificate: boolean;
  queryTimeoutSeconds: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  nodeEnv: string;
  corsOrigins: string[];
  database: DatabaseConfig;
  redis: {
    url: string;
  };
  openai: {
    apiKey: string;
    model: string;
  };
  rateLimit: {
    chatMaxRequests: number;
    chatWindowSeconds: number;
  };
}

const TRUTHY = new Set(['1', 'true', 'yes', 'y', 'on']);
const DEFAULT_QUERY_TIMEOUT_SECONDS = 30;

function requireEnv(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return TRUTHY.has(value.trim().toLowerCase());
}

export function parseQueryTimeout(raw: string | undefined): number {
  if (!raw) {
    return DEFAULT_QUERY_TIMEOUT_SECONDS;
  }
  const seconds = Number(raw.trim());
  if (!Number.isInteger(seconds)) {
    return DEFAULT_QUERY_TIMEOUT_SECONDS;
  }
  return Math.max(1, seconds);
}

export function parseCorsOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function loadConfig(): AppConfig {
  return {
    port: parseInt(requireEnv('PORT', '8000'), 10),
    host: requireEnv('HOST', '0.0.0.0'),
    logLevel: requireEnv('LOG_LEVEL', 'info'),
    nodeEnv: requireEnv('NODE_ENV', 'development'),
    corsOrigins: parseCorsOrigins(requireEnv('CORS_ORIGINS', 'http://localhost:5173')),
    database: {
      server: requireEnv('MSSQL_SERVER', 'localhost'),
      port: parseInt(requireEnv('MSSQL_PORT', '1433'), 10),
      // Credentials are checked when the pool is created, not at import.
      database: requireEnv('MSSQL_DATABASE', ''),
      username: requireEnv('MSSQL_USERNAME', ''),
      password: process.env.MSSQL_PASSWORD,
      encrypt: parseBoolEnv('MSSQL_ENCRYPT', false),
      trustServerCertificate: parseBoolEnv('MSSQL_TRUST_SERVER_CERTIFICATE', true),
      queryTimeoutSeconds: parseQueryTimeout(process.env.MSSQL_QUERY_TIMEOUT_SECONDS),
    },
    redis: {
      url: requireEnv('REDIS_URL', ''),
    },
    openai: {
      apiKey: requireEnv('OPENAI_API_KEY', ''),
      model: requireEnv('OPENAI_MODEL', '').trim(),
    },
    rateLimit: {
      chatMaxRequests: parseInt(requireEnv('RATE_LIMIT_CHAT_MAX', '20'), 10),
      chatWindowSeconds: parseInt(requireEnv('RATE_LIMIT_CHAT_WINDOW', '60'), 10),
    },
  };
}

export const config = loadConfig();
