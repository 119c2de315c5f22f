import pino from 'pino';
import { config } from '../config.js';

export const logger = pino({
  level: config.logLevel,
  name: 'sql-chat',
  transport:
    config.nodeEnv === 'development'
      ? {
          target: 'pino/file',
          options: { destination: 1 },
        }
      : undefined,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    req(req: { method: string; url: string; ip?: string }) {
      return {
        method: req.method,
        url: req.url,
        remoteAddress: req.ip,
      };
    },
    res(res: { statusCode: number }) {
      return {
        statusCode: res.statusCode,
      };
    },
  },
});

export type Logger = typeof logger;
