import pino, { type LoggerOptions } from 'pino';
import { config } from '../config/env';

// Shared by the Fastify instance (request logs) and by code that runs outside a request.
export const loggerOptions: LoggerOptions = {
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  redact: [
    'req.headers.authorization',
    'req.headers.cookie',
    'req.headers["x-admin-token"]',
    'req.query.token',
    'body.password',
    'body.token',
  ],
};

export const logger = pino(loggerOptions);
