import pino from 'pino';
import type { BaseLogger, LoggerOptions } from 'pino';
import { config } from '../config';

export type Logger = BaseLogger;

/**
 * Logger options shared by Fastify and standalone scripts.
 * Pretty output in development, JSON at LOG_LEVEL in production.
 */
export function loggerOptions(): LoggerOptions {
  if (config.isProduction) {
    return { level: config.logLevel };
  }
  return {
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: { translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' },
    },
  };
}

export const logger = pino(loggerOptions());
