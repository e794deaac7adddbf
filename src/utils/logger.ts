/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import { LogLevelSchema } from '../config.js';

const levelResult = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
const level = (levelResult.success ? levelResult.data : 'INFO').toLowerCase();

const prettyPrint =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Shared options, also handed to Fastify so request logs match service logs.
 */
export const loggerConfig = {
  level,
  transport: prettyPrint
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);
