/**
 * Structured logger with correlation ID support
 * Uses pino for high-performance JSON logging
 */

import pino from 'pino';
import { config } from '../config/index.js';

// Base logger configuration
export const logger = pino({
  level: config.log.level,
  transport: config.isDev && config.env !== 'test'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'airlens-engine',
    env: config.env,
  },
  // Redact sensitive fields
  redact: ['apiKey', 'key', 'authorization', 'headers["x-api-key"]'],
});

/**
 * Create a child logger bound to one tool invocation
 */
export function createRequestLogger(context: {
  correlationId: string;
  sessionId?: string;
  callerId?: string;
  toolName?: string;
}): pino.Logger {
  return logger.child(context);
}

export type Logger = pino.Logger;
