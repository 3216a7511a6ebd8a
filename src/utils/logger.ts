/**
 * Logging with Pino
 */

import pino from 'pino';
import { getEnvConfig } from '@/core/env';

const { logLevel, nodeEnv } = getEnvConfig();

export const logger = pino({
  level: logLevel,
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
