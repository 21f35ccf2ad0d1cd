/**
 * Logging with Pino - holding values are redacted
 */

import pino from 'pino';
import { getEnvConfig } from '@/core/env';

const redactPaths = [
  'investmentValue',
  '*.investmentValue',
  'holdings',
  '*.holdings',
];

const env = getEnvConfig();

export const logger = pino({
  level: env.logLevel,
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    env.nodeEnv === 'development'
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
