/**
 * Shared pino logger
 */

import { pino, type Logger } from 'pino';
import { getEnvBoolOrDefault, getEnvOrDefault } from '../config/env.js';

const pretty = getEnvBoolOrDefault('LOG_PRETTY', process.env.NODE_ENV !== 'production');

export const logger: Logger = pino({
  level: getEnvOrDefault('LOG_LEVEL', 'info'),
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
          },
        },
      }
    : {}),
});

export type { Logger };
