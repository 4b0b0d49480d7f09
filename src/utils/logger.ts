// Service logger
// Same pino setup Fastify uses for request logs, shared by services outside a request

import pino, { type LoggerOptions } from 'pino';
import { env } from '../env.js';

const usePretty = env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';

export const loggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
};

export const logger = pino(loggerOptions);

export function childLogger(component: string) {
  return logger.child({ component });
}
