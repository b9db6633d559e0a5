import pino from 'pino';
import { env } from '@/config/env';

/**
 * Root pino logger
 *
 * pino-http needs a real pino instance, so the request logger uses this one
 * directly; application code goes through LoggerFactory, whose console
 * adapter derives children from it.
 */
export const logger = pino({
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development' && env.LOG_PRETTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
