/**
 * Logger Factory
 *
 * LOGGER_TYPE=cloudwatch → CloudWatchLogger
 * LOGGER_TYPE=console (default) → ConsoleLogger
 */

import { env } from '@/config/env';
import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { ConsoleLogger } from './ConsoleLogger';
import { CloudWatchLogger } from './CloudWatchLogger';

export class LoggerFactory implements ILoggerFactory {
  constructor(private readonly loggerType: string = env.LOGGER_TYPE) {}

  createLogger(context?: string): ILogger {
    switch (this.loggerType.toLowerCase()) {
      case 'cloudwatch':
        return new CloudWatchLogger(context);

      case 'console':
      default:
        return new ConsoleLogger(context);
    }
  }
}

const factory = new LoggerFactory();

/**
 * Default logger instance for application use
 */
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
