/**
 * Console Logger Adapter
 *
 * Child of the root pino logger (src/utils/logger.ts), so application logs
 * and request logs share one destination: pino-pretty in development,
 * JSON lines on stdout everywhere else.
 */

import { logger as rootLogger } from '@/utils/logger';
import { PinoLogger } from './PinoLogger';

export class ConsoleLogger extends PinoLogger {
  constructor(context?: string) {
    super(rootLogger.child({ name: context || 'app' }));
  }
}
