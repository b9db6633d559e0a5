/**
 * CloudWatch Logger Adapter
 *
 * Structured JSON on stdout, shaped for CloudWatch Logs Insights:
 * upper-case level labels, ISO timestamps and service/env/region on every
 * line. Shipping stdout to CloudWatch is left to the host (CloudWatch agent
 * on EC2, the awslogs driver on ECS).
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

export class CloudWatchLogger extends PinoLogger {
  constructor(context?: string) {
    super(
      pino({
        name: context || 'app',
        level: env.LOG_LEVEL,
        formatters: {
          level: (label) => ({ level: label.toUpperCase() }),
        },
        base: {
          env: env.NODE_ENV,
          region: env.AWS_REGION,
          service: 'account-rest-api',
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      })
    );
  }
}
