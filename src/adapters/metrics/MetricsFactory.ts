/**
 * Metrics Factory
 *
 * METRICS_TYPE=cloudwatch → CloudWatchMetrics
 * METRICS_TYPE=noop (default) → NoOpMetrics
 */

import { env } from '@/config/env';
import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { NoOpMetrics } from './NoOpMetrics';
import { CloudWatchMetrics } from './CloudWatchMetrics';

export class MetricsFactory implements IMetricsFactory {
  constructor(private readonly metricsType: string = env.METRICS_TYPE) {}

  createMetrics(namespace?: string): IMetrics {
    switch (this.metricsType.toLowerCase()) {
      case 'cloudwatch':
        return new CloudWatchMetrics(namespace);

      case 'noop':
      default:
        return new NoOpMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
export const metrics = new MetricsFactory().createMetrics(env.CLOUDWATCH_METRICS_NAMESPACE);
