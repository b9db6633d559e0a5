/**
 * AWS CloudWatch Metrics Adapter
 *
 * Buffers data points in memory and ships them with PutMetricData once a
 * minute (and on flush). Needs cloudwatch:PutMetricData on the instance role.
 */

import {
  CloudWatchClient,
  MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

// PutMetricData limit per request
const MAX_DATUMS_PER_REQUEST = 20;
const FLUSH_INTERVAL_MS = 60_000;

export class CloudWatchMetrics implements IMetrics {
  private buffer: MetricDatum[] = [];
  private readonly flushInterval: NodeJS.Timeout;

  constructor(
    private readonly namespace: string = env.CLOUDWATCH_METRICS_NAMESPACE,
    private readonly client: CloudWatchClient = new CloudWatchClient({ region: env.AWS_REGION })
  ) {
    this.flushInterval = setInterval(() => {
      this.flush().catch((err: unknown) => {
        logger.error({ err }, 'Failed to flush CloudWatch metrics');
      });
    }, FLUSH_INTERVAL_MS);
    // The timer alone must not keep the process alive
    this.flushInterval.unref();
  }

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    this.record(name, value, StandardUnit.Count, dimensions);
  }

  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void {
    this.record(name, value, StandardUnit.None, dimensions);
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    this.record(name, value, StandardUnit.Milliseconds, dimensions);
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => {
      this.recordHistogram(name, Date.now() - start, dimensions);
    };
  }

  /**
   * Failures are logged and the batch is dropped; metrics never fail a request
   */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const pending = this.buffer.splice(0);

    try {
      for (let i = 0; i < pending.length; i += MAX_DATUMS_PER_REQUEST) {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: pending.slice(i, i + MAX_DATUMS_PER_REQUEST),
          })
        );
      }

      logger.debug({ count: pending.length, namespace: this.namespace }, 'Flushed metrics to CloudWatch');
    } catch (error) {
      logger.error({ error, count: pending.length }, 'Failed to send metrics to CloudWatch');
    }
  }

  /**
   * Stop the timer and send whatever is left
   */
  async destroy(): Promise<void> {
    clearInterval(this.flushInterval);
    await this.flush();
  }

  private record(
    name: string,
    value: number,
    unit: StandardUnit,
    dimensions?: MetricDimensions
  ): void {
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
      Dimensions: Object.entries(dimensions ?? {}).map(([key, dimensionValue]) => ({
        Name: key,
        Value: String(dimensionValue),
      })),
    });
  }
}
