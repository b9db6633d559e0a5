/**
 * Metrics Interface
 *
 * Business metrics (accounts created, deleted, ...) go through this
 * interface so the backend can be swapped via METRICS_TYPE.
 */

/**
 * Dimensions/tags for filtering and grouping
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * @example
   * metrics.incrementCounter('accounts.created');
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a point-in-time value
   */
  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Record a duration in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer; calling the returned function records the elapsed time
   * as a histogram under the same name
   *
   * @example
   * const endTimer = metrics.startTimer('accounts.list');
   * await repo.findAll();
   * endTimer();
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Send buffered metrics to the backend (called on shutdown)
   */
  flush(): Promise<void>;
}

export interface IMetricsFactory {
  createMetrics(namespace?: string): IMetrics;
}
