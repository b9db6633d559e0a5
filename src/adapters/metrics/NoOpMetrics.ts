/**
 * No-Op Metrics Adapter
 *
 * Default backend (METRICS_TYPE=noop) for development and tests.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {}

  recordGauge(_name: string, _value: number, _dimensions?: MetricDimensions): void {}

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {}

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => {};
  }

  async flush(): Promise<void> {}
}
