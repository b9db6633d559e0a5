/**
 * Metrics Controller
 *
 * Prometheus text exposition: HTTP metrics from the middleware plus process
 * uptime, memory and CPU.
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { getHttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { env } from '@/config/env';

function metricLines(name: string, help: string, value: number, type: 'gauge' | 'counter' = 'gauge'): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`, `${name} ${value}`, ''];
}

/**
 * GET /metrics
 */
export function getMetrics(_req: Request, res: Response): void {
  const memUsage = process.memoryUsage();
  const cpuUsage = process.cpuUsage();

  const metrics: string[] = [
    ...getHttpMetrics(),
    ...metricLines('process_uptime_seconds', 'Process uptime in seconds', process.uptime()),
    ...metricLines('process_heap_used_bytes', 'Process heap memory used in bytes', memUsage.heapUsed),
    ...metricLines('process_heap_total_bytes', 'Process heap memory total in bytes', memUsage.heapTotal),
    ...metricLines('process_rss_bytes', 'Process resident set size in bytes', memUsage.rss),
    // cpuUsage() reports microseconds
    ...metricLines('process_cpu_user_seconds_total', 'Total user CPU time in seconds', cpuUsage.user / 1e6, 'counter'),
    ...metricLines('process_cpu_system_seconds_total', 'Total system CPU time in seconds', cpuUsage.system / 1e6, 'counter'),
    '# HELP app_info Application information',
    '# TYPE app_info gauge',
    `app_info{version="1.0",node_version="${process.version}",env="${env.NODE_ENV}"} 1`,
    '',
  ];

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(metrics.join('\n'));
}
