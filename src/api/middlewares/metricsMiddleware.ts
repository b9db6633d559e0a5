/**
 * HTTP Metrics Middleware
 *
 * Tracks, in process memory:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path} (summary over the last 1000 requests)
 *
 * Requests that match no route share the "unmatched" path label.
 */

import { Request, Response, NextFunction } from 'express';

interface RequestCounter {
  method: string;
  path: string;
  status: number;
  count: number;
}

interface DurationWindow {
  method: string;
  path: string;
  durations: number[];
}

const MAX_DURATIONS_PER_ROUTE = 1000;
const UNTRACKED_PATHS = new Set(['/metrics', '/health']);
const UNMATCHED_PATH = 'unmatched';

const requestCounts = new Map<string, RequestCounter>();
const requestDurations = new Map<string, DurationWindow>();

/**
 * Collapse ids so /accounts/17 and /accounts/42 share one series
 */
export function normalizePath(path: string): string {
  return path.replace(/\/\d+(?=\/|$)/g, '/:id');
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const normalizedPath = normalizePath(req.path);

  if (UNTRACKED_PATHS.has(normalizedPath)) {
    next();
    return;
  }

  const startTime = process.hrtime.bigint();

  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
    const method = req.method;
    const status = res.statusCode;
    // req.route is only set once a route handler ran
    const path = req.route ? normalizedPath : UNMATCHED_PATH;

    const countKey = `${method} ${path} ${status}`;
    const counter = requestCounts.get(countKey) ?? { method, path, status, count: 0 };
    counter.count += 1;
    requestCounts.set(countKey, counter);

    const durationKey = `${method} ${path}`;
    const window = requestDurations.get(durationKey) ?? { method, path, durations: [] };
    window.durations.push(duration);
    if (window.durations.length > MAX_DURATIONS_PER_ROUTE) {
      window.durations.shift();
    }
    requestDurations.set(durationKey, window);
  });

  next();
}

function quantile(sorted: number[], q: number): number {
  return sorted[Math.floor(sorted.length * q)] ?? sorted[sorted.length - 1] ?? 0;
}

/**
 * HTTP request metrics in Prometheus text format, one line per entry
 */
export function getHttpMetrics(): string[] {
  const metrics: string[] = [];

  metrics.push('# HELP http_requests_total Total HTTP requests');
  metrics.push('# TYPE http_requests_total counter');
  for (const { method, path, status, count } of requestCounts.values()) {
    metrics.push(`http_requests_total{method="${method}",path="${path}",status="${status}"} ${count}`);
  }
  metrics.push('');

  metrics.push('# HELP http_request_duration_seconds HTTP request duration in seconds');
  metrics.push('# TYPE http_request_duration_seconds summary');
  for (const { method, path, durations } of requestDurations.values()) {
    if (durations.length === 0) continue;

    const labels = `method="${method}",path="${path}"`;
    const sorted = [...durations].sort((a, b) => a - b);
    const sum = durations.reduce((a, b) => a + b, 0);

    for (const q of [0.5, 0.95, 0.99]) {
      metrics.push(`http_request_duration_seconds{${labels},quantile="${q}"} ${quantile(sorted, q).toFixed(4)}`);
    }
    metrics.push(`http_request_duration_seconds_sum{${labels}} ${sum.toFixed(4)}`);
    metrics.push(`http_request_duration_seconds_count{${labels}} ${durations.length}`);
  }
  metrics.push('');

  return metrics;
}

/**
 * Reset all metrics (used by tests)
 */
export function resetMetrics(): void {
  requestCounts.clear();
  requestDurations.clear();
}
