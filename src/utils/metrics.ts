/**
 * Prometheus Metrics
 *
 * In-memory HTTP counters plus registry gauges, rendered in Prometheus text format.
 */

import type { Request, Response, NextFunction } from 'express';
import type { RegistryService } from '../services/registry.js';

interface HttpMetrics {
  requestsTotal: Map<string, number>;
  durationSum: Map<string, number>;
  durationCount: Map<string, number>;
}

const http: HttpMetrics = {
  requestsTotal: new Map(),
  durationSum: new Map(),
  durationCount: new Map(),
};

function increment(map: Map<string, number>, key: string, by: number): void {
  map.set(key, (map.get(key) ?? 0) + by);
}

/**
 * Record an HTTP request for metrics
 */
export function recordHttpRequest(
  method: string,
  route: string,
  status: number,
  durationMs: number
): void {
  const key = `${method}|${route}|${status}`;
  increment(http.requestsTotal, key, 1);
  increment(http.durationSum, key, durationMs);
  increment(http.durationCount, key, 1);
}

/**
 * Clear HTTP counters
 */
export function resetMetrics(): void {
  http.requestsTotal.clear();
  http.durationSum.clear();
  http.durationCount.clear();
}

/**
 * Generate Prometheus text format metrics
 */
export function getPrometheusMetrics(registry: RegistryService): string {
  const lines: string[] = [];

  const addMetric = (
    name: string,
    type: 'counter' | 'gauge',
    help: string,
    value: number
  ) => {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} ${type}`);
    lines.push(`${name} ${value}`);
  };

  lines.push('# HELP watch_http_requests_total Total HTTP requests');
  lines.push('# TYPE watch_http_requests_total counter');
  for (const [key, count] of http.requestsTotal) {
    const [method, route, status] = key.split('|');
    lines.push(
      `watch_http_requests_total{method="${method}",route="${route}",status="${status}"} ${count}`
    );
  }

  lines.push('# HELP watch_http_request_duration_ms HTTP request duration in milliseconds');
  lines.push('# TYPE watch_http_request_duration_ms summary');
  for (const [key, sum] of http.durationSum) {
    const [method, route, status] = key.split('|');
    const count = http.durationCount.get(key) ?? 1;
    lines.push(
      `watch_http_request_duration_ms{method="${method}",route="${route}",status="${status}",quantile="avg"} ${(sum / count).toFixed(2)}`
    );
  }

  addMetric('watch_users_total', 'gauge', 'Registered users', registry.getTotalUsers());
  addMetric('watch_alerts_total', 'counter', 'Alerts ever reported', registry.getTotalAlerts());
  addMetric(
    'watch_alerts_active',
    'gauge',
    'Alerts currently ACTIVE',
    registry.getActiveAlerts().length
  );
  addMetric(
    'watch_neighborhoods_total',
    'gauge',
    'Neighborhoods created',
    registry.getTotalNeighborhoods()
  );
  addMetric(
    'watch_events_total',
    'counter',
    'Notifications emitted',
    registry.getEventCount()
  );

  const memUsage = process.memoryUsage();
  addMetric('nodejs_heap_size_used_bytes', 'gauge', 'Process heap used in bytes', memUsage.heapUsed);
  addMetric('nodejs_process_uptime_seconds', 'gauge', 'Process uptime in seconds', process.uptime());

  return lines.join('\n') + '\n';
}

/**
 * Express middleware to record HTTP request metrics
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      // Route template when matched, so ids don't explode label cardinality
      const matched: unknown = req.route?.path;
      const route = typeof matched === 'string' ? `${req.baseUrl}${matched}` : 'unmatched';
      recordHttpRequest(req.method, route, res.statusCode, Date.now() - start);
    });

    next();
  };
}
