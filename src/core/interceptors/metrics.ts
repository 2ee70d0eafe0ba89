// src/core/interceptors/metrics.ts

import type { Interceptor } from '../http/types';
import { transport } from '../http/chain';
import { MetricsCollector, metricName } from '../../observability/MetricsCollector';

export interface MetricsInterceptorConfig {
  namespace?: string; // default "http_client"
  subsystem?: string;
}

/**
 * Records duration and count per attempt, labelled by method/host/path/status,
 * and counts transport errors by error name.
 */
export function metricsInterceptor(
  collector: MetricsCollector,
  config: MetricsInterceptorConfig = {}
): Interceptor {
  const namespace = config.namespace || 'http_client';
  const labels = ['method', 'host', 'path', 'status'] as const;

  const requestDuration = collector.histogram(
    metricName(namespace, config.subsystem, 'request_duration_seconds'),
    'Time spent processing HTTP requests',
    labels
  );
  const requestsTotal = collector.counter(
    metricName(namespace, config.subsystem, 'requests_total'),
    'Total number of HTTP requests',
    labels
  );
  const requestErrors = collector.counter(
    metricName(namespace, config.subsystem, 'request_errors_total'),
    'Total number of HTTP request errors',
    ['method', 'host', 'path', 'error']
  );

  return (next) =>
    transport(async (request, ctx) => {
      if (!collector.enabled) {
        return next.send(request, ctx);
      }

      const url = new URL(request.url);
      const base = { method: request.method, host: url.host, path: url.pathname };
      const startTime = Date.now();

      try {
        const response = await next.send(request, ctx);
        const status = response.status.toString();
        requestDuration.observe({ ...base, status }, (Date.now() - startTime) / 1000);
        requestsTotal.inc({ ...base, status });
        return response;
      } catch (error) {
        requestErrors.inc({ ...base, error: error instanceof Error ? error.name : 'Error' });
        throw error;
      }
    });
}
