/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Call-level spans for the HTTP client. Per-attempt client spans and
 * trace-context propagation live in the tracing interceptor.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 * - OTEL_SERVICE_NAME=resilient-http-engine
 * - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces
 */

import { trace, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

export const TRACER_NAME = 'resilient-http-engine';

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the global tracer instance
 */
export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Span around one logical call (all of its attempts)
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.INTERNAL,
  });
}

/**
 * Initialize OpenTelemetry SDK (call once at app startup)
 *
 * Reads configuration from environment variables:
 * - OTEL_ENABLED: Enable tracing (default: false)
 * - OTEL_SERVICE_NAME: Service name (default: resilient-http-engine)
 * - OTEL_EXPORTER_OTLP_ENDPOINT: OTLP endpoint (default: http://localhost:4318/v1/traces)
 *
 * @returns true if initialized, false if disabled or the SDK failed to load
 */
export async function initializeTracing(): Promise<boolean> {
  if (!isOTelEnabled()) {
    return false;
  }

  try {
    // Dynamic import to avoid loading OTEL SDK when not needed
    const { NodeSDK } = await import('@opentelemetry/sdk-node');
    const { OTLPTraceExporter } = await import('@opentelemetry/exporter-trace-otlp-http');

    const serviceName = process.env.OTEL_SERVICE_NAME || TRACER_NAME;
    const otlpEndpoint =
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces';

    const sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({
        url: otlpEndpoint,
      }),
    });

    sdk.start();

    console.log(`[OTEL] Tracing initialized: ${serviceName} -> ${otlpEndpoint}`);

    process.on('SIGTERM', () => {
      sdk
        .shutdown()
        .then(() => console.log('[OTEL] Tracing terminated'))
        .catch((error: unknown) => console.error('[OTEL] Error terminating tracing', error));
    });

    return true;
  } catch (error) {
    console.error('[OTEL] Failed to initialize tracing:', error instanceof Error ? error.message : error);
    return false;
  }
}
