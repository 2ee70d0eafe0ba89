// src/core/interceptors/tracing.ts

import { context, propagation, trace, SpanKind, SpanStatusCode, defaultTextMapSetter } from '@opentelemetry/api';
import type { TextMapPropagator, TracerProvider } from '@opentelemetry/api';
import type { HttpRequest, Interceptor } from '../http/types';
import { transport } from '../http/chain';
import { TRACER_NAME } from '../../observability/tracing';

export interface TracingConfig {
  tracerProvider?: TracerProvider;
  propagator?: TextMapPropagator;
  spanName?: (request: HttpRequest) => string;
}

/**
 * One CLIENT span per attempt. Trace context is injected into the outbound
 * headers; transport failures and statuses >= 400 mark the span as errored.
 */
export function tracingInterceptor(config: TracingConfig = {}): Interceptor {
  const tracer = (config.tracerProvider ?? trace.getTracerProvider()).getTracer(TRACER_NAME);
  const spanName = config.spanName ?? ((request: HttpRequest) => `HTTP ${request.method}`);

  return (next) =>
    transport(async (request, ctx) => {
      const url = new URL(request.url);
      const span = tracer.startSpan(spanName(request), {
        kind: SpanKind.CLIENT,
        attributes: {
          'http.method': request.method,
          'http.url': request.url,
          'http.target': url.pathname,
          'http.scheme': url.protocol.replace(/:$/, ''),
          'http.host': url.host,
          'http.resend_count': ctx.attempt,
        },
      });
      if (request.body && request.body.length > 0) {
        span.setAttribute('http.request_content_length', request.body.length);
      }
      for (const [tag, value] of Object.entries(ctx.policy.customTags)) {
        span.setAttribute(tag, value);
      }

      const spanContext = trace.setSpan(context.active(), span);
      if (config.propagator) {
        config.propagator.inject(spanContext, request.headers, defaultTextMapSetter);
      } else {
        propagation.inject(spanContext, request.headers);
      }

      try {
        const response = await context.with(spanContext, () => next.send(request, ctx));

        span.setAttribute('http.status_code', response.status);
        const contentLength = Number.parseInt(response.headers['content-length'] ?? '', 10);
        if (contentLength > 0) {
          span.setAttribute('http.response_content_length', contentLength);
        }
        if (response.status >= 400) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: `HTTP ${response.status}` });
        }
        return response;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw error;
      } finally {
        span.end();
      }
    });
}
