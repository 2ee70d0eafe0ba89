// src/core/interceptors/circuitBreaker.ts

import type { Breaker, HttpMethod, HttpResponse, Interceptor } from '../http/types';
import { transport } from '../http/chain';

export interface CircuitBreakerInterceptorConfig {
  /** Looked up first; the policy's breaker is used when this returns nothing. */
  breakerFor?: (method: HttpMethod, path: string) => Breaker | undefined;
}

// Carries a 5xx response through the breaker so it is counted as a failure
class ServerFailure extends Error {
  constructor(readonly response: HttpResponse) {
    super(`Server error: ${response.status}`);
  }
}

/**
 * Runs the inner call through the breaker. 5xx responses are reported to the
 * breaker as failures but still returned to the caller as responses; an
 * open breaker fails fast with CircuitBreakerOpenError.
 */
export function circuitBreakerInterceptor(config: CircuitBreakerInterceptorConfig = {}): Interceptor {
  return (next) =>
    transport(async (request, ctx) => {
      const breaker = config.breakerFor?.(ctx.info.method, ctx.info.path) ?? ctx.policy.breaker;

      try {
        return await breaker.execute(async () => {
          const response = await next.send(request, ctx);
          if (response.status >= 500) {
            throw new ServerFailure(response);
          }
          return response;
        });
      } catch (error) {
        if (error instanceof ServerFailure) {
          return error.response;
        }
        throw error;
      }
    });
}
