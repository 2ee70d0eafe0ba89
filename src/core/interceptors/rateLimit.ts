// src/core/interceptors/rateLimit.ts

import type { HttpMethod, Interceptor, RateLimiter } from '../http/types';
import { transport } from '../http/chain';
import { RateLimitWaitError } from '../../utils/errors';

export interface RateLimitInterceptorConfig {
  /** Looked up first; the policy's limiter is used when this returns nothing. */
  limiterFor?: (method: HttpMethod, path: string) => RateLimiter | undefined;
}

/**
 * Waits for a limiter token before calling inward. A wait cut short by the
 * call's deadline or cancellation fails the attempt without touching the wire.
 */
export function rateLimitInterceptor(config: RateLimitInterceptorConfig = {}): Interceptor {
  return (next) =>
    transport(async (request, ctx) => {
      const limiter = config.limiterFor?.(ctx.info.method, ctx.info.path) ?? ctx.policy.rateLimiter;
      if (limiter) {
        try {
          await limiter.wait(ctx.signal);
        } catch (error) {
          if (error instanceof RateLimitWaitError) throw error;
          throw new RateLimitWaitError(undefined, { path: ctx.info.path }, error);
        }
      }
      return next.send(request, ctx);
    });
}
