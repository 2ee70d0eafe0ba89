// src/core/interceptors/maxResponseSize.ts

import type { Interceptor } from '../http/types';
import { transport } from '../http/chain';

/**
 * Bounds the response body to `maxBytes`, or to the policy's
 * maxResponseSize when no explicit limit is given. Reading past the bound
 * fails with ResponseTooLargeError.
 */
export function maxResponseSizeInterceptor(maxBytes?: number): Interceptor {
  return (next) =>
    transport(async (request, ctx) => {
      const response = await next.send(request, ctx);
      const limit = maxBytes ?? ctx.policy.maxResponseSize;
      if (limit === undefined || limit <= 0) {
        return response;
      }
      return { ...response, body: response.body.limit(limit) };
    });
}
