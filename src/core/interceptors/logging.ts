// src/core/interceptors/logging.ts

import type { Interceptor } from '../http/types';
import type { Logger } from '../../observability/Logger';
import { transport } from '../http/chain';

/** Debug line per attempt; transport failures at warn. */
export function requestLoggingInterceptor(logger: Logger): Interceptor {
  return (next) =>
    transport(async (request, ctx) => {
      const startTime = Date.now();
      logger.debug('HTTP request', {
        method: request.method,
        url: request.url,
        attempt: ctx.attempt,
        headers: request.headers,
      });

      try {
        const response = await next.send(request, ctx);
        logger.debug('HTTP response', {
          method: request.method,
          url: request.url,
          attempt: ctx.attempt,
          status: response.status,
          duration: Date.now() - startTime,
        });
        return response;
      } catch (error) {
        logger.warn('HTTP transport failure', {
          method: request.method,
          url: request.url,
          attempt: ctx.attempt,
          duration: Date.now() - startTime,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    });
}
