// src/core/interceptors/requestId.ts

import type { Interceptor } from '../http/types';
import { transport } from '../http/chain';
import { generateCorrelationId } from '../../observability/tracing';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Adds a fresh X-Request-ID unless the request already carries one. */
export function requestIdInterceptor(header: string = REQUEST_ID_HEADER): Interceptor {
  const name = header.toLowerCase();
  return (next) =>
    transport((request, ctx) => {
      if (!request.headers[name]) {
        request.headers[name] = generateCorrelationId();
      }
      return next.send(request, ctx);
    });
}
