// src/core/interceptors/auth.ts

import type { Interceptor } from '../http/types';
import { transport } from '../http/chain';

/**
 * Copies the inbound credential onto the outbound request when the policy
 * marks the endpoint as requiring auth. Without a credential the call goes
 * out unauthenticated; enforcement is the server's job.
 */
export function authInterceptor(header: string = 'authorization'): Interceptor {
  const name = header.toLowerCase();
  return (next) =>
    transport((request, ctx) => {
      if (ctx.policy.requireAuth && ctx.credential) {
        request.headers[name] = ctx.credential;
      }
      return next.send(request, ctx);
    });
}
