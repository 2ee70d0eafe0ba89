// src/core/interceptors/appToken.ts

import type { Interceptor } from '../http/types';
import { transport } from '../http/chain';

export const APP_TOKEN_HEADER = 'x-auth-app-token';

/** Stamps the service's own app token on every request, when one is configured. */
export function appTokenInterceptor(token: string | undefined = process.env.X_AUTH_APP_TOKEN): Interceptor {
  return (next) =>
    transport((request, ctx) => {
      if (token) {
        request.headers[APP_TOKEN_HEADER] = token;
      }
      return next.send(request, ctx);
    });
}
