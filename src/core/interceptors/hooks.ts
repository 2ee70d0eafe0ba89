// src/core/interceptors/hooks.ts

import type { HttpRequest, HttpResponse, Interceptor } from '../http/types';
import type { Logger } from '../../observability/Logger';
import { transport } from '../http/chain';

export interface AttemptHooks {
  preRequest?: (request: HttpRequest) => void | Promise<void>;
  postRequest?: (request: HttpRequest, response: HttpResponse) => void | Promise<void>;
  onError?: (request: HttpRequest, error: Error) => void | Promise<void>;
  logger?: Logger;
}

/**
 * Per-attempt hooks, unlike the call-level ClientHooks. A failing hook is
 * logged and never changes the attempt's outcome.
 */
export function hooksInterceptor(hooks: AttemptHooks): Interceptor {
  const invoke = async (name: string, request: HttpRequest, run: () => void | Promise<void>) => {
    try {
      await run();
    } catch (error) {
      hooks.logger?.error('Attempt hook failed', {
        hook: name,
        method: request.method,
        url: request.url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  return (next) =>
    transport(async (request, ctx) => {
      await invoke('preRequest', request, () => hooks.preRequest?.(request));

      let response: HttpResponse;
      try {
        response = await next.send(request, ctx);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        await invoke('onError', request, () => hooks.onError?.(request, err));
        throw error;
      }

      await invoke('postRequest', request, () => hooks.postRequest?.(request, response));
      return response;
    });
}
