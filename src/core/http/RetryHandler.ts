// src/core/http/RetryHandler.ts

import type { BackoffStrategy, CallContext, HttpRequest, HttpResponse, RetryPredicate, Transport } from './types';
import type { Logger } from '../../observability/Logger';
import { abortError, sleep } from '../../utils/signals';

export interface AttemptOutcome {
  response?: HttpResponse;
  error?: Error;
  attempts: number;
}

export const DEFAULT_BACKOFF_MS = 200;

/** Retry on transport errors and on 5xx responses. */
export const defaultShouldRetry: RetryPredicate = (response, error) =>
  error !== undefined || (response !== undefined && response.status >= 500);

export function constantBackoff(delay: number = DEFAULT_BACKOFF_MS): BackoffStrategy {
  return () => delay;
}

/**
 * baseDelay * 2^attempt plus up to `jitter` ms of noise, capped at maxDelay
 */
export function exponentialBackoff(config: {
  baseDelay: number;
  maxDelay: number;
  jitter?: number;
}): BackoffStrategy {
  const jitter = config.jitter ?? 0;
  return (attempt) =>
    Math.min(config.baseDelay * Math.pow(2, attempt) + Math.random() * jitter, config.maxDelay);
}

export class RetryHandler {
  constructor(private logger: Logger) {}

  /**
   * Runs the decorated transport until the policy's predicate says stop or
   * maxRetries is used up. The final attempt's response or error is what
   * comes back; responses from discarded attempts are released first.
   */
  async execute(transport: Transport, request: HttpRequest, ctx: CallContext): Promise<AttemptOutcome> {
    const { maxRetries, shouldRetry, backoff } = ctx.policy;

    for (let attempt = 0; ; attempt++) {
      let response: HttpResponse | undefined;
      let error: Error | undefined;

      try {
        // Each attempt sees the caller's request, untouched by earlier attempts
        response = await transport.send(
          { ...request, headers: { ...request.headers } },
          { ...ctx, attempt }
        );
      } catch (caught) {
        error = caught instanceof Error ? caught : new Error(String(caught));
      }

      const attempts = attempt + 1;
      if (!shouldRetry(response, error) || attempt >= maxRetries || ctx.signal.aborted) {
        return { response, error, attempts };
      }

      response?.body.release();

      const delay = backoff(attempt);
      this.logger.warn('Retrying request', {
        method: request.method,
        url: request.url,
        attempt: attempts,
        delay,
        status: response?.status,
        error: error?.message,
      });

      try {
        await sleep(delay, ctx.signal);
      } catch (aborted) {
        // The deadline or the caller cut the backoff short: no further attempt
        return { error: aborted instanceof Error ? aborted : abortError(ctx.signal), attempts };
      }
    }
  }
}
