// src/core/http/ErrorClassifier.ts

import type { HttpRequest, HttpResponse } from './types';
import type { AttemptOutcome } from './RetryHandler';
import type { Logger } from '../../observability/Logger';
import { CallError, NetworkError, statusError } from '../../utils/errors';

export type Classification = { ok: true; response: HttpResponse } | { ok: false; error: CallError };

/**
 * Decides success or failure for a settled call. A transport error or a
 * status >= 400 is a failure and becomes a CallError.
 */
export class ErrorClassifier {
  constructor(private logger: Logger) {}

  classify(request: HttpRequest, outcome: AttemptOutcome): Classification {
    const { response, error, attempts } = outcome;
    if (!error && response && response.status < 400) {
      return { ok: true, response };
    }

    let cause: Error;
    if (error) {
      cause = error;
    } else if (response) {
      cause = statusError(response.status, response.headers);
    } else {
      cause = new NetworkError('No response received');
    }

    const body = response?.body.bytes();
    this.logger.debug('HTTP error response', {
      method: request.method,
      url: request.url,
      status: response?.status,
      attempts,
      error: cause.message,
      bodyBytes: body?.length,
    });

    const callError = new CallError({
      status: response?.status ?? 0,
      method: request.method,
      url: request.url,
      attempts,
      cause,
      body,
      response,
    });
    return { ok: false, error: callError };
  }
}
