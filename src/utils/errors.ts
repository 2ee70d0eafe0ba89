// src/utils/errors.ts

import type { HttpResponse } from '../core/http/types';

export class EngineError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends EngineError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, 'CONFIG_ERROR', { issues });
  }
}

// Status errors: the response arrived, but with a failing status
export class ApiError extends EngineError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Transport errors: no usable response
export class NetworkError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'NETWORK_ERROR', details, cause);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class RequestCancelledError extends NetworkError {
  constructor(message: string = 'Request cancelled', details?: Record<string, unknown>, cause?: unknown) {
    super(message, details, cause);
    this.code = 'REQUEST_CANCELLED';
  }
}

export class CircuitBreakerOpenError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

export class RateLimitWaitError extends NetworkError {
  constructor(message: string = 'Rate limiter wait cancelled', details?: Record<string, unknown>, cause?: unknown) {
    super(message, details, cause);
    this.code = 'RATE_LIMIT_WAIT_CANCELLED';
  }
}

export class ResponseTooLargeError extends EngineError {
  constructor(public maxBytes: number) {
    super(`Response body exceeds ${maxBytes} bytes`, 'RESPONSE_TOO_LARGE', { maxBytes });
  }
}

const BODY_PREVIEW_LIMIT = 512;

export interface CallErrorInit {
  status: number;
  method: string;
  url: string;
  attempts: number;
  cause?: unknown;
  body?: Buffer;
  response?: HttpResponse;
}

/**
 * The one error type a call surfaces. `status` is 0 when no response was
 * ever received (transport failure, limiter wait, open breaker).
 */
export class CallError extends EngineError {
  readonly status: number;
  readonly method: string;
  readonly url: string;
  readonly attempts: number;
  readonly body?: Buffer;
  readonly response?: HttpResponse;

  constructor(init: CallErrorInit) {
    super(
      formatCallError(init),
      'HTTP_CALL_ERROR',
      { status: init.status, method: init.method, url: init.url, attempts: init.attempts },
      init.cause
    );
    this.status = init.status;
    this.method = init.method;
    this.url = init.url;
    this.attempts = init.attempts;
    this.body = init.body;
    this.response = init.response;
  }

  /**
   * Normalizes anything thrown on the fallback path. A CallError passes
   * through; anything else becomes the cause of a CallError that keeps the
   * original call's request context.
   */
  static from(error: unknown, context: CallError): CallError {
    if (error instanceof CallError) {
      return error;
    }
    return new CallError({
      status: context.status,
      method: context.method,
      url: context.url,
      attempts: context.attempts,
      body: context.body,
      response: context.response,
      cause: error instanceof Error ? error : new EngineError(String(error), 'FALLBACK_ERROR'),
    });
  }

  get bodyText(): string {
    return this.body ? this.body.toString('utf8') : '';
  }
}

function formatCallError(init: CallErrorInit): string {
  const reason = init.cause instanceof Error ? init.cause.message : 'none';
  let message = `[HTTP] ${init.method} ${init.url}: status=${init.status}, attempts=${init.attempts}, err=${reason}`;
  if (init.body && init.body.length > 0) {
    const preview = init.body.subarray(0, BODY_PREVIEW_LIMIT).toString('utf8');
    message += `, body=${preview}`;
  }
  return message;
}

/**
 * Maps a failing status to its status error. 429 carries Retry-After
 * (seconds) when the server sent one.
 */
export function statusError(status: number, headers: Record<string, string> = {}): ApiError {
  if (status === 429) {
    const retryAfter = Number.parseInt(headers['retry-after'] ?? '', 10);
    return new RateLimitError(
      'Rate limit exceeded',
      Number.isNaN(retryAfter) ? undefined : retryAfter
    );
  }
  if (status >= 500) {
    return new ApiServerError(`Server error: ${status}`, status);
  }
  return new ApiClientError(`Client error: ${status}`, status);
}
