// src/core/http/types.ts

import type { ResponseBody } from './ResponseBody';
import type { CallError } from '../../utils/errors';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

// Header names are kept lowercase throughout the engine
export type HttpHeaders = Record<string, string>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Buffer;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  body: ResponseBody;
  cached?: boolean; // True if synthesized from the response cache
}

export type RequestBody = Buffer | string | Record<string, unknown> | unknown[];

export interface RequestInfo {
  method: HttpMethod;
  path: string;
}

export type RetryPredicate = (response: HttpResponse | undefined, error: Error | undefined) => boolean;
export type BackoffStrategy = (attempt: number) => number; // milliseconds
export type AuthTokenProvider = (
  info: RequestInfo
) => string | undefined | Promise<string | undefined>;
export type Fallback = (request: HttpRequest, error: CallError) => HttpResponse | Promise<HttpResponse>;

export interface RateLimiter {
  /** Resolves once a token is available; rejects when `signal` aborts first. */
  wait(signal: AbortSignal): Promise<void>;
}

export interface Breaker {
  /** Runs `operation` unless the breaker is open; a rejection counts as a failure. */
  execute<T>(operation: () => Promise<T>): Promise<T>;
}

export interface CacheBackend {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
}

export interface EndpointPolicy {
  timeout: number; // milliseconds
  maxRetries: number;
  shouldRetry: RetryPredicate;
  backoff: BackoffStrategy;
  headers: HttpHeaders;
  requireAuth: boolean;
  rateLimiter?: RateLimiter;
  breaker: Breaker;
  authToken?: AuthTokenProvider;
  enableCache: boolean;
  cacheTtl?: number; // milliseconds
  fallback?: Fallback;
  maxResponseSize?: number; // bytes
  customTags: Record<string, string>;
}

export type EndpointSettings = Partial<EndpointPolicy>;

export type EndpointConfig = (method: HttpMethod, path: string) => EndpointSettings | null | undefined;

/**
 * Per-call state threaded next to the request through every interceptor.
 * One context (and one policy) is shared by all attempts of a call; only
 * `attempt` differs between them.
 */
export interface CallContext {
  readonly policy: Readonly<EndpointPolicy>;
  readonly info: RequestInfo;
  readonly signal: AbortSignal;
  readonly deadline: number; // epoch milliseconds
  readonly attempt: number;
  readonly credential?: string;
  readonly remoteAddress?: string;
}

export interface Transport {
  send(request: HttpRequest, ctx: CallContext): Promise<HttpResponse>;
}

export interface BaseTransport extends Transport {
  close(): void;
}

export type Interceptor = (next: Transport) => Transport;

export interface CallOptions {
  headers?: HttpHeaders;
  signal?: AbortSignal;
  deadline?: number; // epoch milliseconds
  credential?: string; // inbound Authorization value to propagate
  remoteAddress?: string; // caller's network address, for X-Forwarded-For
}

export interface ClientHooks {
  preRequest?: (info: RequestInfo) => void | Promise<void>;
  postRequest?: (info: RequestInfo, status: number) => void | Promise<void>;
  onError?: (info: RequestInfo, error: CallError) => void | Promise<void>;
}
