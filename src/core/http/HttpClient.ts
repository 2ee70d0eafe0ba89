// src/core/http/HttpClient.ts

import type {
  BaseTransport,
  CallContext,
  CallOptions,
  ClientHooks,
  EndpointConfig,
  EndpointPolicy,
  EndpointSettings,
  Fallback,
  HttpHeaders,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  Interceptor,
  RequestBody,
  RequestInfo,
  Transport,
} from './types';
import { Logger } from '../../observability/Logger';
import { withHttpSpan } from '../../observability/tracing';
import { AxiosTransport } from './AxiosTransport';
import { composeInterceptors } from './chain';
import { ErrorClassifier } from './ErrorClassifier';
import { HooksDispatcher } from './HooksDispatcher';
import { PolicyResolver } from './PolicyResolver';
import { RetryHandler } from './RetryHandler';
import type { AttemptOutcome } from './RetryHandler';
import { CallError, ConfigError } from '../../utils/errors';
import { normalizeHeaders } from '../../utils/headers';
import { abortError, createCallScope } from '../../utils/signals';

export interface HttpClientOptions {
  baseUrl?: string;
  defaults?: EndpointSettings;
  endpointConfig?: EndpointConfig;
  /** Registration order is execution order: the first one is outermost. */
  interceptors?: Interceptor[];
  hooks?: ClientHooks;
  transport?: BaseTransport;
  logger?: Logger;
}

/**
 * Shared, immutable request engine. Every call resolves its own policy and
 * context; the client holds no per-call state.
 */
export class HttpClient {
  readonly baseUrl: string;
  private base: BaseTransport;
  private chain: Transport;
  private resolver: PolicyResolver;
  private retryHandler: RetryHandler;
  private classifier: ErrorClassifier;
  private hooks: HooksDispatcher;
  private logger: Logger;

  constructor(options: HttpClientOptions = {}) {
    this.logger = options.logger ?? new Logger();
    this.baseUrl = (options.baseUrl ?? '').replace(/\/+$/, '');
    this.base = options.transport ?? new AxiosTransport();
    this.chain = composeInterceptors([...(options.interceptors ?? [])], this.base);
    this.resolver = new PolicyResolver(options.defaults, options.endpointConfig, this.logger);
    this.retryHandler = new RetryHandler(this.logger);
    this.classifier = new ErrorClassifier(this.logger);
    this.hooks = new HooksDispatcher(options.hooks ?? {}, this.logger);
  }

  async get(path: string, options?: CallOptions): Promise<HttpResponse> {
    return this.request('GET', path, undefined, options);
  }

  async head(path: string, options?: CallOptions): Promise<HttpResponse> {
    return this.request('HEAD', path, undefined, options);
  }

  async delete(path: string, options?: CallOptions): Promise<HttpResponse> {
    return this.request('DELETE', path, undefined, options);
  }

  async post(path: string, body?: RequestBody, options?: CallOptions): Promise<HttpResponse> {
    return this.request('POST', path, body, options);
  }

  async put(path: string, body?: RequestBody, options?: CallOptions): Promise<HttpResponse> {
    return this.request('PUT', path, body, options);
  }

  async patch(path: string, body?: RequestBody, options?: CallOptions): Promise<HttpResponse> {
    return this.request('PATCH', path, body, options);
  }

  async request(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
    options: CallOptions = {}
  ): Promise<HttpResponse> {
    const headers = normalizeHeaders(options.headers);
    const request: HttpRequest = {
      method,
      url: this.resolveUrl(path),
      headers,
      body: encodeBody(body, headers),
    };
    return this.send(request, options);
  }

  /**
   * Executes one logical call: policy, hooks, retries through the interceptor
   * chain, materialization, classification and fallback.
   *
   * @throws {CallError} Every failure, including one raised by the fallback
   */
  async send(request: HttpRequest, options: CallOptions = {}): Promise<HttpResponse> {
    if (!URL.canParse(request.url)) {
      throw new CallError({
        status: 0,
        method: request.method,
        url: request.url,
        attempts: 0,
        cause: new ConfigError(`Request URL must be absolute; set baseUrl or pass a full URL: ${request.url}`),
      });
    }

    const info: RequestInfo = { method: request.method, path: new URL(request.url).pathname };

    return withHttpSpan(request.method, request.url, async () => {
      await this.hooks.preRequest(info);

      const policy = this.resolver.resolve(info.method, info.path);
      const scope = createCallScope(policy.timeout, options);

      try {
        const outbound = await this.prepare(request, policy, info);
        const ctx: CallContext = {
          policy,
          info,
          signal: scope.signal,
          deadline: scope.deadline,
          attempt: 0,
          credential: options.credential,
          remoteAddress: options.remoteAddress,
        };

        const outcome = await this.materialize(
          await this.retryHandler.execute(this.chain, outbound, ctx),
          ctx
        );
        const result = this.classifier.classify(outbound, outcome);

        if (result.ok) {
          await this.hooks.postRequest(info, result.response.status);
          return result.response;
        }

        const failure = result.error;
        if (policy.fallback) {
          return await this.runFallback(policy.fallback, outbound, failure, info);
        }

        if (failure.response) {
          await this.hooks.postRequest(info, failure.status);
        }
        await this.hooks.onError(info, failure);
        throw failure;
      } finally {
        scope.dispose();
      }
    });
  }

  /** Releases idle pooled connections. */
  shutdown(): void {
    this.base.close();
  }

  private resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    if (!this.baseUrl) return path;
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  private async prepare(
    request: HttpRequest,
    policy: Readonly<EndpointPolicy>,
    info: RequestInfo
  ): Promise<HttpRequest> {
    // Endpoint headers overwrite the caller's
    const headers: HttpHeaders = { ...request.headers, ...policy.headers };

    if (policy.authToken) {
      try {
        const token = await policy.authToken(info);
        if (token) {
          headers.authorization = `Bearer ${token}`;
        }
      } catch (error) {
        this.logger.warn('Auth token provider failed; sending without token', {
          method: info.method,
          path: info.path,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return { ...request, headers };
  }

  /** Reads the final response body into memory, exactly once. */
  private async materialize(outcome: AttemptOutcome, ctx: CallContext): Promise<AttemptOutcome> {
    const { response } = outcome;
    if (!response) return outcome;

    try {
      await response.body.buffer();
      return outcome;
    } catch (error) {
      const cause = ctx.signal.aborted
        ? abortError(ctx.signal)
        : error instanceof Error
          ? error
          : new Error(String(error));
      return { ...outcome, error: outcome.error ?? cause };
    }
  }

  /**
   * The fallback's outcome replaces the classified failure. Whatever it
   * throws is normalized to CallError and still reaches the onError hook.
   */
  private async runFallback(
    fallback: Fallback,
    request: HttpRequest,
    failure: CallError,
    info: RequestInfo
  ): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await fallback(request, failure);
      await response.body.buffer();
    } catch (error) {
      const normalized = CallError.from(error, failure);
      await this.hooks.onError(info, normalized);
      throw normalized;
    }

    this.logger.info('Fallback response used', {
      method: info.method,
      path: info.path,
      status: response.status,
      originalStatus: failure.status,
    });
    await this.hooks.postRequest(info, response.status);
    return response;
  }
}

function encodeBody(body: RequestBody | undefined, headers: HttpHeaders): Buffer | undefined {
  if (body === undefined) return undefined;
  if (Buffer.isBuffer(body)) return body;
  if (typeof body === 'string') return Buffer.from(body, 'utf8');

  headers['content-type'] ??= 'application/json';
  return Buffer.from(JSON.stringify(body), 'utf8');
}
