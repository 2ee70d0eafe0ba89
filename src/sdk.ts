// src/sdk.ts

import type { TracerProvider } from '@opentelemetry/api';
import type {
  BaseTransport,
  Breaker,
  CacheBackend,
  ClientHooks,
  EndpointConfig,
  EndpointSettings,
  HttpMethod,
  Interceptor,
  RateLimiter,
} from './core/http/types';
import { HttpClient } from './core/http/HttpClient';
import { AxiosTransport } from './core/http/AxiosTransport';
import { QueueRateLimiter } from './core/http/QueueRateLimiter';
import { mergeSettings } from './core/http/PolicyResolver';
import { KeyvCacheBackend } from './core/cache/KeyvCacheBackend';
import {
  appTokenInterceptor,
  authInterceptor,
  cacheInterceptor,
  circuitBreakerInterceptor,
  identityInterceptor,
  maxResponseSizeInterceptor,
  metricsInterceptor,
  rateLimitInterceptor,
  requestIdInterceptor,
  requestLoggingInterceptor,
  tracingInterceptor,
} from './core/interceptors';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import type { ClientConfig } from './config/ConfigValidator';

/** Everything that cannot live in a plain config object. */
export interface ClientDependencies {
  defaults?: EndpointSettings; // merged over config.defaults, header and tag maps key by key
  endpointConfig?: EndpointConfig;
  hooks?: ClientHooks;
  transport?: BaseTransport;
  cache?: CacheBackend;
  logger?: Logger;
  metrics?: MetricsCollector;
  tracerProvider?: TracerProvider;
  limiterFor?: (method: HttpMethod, path: string) => RateLimiter | undefined;
  breakerFor?: (method: HttpMethod, path: string) => Breaker | undefined;
  /** Placed between the standard cross-cutting layers and the request-id layer. */
  interceptors?: Interceptor[];
}

/**
 * Build a client with the standard interceptor stack
 *
 * Outermost to innermost: tracing, metrics, caching, circuit breaking, rate
 * limiting, identity, auth, app token, caller extras, request id, logging,
 * max response size.
 *
 * @throws {ConfigError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createResilientClient(
 *   {
 *     baseUrl: 'https://api.example.com',
 *     defaults: { timeout: 5000, maxRetries: 2 },
 *     cache: { defaultTtl: 30000 },
 *     metrics: { namespace: 'orders', subsystem: 'upstream' },
 *   },
 *   {
 *     endpointConfig: (method, path) =>
 *       path.startsWith('/public') ? { requireAuth: false, enableCache: true } : undefined,
 *   }
 * );
 * const response = await client.get('/public/items');
 * ```
 */
export function createResilientClient(config: ClientConfig = {}, deps: ClientDependencies = {}): HttpClient {
  const validated = validateConfig(config);

  const logger = deps.logger ?? new Logger(validated.logging);
  const metrics = deps.metrics ?? new MetricsCollector(validated.metrics ?? {}, logger);

  const defaults: EndpointSettings = mergeSettings(validated.defaults ?? {}, deps.defaults ?? {});
  if (validated.rateLimit && !defaults.rateLimiter) {
    // One limiter shared by every call of this client
    defaults.rateLimiter = new QueueRateLimiter(validated.rateLimit, logger);
  }

  const interceptors: Interceptor[] = [
    tracingInterceptor({ tracerProvider: deps.tracerProvider }),
  ];

  if (metrics.enabled) {
    interceptors.push(
      metricsInterceptor(metrics, {
        namespace: validated.metrics?.namespace,
        subsystem: validated.metrics?.subsystem,
      })
    );
  }

  const cache = deps.cache ?? (validated.cache ? new KeyvCacheBackend(validated.cache) : undefined);
  if (cache) {
    interceptors.push(
      cacheInterceptor({
        cache,
        defaultTtl: validated.cache?.defaultTtl,
        methods: validated.cache?.methods,
        statusCodes: validated.cache?.statusCodes,
        skipCacheHeader: validated.cache?.skipCacheHeader,
        logger,
      })
    );
  }

  interceptors.push(
    circuitBreakerInterceptor({ breakerFor: deps.breakerFor }),
    rateLimitInterceptor({ limiterFor: deps.limiterFor }),
    identityInterceptor(),
    authInterceptor(),
    appTokenInterceptor(validated.appToken ?? process.env.X_AUTH_APP_TOKEN),
    ...(deps.interceptors ?? []),
    requestIdInterceptor(),
    requestLoggingInterceptor(logger),
    maxResponseSizeInterceptor()
  );

  logger.debug('HTTP client initialized', {
    baseUrl: validated.baseUrl,
    interceptors: interceptors.length,
    cache: cache !== undefined,
    metrics: metrics.enabled,
  });

  return new HttpClient({
    baseUrl: validated.baseUrl,
    defaults,
    endpointConfig: deps.endpointConfig,
    interceptors,
    hooks: deps.hooks,
    transport: deps.transport ?? new AxiosTransport({ keepAlive: validated.keepAlive }),
    logger,
  });
}
