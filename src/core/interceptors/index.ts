// src/core/interceptors/index.ts

export { requestIdInterceptor, REQUEST_ID_HEADER } from './requestId';
export { identityInterceptor, FORWARDED_FOR_HEADER, stripPort } from './identity';
export { authInterceptor } from './auth';
export { appTokenInterceptor, APP_TOKEN_HEADER } from './appToken';
export { rateLimitInterceptor } from './rateLimit';
export type { RateLimitInterceptorConfig } from './rateLimit';
export { circuitBreakerInterceptor } from './circuitBreaker';
export type { CircuitBreakerInterceptorConfig } from './circuitBreaker';
export { cacheInterceptor, defaultCacheKey, DEFAULT_CACHE_TTL_MS, SKIP_CACHE_HEADER } from './cache';
export type { CacheInterceptorConfig, CacheEntry } from './cache';
export { tracingInterceptor } from './tracing';
export type { TracingConfig } from './tracing';
export { metricsInterceptor } from './metrics';
export type { MetricsInterceptorConfig } from './metrics';
export { maxResponseSizeInterceptor } from './maxResponseSize';
export { requestLoggingInterceptor } from './logging';
export { hooksInterceptor } from './hooks';
export type { AttemptHooks } from './hooks';
