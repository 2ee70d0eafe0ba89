// src/index.ts

export { createResilientClient } from './sdk';
export type { ClientDependencies } from './sdk';
export { HttpClient } from './core/http/HttpClient';
export type { HttpClientOptions } from './core/http/HttpClient';
export { AxiosTransport } from './core/http/AxiosTransport';
export type { AxiosTransportOptions } from './core/http/AxiosTransport';
export { PolicyResolver, DEFAULT_TIMEOUT_MS, DEFAULT_MAX_RETRIES } from './core/http/PolicyResolver';
export {
  RetryHandler,
  defaultShouldRetry,
  constantBackoff,
  exponentialBackoff,
  DEFAULT_BACKOFF_MS,
} from './core/http/RetryHandler';
export { ResponseBody } from './core/http/ResponseBody';
export { CircuitBreaker } from './core/http/CircuitBreaker';
export type { CircuitBreakerOptions, CircuitState } from './core/http/CircuitBreaker';
export { QueueRateLimiter } from './core/http/QueueRateLimiter';
export type { RateLimitConfig } from './core/http/QueueRateLimiter';
export { KeyvCacheBackend } from './core/cache/KeyvCacheBackend';
export type { CacheBackendConfig } from './core/cache/KeyvCacheBackend';
export { composeInterceptors, transport } from './core/http/chain';
export * from './core/interceptors';
export type * from './core/http/types';

export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig } from './observability/MetricsCollector';
export { initializeTracing } from './observability/tracing';
export { validateConfig, validateConfigSafe, ClientConfigSchema } from './config/ConfigValidator';
export type { ClientConfig } from './config/ConfigValidator';

// Export error classes for error handling
export {
  EngineError,
  ConfigError,
  CallError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  RequestCancelledError,
  CircuitBreakerOpenError,
  RateLimitWaitError,
  ResponseTooLargeError,
} from './utils/errors';
