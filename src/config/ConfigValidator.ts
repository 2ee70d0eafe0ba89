// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const HttpMethodSchema = z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS']);

// Serializable endpoint defaults; functions and collaborators are passed as dependencies
const EndpointDefaultsSchema = z.object({
  timeout: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).max(10).optional(),
  headers: z.record(z.string()).optional(),
  requireAuth: z.boolean().optional(),
  enableCache: z.boolean().optional(),
  cacheTtl: z.number().int().positive().optional(),
  maxResponseSize: z.number().int().positive().optional(),
  customTags: z.record(z.string()).optional(),
});

const CacheConfigSchema = z
  .object({
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
    defaultTtl: z.number().int().positive().optional(),
    methods: z.array(HttpMethodSchema).min(1).optional(),
    statusCodes: z.array(z.number().int().min(100).max(599)).min(1).optional(),
    skipCacheHeader: z.string().min(1).optional(),
  })
  .refine((data) => !data.url || /^rediss?:\/\//.test(data.url), {
    message: "Cache 'url' must be a redis:// or rediss:// URL",
    path: ['url'],
  });

const MetricsConfigSchema = z.object({
  enabled: z.boolean().optional(),
  namespace: z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'Metrics namespace must be a valid Prometheus name')
    .optional(),
  subsystem: z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'Metrics subsystem must be a valid Prometheus name')
    .optional(),
});

const LoggerConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  format: z.enum(['json', 'pretty']).optional(),
});

const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  burst: z.number().int().positive().optional(),
});

export const ClientConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  defaults: EndpointDefaultsSchema.optional(),
  cache: CacheConfigSchema.optional(),
  metrics: MetricsConfigSchema.optional(),
  logging: LoggerConfigSchema.optional(),
  rateLimit: RateLimitConfigSchema.optional(),
  keepAlive: z.boolean().optional(),
  appToken: z.string().min(1).optional(),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/**
 * Validate client configuration
 *
 * @returns Validated configuration
 * @throws {ConfigError} With one "path: message" entry per problem
 */
export function validateConfig(config: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid client configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}
