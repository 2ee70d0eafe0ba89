// src/core/http/PolicyResolver.ts

import type { EndpointConfig, EndpointPolicy, EndpointSettings, HttpHeaders, HttpMethod } from './types';
import type { Logger } from '../../observability/Logger';
import { CircuitBreaker } from './CircuitBreaker';
import { constantBackoff, defaultShouldRetry } from './RetryHandler';
import { normalizeHeaders } from '../../utils/headers';

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_MAX_RETRIES = 2;

/**
 * Produces the EndpointPolicy for one call: the endpoint override merged over
 * the client defaults, then structural defaults for whatever is still unset.
 * Never fails; missing configuration degrades to defaults.
 */
export class PolicyResolver {
  private defaults: EndpointSettings;

  constructor(
    defaults: EndpointSettings = {},
    private endpointConfig?: EndpointConfig,
    private logger?: Logger
  ) {
    this.defaults = { ...defaults, headers: normalizeHeaders(defaults.headers) };
  }

  resolve(method: HttpMethod, path: string): Readonly<EndpointPolicy> {
    const routePath = stripQuery(path);
    const override = this.endpointConfig?.(method, routePath);

    const settings =
      override && !isEmptySettings(override) ? mergeSettings(this.defaults, override) : this.defaults;
    return Object.freeze(this.applyDefaults(settings, routePath));
  }

  private applyDefaults(settings: EndpointSettings, path: string): EndpointPolicy {
    const timeout = settings.timeout !== undefined && settings.timeout > 0 ? settings.timeout : undefined;
    if (timeout === undefined) {
      this.logger?.debug('Endpoint timeout not set, using default', { path, timeout: DEFAULT_TIMEOUT_MS });
    }

    let breaker = settings.breaker;
    if (!breaker) {
      // Lives for this call only, so in practice it never opens
      breaker = new CircuitBreaker({ name: `${process.env.APP_NAME ?? 'http'}-breaker` });
    }

    return {
      ...settings,
      timeout: timeout ?? DEFAULT_TIMEOUT_MS,
      maxRetries: settings.maxRetries ?? DEFAULT_MAX_RETRIES,
      shouldRetry: settings.shouldRetry ?? defaultShouldRetry,
      backoff: settings.backoff ?? constantBackoff(),
      headers: { ...(settings.headers ?? {}) },
      requireAuth: settings.requireAuth ?? false,
      breaker,
      enableCache: settings.enableCache ?? false,
      customTags: { ...(settings.customTags ?? {}) },
    };
  }
}

/** Override fields win; header and tag maps are merged key by key. */
export function mergeSettings(defaults: EndpointSettings, override: EndpointSettings): EndpointSettings {
  const merged: EndpointSettings = { ...defaults };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  merged.headers = mergeMaps(
    defaults.headers && normalizeHeaders(defaults.headers),
    override.headers && normalizeHeaders(override.headers)
  );
  merged.customTags = mergeMaps(defaults.customTags, override.customTags);
  return merged;
}

function mergeMaps(base?: HttpHeaders, override?: HttpHeaders): HttpHeaders | undefined {
  if (!base && !override) return undefined;
  return { ...(base ?? {}), ...(override ?? {}) };
}

function isEmptySettings(settings: EndpointSettings): boolean {
  return Object.values(settings).every((value) => value === undefined);
}

function stripQuery(path: string): string {
  const index = path.search(/[?#]/);
  return index === -1 ? path : path.slice(0, index);
}
