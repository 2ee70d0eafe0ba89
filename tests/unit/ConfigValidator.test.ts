// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import { validateConfig, validateConfigSafe } from '../../src/config/ConfigValidator';
import { ConfigError } from '../../src/utils/errors';

describe('ConfigValidator', () => {
  const validConfig = {
    baseUrl: 'https://api.example.test',
    defaults: {
      timeout: 5000,
      maxRetries: 3,
      headers: { Accept: 'application/json' },
      requireAuth: true,
    },
    cache: {
      url: 'redis://localhost:6379',
      defaultTtl: 30000,
      methods: ['GET' as const],
      statusCodes: [200, 203],
    },
    metrics: { namespace: 'orders', subsystem: 'upstream' },
    logging: { level: 'error' as const },
    rateLimit: { qps: 10, burst: 20 },
  };

  it('should validate correct configuration', () => {
    const validated = validateConfig(validConfig);
    expect(validated).toEqual(validConfig);
  });

  it('should accept an empty configuration', () => {
    expect(validateConfig({})).toEqual({});
  });

  it('should reject a malformed base URL', () => {
    expect(() => validateConfig({ baseUrl: 'not a url' })).toThrow(ConfigError);
  });

  it('should reject non-redis cache URLs', () => {
    const invalid = { ...validConfig, cache: { url: 'postgres://localhost/db' } };
    expect(() => validateConfig(invalid)).toThrow(
      "Invalid client configuration: cache.url: Cache 'url' must be a redis:// or rediss:// URL"
    );
  });

  it('should reject more than 10 retries', () => {
    const invalid = { ...validConfig, defaults: { maxRetries: 11 } };
    expect(() => validateConfig(invalid)).toThrow(/defaults\.maxRetries/);
  });

  it('should reject metric names Prometheus would refuse', () => {
    const invalid = { ...validConfig, metrics: { namespace: 'orders-api' } };
    expect(() => validateConfig(invalid)).toThrow(/Metrics namespace must be a valid Prometheus name/);
  });

  it('should reject a non-positive rate', () => {
    const invalid = { ...validConfig, rateLimit: { qps: 0 } };
    expect(() => validateConfig(invalid)).toThrow(/rateLimit\.qps/);
  });

  it('should collect every issue on the error', () => {
    try {
      validateConfig({ baseUrl: 'nope', defaults: { timeout: -1 } });
      throw new Error('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        issues: [expect.stringMatching(/^baseUrl: /), expect.stringMatching(/^defaults\.timeout: /)],
      });
    }
  });

  describe('validateConfigSafe', () => {
    it('should return success for valid config', () => {
      const result = validateConfigSafe(validConfig);
      expect(result.success).toBe(true);
    });

    it('should return errors for invalid config', () => {
      const result = validateConfigSafe({ logging: { level: 'verbose' } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]).toMatch(/^logging\.level: /);
      }
    });
  });
});
