// src/observability/MetricsCollector.ts

import { register, Counter, Histogram } from 'prom-client';
import type { Registry } from 'prom-client';
import type { Logger } from './Logger';
import { ConfigError } from '../utils/errors';

export interface MetricsConfig {
  enabled?: boolean;
  namespace?: string;
  subsystem?: string;
  registry?: Registry;
}

/**
 * Thin layer over a prom-client registry. Descriptors are looked up by name
 * before being created, so building several clients against the same
 * registry and namespace reuses the metrics instead of failing.
 */
export class MetricsCollector {
  readonly registry: Registry;
  readonly enabled: boolean;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = config.registry ?? register;
    this.enabled = config.enabled !== false;
  }

  counter(name: string, help: string, labelNames: readonly string[]): Counter<string> {
    const existing = this.registry.getSingleMetric(name);
    if (existing instanceof Counter) {
      assertSameLabels(name, existing, labelNames);
      return existing;
    }
    if (existing) {
      throw new ConfigError(`Metric ${name} is already registered with a different type`);
    }

    this.logger?.debug('Registering counter', { name });
    return new Counter({ name, help, labelNames, registers: [this.registry] });
  }

  histogram(
    name: string,
    help: string,
    labelNames: readonly string[],
    buckets: number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10]
  ): Histogram<string> {
    const existing = this.registry.getSingleMetric(name);
    if (existing instanceof Histogram) {
      assertSameLabels(name, existing, labelNames);
      return existing;
    }
    if (existing) {
      throw new ConfigError(`Metric ${name} is already registered with a different type`);
    }

    this.logger?.debug('Registering histogram', { name });
    return new Histogram({ name, help, labelNames, buckets, registers: [this.registry] });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}

function assertSameLabels(name: string, metric: object, labelNames: readonly string[]): void {
  const registered = 'labelNames' in metric && Array.isArray(metric.labelNames) ? metric.labelNames : [];
  const expected = [...labelNames].sort().join(',');
  const actual = registered.map(String).sort().join(',');
  if (actual !== expected) {
    throw new ConfigError(`Metric ${name} is already registered with labels [${actual}], not [${expected}]`);
  }
}

/** Prometheus-style full name: namespace_subsystem_name, skipping empty parts. */
export function metricName(namespace: string | undefined, subsystem: string | undefined, name: string): string {
  return [namespace, subsystem, name].filter((part) => part && part.length > 0).join('_');
}
