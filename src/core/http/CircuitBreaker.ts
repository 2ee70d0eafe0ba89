// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';
import type { Breaker } from './types';
import { CircuitBreakerOpenError } from '../../utils/errors';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name?: string;
  failureThreshold?: number; // consecutive failures that trip the breaker
  resetTimeout?: number; // ms spent open before probing
  halfOpenMaxRequests?: number; // probes allowed, and successes needed to close
  interval?: number; // ms after which closed-state counts reset; 0 keeps them
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export class CircuitBreaker implements Breaker {
  readonly name: string;
  private state: CircuitState = 'closed';
  private generation = 0;
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private halfOpenRequests = 0;
  private openedAt = 0;
  private windowStartedAt = Date.now();
  private threshold: number;
  private resetTimeout: number;
  private halfOpenMaxRequests: number;
  private interval: number;

  constructor(
    private options: CircuitBreakerOptions = {},
    private logger?: Logger
  ) {
    this.name = options.name ?? 'http-breaker';
    this.threshold = options.failureThreshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000; // 1 minute
    this.halfOpenMaxRequests = options.halfOpenMaxRequests ?? 1;
    this.interval = options.interval ?? 0;
  }

  get currentState(): CircuitState {
    this.refresh(Date.now());
    return this.state;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const generation = this.beforeRequest();

    try {
      const result = await operation();
      this.afterRequest(generation, true);
      return result;
    } catch (error) {
      this.afterRequest(generation, false);
      throw error;
    }
  }

  private beforeRequest(): number {
    const now = Date.now();
    this.refresh(now);

    if (this.state === 'open') {
      this.logger?.warn('Circuit breaker open', { breaker: this.name, failures: this.consecutiveFailures });
      throw new CircuitBreakerOpenError(`Circuit breaker ${this.name} is open`, { breaker: this.name });
    }
    if (this.state === 'half-open') {
      if (this.halfOpenRequests >= this.halfOpenMaxRequests) {
        throw new CircuitBreakerOpenError(`Circuit breaker ${this.name} is half-open and at capacity`, {
          breaker: this.name,
        });
      }
      this.halfOpenRequests++;
    }
    return this.generation;
  }

  private afterRequest(generation: number, success: boolean): void {
    const now = Date.now();
    this.refresh(now);
    // Outcomes of calls admitted under an earlier state are ignored
    if (generation !== this.generation) return;

    if (success) {
      this.consecutiveFailures = 0;
      this.consecutiveSuccesses++;
      if (this.state === 'half-open' && this.consecutiveSuccesses >= this.halfOpenMaxRequests) {
        this.transition('closed', now);
      }
      return;
    }

    this.consecutiveSuccesses = 0;
    this.consecutiveFailures++;
    if (this.state === 'half-open' || this.consecutiveFailures >= this.threshold) {
      this.transition('open', now);
    }
  }

  private refresh(now: number): void {
    if (this.state === 'open' && now - this.openedAt >= this.resetTimeout) {
      this.transition('half-open', now);
    } else if (this.state === 'closed' && this.interval > 0 && now - this.windowStartedAt >= this.interval) {
      this.resetCounts(now);
    }
  }

  private transition(to: CircuitState, now: number): void {
    const from = this.state;
    if (from === to) return;

    this.state = to;
    this.generation++;
    this.resetCounts(now);
    if (to === 'open') {
      this.openedAt = now;
    }

    this.logger?.warn('Circuit breaker state change', { breaker: this.name, from, to });
    this.options.onStateChange?.(this.name, from, to);
  }

  private resetCounts(now: number): void {
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.halfOpenRequests = 0;
    this.windowStartedAt = now;
  }
}
