// src/core/http/QueueRateLimiter.ts

import PQueue from 'p-queue';
import type { RateLimiter } from './types';
import type { Logger } from '../../observability/Logger';
import { RateLimitWaitError } from '../../utils/errors';
import { sleep } from '../../utils/signals';

export interface RateLimitConfig {
  qps: number; // Queries per second
  burst?: number; // Bucket capacity; defaults to floor(qps), at least 1
}

/**
 * Token bucket holding `burst` tokens, refilled at `qps` tokens per second.
 * Waiters are admitted in FIFO order through a single-slot p-queue; a waiter
 * whose signal aborts leaves the line without taking a token.
 */
export class QueueRateLimiter implements RateLimiter {
  private queue = new PQueue({ concurrency: 1 });
  private readonly qps: number;
  private readonly capacity: number;
  private tokens: number;
  private lastRefill: number;

  constructor(config: RateLimitConfig, logger?: Logger) {
    this.qps = config.qps;
    this.capacity = config.burst ?? Math.max(1, Math.floor(config.qps));
    this.tokens = this.capacity;
    this.lastRefill = Date.now();

    logger?.debug('Rate limiter initialized', {
      qps: this.qps,
      burst: this.capacity,
    });
  }

  /** Waiters not yet admitted */
  get size(): number {
    return this.queue.size + this.queue.pending;
  }

  /** Tokens currently in the bucket */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  async wait(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw new RateLimitWaitError(undefined, undefined, signal.reason);
    }

    const admitted = this.queue.add(() => this.take(signal));

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        reject(new RateLimitWaitError(undefined, { queued: this.size }, signal.reason));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      admitted.then(
        (took) => {
          signal.removeEventListener('abort', onAbort);
          if (took === true) {
            resolve();
          } else {
            reject(new RateLimitWaitError(undefined, undefined, signal.reason));
          }
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(new RateLimitWaitError('Rate limiter failed', undefined, error));
        }
      );
    });
  }

  /** Resolves true once a token is taken, false if the signal aborts first. */
  private async take(signal: AbortSignal): Promise<boolean> {
    while (!signal.aborted) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return true;
      }

      const delay = Math.ceil(((1 - this.tokens) * 1000) / this.qps);
      try {
        await sleep(delay, signal);
      } catch {
        return false; // aborted while waiting for the next token
      }
    }
    return false;
  }

  private refill(): void {
    const now = Date.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.qps);
      this.lastRefill = now;
    }
  }
}
