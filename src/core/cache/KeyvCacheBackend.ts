// src/core/cache/KeyvCacheBackend.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import type { CacheBackend } from '../http/types';

export interface CacheBackendConfig {
  url?: string; // redis:// URL; in-memory when omitted
  namespace?: string;
}

export class KeyvCacheBackend implements CacheBackend {
  private store: Keyv<string>;

  constructor(config: CacheBackendConfig = {}) {
    const namespace = config.namespace ?? 'http-cache';

    if (config.url) {
      this.store = new Keyv<string>({ store: new KeyvRedis(config.url), namespace });
    } else {
      this.store = new Keyv<string>({ namespace }); // Memory
    }
  }

  async get(key: string): Promise<string | undefined> {
    return this.store.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.store.set(key, value, ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key);
  }

  async close(): Promise<void> {
    await this.store.disconnect();
  }
}
