import Redis from 'ioredis';
import type { CacheStore, Logger } from '@libs/http-client-core';

export class InMemoryCacheStore implements CacheStore {
  private store = new Map<string, { value: string; expiresAt?: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | undefined> {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const expiresAt = ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : undefined;
    this.store.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  get size(): number {
    return this.store.size;
  }
}

/** The subset of the ioredis client the cache store talks to. */
export type RedisCommands = Pick<Redis, 'get' | 'setex' | 'del' | 'quit'>;

export interface RedisCacheStoreOptions {
  namespace?: string;
  failOpen?: boolean;
  logger?: Logger;
}

export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
}

/**
 * Redis-backed {@link CacheStore}. Keys are namespaced; in fail-open mode (the
 * default) Redis errors are logged and treated as cache misses.
 */
export class RedisCacheStore implements CacheStore {
  private readonly namespace: string;
  private readonly failOpen: boolean;
  private readonly logger?: Logger;

  constructor(
    private readonly client: RedisCommands,
    options: RedisCacheStoreOptions = {},
  ) {
    this.namespace = options.namespace ?? 'crossref';
    this.failOpen = options.failOpen ?? true;
    this.logger = options.logger;
  }

  private getKey(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async get(key: string): Promise<string | undefined> {
    try {
      const raw = await this.client.get(this.getKey(key));
      return raw ?? undefined;
    } catch (err) {
      this.report('get', key, err);
      return undefined;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.client.setex(this.getKey(key), Math.max(1, Math.ceil(ttlSeconds)), value);
    } catch (err) {
      this.report('set', key, err);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.del(this.getKey(key));
    } catch (err) {
      this.report('delete', key, err);
    }
  }

  /** Closes the Redis connection. */
  async disconnect(): Promise<void> {
    await this.client.quit();
  }

  private report(operation: string, key: string, err: unknown): void {
    this.logger?.warn?.(`crossref.redis.${operation}.error`, {
      key: this.getKey(key),
      error: err instanceof Error ? err.message : err,
    });
    if (!this.failOpen) {
      throw err;
    }
  }
}

/**
 * Connects lazily with fail-fast settings: commands error out instead of
 * queueing while Redis is unreachable.
 */
export function createRedisClient(config: RedisConnectionConfig, logger?: Logger): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    lazyConnect: true,
    maxRetriesPerRequest: 2,
    enableOfflineQueue: false,
    connectTimeout: 5000,
    commandTimeout: 2000,
    retryStrategy: (times: number) => {
      if (times > 3) {
        logger?.warn?.('crossref.redis.retries_exhausted', { attempts: times });
        return null;
      }
      return Math.min(times * 50, 2000);
    },
  });

  client.on('error', (err: Error) => {
    logger?.warn?.('crossref.redis.error', { error: err.message });
  });

  client.connect().catch((err: unknown) => {
    logger?.warn?.('crossref.redis.connect_failed', {
      error: err instanceof Error ? err.message : err,
    });
  });

  return client;
}
