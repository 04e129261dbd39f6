/**
 * Redis-backed TTL cache for sharing rate and robots state across processes
 */

import { Redis } from 'ioredis';
import { CacheError } from '../errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import type { Logger } from '../types.js';
import type { JsonValue, TtlCache } from './cache.js';

const MAX_UPDATE_ATTEMPTS = 10;

export class RedisCache implements TtlCache {
  private client: Redis;
  private logger: Logger;
  // WATCH state belongs to a connection, so each transaction borrows its own
  private idle: Redis[] = [];
  private transactions = new KeyedMutex();

  constructor(client: Redis, logger: Logger) {
    this.client = client;
    this.logger = logger;

    this.client.on('error', (error: Error) => {
      this.logger.warn('Redis connection error', { error: error.message });
    });
  }

  /**
   * Create a cache from a redis:// URL
   */
  static fromUrl(url: string, logger: Logger): RedisCache {
    const client = new Redis(url, {
      maxRetriesPerRequest: 2,
      connectTimeout: 5000,
      retryStrategy: (times: number) => Math.min(times * 200, 5000),
    });
    return new RedisCache(client, logger);
  }

  async get(key: string): Promise<unknown> {
    const raw = await this.client.get(key);
    return raw === null ? undefined : JSON.parse(raw);
  }

  async set(key: string, value: JsonValue, ttlSeconds: number): Promise<void> {
    await this.client.set(key, JSON.stringify(value), 'EX', toSeconds(ttlSeconds));
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  async update(
    key: string,
    fn: (current: unknown) => JsonValue,
    ttlSeconds: number
  ): Promise<JsonValue> {
    return this.transactions.runExclusive(key, async () => {
      const connection = this.borrow();
      try {
        const next = await this.compareAndSwap(connection, key, fn, ttlSeconds);
        this.idle.push(connection);
        return next;
      } catch (error) {
        connection.disconnect();
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    const connections = this.idle.splice(0);
    await Promise.all([this.client.quit(), ...connections.map(connection => connection.quit())]);
  }

  private borrow(): Redis {
    const pooled = this.idle.pop();
    if (pooled) {
      return pooled;
    }
    const connection = this.client.duplicate();
    connection.on('error', (error: Error) => {
      this.logger.warn('Redis transaction connection error', { error: error.message });
    });
    return connection;
  }

  private async compareAndSwap(
    connection: Redis,
    key: string,
    fn: (current: unknown) => JsonValue,
    ttlSeconds: number
  ): Promise<JsonValue> {
    for (let attempt = 1; attempt <= MAX_UPDATE_ATTEMPTS; attempt++) {
      await connection.watch(key);
      const raw = await connection.get(key);
      const next = fn(raw === null ? undefined : JSON.parse(raw));

      const result = await connection
        .multi()
        .set(key, JSON.stringify(next), 'EX', toSeconds(ttlSeconds))
        .exec();

      if (result !== null) {
        return next;
      }
      this.logger.debug('Cache update contended, retrying', { key, attempt });
    }
    throw new CacheError(`Could not update ${key} after ${MAX_UPDATE_ATTEMPTS} attempts`, { key });
  }
}

/** Redis EX takes whole seconds */
function toSeconds(ttlSeconds: number): number {
  return Math.max(1, Math.ceil(ttlSeconds));
}
