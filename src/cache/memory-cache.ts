/**
 * In-process TTL cache
 */

import { KeyedMutex } from '../utils/keyed-mutex.js';
import type { JsonValue, TtlCache } from './cache.js';

interface CacheEntry {
  /** Serialized value, so callers never share references with the store */
  value: string;
  expiresAt: number;
}

export class MemoryCache implements TtlCache {
  private entries: Map<string, CacheEntry> = new Map();
  private locks = new KeyedMutex();
  /** Earliest expiry among held entries, as of the last sweep or write */
  private nextExpiry = Infinity;

  async get(key: string): Promise<unknown> {
    const raw = this.read(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async set(key: string, value: JsonValue, ttlSeconds: number): Promise<void> {
    this.write(key, value, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async update(
    key: string,
    fn: (current: unknown) => JsonValue,
    ttlSeconds: number
  ): Promise<JsonValue> {
    return this.locks.runExclusive(key, async () => {
      const raw = this.read(key);
      const next = fn(raw === undefined ? undefined : JSON.parse(raw));
      this.write(key, next, ttlSeconds);
      return next;
    });
  }

  async close(): Promise<void> {
    this.entries.clear();
    this.nextExpiry = Infinity;
  }

  /**
   * Number of entries held, including expired ones not yet swept
   */
  size(): number {
    return this.entries.size;
  }

  private read(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  private write(key: string, value: JsonValue, ttlSeconds: number): void {
    const now = Date.now();
    if (this.nextExpiry <= now) {
      this.sweep(now);
    }

    const expiresAt = now + ttlSeconds * 1000;
    this.entries.set(key, { value: JSON.stringify(value), expiresAt });
    this.nextExpiry = Math.min(this.nextExpiry, expiresAt);
  }

  private sweep(now: number): void {
    let nextExpiry = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      } else {
        nextExpiry = Math.min(nextExpiry, entry.expiresAt);
      }
    }
    this.nextExpiry = nextExpiry;
  }
}
