/**
 * Generic TTL key-value store shared by the rate limiter, the robots gate and
 * result caching. Values are JSON; readers validate what they get back.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface TtlCache {
  get(key: string): Promise<unknown>;
  set(key: string, value: JsonValue, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /**
   * Atomically replace the value at `key` with `fn(current)`. `current` is
   * undefined when the key is absent or expired. Returns the stored value.
   */
  update(
    key: string,
    fn: (current: unknown) => JsonValue,
    ttlSeconds: number
  ): Promise<JsonValue>;
  close(): Promise<void>;
}

export function rateLimitKey(domain: string): string {
  return `rate_limit:${domain}`;
}

export function robotsTxtKey(domain: string): string {
  return `robots_txt:${domain}`;
}

export function crawlResultKey(recordId: string): string {
  return `crawl_result:${recordId}`;
}
