/**
 * Cache module exports
 */

import type { CacheConfig, Logger } from '../types.js';
import type { TtlCache } from './cache.js';
import { MemoryCache } from './memory-cache.js';
import { RedisCache } from './redis-cache.js';

export { type TtlCache, type JsonValue, rateLimitKey, robotsTxtKey, crawlResultKey } from './cache.js';
export { MemoryCache } from './memory-cache.js';
export { RedisCache } from './redis-cache.js';

/**
 * Build the cache selected by configuration
 */
export function createCache(config: CacheConfig, logger: Logger): TtlCache {
  if (config.driver === 'redis') {
    if (!config.redisUrl) {
      throw new Error('redisUrl is required for the redis cache driver');
    }
    logger.info('Using Redis cache', { url: config.redisUrl });
    return RedisCache.fromUrl(config.redisUrl, logger);
  }
  return new MemoryCache();
}
