/**
 * Storage module exports
 */

export { CrawlStore, type NewCrawlRecord } from './database.js';
export { toJsonValue, parseCachedResult } from './result-codec.js';
