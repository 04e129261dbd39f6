/**
 * Crawler module exports
 */

export { AxiosFetcher, flattenHeaders, toFetchError } from './fetcher.js';
export { RateLimiter, type RateLimiterOptions } from './rate-limiter.js';
export { RobotsGate, type RobotsGateOptions } from './robots.js';
