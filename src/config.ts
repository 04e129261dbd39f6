/**
 * Configuration loading and defaults
 */

import fs from 'fs';
import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type {
  HarvestmanConfig,
  CrawlerConfig,
  RateLimitConfig,
  ClassificationConfig,
  CacheConfig,
  StorageConfig,
} from './types.js';

// Load environment variables
dotenvConfig();

/**
 * Default crawler configuration
 */
export const DEFAULT_CRAWLER_CONFIG: CrawlerConfig = {
  userAgent: 'Harvestman/1.0 (+https://example.com/harvestman-bot)',
  concurrency: 10,
  defaultCrawlDelay: 1.0,
  maxRetryAttempts: 3,
  requestTimeout: 30000,
  maxContentSize: 10 * 1024 * 1024, // 10MB
  respectRobotsTxt: true,
  robotsCacheTtl: 86400, // 24 hours
  robotsErrorCacheTtl: 300,
};

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  enabled: true,
  stateTtl: 3600,
};

export const DEFAULT_CLASSIFICATION_CONFIG: ClassificationConfig = {
  enabled: true,
  minConfidence: 0.5,
  maxTopics: 10,
};

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  driver: 'memory',
  redisUrl: undefined,
  resultTtl: 3600,
};

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  dbPath: path.join(process.cwd(), 'data', 'harvestman.db'),
};

/**
 * Create default configuration
 */
export function createDefaultConfig(): HarvestmanConfig {
  return {
    crawler: { ...DEFAULT_CRAWLER_CONFIG },
    rateLimit: { ...DEFAULT_RATE_LIMIT_CONFIG },
    classification: { ...DEFAULT_CLASSIFICATION_CONFIG },
    cache: { ...DEFAULT_CACHE_CONFIG },
    storage: { ...DEFAULT_STORAGE_CONFIG },
    logLevel: 'info',
  };
}

/**
 * Shape accepted from config files and overrides
 */
export const partialConfigSchema = z.object({
  crawler: z
    .object({
      userAgent: z.string(),
      concurrency: z.number(),
      defaultCrawlDelay: z.number(),
      maxRetryAttempts: z.number(),
      requestTimeout: z.number(),
      maxContentSize: z.number(),
      respectRobotsTxt: z.boolean(),
      robotsCacheTtl: z.number(),
      robotsErrorCacheTtl: z.number(),
    })
    .partial()
    .optional(),
  rateLimit: z
    .object({ enabled: z.boolean(), stateTtl: z.number() })
    .partial()
    .optional(),
  classification: z
    .object({ enabled: z.boolean(), minConfidence: z.number(), maxTopics: z.number() })
    .partial()
    .optional(),
  cache: z
    .object({
      driver: z.enum(['memory', 'redis']),
      redisUrl: z.string(),
      resultTtl: z.number(),
    })
    .partial()
    .optional(),
  storage: z.object({ dbPath: z.string() }).partial().optional(),
  logLevel: z.string().optional(),
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Load configuration from a JSON file
 */
export function loadConfigFromFile(configPath: string): PartialConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to load config from ${configPath}: ${error}`);
  }

  const result = partialConfigSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid config file ${configPath}: ${issues.join('; ')}`);
  }
  return result.data;
}

function parseNumericEnv(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/** Assign only values that are present so they don't shadow defaults */
function setIfDefined<T, K extends keyof T>(
  target: Partial<T>,
  key: K,
  value: T[K] | undefined
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Read overrides from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const crawler: Partial<CrawlerConfig> = {};
  setIfDefined(crawler, 'userAgent', env['HARVESTMAN_USER_AGENT'] || undefined);
  setIfDefined(crawler, 'concurrency', parseNumericEnv(env['HARVESTMAN_CONCURRENCY']));
  setIfDefined(crawler, 'defaultCrawlDelay', parseNumericEnv(env['HARVESTMAN_CRAWL_DELAY']));
  setIfDefined(crawler, 'maxRetryAttempts', parseNumericEnv(env['HARVESTMAN_MAX_RETRIES']));
  setIfDefined(crawler, 'requestTimeout', parseNumericEnv(env['HARVESTMAN_REQUEST_TIMEOUT']));
  setIfDefined(crawler, 'maxContentSize', parseNumericEnv(env['HARVESTMAN_MAX_CONTENT_SIZE']));
  setIfDefined(crawler, 'respectRobotsTxt', parseBooleanEnv(env['HARVESTMAN_RESPECT_ROBOTS']));
  setIfDefined(crawler, 'robotsCacheTtl', parseNumericEnv(env['HARVESTMAN_ROBOTS_CACHE_TTL']));

  const rateLimit: Partial<RateLimitConfig> = {};
  setIfDefined(rateLimit, 'enabled', parseBooleanEnv(env['HARVESTMAN_RATE_LIMIT_ENABLED']));

  const classification: Partial<ClassificationConfig> = {};
  setIfDefined(classification, 'enabled', parseBooleanEnv(env['HARVESTMAN_TOPICS_ENABLED']));
  setIfDefined(
    classification,
    'minConfidence',
    parseNumericEnv(env['HARVESTMAN_MIN_TOPIC_CONFIDENCE'])
  );
  setIfDefined(classification, 'maxTopics', parseNumericEnv(env['HARVESTMAN_MAX_TOPICS']));

  const cache: Partial<CacheConfig> = {};
  const redisUrl = env['REDIS_URL'];
  if (redisUrl) {
    cache.driver = 'redis';
    cache.redisUrl = redisUrl;
  }

  const storage: Partial<StorageConfig> = {};
  setIfDefined(storage, 'dbPath', env['HARVESTMAN_DB_PATH'] || undefined);

  const partial: PartialConfig = { crawler, rateLimit, classification, cache, storage };
  const logLevel = env['LOG_LEVEL'];
  if (logLevel) {
    partial.logLevel = logLevel.toLowerCase();
  }
  return partial;
}

/**
 * Merge configurations with defaults
 */
export function mergeConfig(
  partial: PartialConfig,
  defaults: HarvestmanConfig = createDefaultConfig()
): HarvestmanConfig {
  return {
    crawler: {
      ...defaults.crawler,
      ...partial.crawler,
    },
    rateLimit: {
      ...defaults.rateLimit,
      ...partial.rateLimit,
    },
    classification: {
      ...defaults.classification,
      ...partial.classification,
    },
    cache: {
      ...defaults.cache,
      ...partial.cache,
    },
    storage: {
      ...defaults.storage,
      ...partial.storage,
    },
    logLevel: partial.logLevel ?? defaults.logLevel,
  };
}

/**
 * Load and merge configuration: defaults, then file, then environment
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): HarvestmanConfig {
  let config = createDefaultConfig();

  const filePath = configPath ?? path.join(process.cwd(), 'config', 'harvestman.json');
  if (configPath && !fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  if (fs.existsSync(filePath)) {
    config = mergeConfig(loadConfigFromFile(filePath), config);
  }

  return mergeConfig(configFromEnv(env), config);
}

/**
 * State written to an in-process cache is gone when the process exits, so
 * commands that only change cached state need the redis driver.
 */
export function requireSharedCache(config: HarvestmanConfig, action: string): void {
  if (config.cache.driver !== 'redis') {
    throw new ValidationError(`${action} needs a shared cache`, [
      'set cache.driver to "redis" (or REDIS_URL) so later runs see the change',
    ]);
  }
}

/**
 * Validate configuration
 */
export function validateConfig(config: HarvestmanConfig): string[] {
  const errors: string[] = [];
  const { crawler, rateLimit, classification, cache } = config;

  if (!crawler.userAgent.trim()) {
    errors.push('userAgent must not be empty');
  }
  if (!Number.isInteger(crawler.concurrency) || crawler.concurrency < 1) {
    errors.push('concurrency must be a positive integer');
  }
  if (crawler.defaultCrawlDelay < 0) {
    errors.push('defaultCrawlDelay must be non-negative');
  }
  if (crawler.maxRetryAttempts < 0 || crawler.maxRetryAttempts > 10) {
    errors.push('maxRetryAttempts must be between 0 and 10');
  }
  if (crawler.requestTimeout < 1000) {
    errors.push('requestTimeout must be at least 1000ms');
  }
  if (crawler.maxContentSize < 1024) {
    errors.push('maxContentSize must be at least 1024 bytes');
  }
  if (crawler.robotsCacheTtl < 1 || crawler.robotsErrorCacheTtl < 1) {
    errors.push('robots cache TTLs must be at least 1 second');
  }
  if (rateLimit.stateTtl < 1) {
    errors.push('rateLimit.stateTtl must be at least 1 second');
  }
  if (classification.minConfidence < 0 || classification.minConfidence > 1) {
    errors.push('minConfidence must be between 0 and 1');
  }
  if (!Number.isInteger(classification.maxTopics) || classification.maxTopics < 1) {
    errors.push('maxTopics must be a positive integer');
  }
  if (!['memory', 'redis'].includes(cache.driver)) {
    errors.push(`Unknown cache driver: ${cache.driver}`);
  }
  if (cache.driver === 'redis' && !cache.redisUrl) {
    errors.push('redisUrl is required for the redis cache driver');
  }
  if (cache.resultTtl < 1) {
    errors.push('cache.resultTtl must be at least 1 second');
  }

  return errors;
}
