import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  configFromEnv,
  createDefaultConfig,
  loadConfig,
  mergeConfig,
  requireSharedCache,
  validateConfig,
} from './config.js';
import { ValidationError } from './errors.js';

describe('configuration', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvestman-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('has valid defaults', () => {
    const config = createDefaultConfig();

    expect(config.crawler.concurrency).toBe(10);
    expect(config.crawler.defaultCrawlDelay).toBe(1.0);
    expect(config.cache.driver).toBe('memory');
    expect(validateConfig(config)).toEqual([]);
  });

  it('reads overrides from the environment', () => {
    const partial = configFromEnv({
      HARVESTMAN_CONCURRENCY: '4',
      HARVESTMAN_CRAWL_DELAY: 'soon',
      HARVESTMAN_RESPECT_ROBOTS: 'false',
      HARVESTMAN_MIN_TOPIC_CONFIDENCE: '0.3',
      REDIS_URL: 'redis://localhost:6379',
      LOG_LEVEL: 'DEBUG',
    });
    const config = mergeConfig(partial);

    expect(config.crawler.concurrency).toBe(4);
    expect(config.crawler.defaultCrawlDelay).toBe(1.0);
    expect(config.crawler.respectRobotsTxt).toBe(false);
    expect(config.classification.minConfidence).toBe(0.3);
    expect(config.cache).toMatchObject({ driver: 'redis', redisUrl: 'redis://localhost:6379' });
    expect(config.logLevel).toBe('debug');
  });

  it('layers file values under environment values', () => {
    const file = path.join(dir, 'harvestman.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ crawler: { concurrency: 3, userAgent: 'FileBot/1.0' }, logLevel: 'warn' })
    );

    const config = loadConfig(file, { HARVESTMAN_USER_AGENT: 'EnvBot/2.0' });

    expect(config.crawler.concurrency).toBe(3);
    expect(config.crawler.userAgent).toBe('EnvBot/2.0');
    expect(config.crawler.requestTimeout).toBe(30000);
    expect(config.logLevel).toBe('warn');
  });

  it('rejects missing and malformed config files', () => {
    const file = path.join(dir, 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ crawler: { concurrency: 'many' } }));

    expect(() => loadConfig(path.join(dir, 'absent.json'), {})).toThrow('Config file not found');
    expect(() => loadConfig(file, {})).toThrow(/Invalid config file .*crawler\.concurrency/);
  });

  it('reports invalid settings', () => {
    const config = createDefaultConfig();
    config.crawler.concurrency = 0;
    config.classification.minConfidence = 1.5;
    config.cache.driver = 'redis';

    expect(validateConfig(config)).toEqual([
      'concurrency must be a positive integer',
      'minConfidence must be between 0 and 1',
      'redisUrl is required for the redis cache driver',
    ]);
  });

  it('refuses cache-only changes without a shared cache', () => {
    const config = createDefaultConfig();

    expect(() => requireSharedCache(config, '--set-delay')).toThrow(ValidationError);
    expect(() => requireSharedCache(config, '--set-delay')).toThrow(
      '--set-delay needs a shared cache: set cache.driver to "redis" (or REDIS_URL) so later runs see the change'
    );

    config.cache = { ...config.cache, driver: 'redis', redisUrl: 'redis://localhost:6379' };
    expect(() => requireSharedCache(config, '--set-delay')).not.toThrow();
  });
});
