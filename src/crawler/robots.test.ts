import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RobotsGate, type RobotsGateOptions } from './robots.js';
import { MemoryCache } from '../cache/index.js';
import { NetworkError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import { BrokenCache, FakeFetcher } from '../testing/index.js';
import type { TtlCache } from '../cache/index.js';

const ORIGIN = 'https://example.com';
const ROBOTS_URL = `${ORIGIN}/robots.txt`;

const options: RobotsGateOptions = {
  userAgent: 'Harvestman/1.0',
  respectRobotsTxt: true,
  robotsCacheTtl: 86400,
  robotsErrorCacheTtl: 300,
};

describe('RobotsGate', () => {
  let cache: TtlCache;
  let fetcher: FakeFetcher;
  let gate: RobotsGate;

  beforeEach(() => {
    cache = new MemoryCache();
    fetcher = new FakeFetcher();
    gate = new RobotsGate(cache, fetcher, options, createSilentLogger());
  });

  it('evaluates disallow rules and caches the policy', async () => {
    fetcher.robots(ORIGIN, 'User-agent: *\nDisallow: /private');

    expect(await gate.canCrawl(`${ORIGIN}/private/x`, '*')).toBe(false);
    expect(await gate.canCrawl(`${ORIGIN}/public/x`, '*')).toBe(true);
    expect(await gate.canCrawl(`${ORIGIN}/private/y`)).toBe(false);
    expect(fetcher.callsTo(ROBOTS_URL)).toHaveLength(1);
  });

  it('applies the group matching the user agent', async () => {
    fetcher.robots(ORIGIN, 'User-agent: Harvestman\nDisallow: /\n\nUser-agent: *\nDisallow:');

    expect(await gate.canCrawl(`${ORIGIN}/page`, 'Harvestman/1.0')).toBe(false);
    expect(await gate.canCrawl(`${ORIGIN}/page`, 'OtherBot/2.0')).toBe(true);
  });

  it('sends its own user agent when fetching robots.txt', async () => {
    await gate.canCrawl(`${ORIGIN}/page`);

    expect(fetcher.callsTo(ROBOTS_URL)[0]?.options.headers).toEqual({
      'User-Agent': 'Harvestman/1.0',
    });
  });

  it('allows everything when robots.txt is missing', async () => {
    expect(await gate.canCrawl(`${ORIGIN}/anything`)).toBe(true);
    expect((await gate.getPolicy(`${ORIGIN}/anything`)).status).toBe('not_found');
  });

  it('allows crawling and caches briefly when robots.txt errors', async () => {
    fetcher.route(ROBOTS_URL, { statusCode: 500 });
    const setSpy = vi.spyOn(cache, 'set');

    expect(await gate.canCrawl(`${ORIGIN}/page`)).toBe(true);
    expect(await gate.canCrawl(`${ORIGIN}/other`)).toBe(true);

    expect(fetcher.callsTo(ROBOTS_URL)).toHaveLength(1);
    expect(setSpy).toHaveBeenCalledWith(
      'robots_txt:example.com',
      expect.objectContaining({ status: 'unavailable' }),
      300
    );
  });

  it('allows crawling when the fetch throws', async () => {
    fetcher.route(ROBOTS_URL, { error: new NetworkError('Request timeout', 'timeout') });

    expect(await gate.canCrawl(`${ORIGIN}/page`)).toBe(true);
    expect(await gate.getCrawlDelay(`${ORIGIN}/page`)).toBeUndefined();
  });

  it('skips robots.txt entirely when disabled', async () => {
    const lenient = new RobotsGate(
      cache,
      fetcher,
      { ...options, respectRobotsTxt: false },
      createSilentLogger()
    );
    fetcher.robots(ORIGIN, 'User-agent: *\nDisallow: /');

    expect(await lenient.canCrawl(`${ORIGIN}/page`)).toBe(true);
    expect(fetcher.calls).toHaveLength(0);
  });

  it('shares one fetch between concurrent lookups', async () => {
    fetcher.route(ROBOTS_URL, {
      headers: { 'content-type': 'text/plain' },
      body: 'User-agent: *\nDisallow: /private',
      latencyMs: 20,
    });

    const results = await Promise.all([
      gate.canCrawl(`${ORIGIN}/a`),
      gate.canCrawl(`${ORIGIN}/private/b`),
      gate.canCrawl(`${ORIGIN}/c`),
    ]);

    expect(results).toEqual([true, false, true]);
    expect(fetcher.callsTo(ROBOTS_URL)).toHaveLength(1);
  });

  it('reads crawl delay and sitemaps', async () => {
    fetcher.robots(
      ORIGIN,
      'User-agent: *\nCrawl-delay: 5\nDisallow:\n\nSitemap: https://example.com/sitemap.xml'
    );

    expect(await gate.getCrawlDelay(`${ORIGIN}/page`)).toBe(5);
    expect(await gate.getSitemaps(`${ORIGIN}/page`)).toEqual(['https://example.com/sitemap.xml']);
  });

  it('refetches after the cached policy is cleared', async () => {
    fetcher.robots(ORIGIN, 'User-agent: *\nDisallow: /private');
    await gate.canCrawl(`${ORIGIN}/page`);

    await gate.clearCache('EXAMPLE.com');
    await gate.canCrawl(`${ORIGIN}/page`);

    expect(fetcher.callsTo(ROBOTS_URL)).toHaveLength(2);
  });

  it('still answers when the cache is unavailable', async () => {
    const uncached = new RobotsGate(new BrokenCache(), fetcher, options, createSilentLogger());
    fetcher.robots(ORIGIN, 'User-agent: *\nDisallow: /private');

    expect(await uncached.canCrawl(`${ORIGIN}/private/x`)).toBe(false);
  });
});
