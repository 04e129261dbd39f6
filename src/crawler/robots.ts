/**
 * Robots.txt parser and checker
 */

import robotsParser from 'robots-parser';
import { z } from 'zod';
import { robotsTxtKey, type TtlCache } from '../cache/index.js';
import { errorMessage } from '../errors.js';
import type { CrawlerConfig, Fetcher, Logger, RobotsPolicy } from '../types.js';

type Robots = ReturnType<typeof robotsParser>;

const ROBOTS_FETCH_TIMEOUT = 10000;
const ROBOTS_MAX_BYTES = 512 * 1024;

const robotsPolicySchema = z.object({
  domain: z.string(),
  status: z.enum(['found', 'not_found', 'unavailable']),
  content: z.string().optional(),
  fetchedAt: z.number(),
});

export type RobotsGateOptions = Pick<
  CrawlerConfig,
  'userAgent' | 'respectRobotsTxt' | 'robotsCacheTtl' | 'robotsErrorCacheTtl'
>;

/**
 * Resolves, caches and evaluates robots.txt policies per domain.
 *
 * Lookups fail open: if the file cannot be fetched or understood, crawling is
 * allowed and the problem is logged.
 */
export class RobotsGate {
  private cache: TtlCache;
  private fetcher: Fetcher;
  private options: RobotsGateOptions;
  private logger: Logger;
  /** Fetches in flight, so concurrent lookups for a domain share one request */
  private inflight: Map<string, Promise<RobotsPolicy>> = new Map();

  constructor(cache: TtlCache, fetcher: Fetcher, options: RobotsGateOptions, logger: Logger) {
    this.cache = cache;
    this.fetcher = fetcher;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Checks if a URL may be crawled by the user agent
   */
  async canCrawl(url: string, userAgent: string = this.options.userAgent): Promise<boolean> {
    if (!this.options.respectRobotsTxt) {
      return true;
    }

    try {
      const robots = await this.getParser(url);
      if (!robots) {
        return true;
      }
      return robots.isAllowed(url, userAgent) ?? true;
    } catch (error) {
      this.logger.error(`Robots check failed for ${url}`, { error: errorMessage(error) });
      return true;
    }
  }

  /**
   * Crawl delay in seconds declared for the user agent, if any
   */
  async getCrawlDelay(
    url: string,
    userAgent: string = this.options.userAgent
  ): Promise<number | undefined> {
    if (!this.options.respectRobotsTxt) {
      return undefined;
    }

    try {
      const robots = await this.getParser(url);
      return robots?.getCrawlDelay(userAgent);
    } catch (error) {
      this.logger.error(`Robots crawl delay lookup failed for ${url}`, {
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  /**
   * Sitemap URLs listed in the domain's robots.txt
   */
  async getSitemaps(url: string): Promise<string[]> {
    try {
      const robots = await this.getParser(url);
      return robots ? robots.getSitemaps() : [];
    } catch (error) {
      this.logger.error(`Robots sitemap lookup failed for ${url}`, {
        error: errorMessage(error),
      });
      return [];
    }
  }

  /**
   * Cached or freshly fetched policy for the URL's domain
   */
  async getPolicy(url: string): Promise<RobotsPolicy> {
    const { origin, host } = new URL(url);
    const domain = host.toLowerCase();

    const cached = await this.readCached(domain);
    if (cached) {
      return cached;
    }

    const pending = this.inflight.get(domain);
    if (pending) {
      return pending;
    }

    const fetching = this.fetchAndCache(domain, origin).finally(() => {
      this.inflight.delete(domain);
    });
    this.inflight.set(domain, fetching);
    return fetching;
  }

  /**
   * Drop the cached policy for a domain
   */
  async clearCache(domain: string): Promise<void> {
    await this.cache.delete(robotsTxtKey(domain.toLowerCase()));
    this.logger.info(`Cleared robots.txt cache for ${domain}`);
  }

  private async getParser(url: string): Promise<Robots | null> {
    const policy = await this.getPolicy(url);
    if (policy.status !== 'found' || policy.content === undefined) {
      return null;
    }
    return robotsParser(`${new URL(url).origin}/robots.txt`, policy.content);
  }

  private async readCached(domain: string): Promise<RobotsPolicy | undefined> {
    try {
      const parsed = robotsPolicySchema.safeParse(await this.cache.get(robotsTxtKey(domain)));
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      this.logger.warn(`Could not read cached robots.txt for ${domain}`, {
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private async fetchAndCache(domain: string, origin: string): Promise<RobotsPolicy> {
    const policy = await this.fetchPolicy(domain, `${origin}/robots.txt`);
    const ttl =
      policy.status === 'unavailable'
        ? this.options.robotsErrorCacheTtl
        : this.options.robotsCacheTtl;

    try {
      await this.cache.set(
        robotsTxtKey(domain),
        policy.content !== undefined
          ? { domain, status: policy.status, content: policy.content, fetchedAt: policy.fetchedAt }
          : { domain, status: policy.status, fetchedAt: policy.fetchedAt },
        ttl
      );
    } catch (error) {
      this.logger.warn(`Could not cache robots.txt for ${domain}`, {
        error: errorMessage(error),
      });
    }
    return policy;
  }

  /**
   * Fetches robots.txt for a domain
   */
  private async fetchPolicy(domain: string, robotsUrl: string): Promise<RobotsPolicy> {
    const fetchedAt = Date.now();

    try {
      const response = await this.fetcher.get(robotsUrl, {
        headers: { 'User-Agent': this.options.userAgent },
        timeoutMs: ROBOTS_FETCH_TIMEOUT,
        maxBytes: ROBOTS_MAX_BYTES,
      });

      if (response.statusCode === 200) {
        const content = response.body.toString('utf-8');
        this.logger.debug(`Fetched robots.txt for ${domain}`, { size: content.length });
        return { domain, status: 'found', content, fetchedAt };
      }

      if (response.statusCode === 404) {
        this.logger.debug(`No robots.txt found for ${domain}`);
        return { domain, status: 'not_found', fetchedAt };
      }

      this.logger.warn(`Unexpected robots.txt status for ${domain}`, {
        status: response.statusCode,
      });
      return { domain, status: 'unavailable', fetchedAt };
    } catch (error) {
      this.logger.warn(`Failed to fetch robots.txt for ${domain}`, {
        error: errorMessage(error),
      });
      return { domain, status: 'unavailable', fetchedAt };
    }
  }
}
