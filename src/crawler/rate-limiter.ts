/**
 * Domain-aware rate limiter for polite crawling
 */

import { z } from 'zod';
import { rateLimitKey, type TtlCache } from '../cache/index.js';
import { CancelledError, errorMessage } from '../errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { delay } from '../utils/delay.js';
import type { DomainRateState, DomainRateStats, Logger, RateLimitConfig } from '../types.js';

const domainRateStateSchema = z.object({
  domain: z.string(),
  lastRequestTime: z.number(),
  requestCount: z.number().int().nonnegative(),
  crawlDelay: z.number().nonnegative(),
});

interface Reservation {
  /** Epoch ms the caller may start at */
  slot: number;
  crawlDelay: number;
  /** lastRequestTime before the reservation */
  previousTime: number;
}

export interface RateLimiterOptions extends RateLimitConfig {
  /** Delay in seconds used when neither stored state nor the caller names one */
  defaultCrawlDelay: number;
}

/**
 * Enforces a minimum spacing between request starts to the same domain.
 *
 * Each call reserves its start time through the cache's atomic update and
 * then sleeps until it. The reservation is what spaces callers, including
 * limiters in other processes sharing the cache; the per-domain lock only
 * keeps same-process callers in arrival order. Any cache failure is logged
 * and treated as "no prior request".
 */
export class RateLimiter {
  private cache: TtlCache;
  private logger: Logger;
  private options: RateLimiterOptions;
  private locks = new KeyedMutex();

  constructor(cache: TtlCache, options: RateLimiterOptions, logger: Logger) {
    this.cache = cache;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Reserve the domain's next request start and wait for it.
   * @param requestedDelay - seconds the caller asks for
   * @returns the recorded request start, in epoch milliseconds
   */
  async wait(domain: string, requestedDelay?: number, signal?: AbortSignal): Promise<number> {
    if (!this.options.enabled) {
      return Date.now();
    }

    return this.locks.runExclusive(domain, async () => {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      const reservation = await this.reserveSlot(domain, requestedDelay);
      const { slot, crawlDelay } = reservation;
      const waitMs = slot - Date.now();
      if (waitMs > 0) {
        this.logger.info(`Rate limit wait for ${domain}`, { waitMs, crawlDelay });
        try {
          await this.sleepUntil(slot, signal);
        } catch (error) {
          await this.releaseSlot(domain, reservation);
          throw error;
        }
      }
      return slot;
    });
  }

  /**
   * Current statistics for a domain
   */
  async getStats(domain: string): Promise<DomainRateStats> {
    const state = await this.readState(domain);
    if (!state) {
      return {
        domain,
        requestCount: 0,
        crawlDelay: this.options.defaultCrawlDelay,
      };
    }

    return {
      domain,
      requestCount: state.requestCount,
      lastRequestTime: state.lastRequestTime > 0 ? new Date(state.lastRequestTime) : undefined,
      crawlDelay: state.crawlDelay,
    };
  }

  /**
   * Store a delay for the domain that later requests use as their floor
   */
  async setCrawlDelay(domain: string, crawlDelay: number): Promise<void> {
    await this.cache.update(
      rateLimitKey(domain),
      current => {
        const parsed = domainRateStateSchema.safeParse(current);
        const state: DomainRateState = parsed.success
          ? { ...parsed.data, crawlDelay }
          : { domain, lastRequestTime: 0, requestCount: 0, crawlDelay };
        return { ...state };
      },
      this.options.stateTtl
    );

    this.logger.info(`Updated crawl delay for ${domain}`, { crawlDelay });
  }

  /**
   * Whether a request to the domain right now would have to wait
   */
  async isRateLimited(domain: string): Promise<boolean> {
    if (!this.options.enabled) {
      return false;
    }
    const state = await this.readState(domain);
    if (!state) {
      return false;
    }
    return Date.now() - state.lastRequestTime < state.crawlDelay * 1000;
  }

  /**
   * Forget everything known about the domain
   */
  async resetStats(domain: string): Promise<void> {
    await this.cache.delete(rateLimitKey(domain));
    this.logger.info(`Reset rate limit state for ${domain}`);
  }

  /**
   * The stored delay is a floor for the requested one; with neither, the
   * configured default applies.
   */
  private resolveDelay(state: DomainRateState | undefined, requestedDelay?: number): number {
    if (state) {
      return Math.max(state.crawlDelay, requestedDelay ?? 0);
    }
    return requestedDelay ?? this.options.defaultCrawlDelay;
  }

  private async readState(domain: string): Promise<DomainRateState | undefined> {
    try {
      const parsed = domainRateStateSchema.safeParse(await this.cache.get(rateLimitKey(domain)));
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      this.logger.warn(`Could not read rate limit state for ${domain}`, {
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  /**
   * Claim the next start time for the domain inside one atomic update, so
   * limiters sharing the cache from other processes queue behind it.
   */
  private async reserveSlot(domain: string, requestedDelay?: number): Promise<Reservation> {
    let slot = Date.now();
    let previousTime = 0;
    let crawlDelay = requestedDelay ?? this.options.defaultCrawlDelay;
    try {
      await this.cache.update(
        rateLimitKey(domain),
        current => {
          const parsed = domainRateStateSchema.safeParse(current);
          const previous = parsed.success ? parsed.data : undefined;
          const now = Date.now();
          crawlDelay = this.resolveDelay(previous, requestedDelay);
          previousTime = previous?.lastRequestTime ?? 0;
          slot = previous ? Math.max(now, previous.lastRequestTime + crawlDelay * 1000) : now;
          const state: DomainRateState = {
            domain,
            lastRequestTime: slot,
            requestCount: (previous?.requestCount ?? 0) + 1,
            crawlDelay,
          };
          return { ...state };
        },
        this.options.stateTtl
      );
    } catch (error) {
      this.logger.warn(`Could not record request for ${domain}`, {
        error: errorMessage(error),
      });
      slot = Date.now();
    }
    return { slot, crawlDelay, previousTime };
  }

  /**
   * Give back an unused reservation, unless a later caller already queued
   * behind it
   */
  private async releaseSlot(domain: string, reservation: Reservation): Promise<void> {
    try {
      await this.cache.update(
        rateLimitKey(domain),
        current => {
          const parsed = domainRateStateSchema.safeParse(current);
          if (!parsed.success) {
            return null;
          }
          if (parsed.data.lastRequestTime !== reservation.slot) {
            return { ...parsed.data };
          }
          return {
            ...parsed.data,
            lastRequestTime: reservation.previousTime,
            requestCount: Math.max(0, parsed.data.requestCount - 1),
          };
        },
        this.options.stateTtl
      );
    } catch (error) {
      this.logger.warn(`Could not release reservation for ${domain}`, {
        error: errorMessage(error),
      });
    }
  }

  /**
   * Timers may fire a little early relative to Date.now(), so re-check
   */
  private async sleepUntil(deadline: number, signal?: AbortSignal): Promise<void> {
    let remaining = deadline - Date.now();
    while (remaining > 0) {
      await delay(remaining, signal);
      remaining = deadline - Date.now();
    }
  }
}
