import type { Fetcher, FetchOptions, FetchResponse } from '../types.js';
import { delay } from '../utils/delay.js';

export interface FakeRoute {
  statusCode?: number;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Milliseconds before the response arrives */
  latencyMs?: number;
  /** Thrown instead of responding */
  error?: Error;
}

export interface FetchCall {
  url: string;
  options: FetchOptions;
  startedAt: number;
}

/**
 * In-process Fetcher. Unrouted URLs answer 404 with an empty body.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: FetchCall[] = [];
  maxInFlight = 0;
  private inFlight = 0;
  private routes: Map<string, FakeRoute> = new Map();

  route(url: string, route: FakeRoute): this {
    this.routes.set(url, route);
    return this;
  }

  html(url: string, body: string, route: Omit<FakeRoute, 'body'> = {}): this {
    return this.route(url, {
      ...route,
      headers: { 'content-type': 'text/html; charset=utf-8', ...route.headers },
      body,
    });
  }

  robots(origin: string, content: string): this {
    return this.route(`${origin}/robots.txt`, {
      headers: { 'content-type': 'text/plain' },
      body: content,
    });
  }

  callsTo(url: string): FetchCall[] {
    return this.calls.filter(call => call.url === url);
  }

  async get(url: string, options: FetchOptions): Promise<FetchResponse> {
    this.calls.push({ url, options, startedAt: Date.now() });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const route = this.routes.get(url);
      if (!route) {
        return { statusCode: 404, headers: {}, body: Buffer.alloc(0) };
      }
      if (route.latencyMs) {
        await delay(route.latencyMs, options.signal);
      }
      if (route.error) {
        throw route.error;
      }

      const body =
        typeof route.body === 'string' ? Buffer.from(route.body, 'utf-8') : (route.body ?? Buffer.alloc(0));
      return { statusCode: route.statusCode ?? 200, headers: route.headers ?? {}, body };
    } finally {
      this.inFlight -= 1;
    }
  }
}
