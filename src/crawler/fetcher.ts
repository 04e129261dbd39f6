/**
 * HTTP retrieval on top of axios
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import {
  CancelledError,
  ContentTooLargeError,
  NetworkError,
  type NetworkErrorKind,
} from '../errors.js';
import type { Fetcher, FetchOptions, FetchResponse } from '../types.js';

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  'Accept-Encoding': 'gzip, deflate',
};

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT'];
const DNS_CODES = ['ENOTFOUND', 'EAI_AGAIN'];
const CONNECTION_CODES = ['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE'];

/**
 * Fetcher that never throws on HTTP status; only transport problems and the
 * size cap become errors.
 */
export class AxiosFetcher implements Fetcher {
  private http: AxiosInstance;

  constructor(http: AxiosInstance = axios.create()) {
    this.http = http;
  }

  async get(url: string, options: FetchOptions): Promise<FetchResponse> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        headers: { ...DEFAULT_HEADERS, ...options.headers },
        timeout: options.timeoutMs,
        maxContentLength: options.maxBytes,
        maxRedirects: 5,
        responseType: 'arraybuffer',
        signal: options.signal,
        validateStatus: () => true,
      });

      return {
        statusCode: response.status,
        headers: flattenHeaders(response.headers),
        body: Buffer.from(response.data),
      };
    } catch (error) {
      throw toFetchError(error, url, options.maxBytes);
    }
  }
}

/**
 * Normalize header values to lower-cased single strings
 */
export function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}

/**
 * Map an axios failure onto the crawl error taxonomy
 */
export function toFetchError(error: unknown, url: string, maxBytes: number): Error {
  if (axios.isCancel(error)) {
    return new CancelledError();
  }

  if (error instanceof AxiosError) {
    if (error.message.includes('maxContentLength')) {
      return new ContentTooLargeError(maxBytes, url);
    }

    const code = error.code ?? '';
    let kind: NetworkErrorKind = 'unknown';
    if (TIMEOUT_CODES.includes(code) || /timeout/i.test(error.message)) {
      kind = 'timeout';
    } else if (DNS_CODES.includes(code)) {
      kind = 'dns';
    } else if (CONNECTION_CODES.includes(code)) {
      kind = 'connection';
    }

    const message = kind === 'timeout' ? 'Request timeout' : error.message;
    return new NetworkError(message, kind, { url, code });
  }

  return error instanceof Error ? error : new Error(String(error));
}
