/**
 * JSON form of crawl results kept in the TTL cache
 */

import { z } from 'zod';
import type { JsonValue } from '../cache/index.js';
import type { CrawlResult } from '../types.js';

/**
 * Convert a value to plain JSON: dates become ISO strings and undefined
 * properties are dropped.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = toJsonValue(item);
      }
    }
    return result;
  }
  return null;
}

const recordSchema = z.object({
  id: z.string(),
  url: z.string(),
  domain: z.string(),
  status: z.enum(['pending', 'processing', 'completed', 'failed']),
  priority: z.enum(['low', 'normal', 'high']),
  errorMessage: z.string().optional(),
  retryCount: z.number(),
  maxRetries: z.number(),
  batchId: z.string().optional(),
  retryOf: z.string().optional(),
  createdAt: z.coerce.date(),
  startedAt: z.coerce.date().optional(),
  completedAt: z.coerce.date().optional(),
});

const metadataSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  keywords: z.array(z.string()),
  author: z.string().optional(),
  publishedDate: z.coerce.date().optional(),
  canonicalUrl: z.string().optional(),
  language: z.string().optional(),
  contentType: z.string(),
  wordCount: z.number(),
  images: z.array(
    z.object({
      url: z.string(),
      alt: z.string().optional(),
      title: z.string().optional(),
      width: z.number().optional(),
      height: z.number().optional(),
    })
  ),
  links: z.array(
    z.object({
      url: z.string(),
      text: z.string().optional(),
      title: z.string().optional(),
      rel: z.string().optional(),
    })
  ),
  topics: z.array(
    z.object({ topic: z.string(), confidence: z.number(), keywords: z.array(z.string()) })
  ),
  crawledAt: z.coerce.date(),
  responseTimeMs: z.number(),
  statusCode: z.number(),
  contentHash: z.string(),
  headers: z.record(z.string(), z.string()),
});

const resultSchema = z.object({
  record: recordSchema,
  metadata: metadataSchema.optional(),
});

/**
 * Rebuild a cached result; anything malformed reads as a miss
 */
export function parseCachedResult(value: unknown): CrawlResult | undefined {
  const parsed = resultSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}
