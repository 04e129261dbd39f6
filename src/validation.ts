/**
 * Input validation for crawl submissions
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { BatchCrawlRequest, CrawlRequest } from './types.js';

export const MAX_BATCH_SIZE = 1000;

function isHttpUrl(value: string): boolean {
  try {
    const { protocol, hostname } = new URL(value);
    return (protocol === 'http:' || protocol === 'https:') && hostname.length > 0;
  } catch {
    return false;
  }
}

const httpUrlSchema = z
  .string()
  .trim()
  .refine(isHttpUrl, { message: 'must be an absolute http(s) URL' });

export const prioritySchema = z.enum(['low', 'normal', 'high']);
export const crawlStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed']);

const requestOptionsSchema = z.object({
  priority: prioritySchema.default('normal'),
  maxRetries: z.number().int().min(0).max(10).default(3),
  crawlDelay: z.number().min(0.1).max(60).optional(),
  respectRobotsTxt: z.boolean().default(true),
  userAgent: z.string().trim().min(1).max(500).optional(),
  headers: z.record(z.string(), z.string()).default({}),
});

export const crawlRequestSchema = requestOptionsSchema.extend({
  url: httpUrlSchema,
});

export const batchCrawlRequestSchema = requestOptionsSchema.extend({
  urls: z.array(httpUrlSchema).min(1).max(MAX_BATCH_SIZE),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a single submission and fill in defaults
 */
export function parseCrawlRequest(input: unknown, maxRetryAttempts = 10): CrawlRequest {
  const parsed = crawlRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid crawl request', formatIssues(parsed.error));
  }
  checkRetryLimit(parsed.data.maxRetries, maxRetryAttempts);
  return parsed.data;
}

/**
 * Validate a batch submission and fill in defaults
 */
export function parseBatchCrawlRequest(input: unknown, maxRetryAttempts = 10): BatchCrawlRequest {
  const parsed = batchCrawlRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid batch crawl request', formatIssues(parsed.error));
  }
  checkRetryLimit(parsed.data.maxRetries, maxRetryAttempts);
  return parsed.data;
}

function checkRetryLimit(maxRetries: number, maxRetryAttempts: number): void {
  if (maxRetries > maxRetryAttempts) {
    throw new ValidationError('Invalid crawl request', [
      `maxRetries: must be at most ${maxRetryAttempts}`,
    ]);
  }
}

/**
 * Split a batch into one request per URL
 */
export function expandBatch(batch: BatchCrawlRequest): CrawlRequest[] {
  const { urls, ...options } = batch;
  return urls.map(url => ({ ...options, url }));
}
