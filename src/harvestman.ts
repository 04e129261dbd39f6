/**
 * Harvestman - Main orchestrator class
 *
 * Sequences the robots gate, rate limiter, fetcher, extractor, classifier and
 * store for single and batch submissions under a bounded concurrency gate.
 */

import { createHash, randomUUID } from 'crypto';
import type {
  BatchSubmission,
  BatchSummary,
  CrawlHistoryEntry,
  CrawlRecord,
  CrawlRequest,
  CrawlResult,
  DomainStats,
  Fetcher,
  HarvestmanConfig,
  HarvestmanStats,
  HistoryStatus,
  ListResultsQuery,
  Logger,
  PageMetadata,
} from './types.js';
import { createCache, crawlResultKey, type TtlCache } from './cache/index.js';
import { AxiosFetcher, RateLimiter, RobotsGate } from './crawler/index.js';
import { extractMetadata, loadDocument, TopicClassifier } from './processors/index.js';
import { CrawlStore, parseCachedResult, toJsonValue } from './storage/index.js';
import { JobQueue } from './queue/index.js';
import {
  CancelledError,
  ContentTooLargeError,
  HarvestmanError,
  HttpStatusError,
  NetworkError,
  NotFoundError,
  PersistenceError,
  RetryLimitError,
  RobotsDisallowedError,
  UnsupportedContentTypeError,
  ValidationError,
  errorMessage,
} from './errors.js';
import { getDomain } from './utils/url.js';
import { throwIfAborted } from './utils/delay.js';
import { expandBatch, parseBatchCrawlRequest, parseCrawlRequest } from './validation.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Collaborators that may be swapped out, mostly for tests
 */
export interface HarvestmanDependencies {
  cache?: TtlCache;
  fetcher?: Fetcher;
  store?: CrawlStore;
  classifier?: TopicClassifier;
}

/** Fetch outcome details carried into the history log */
interface FetchDetails {
  statusCode?: number;
  responseTimeMs?: number;
}

/**
 * Main Harvestman crawl orchestrator
 */
export class Harvestman {
  private config: HarvestmanConfig;
  private logger: Logger;
  private cache: TtlCache;
  private fetcher: Fetcher;
  private store: CrawlStore;
  private classifier: TopicClassifier;
  private rateLimiter: RateLimiter;
  private robots: RobotsGate;
  private queue: JobQueue;
  private closed: boolean = false;

  constructor(config: HarvestmanConfig, logger: Logger, deps: HarvestmanDependencies = {}) {
    this.config = config;
    this.logger = logger;

    // Initialize components
    this.cache = deps.cache ?? createCache(config.cache, logger);
    this.fetcher = deps.fetcher ?? new AxiosFetcher();
    this.store = deps.store ?? new CrawlStore(config.storage.dbPath, logger);
    this.classifier = deps.classifier ?? new TopicClassifier(config.classification);
    this.rateLimiter = new RateLimiter(
      this.cache,
      { ...config.rateLimit, defaultCrawlDelay: config.crawler.defaultCrawlDelay },
      logger
    );
    this.robots = new RobotsGate(this.cache, this.fetcher, config.crawler, logger);
    this.queue = new JobQueue(logger, config.crawler.concurrency);
  }

  // ============ Caller surface ============

  /**
   * Validate and schedule one URL. Returns the new record id immediately.
   */
  submitSingle(input: unknown): string {
    this.assertOpen();
    const request = parseCrawlRequest(input, this.config.crawler.maxRetryAttempts);
    const id = randomUUID();

    this.store.createRecord({ id, request, domain: getDomain(request.url) });
    this.schedule(id, request);

    this.logger.info(`Submitted crawl: ${request.url}`, { id, priority: request.priority });
    return id;
  }

  /**
   * Validate and schedule several URLs sharing one set of options
   */
  submitBatch(input: unknown): BatchSubmission {
    this.assertOpen();
    const batch = parseBatchCrawlRequest(input, this.config.crawler.maxRetryAttempts);
    const batchId = randomUUID();
    const recordIds = this.enqueueBatch(batchId, expandBatch(batch));

    this.logger.info(`Submitted batch ${batchId}`, { urls: recordIds.length });
    return { batchId, recordIds };
  }

  /**
   * Current snapshot of a record, with metadata once completed
   */
  async getResult(recordId: string): Promise<CrawlResult | null> {
    const cached = await this.readCachedResult(recordId);
    if (cached) {
      return cached;
    }

    const record = this.store.getRecord(recordId);
    if (!record) {
      return null;
    }

    const metadata = record.status === 'completed' ? this.store.getMetadata(recordId) : null;
    return metadata ? { record, metadata } : { record };
  }

  /**
   * Cancel any work for the record, then remove it and its metadata
   */
  async deleteResult(recordId: string): Promise<boolean> {
    const handle = this.queue.get(recordId);
    if (handle) {
      this.cancel(recordId);
      await handle.done;
    }

    const deleted = this.store.deleteResult(recordId);
    try {
      await this.cache.delete(crawlResultKey(recordId));
    } catch (error) {
      this.logger.warn(`Could not evict cached result for ${recordId}`, {
        error: errorMessage(error),
      });
    }

    if (deleted) {
      this.logger.info(`Deleted crawl result ${recordId}`);
    }
    return deleted;
  }

  /**
   * Resolve once the record is terminal. A save failure on the record's task
   * is rethrown here.
   */
  async waitFor(recordId: string): Promise<CrawlResult> {
    const handle = this.queue.get(recordId);
    if (handle) {
      await handle.done;
      if (handle.error !== undefined) {
        throw handle.error;
      }
    }

    const result = await this.getResult(recordId);
    if (!result) {
      throw new NotFoundError('Crawl record', recordId);
    }
    return result;
  }

  /**
   * Resolve once every record of the batch is terminal
   */
  async waitForBatch(batchId: string): Promise<BatchSummary> {
    const records = this.store.listBatch(batchId);
    if (records.length === 0) {
      throw new NotFoundError('Batch', batchId);
    }

    await Promise.all(
      records.map(record => this.queue.get(record.id)?.done ?? Promise.resolve())
    );
    return this.summarizeBatch(batchId);
  }

  /**
   * Abort a queued or running crawl. Returns false when nothing was in flight.
   */
  cancel(recordId: string): boolean {
    const handle = this.queue.get(recordId);
    if (!handle || handle.finished) {
      return false;
    }

    const wasStarted = handle.started;
    this.queue.cancel(recordId);

    // A job cancelled while queued never runs, so settle its record here
    if (!wasStarted) {
      const record = this.store.getRecord(recordId);
      if (record?.status === 'pending') {
        this.store.markProcessing(recordId);
        this.failRecord(record, new CancelledError(), {});
      }
    }
    return true;
  }

  listResults(query: ListResultsQuery = {}): CrawlRecord[] {
    return this.store.listRecords(query);
  }

  /**
   * Schedule a new attempt for a failed record. The old record stays as it
   * is; the new one points back at it and belongs to no batch.
   */
  retry(recordId: string): string {
    this.assertOpen();
    const record = this.store.getRecord(recordId);
    const request = this.store.getRequest(recordId);
    if (!record || !request) {
      throw new NotFoundError('Crawl record', recordId);
    }
    if (record.status !== 'failed') {
      throw new ValidationError('Only failed records can be retried', [
        `record ${recordId} is ${record.status}`,
      ]);
    }
    if (record.retryCount >= record.maxRetries) {
      throw new RetryLimitError(recordId, record.retryCount, record.maxRetries);
    }

    const id = randomUUID();
    this.store.createRecord({
      id,
      request,
      domain: record.domain,
      retryOf: record.id,
      retryCount: record.retryCount + 1,
    });
    this.schedule(id, request);

    this.logger.info(`Retrying ${record.url}`, {
      id,
      retryOf: record.id,
      attempt: record.retryCount + 1,
    });
    return id;
  }

  async getDomainStats(domain: string): Promise<DomainStats> {
    const normalized = domain.toLowerCase();
    const [rateLimit, isRateLimited] = await Promise.all([
      this.rateLimiter.getStats(normalized),
      this.rateLimiter.isRateLimited(normalized),
    ]);

    return {
      domain: normalized,
      rateLimit,
      isRateLimited,
      recentRecords: this.store.listByDomain(normalized, 10),
    };
  }

  getStats(): HarvestmanStats {
    return {
      records: this.store.getStatusCounts(),
      queue: this.queue.getStats(),
    };
  }

  getHistory(recordId: string): CrawlHistoryEntry[] {
    return this.store.listHistory({ recordId });
  }

  /**
   * Robots helpers exposed for the CLI
   */
  getRobots(): RobotsGate {
    return this.robots;
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  /**
   * Cancel outstanding work and release every resource
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.logger.info('Shutting down Harvestman');

    for (const id of this.queue.trackedIds()) {
      this.cancel(id);
    }
    await this.queue.close();
    await this.cache.close();
    this.store.close();

    this.logger.info('Harvestman shutdown complete');
  }

  // ============ Processing ============

  /**
   * Create records for a batch and wait until every one is terminal.
   * Individual failures never stop their siblings.
   */
  async processBatch(batchId: string, requests: CrawlRequest[]): Promise<BatchSummary> {
    this.assertOpen();
    this.enqueueBatch(batchId, requests);
    const summary = await this.waitForBatch(batchId);

    this.logger.info(`Batch ${batchId} finished`, {
      total: summary.total,
      completed: summary.completed,
      failed: summary.failed,
    });
    return summary;
  }

  /**
   * Run one pending record to a terminal state.
   *
   * Every fetch, parse and classification problem ends as a failed record.
   * Only a PersistenceError from the final save propagates, after the record
   * has been marked failed.
   */
  async processSingle(
    recordId: string,
    request: CrawlRequest,
    signal?: AbortSignal
  ): Promise<CrawlRecord> {
    const processing = this.store.markProcessing(recordId);
    const userAgent = request.userAgent ?? this.config.crawler.userAgent;
    const details: FetchDetails = {};

    let metadata: PageMetadata;
    try {
      throwIfAborted(signal);
      const robotsDelay = await this.checkRobots(request, userAgent);
      throwIfAborted(signal);

      await this.rateLimiter.wait(
        processing.domain,
        maxDefined(request.crawlDelay, robotsDelay),
        signal
      );

      metadata = await this.fetchPage(request, userAgent, details, signal);
      throwIfAborted(signal);
    } catch (error) {
      return this.failRecord(processing, error, details);
    }

    let completed: CrawlRecord;
    try {
      completed = this.store.completeWithMetadata(recordId, metadata);
    } catch (error) {
      const failed = this.failRecord(processing, error, details);
      if (error instanceof PersistenceError) {
        throw error;
      }
      return failed;
    }

    await this.cacheResult({ record: completed, metadata });
    this.recordHistory(completed, 'completed', details);

    this.logger.info(`Crawl completed: ${request.url}`, {
      id: recordId,
      statusCode: metadata.statusCode,
      responseTimeMs: metadata.responseTimeMs,
      topics: metadata.topics.length,
    });
    return completed;
  }

  // ============ Internals ============

  private schedule(recordId: string, request: CrawlRequest): void {
    this.queue.submit(recordId, request.priority, async signal => {
      await this.processSingle(recordId, request, signal);
    });
  }

  private enqueueBatch(batchId: string, requests: CrawlRequest[]): string[] {
    const records = this.store.createRecords(
      requests.map(request => ({
        id: randomUUID(),
        request,
        domain: getDomain(request.url),
        batchId,
      }))
    );

    records.forEach((record, index) => {
      const request = requests[index];
      if (request) {
        this.schedule(record.id, request);
      }
    });
    return records.map(record => record.id);
  }

  private summarizeBatch(batchId: string): BatchSummary {
    const records = this.store.listBatch(batchId);
    return {
      batchId,
      total: records.length,
      completed: records.filter(record => record.status === 'completed').length,
      failed: records.filter(record => record.status === 'failed').length,
      records,
    };
  }

  /**
   * Throws when robots.txt forbids the URL; otherwise returns its crawl delay
   */
  private async checkRobots(request: CrawlRequest, userAgent: string): Promise<number | undefined> {
    if (!request.respectRobotsTxt) {
      return undefined;
    }

    const allowed = await this.robots.canCrawl(request.url, userAgent);
    if (!allowed) {
      throw new RobotsDisallowedError(request.url, userAgent);
    }
    return this.robots.getCrawlDelay(request.url, userAgent);
  }

  /**
   * Fetch, validate, extract and classify one page
   */
  private async fetchPage(
    request: CrawlRequest,
    userAgent: string,
    details: FetchDetails,
    signal?: AbortSignal
  ): Promise<PageMetadata> {
    const { maxContentSize, requestTimeout } = this.config.crawler;
    const startTime = Date.now();

    const response = await this.fetcher.get(request.url, {
      headers: { ...request.headers, 'User-Agent': userAgent },
      timeoutMs: requestTimeout,
      maxBytes: maxContentSize,
      signal,
    });
    details.responseTimeMs = Date.now() - startTime;
    details.statusCode = response.statusCode;

    if (response.statusCode !== 200) {
      throw new HttpStatusError(response.statusCode, request.url);
    }

    const contentType = response.headers['content-type'] ?? '';
    if (!HTML_CONTENT_TYPES.some(type => contentType.toLowerCase().includes(type))) {
      throw new UnsupportedContentTypeError(contentType, request.url);
    }

    if (response.body.length > maxContentSize) {
      throw new ContentTooLargeError(maxContentSize, request.url, response.body.length);
    }

    const $ = loadDocument(response.body.toString('utf-8'));
    const extracted = extractMetadata($, request.url);
    const topics = this.config.classification.enabled ? this.classifier.classify($, extracted) : [];

    return {
      ...extracted,
      contentType,
      topics,
      crawledAt: new Date(),
      responseTimeMs: details.responseTimeMs,
      statusCode: response.statusCode,
      contentHash: createHash('sha256').update(response.body).digest('hex'),
      headers: response.headers,
    };
  }

  /**
   * Mark a record failed and log the outcome
   */
  private failRecord(record: CrawlRecord, error: unknown, details: FetchDetails): CrawlRecord {
    const message = errorMessage(error);
    const historyStatus = historyStatusFor(error);

    if (error instanceof HarvestmanError) {
      this.logger.warn(`Crawl failed: ${record.url}`, {
        id: record.id,
        code: error.code,
        error: message,
      });
    } else {
      this.logger.error(`Unexpected crawl error: ${record.url}`, {
        id: record.id,
        error: message,
        stack: error instanceof Error ? error.stack : undefined,
      });
    }

    const current = this.store.getRecord(record.id);
    const failed =
      current && current.status === 'processing'
        ? this.store.markFailed(record.id, message)
        : (current ?? record);

    this.recordHistory(failed, historyStatus, {
      ...details,
      statusCode: error instanceof HttpStatusError ? error.statusCode : details.statusCode,
    }, message);
    return failed;
  }

  private recordHistory(
    record: CrawlRecord,
    status: HistoryStatus,
    details: FetchDetails,
    message?: string
  ): void {
    try {
      this.store.appendHistory({
        recordId: record.id,
        url: record.url,
        domain: record.domain,
        status,
        statusCode: details.statusCode,
        responseTimeMs: details.responseTimeMs,
        errorMessage: message,
        timestamp: new Date(),
      });
    } catch (error) {
      this.logger.error(`Could not record crawl history for ${record.id}`, {
        error: errorMessage(error),
      });
    }
  }

  private async cacheResult(result: CrawlResult): Promise<void> {
    try {
      await this.cache.set(
        crawlResultKey(result.record.id),
        toJsonValue(result),
        this.config.cache.resultTtl
      );
    } catch (error) {
      this.logger.warn(`Could not cache result for ${result.record.id}`, {
        error: errorMessage(error),
      });
    }
  }

  private async readCachedResult(recordId: string): Promise<CrawlResult | undefined> {
    try {
      return parseCachedResult(await this.cache.get(crawlResultKey(recordId)));
    } catch (error) {
      this.logger.warn(`Could not read cached result for ${recordId}`, {
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Harvestman has been closed');
    }
  }
}

function historyStatusFor(error: unknown): HistoryStatus {
  if (error instanceof RobotsDisallowedError) return 'blocked';
  if (error instanceof CancelledError) return 'cancelled';
  if (error instanceof NetworkError && error.kind === 'timeout') return 'timeout';
  return 'failed';
}

/**
 * Larger of two optional delays
 */
function maxDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}
