/**
 * Core type definitions for Harvestman
 */

/** Crawl record status. `completed` and `failed` are terminal. */
export type CrawlStatus = 'pending' | 'processing' | 'completed' | 'failed';

/** Request priority levels */
export type Priority = 'low' | 'normal' | 'high';

/** Outcome recorded in the crawl history log */
export type HistoryStatus = 'completed' | 'failed' | 'blocked' | 'timeout' | 'cancelled';

/** Configuration for fetching and politeness */
export interface CrawlerConfig {
  /** Default user agent string */
  userAgent: string;
  /** Maximum tasks in flight at once */
  concurrency: number;
  /** Default delay between requests to one domain, in seconds */
  defaultCrawlDelay: number;
  /** Upper bound for a request's maxRetries */
  maxRetryAttempts: number;
  /** Request timeout in milliseconds */
  requestTimeout: number;
  /** Maximum accepted body size in bytes */
  maxContentSize: number;
  /** Whether to honour robots.txt at all */
  respectRobotsTxt: boolean;
  /** Robots policy cache TTL in seconds */
  robotsCacheTtl: number;
  /** TTL for robots fetches that failed, in seconds */
  robotsErrorCacheTtl: number;
}

/** Per-domain rate limiting */
export interface RateLimitConfig {
  enabled: boolean;
  /** Idle seconds after which a domain's state is forgotten */
  stateTtl: number;
}

/** Topic classification settings */
export interface ClassificationConfig {
  enabled: boolean;
  minConfidence: number;
  maxTopics: number;
}

export type CacheDriver = 'memory' | 'redis';

export interface CacheConfig {
  driver: CacheDriver;
  /** Connection URL when driver is redis */
  redisUrl?: string;
  /** TTL of cached completed results, in seconds */
  resultTtl: number;
}

export interface StorageConfig {
  /** SQLite database path (":memory:" for an ephemeral store) */
  dbPath: string;
}

/** Full application configuration */
export interface HarvestmanConfig {
  crawler: CrawlerConfig;
  rateLimit: RateLimitConfig;
  classification: ClassificationConfig;
  cache: CacheConfig;
  storage: StorageConfig;
  logLevel: string;
}

/** A validated request to crawl one URL */
export interface CrawlRequest {
  readonly url: string;
  readonly priority: Priority;
  readonly maxRetries: number;
  /** Requested delay between requests to the domain, in seconds */
  readonly crawlDelay?: number;
  readonly respectRobotsTxt: boolean;
  readonly userAgent?: string;
  readonly headers: Readonly<Record<string, string>>;
}

/** A validated request to crawl several URLs with shared options */
export interface BatchCrawlRequest extends Omit<CrawlRequest, 'url'> {
  readonly urls: readonly string[];
}

/** Lifecycle record of one crawl */
export interface CrawlRecord {
  id: string;
  url: string;
  domain: string;
  status: CrawlStatus;
  priority: Priority;
  errorMessage?: string;
  retryCount: number;
  maxRetries: number;
  batchId?: string;
  /** Record this one retries */
  retryOf?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface ImageMetadata {
  url: string;
  alt?: string;
  title?: string;
  width?: number;
  height?: number;
}

export interface LinkMetadata {
  url: string;
  text?: string;
  title?: string;
  rel?: string;
}

export interface TopicClassification {
  topic: string;
  /** Always within [0, 1] */
  confidence: number;
  keywords: string[];
}

/** Fields the extractor derives from the document alone */
export interface ExtractedMetadata {
  url: string;
  title?: string;
  description?: string;
  keywords: string[];
  author?: string;
  publishedDate?: Date;
  canonicalUrl?: string;
  language?: string;
  contentType: string;
  wordCount: number;
  images: ImageMetadata[];
  links: LinkMetadata[];
}

/** Complete metadata for a successfully crawled page */
export interface PageMetadata extends ExtractedMetadata {
  topics: TopicClassification[];
  crawledAt: Date;
  responseTimeMs: number;
  statusCode: number;
  /** SHA-256 hex digest of the raw body */
  contentHash: string;
  headers: Record<string, string>;
}

/** A record together with its metadata, when completed */
export interface CrawlResult {
  record: CrawlRecord;
  metadata?: PageMetadata;
}

export interface CrawlHistoryEntry {
  recordId: string;
  url: string;
  domain: string;
  status: HistoryStatus;
  statusCode?: number;
  responseTimeMs?: number;
  errorMessage?: string;
  timestamp: Date;
}

/** Per-domain rate state as kept in the shared cache */
export interface DomainRateState {
  domain: string;
  /** Epoch milliseconds of the last request start */
  lastRequestTime: number;
  requestCount: number;
  /** Seconds */
  crawlDelay: number;
}

export interface DomainRateStats {
  domain: string;
  requestCount: number;
  lastRequestTime?: Date;
  crawlDelay: number;
}

export type RobotsPolicyStatus = 'found' | 'not_found' | 'unavailable';

/** Cached outcome of a robots.txt lookup */
export interface RobotsPolicy {
  domain: string;
  status: RobotsPolicyStatus;
  /** Raw robots.txt body when status is found */
  content?: string;
  /** Epoch milliseconds */
  fetchedAt: number;
}

export interface FetchOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  maxBytes: number;
  signal?: AbortSignal;
}

export interface FetchResponse {
  statusCode: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: Buffer;
}

/** Network retrieval collaborator */
export interface Fetcher {
  get(url: string, options: FetchOptions): Promise<FetchResponse>;
}

export interface ListResultsQuery {
  domain?: string;
  status?: CrawlStatus;
  limit?: number;
  offset?: number;
}

export interface BatchSubmission {
  batchId: string;
  recordIds: string[];
}

export interface BatchSummary {
  batchId: string;
  total: number;
  completed: number;
  failed: number;
  records: CrawlRecord[];
}

export interface StatusCounts {
  pending: number;
  processing: number;
  completed: number;
  failed: number;
}

/** Politeness state and recent activity for one domain */
export interface DomainStats {
  domain: string;
  rateLimit: DomainRateStats;
  isRateLimited: boolean;
  recentRecords: CrawlRecord[];
}

export interface QueueStats {
  queued: number;
  running: number;
  tracked: number;
  concurrency: number;
}

export interface HarvestmanStats {
  records: StatusCounts;
  queue: QueueStats;
}

/** Logger interface for dependency injection */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/** Database row types for SQLite */
export interface RecordRow {
  id: string;
  url: string;
  domain: string;
  status: string;
  priority: string;
  error_message: string | null;
  retry_count: number;
  max_retries: number;
  batch_id: string | null;
  retry_of: string | null;
  request_json: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

export interface MetadataRow {
  record_id: string;
  url: string;
  domain: string;
  title: string | null;
  description: string | null;
  keywords: string;
  author: string | null;
  published_date: string | null;
  canonical_url: string | null;
  language: string | null;
  content_type: string;
  word_count: number;
  images: string;
  links: string;
  topics: string;
  headers: string;
  content_hash: string;
  response_time_ms: number;
  status_code: number;
  crawled_at: string;
}

export interface HistoryRow {
  id: number;
  record_id: string;
  url: string;
  domain: string;
  status: string;
  status_code: number | null;
  response_time_ms: number | null;
  error_message: string | null;
  timestamp: string;
}
