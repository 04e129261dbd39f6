/**
 * SQLite store for crawl records, page metadata and crawl history
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  HarvestmanError,
  InvalidTransitionError,
  NotFoundError,
  PersistenceError,
  errorMessage,
} from '../errors.js';
import { crawlRequestSchema, crawlStatusSchema, prioritySchema } from '../validation.js';
import type {
  CrawlHistoryEntry,
  CrawlRecord,
  CrawlRequest,
  CrawlStatus,
  HistoryRow,
  HistoryStatus,
  ListResultsQuery,
  Logger,
  MetadataRow,
  PageMetadata,
  Priority,
  RecordRow,
  StatusCounts,
} from '../types.js';

/**
 * Legal status moves. Completed and failed are terminal.
 */
const TRANSITIONS: Record<CrawlStatus, readonly CrawlStatus[]> = {
  pending: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

const historyStatusSchema = z.enum(['completed', 'failed', 'blocked', 'timeout', 'cancelled']);
const stringListSchema = z.array(z.string());
const headersSchema = z.record(z.string(), z.string());
const imagesSchema = z.array(
  z.object({
    url: z.string(),
    alt: z.string().optional(),
    title: z.string().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
  })
);
const linksSchema = z.array(
  z.object({
    url: z.string(),
    text: z.string().optional(),
    title: z.string().optional(),
    rel: z.string().optional(),
  })
);
const topicsSchema = z.array(
  z.object({
    topic: z.string(),
    confidence: z.number(),
    keywords: z.array(z.string()),
  })
);

export interface NewCrawlRecord {
  id: string;
  request: CrawlRequest;
  domain: string;
  batchId?: string;
  retryOf?: string;
  retryCount?: number;
}

/**
 * Database manager for crawl state
 */
export class CrawlStore {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string, logger: Logger) {
    this.logger = logger;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  /**
   * Initialize database schema
   */
  private initSchema(): void {
    this.db.exec(`
      -- Crawl records: one row per submitted URL
      CREATE TABLE IF NOT EXISTS crawl_records (
        id TEXT PRIMARY KEY,
        url TEXT NOT NULL,
        domain TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        priority TEXT NOT NULL DEFAULT 'normal',
        error_message TEXT,
        retry_count INTEGER NOT NULL DEFAULT 0,
        max_retries INTEGER NOT NULL DEFAULT 3,
        batch_id TEXT,
        retry_of TEXT,
        request_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT
      );

      -- Page metadata: written once, when a record completes
      CREATE TABLE IF NOT EXISTS page_metadata (
        record_id TEXT PRIMARY KEY,
        url TEXT NOT NULL,
        domain TEXT NOT NULL,
        title TEXT,
        description TEXT,
        keywords TEXT NOT NULL,
        author TEXT,
        published_date TEXT,
        canonical_url TEXT,
        language TEXT,
        content_type TEXT NOT NULL,
        word_count INTEGER NOT NULL,
        images TEXT NOT NULL,
        links TEXT NOT NULL,
        topics TEXT NOT NULL,
        headers TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        response_time_ms INTEGER NOT NULL,
        status_code INTEGER NOT NULL,
        crawled_at TEXT NOT NULL,
        FOREIGN KEY (record_id) REFERENCES crawl_records(id) ON DELETE CASCADE
      );

      -- Crawl history: append-only outcome log
      CREATE TABLE IF NOT EXISTS crawl_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        record_id TEXT NOT NULL,
        url TEXT NOT NULL,
        domain TEXT NOT NULL,
        status TEXT NOT NULL,
        status_code INTEGER,
        response_time_ms INTEGER,
        error_message TEXT,
        timestamp TEXT NOT NULL
      );

      -- Indexes
      CREATE INDEX IF NOT EXISTS idx_records_domain ON crawl_records(domain);
      CREATE INDEX IF NOT EXISTS idx_records_status ON crawl_records(status);
      CREATE INDEX IF NOT EXISTS idx_records_created_at ON crawl_records(created_at);
      CREATE INDEX IF NOT EXISTS idx_records_batch_id ON crawl_records(batch_id);
      CREATE INDEX IF NOT EXISTS idx_metadata_domain ON page_metadata(domain);
      CREATE INDEX IF NOT EXISTS idx_history_record_id ON crawl_history(record_id);
      CREATE INDEX IF NOT EXISTS idx_history_domain ON crawl_history(domain);
    `);

    this.logger.debug('Database schema initialized');
  }

  // ============ Crawl Records ============

  /**
   * Insert a pending record
   */
  createRecord(input: NewCrawlRecord): CrawlRecord {
    const stmt = this.db.prepare(`
      INSERT INTO crawl_records (
        id, url, domain, status, priority, retry_count, max_retries,
        batch_id, retry_of, request_json, created_at
      ) VALUES (?, ?, ?, 'pending', ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      input.id,
      input.request.url,
      input.domain,
      input.request.priority,
      input.retryCount ?? 0,
      input.request.maxRetries,
      input.batchId ?? null,
      input.retryOf ?? null,
      JSON.stringify(input.request),
      new Date().toISOString()
    );

    return this.requireRecord(input.id);
  }

  /**
   * Insert several pending records atomically
   */
  createRecords(inputs: NewCrawlRecord[]): CrawlRecord[] {
    const insertAll = this.db.transaction((items: NewCrawlRecord[]) =>
      items.map(item => this.createRecord(item))
    );
    return insertAll(inputs);
  }

  getRecord(id: string): CrawlRecord | null {
    const row = this.db.prepare(`SELECT * FROM crawl_records WHERE id = ?`).get(id) as
      | RecordRow
      | undefined;
    return row ? this.rowToRecord(row) : null;
  }

  /**
   * The request a record was created from
   */
  getRequest(id: string): CrawlRequest | null {
    const row = this.db
      .prepare(`SELECT request_json FROM crawl_records WHERE id = ?`)
      .get(id) as Pick<RecordRow, 'request_json'> | undefined;
    if (!row) return null;

    const parsed = crawlRequestSchema.safeParse(JSON.parse(row.request_json));
    if (!parsed.success) {
      this.logger.warn(`Stored request for ${id} is unreadable`, { error: parsed.error.message });
      return null;
    }
    return parsed.data;
  }

  markProcessing(id: string): CrawlRecord {
    return this.transition(id, 'processing');
  }

  markFailed(id: string, message: string): CrawlRecord {
    return this.transition(id, 'failed', message);
  }

  /**
   * Save metadata and mark the record completed in one transaction.
   * Nothing is written if either step fails.
   */
  completeWithMetadata(id: string, metadata: PageMetadata): CrawlRecord {
    const complete = this.db.transaction(() => {
      const record = this.transition(id, 'completed');
      this.insertMetadata(record, metadata);
      return record;
    });

    try {
      return complete();
    } catch (error) {
      if (error instanceof HarvestmanError) {
        throw error;
      }
      throw new PersistenceError(`Failed to save result for ${id}: ${errorMessage(error)}`, {
        recordId: id,
      });
    }
  }

  /**
   * Records newest first, optionally filtered
   */
  listRecords(query: ListResultsQuery = {}): CrawlRecord[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (query.domain) {
      conditions.push('domain = ?');
      params.push(query.domain.toLowerCase());
    }
    if (query.status) {
      conditions.push('status = ?');
      params.push(query.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const stmt = this.db.prepare(`
      SELECT * FROM crawl_records ${where}
      ORDER BY created_at DESC, rowid DESC
      LIMIT ? OFFSET ?
    `);

    const rows = stmt.all(...params, query.limit ?? 50, query.offset ?? 0) as RecordRow[];
    return rows.map(row => this.rowToRecord(row));
  }

  listByDomain(domain: string, limit: number = 50): CrawlRecord[] {
    return this.listRecords({ domain, limit });
  }

  /**
   * Records of a batch in submission order
   */
  listBatch(batchId: string): CrawlRecord[] {
    const rows = this.db
      .prepare(`SELECT * FROM crawl_records WHERE batch_id = ? ORDER BY rowid ASC`)
      .all(batchId) as RecordRow[];
    return rows.map(row => this.rowToRecord(row));
  }

  /**
   * Remove a record and its metadata. History rows stay.
   */
  deleteResult(id: string): boolean {
    const remove = this.db.transaction((recordId: string) => {
      this.db.prepare(`DELETE FROM page_metadata WHERE record_id = ?`).run(recordId);
      return this.db.prepare(`DELETE FROM crawl_records WHERE id = ?`).run(recordId).changes > 0;
    });
    const deleted = remove(id);
    if (deleted) {
      this.logger.debug(`Deleted crawl record: ${id}`);
    }
    return deleted;
  }

  getStatusCounts(): StatusCounts {
    const result = this.db
      .prepare(`
        SELECT
          SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) as pending,
          SUM(CASE WHEN status = 'processing' THEN 1 ELSE 0 END) as processing,
          SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) as completed,
          SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed
        FROM crawl_records
      `)
      .get() as Record<keyof StatusCounts, number | null>;

    return {
      pending: result.pending ?? 0,
      processing: result.processing ?? 0,
      completed: result.completed ?? 0,
      failed: result.failed ?? 0,
    };
  }

  // ============ Page Metadata ============

  getMetadata(recordId: string): PageMetadata | null {
    const row = this.db
      .prepare(`SELECT * FROM page_metadata WHERE record_id = ?`)
      .get(recordId) as MetadataRow | undefined;
    return row ? this.rowToMetadata(row) : null;
  }

  private insertMetadata(record: CrawlRecord, metadata: PageMetadata): void {
    const stmt = this.db.prepare(`
      INSERT INTO page_metadata (
        record_id, url, domain, title, description, keywords, author,
        published_date, canonical_url, language, content_type, word_count,
        images, links, topics, headers, content_hash, response_time_ms,
        status_code, crawled_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      record.id,
      metadata.url,
      record.domain,
      metadata.title ?? null,
      metadata.description ?? null,
      JSON.stringify(metadata.keywords),
      metadata.author ?? null,
      metadata.publishedDate?.toISOString() ?? null,
      metadata.canonicalUrl ?? null,
      metadata.language ?? null,
      metadata.contentType,
      metadata.wordCount,
      JSON.stringify(metadata.images),
      JSON.stringify(metadata.links),
      JSON.stringify(metadata.topics),
      JSON.stringify(metadata.headers),
      metadata.contentHash,
      Math.round(metadata.responseTimeMs),
      metadata.statusCode,
      metadata.crawledAt.toISOString()
    );
  }

  // ============ Crawl History ============

  appendHistory(entry: CrawlHistoryEntry): void {
    this.db
      .prepare(`
        INSERT INTO crawl_history (
          record_id, url, domain, status, status_code, response_time_ms, error_message, timestamp
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        entry.recordId,
        entry.url,
        entry.domain,
        entry.status,
        entry.statusCode ?? null,
        entry.responseTimeMs !== undefined ? Math.round(entry.responseTimeMs) : null,
        entry.errorMessage ?? null,
        entry.timestamp.toISOString()
      );
  }

  /**
   * History entries, oldest first
   */
  listHistory(filter: { recordId?: string; domain?: string; limit?: number } = {}): CrawlHistoryEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];
    if (filter.recordId) {
      conditions.push('record_id = ?');
      params.push(filter.recordId);
    }
    if (filter.domain) {
      conditions.push('domain = ?');
      params.push(filter.domain.toLowerCase());
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM crawl_history ${where} ORDER BY id ASC LIMIT ?`)
      .all(...params, filter.limit ?? 1000) as HistoryRow[];

    return rows.map(row => this.rowToHistory(row));
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
    this.logger.debug('Database connection closed');
  }

  private requireRecord(id: string): CrawlRecord {
    const record = this.getRecord(id);
    if (!record) {
      throw new NotFoundError('Crawl record', id);
    }
    return record;
  }

  /**
   * Move a record to a new status if the state machine allows it
   */
  private transition(id: string, to: CrawlStatus, message?: string): CrawlRecord {
    const current = this.requireRecord(id);
    if (!TRANSITIONS[current.status].includes(to)) {
      throw new InvalidTransitionError(id, current.status, to);
    }

    const now = new Date().toISOString();
    const result = this.db
      .prepare(`
        UPDATE crawl_records SET
          status = ?,
          error_message = ?,
          started_at = CASE WHEN ? = 'processing' THEN ? ELSE started_at END,
          completed_at = CASE WHEN ? IN ('completed', 'failed') THEN ? ELSE completed_at END
        WHERE id = ? AND status = ?
      `)
      .run(to, message ?? null, to, now, to, now, id, current.status);

    if (result.changes === 0) {
      throw new InvalidTransitionError(id, current.status, to);
    }
    return this.requireRecord(id);
  }

  /**
   * Convert a database row to a CrawlRecord object
   */
  private rowToRecord(row: RecordRow): CrawlRecord {
    const record: CrawlRecord = {
      id: row.id,
      url: row.url,
      domain: row.domain,
      status: crawlStatusSchema.parse(row.status),
      priority: parsePriority(row.priority),
      retryCount: row.retry_count,
      maxRetries: row.max_retries,
      createdAt: new Date(row.created_at),
    };
    if (row.error_message !== null) record.errorMessage = row.error_message;
    if (row.batch_id !== null) record.batchId = row.batch_id;
    if (row.retry_of !== null) record.retryOf = row.retry_of;
    if (row.started_at !== null) record.startedAt = new Date(row.started_at);
    if (row.completed_at !== null) record.completedAt = new Date(row.completed_at);
    return record;
  }

  /**
   * Convert a database row to a PageMetadata object
   */
  private rowToMetadata(row: MetadataRow): PageMetadata {
    const metadata: PageMetadata = {
      url: row.url,
      keywords: stringListSchema.parse(JSON.parse(row.keywords)),
      contentType: row.content_type,
      wordCount: row.word_count,
      images: imagesSchema.parse(JSON.parse(row.images)),
      links: linksSchema.parse(JSON.parse(row.links)),
      topics: topicsSchema.parse(JSON.parse(row.topics)),
      headers: headersSchema.parse(JSON.parse(row.headers)),
      contentHash: row.content_hash,
      responseTimeMs: row.response_time_ms,
      statusCode: row.status_code,
      crawledAt: new Date(row.crawled_at),
    };
    if (row.title !== null) metadata.title = row.title;
    if (row.description !== null) metadata.description = row.description;
    if (row.author !== null) metadata.author = row.author;
    if (row.published_date !== null) metadata.publishedDate = new Date(row.published_date);
    if (row.canonical_url !== null) metadata.canonicalUrl = row.canonical_url;
    if (row.language !== null) metadata.language = row.language;
    return metadata;
  }

  private rowToHistory(row: HistoryRow): CrawlHistoryEntry {
    const entry: CrawlHistoryEntry = {
      recordId: row.record_id,
      url: row.url,
      domain: row.domain,
      status: parseHistoryStatus(row.status),
      timestamp: new Date(row.timestamp),
    };
    if (row.status_code !== null) entry.statusCode = row.status_code;
    if (row.response_time_ms !== null) entry.responseTimeMs = row.response_time_ms;
    if (row.error_message !== null) entry.errorMessage = row.error_message;
    return entry;
  }
}

function parsePriority(value: string): Priority {
  const parsed = prioritySchema.safeParse(value);
  return parsed.success ? parsed.data : 'normal';
}

function parseHistoryStatus(value: string): HistoryStatus {
  const parsed = historyStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : 'failed';
}
