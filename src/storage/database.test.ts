import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CrawlStore } from './database.js';
import { InvalidTransitionError, NotFoundError, PersistenceError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import type { CrawlRequest, PageMetadata } from '../types.js';

function request(url: string, overrides: Partial<CrawlRequest> = {}): CrawlRequest {
  return {
    url,
    priority: 'normal',
    maxRetries: 3,
    respectRobotsTxt: true,
    headers: {},
    ...overrides,
  };
}

function pageMetadata(url: string, overrides: Partial<PageMetadata> = {}): PageMetadata {
  return {
    url,
    title: 'Example page',
    keywords: ['example'],
    contentType: 'text/html; charset=utf-8',
    wordCount: 42,
    images: [{ url: 'https://example.com/a.png', alt: 'A' }],
    links: [{ url: 'https://example.com/b', text: 'B' }],
    topics: [{ topic: 'technology', confidence: 0.75, keywords: ['software'] }],
    crawledAt: new Date('2024-05-01T12:00:00.000Z'),
    responseTimeMs: 120,
    statusCode: 200,
    contentHash: 'abc123',
    headers: { 'content-type': 'text/html; charset=utf-8' },
    ...overrides,
  };
}

describe('CrawlStore', () => {
  let store: CrawlStore;

  beforeEach(() => {
    store = new CrawlStore(':memory:', createSilentLogger());
  });

  afterEach(() => {
    store.close();
  });

  it('creates pending records and keeps their request', () => {
    const req = request('https://example.com/', { priority: 'high', crawlDelay: 1.5 });
    const record = store.createRecord({ id: 'r1', request: req, domain: 'example.com' });

    expect(record).toMatchObject({
      id: 'r1',
      url: 'https://example.com/',
      domain: 'example.com',
      status: 'pending',
      priority: 'high',
      retryCount: 0,
      maxRetries: 3,
    });
    expect(record.createdAt).toBeInstanceOf(Date);
    expect(record.startedAt).toBeUndefined();
    expect(store.getRequest('r1')).toEqual(req);
    expect(store.getRecord('missing')).toBeNull();
  });

  it('moves a record through processing to completed with its metadata', () => {
    store.createRecord({ id: 'r1', request: request('https://example.com/'), domain: 'example.com' });

    const processing = store.markProcessing('r1');
    expect(processing.status).toBe('processing');
    expect(processing.startedAt).toBeInstanceOf(Date);

    const metadata = pageMetadata('https://example.com/', {
      publishedDate: new Date('2024-04-01T00:00:00.000Z'),
      language: 'en',
    });
    const completed = store.completeWithMetadata('r1', metadata);

    expect(completed.status).toBe('completed');
    expect(completed.completedAt).toBeInstanceOf(Date);
    expect(store.getMetadata('r1')).toEqual(metadata);
  });

  it('rejects transitions the state machine does not allow', () => {
    store.createRecord({ id: 'r1', request: request('https://example.com/'), domain: 'example.com' });

    expect(() => store.markFailed('r1', 'too early')).toThrow(InvalidTransitionError);
    expect(() => store.completeWithMetadata('r1', pageMetadata('https://example.com/'))).toThrow(
      InvalidTransitionError
    );

    store.markProcessing('r1');
    expect(() => store.markProcessing('r1')).toThrow(InvalidTransitionError);

    store.markFailed('r1', 'HTTP 500');
    expect(() => store.markProcessing('r1')).toThrow(InvalidTransitionError);
    expect(store.getRecord('r1')).toMatchObject({ status: 'failed', errorMessage: 'HTTP 500' });
    expect(store.getMetadata('r1')).toBeNull();
  });

  it('throws NotFoundError for unknown records', () => {
    expect(() => store.markProcessing('ghost')).toThrow(NotFoundError);
  });

  it('rolls back completion when the metadata cannot be written', () => {
    store.createRecord({ id: 'r1', request: request('https://example.com/'), domain: 'example.com' });
    store.markProcessing('r1');

    const broken = pageMetadata('https://example.com/', { crawledAt: new Date('invalid') });

    expect(() => store.completeWithMetadata('r1', broken)).toThrow(PersistenceError);
    expect(store.getRecord('r1')?.status).toBe('processing');
    expect(store.getMetadata('r1')).toBeNull();
  });

  it('lists records newest first with filters and paging', () => {
    store.createRecord({ id: 'a', request: request('https://a.example.com/'), domain: 'a.example.com' });
    store.createRecord({ id: 'b', request: request('https://b.example.com/'), domain: 'b.example.com' });
    store.createRecord({ id: 'c', request: request('https://a.example.com/2'), domain: 'a.example.com' });
    store.markProcessing('b');

    expect(store.listRecords().map(r => r.id)).toEqual(['c', 'b', 'a']);
    expect(store.listRecords({ domain: 'A.example.com' }).map(r => r.id)).toEqual(['c', 'a']);
    expect(store.listRecords({ status: 'processing' }).map(r => r.id)).toEqual(['b']);
    expect(store.listRecords({ limit: 1, offset: 1 }).map(r => r.id)).toEqual(['b']);
    expect(store.listByDomain('a.example.com', 1).map(r => r.id)).toEqual(['c']);
  });

  it('lists batch members in submission order', () => {
    store.createRecords([
      { id: 'x', request: request('https://example.com/x'), domain: 'example.com', batchId: 'batch-1' },
      { id: 'y', request: request('https://example.com/y'), domain: 'example.com', batchId: 'batch-1' },
    ]);
    store.createRecord({ id: 'z', request: request('https://example.com/z'), domain: 'example.com' });

    expect(store.listBatch('batch-1').map(r => r.id)).toEqual(['x', 'y']);
    expect(store.listBatch('batch-1')[0]?.batchId).toBe('batch-1');
  });

  it('records retry lineage', () => {
    store.createRecord({
      id: 'again',
      request: request('https://example.com/'),
      domain: 'example.com',
      retryOf: 'first',
      retryCount: 2,
    });

    expect(store.getRecord('again')).toMatchObject({ retryOf: 'first', retryCount: 2 });
  });

  it('deletes records and metadata but keeps history', () => {
    store.createRecord({ id: 'r1', request: request('https://example.com/'), domain: 'example.com' });
    store.markProcessing('r1');
    store.completeWithMetadata('r1', pageMetadata('https://example.com/'));
    store.appendHistory({
      recordId: 'r1',
      url: 'https://example.com/',
      domain: 'example.com',
      status: 'completed',
      statusCode: 200,
      timestamp: new Date(),
    });

    expect(store.deleteResult('r1')).toBe(true);
    expect(store.getRecord('r1')).toBeNull();
    expect(store.getMetadata('r1')).toBeNull();
    expect(store.listHistory({ recordId: 'r1' })).toHaveLength(1);
    expect(store.deleteResult('r1')).toBe(false);
  });

  it('counts records by status', () => {
    expect(store.getStatusCounts()).toEqual({ pending: 0, processing: 0, completed: 0, failed: 0 });

    store.createRecord({ id: 'a', request: request('https://example.com/a'), domain: 'example.com' });
    store.createRecord({ id: 'b', request: request('https://example.com/b'), domain: 'example.com' });
    store.markProcessing('b');
    store.markFailed('b', 'boom');

    expect(store.getStatusCounts()).toEqual({ pending: 1, processing: 0, completed: 0, failed: 1 });
  });

  it('appends and filters history oldest first', () => {
    const base = { url: 'https://example.com/', timestamp: new Date('2024-01-01T00:00:00.000Z') };
    store.appendHistory({ ...base, recordId: 'r1', domain: 'example.com', status: 'blocked' });
    store.appendHistory({
      ...base,
      recordId: 'r2',
      domain: 'example.com',
      status: 'failed',
      statusCode: 503,
      responseTimeMs: 80.4,
      errorMessage: 'Unexpected HTTP status 503',
    });
    store.appendHistory({ ...base, recordId: 'r3', domain: 'other.com', status: 'completed' });

    expect(store.listHistory({ domain: 'example.com' }).map(e => e.recordId)).toEqual(['r1', 'r2']);
    expect(store.listHistory({ recordId: 'r2' })).toEqual([
      {
        recordId: 'r2',
        url: 'https://example.com/',
        domain: 'example.com',
        status: 'failed',
        statusCode: 503,
        responseTimeMs: 80,
        errorMessage: 'Unexpected HTTP status 503',
        timestamp: new Date('2024-01-01T00:00:00.000Z'),
      },
    ]);
  });
});
