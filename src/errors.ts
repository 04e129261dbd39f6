/**
 * Error hierarchy for Harvestman
 */

/**
 * Base class for all Harvestman errors
 */
export class HarvestmanError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type NetworkErrorKind = 'timeout' | 'connection' | 'dns' | 'unknown';

/** Timeout, refused connection, DNS failure and similar transport problems */
export class NetworkError extends HarvestmanError {
  public readonly kind: NetworkErrorKind;

  constructor(message: string, kind: NetworkErrorKind, context?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', context);
    this.kind = kind;
  }
}

export class HttpStatusError extends HarvestmanError {
  public readonly statusCode: number;

  constructor(statusCode: number, url: string) {
    super(`Unexpected HTTP status ${statusCode}`, 'HTTP_STATUS', { url, statusCode });
    this.statusCode = statusCode;
  }
}

export class UnsupportedContentTypeError extends HarvestmanError {
  constructor(contentType: string, url: string) {
    super(
      `Unsupported content type: ${contentType || 'unknown'}`,
      'UNSUPPORTED_CONTENT_TYPE',
      { url, contentType }
    );
  }
}

export class ContentTooLargeError extends HarvestmanError {
  constructor(maxBytes: number, url: string, size?: number) {
    super(
      size !== undefined
        ? `Content size ${size} exceeds limit of ${maxBytes} bytes`
        : `Content exceeds limit of ${maxBytes} bytes`,
      'CONTENT_TOO_LARGE',
      { url, maxBytes, size }
    );
  }
}

export class RobotsDisallowedError extends HarvestmanError {
  constructor(url: string, userAgent: string) {
    super('Blocked by robots.txt', 'ROBOTS_DISALLOWED', { url, userAgent });
  }
}

/** A write that was rolled back before surfacing */
export class PersistenceError extends HarvestmanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_ERROR', context);
  }
}

export class CancelledError extends HarvestmanError {
  constructor(message: string = 'Crawl cancelled') {
    super(message, 'CANCELLED');
  }
}

export class NotFoundError extends HarvestmanError {
  constructor(resource: string, identifier: string) {
    super(`${resource} '${identifier}' not found`, 'NOT_FOUND', { resource, identifier });
  }
}

export class InvalidTransitionError extends HarvestmanError {
  constructor(recordId: string, from: string, to: string) {
    super(
      `Cannot move record ${recordId} from ${from} to ${to}`,
      'INVALID_TRANSITION',
      { recordId, from, to }
    );
  }
}

export class ValidationError extends HarvestmanError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'VALIDATION_ERROR', {
      issues,
    });
    this.issues = issues;
  }
}

export class RetryLimitError extends HarvestmanError {
  constructor(recordId: string, retryCount: number, maxRetries: number) {
    super(
      `Record ${recordId} has used ${retryCount} of ${maxRetries} retries`,
      'RETRY_LIMIT',
      { recordId, retryCount, maxRetries }
    );
  }
}

export class CacheError extends HarvestmanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CACHE_ERROR', context);
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
