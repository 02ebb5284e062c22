/**
 * Error taxonomy for the crawler and its stores.
 *
 * Fetch-level errors are returned as values inside a FetchResult and never
 * thrown across a batch. Persistence errors are thrown by the stores and
 * caught by the crawler, which logs them and keeps the run going in memory.
 */
export type CrawlErrorKind = 'network' | 'extraction' | 'parse' | 'persistence' | 'config';

export class CrawlError extends Error {
  readonly kind: CrawlErrorKind;
  originalError?: unknown;

  constructor(message: string, kind: CrawlErrorKind, originalError?: unknown) {
    super(message);
    this.name = 'CrawlError';
    this.kind = kind;
    this.originalError = originalError;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Timeout, connection failure or non-2xx status. */
export class NetworkError extends CrawlError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, originalError?: unknown) {
    super(message, 'network', originalError);
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
  }
}

/** The page body lacked the containers a wiki page must have. */
export class ExtractionError extends CrawlError {
  readonly url: string;

  constructor(message: string, url: string) {
    super(message, 'extraction');
    this.name = 'ExtractionError';
    this.url = url;
  }
}

/** Malformed persisted JSON. */
export class ParseError extends CrawlError {
  readonly filePath: string;

  constructor(message: string, filePath: string, originalError?: unknown) {
    super(message, 'parse', originalError);
    this.name = 'ParseError';
    this.filePath = filePath;
  }
}

export class PersistenceError extends CrawlError {
  readonly filePath: string;

  constructor(message: string, filePath: string, originalError?: unknown) {
    super(message, 'persistence', originalError);
    this.name = 'PersistenceError';
    this.filePath = filePath;
  }
}

export class ConfigError extends CrawlError {
  constructor(message: string) {
    super(message, 'config');
    this.name = 'ConfigError';
  }
}

/**
 * Wrap anything thrown into a CrawlError, keeping CrawlErrors as they are
 */
export function toCrawlError(error: unknown, fallbackKind: CrawlErrorKind = 'network'): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CrawlError(message, fallbackKind, error);
}
