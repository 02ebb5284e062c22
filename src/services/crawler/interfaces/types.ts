/**
 * Common types and enums for the crawler service
 */
import { CrawlError } from '../errors';

/**
 * A scraped wiki page. Identity is `id`: the oldid for systematic crawls,
 * the resolved URL for random discovery.
 */
export interface Page {
  readonly id: string;
  readonly oldid?: number;
  readonly title: string;
  readonly url: string;
  readonly content: string;
  readonly categories: readonly string[];
  readonly wordCount: number;
  /** Seconds since the epoch */
  readonly scrapedAt: number;
}

/**
 * What a single fetch should retrieve
 */
export type FetchTarget =
  | { kind: 'oldid'; oldid: number }
  | { kind: 'random' };

export type FetchResult =
  | { ok: true; page: Page }
  | { ok: false; error: CrawlError };

/**
 * How the crawler treated one fetch once merged into the corpus
 */
export type FetchOutcome = 'accepted' | 'ignored' | 'failed';

/**
 * Result of parsing a page body
 */
export interface ExtractedPage {
  title: string | null;
  content: string;
  categories: string[];
  hasContentContainer: boolean;
}

/**
 * State of a systematic (oldid range) crawl
 */
export interface CorpusState {
  pages: Page[];
  totalPages: number;
  lastUpdated: number;
  lastOldid: number;
}

/**
 * State of a random-discovery crawl. `scrapedUrls` always holds exactly
 * the urls of `scrapedData`.
 */
export interface CheckpointState {
  scrapedData: Page[];
  scrapedUrls: Set<string>;
  lastSaved: number;
}

export type CrawlMode = 'systematic' | 'random';

/**
 * Immutable crawl configuration handed to crawler constructors
 */
export interface CrawlerConfig {
  readonly baseUrl: string;
  readonly concurrency: number;
  readonly timeout: number;
  readonly userAgent: string;
  readonly batchDelayMs: number;
  readonly startOldid: number;
  readonly endOldid: number;
  readonly saveEvery: number;
  readonly targetPages: number;
  readonly checkpointEvery: number;
  /** Spend one extra round per batch replacing slots lost to duplicate draws */
  readonly refillDuplicates: boolean;
  /** Stop a random crawl after this many consecutive batches add nothing */
  readonly maxIdleBatches: number;
  readonly corpusFile: string;
  readonly randomCorpusFile: string;
  readonly checkpointFile: string;
  readonly summaryFile: string;
}

/**
 * Crawler state enum
 */
export enum CrawlerState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  STOPPING = 'STOPPING',
  COMPLETED = 'COMPLETED',
  ERROR = 'ERROR'
}

export interface CrawlStats {
  batches: number;
  accepted: number;
  ignored: number;
  failed: number;
}

/**
 * Crawl progress information
 */
export interface CrawlProgress {
  collectedPages: number;
  processed: number;
  total: number;
  percentage: number;
  stats: CrawlStats;
}

export interface SystematicCrawlSummary {
  mode: 'systematic';
  completed: boolean;
  lastOldid: number;
  totalPages: number;
  stats: CrawlStats;
}

export interface RandomCrawlSummary {
  mode: 'random';
  completed: boolean;
  totalPages: number;
  stats: CrawlStats;
}

export type CrawlSummary = SystematicCrawlSummary | RandomCrawlSummary;
