import { ICrawler } from '../interfaces/ICrawler';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import {
  CrawlProgress,
  CrawlStats,
  CrawlSummary,
  CrawlerConfig,
  CrawlerState,
  FetchOutcome,
  FetchResult,
  FetchTarget,
  Page
} from '../interfaces/types';
import { toCrawlError } from '../errors';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Waits between batches; injectable so tests need no timers
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BatchEntry {
  target: FetchTarget;
  result: FetchResult;
}

function emptyStats(): CrawlStats {
  return { batches: 0, accepted: 0, ignored: 0, failed: 0 };
}

/**
 * Abstract base class for crawler implementations.
 *
 * Fetch tasks only return results; every merge into crawl state and every
 * persist happens in the single orchestrating loop of the subclass, after
 * the batch has settled. No locks are needed around the state.
 */
export abstract class BaseCrawler<TSummary extends CrawlSummary> implements ICrawler<TSummary> {
  protected state: CrawlerState = CrawlerState.IDLE;
  protected stats: CrawlStats = emptyStats();
  protected readonly logger = LoggingUtils.createTaggedLogger('crawler');
  private stopRequested = false;

  /**
   * @param config Immutable crawl configuration
   * @param fetcher Page fetcher, already bound to the shared concurrency gate
   * @param sleep Delay between batches
   */
  constructor(
    protected readonly config: CrawlerConfig,
    protected readonly fetcher: IPageFetcher,
    protected readonly sleep: Sleeper = (ms, signal) => DelayUtils.delayUnlessAborted(ms, signal)
  ) {}

  abstract crawl(signal?: AbortSignal): Promise<TSummary>;

  abstract getProgress(): CrawlProgress;

  /**
   * Pages collected so far, in corpus order
   */
  abstract getPages(): readonly Page[];

  stop(): void {
    if (this.state === CrawlerState.RUNNING) {
      this.logger.info('Stop requested, finishing current batch');
      this.state = CrawlerState.STOPPING;
      this.stopRequested = true;
    } else {
      this.logger.warn(`Cannot stop crawler in state: ${this.state}`);
    }
  }

  getState(): CrawlerState {
    return this.state;
  }

  protected beginRun(): void {
    if (this.state === CrawlerState.RUNNING || this.state === CrawlerState.STOPPING) {
      throw new Error(`Crawler is already running (state: ${this.state})`);
    }
    this.state = CrawlerState.RUNNING;
    this.stopRequested = false;
    this.stats = emptyStats();
  }

  protected finishRun(completed: boolean, failed: boolean): void {
    if (failed) {
      this.state = CrawlerState.ERROR;
    } else if (completed) {
      this.state = CrawlerState.COMPLETED;
    } else {
      this.state = CrawlerState.IDLE;
    }
  }

  protected shouldContinue(signal?: AbortSignal): boolean {
    return !this.stopRequested && !(signal?.aborted ?? false);
  }

  /**
   * Fetch every target concurrently and wait for all of them. A rejected
   * fetch becomes a failed result; it never cancels its siblings.
   */
  protected async fetchBatch(targets: readonly FetchTarget[]): Promise<BatchEntry[]> {
    this.stats.batches += 1;
    const settled = await Promise.allSettled(targets.map(target => this.fetcher.fetch(target)));

    return settled.map((result, index): BatchEntry => ({
      target: targets[index],
      result: result.status === 'fulfilled'
        ? result.value
        : { ok: false, error: toCrawlError(result.reason) }
    }));
  }

  protected record(outcome: FetchOutcome, entry: BatchEntry): void {
    this.stats[outcome] += 1;
    if (!entry.result.ok) {
      this.logger.warn(`Fetch failed for ${BaseCrawler.describeTarget(entry.target)}: ${entry.result.error.message}`);
    }
  }

  /**
   * Run a write and keep the crawl alive if it fails. The failure is
   * logged at error level: anything gathered since the last good write
   * now exists only in memory.
   * @returns True if the write succeeded
   */
  protected persistSafely(description: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (error) {
      this.logger.error(
        `PERSISTENCE FAILURE while ${description}; unsaved pages are held in memory only: ` +
        `${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }

  protected snapshotStats(): CrawlStats {
    return { ...this.stats };
  }

  static describeTarget(target: FetchTarget): string {
    return target.kind === 'oldid' ? `oldid ${target.oldid}` : 'random page';
  }
}
