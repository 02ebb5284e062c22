import { BaseCrawler, BatchEntry, Sleeper } from './BaseCrawler';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { ICorpusStore } from '../interfaces/ICorpusStore';
import { CorpusState, CrawlProgress, CrawlerConfig, Page, SystematicCrawlSummary } from '../interfaces/types';
import { StateUtils } from '../utils/StateUtils';

/**
 * Crawls every revision id in `[startOldid, endOldid]` in order.
 *
 * The cursor (`lastOldid`) advances over every id of a batch whether the
 * fetch succeeded or not, so a permanently broken id never blocks a resumed
 * run. The corpus is saved every `saveEvery` new pages and once more when
 * the run ends for any reason.
 */
export class SystematicCrawler extends BaseCrawler<SystematicCrawlSummary> {
  private corpus: CorpusState = StateUtils.emptyCorpusState();
  private knownIds: Set<string> = new Set();

  constructor(
    config: CrawlerConfig,
    fetcher: IPageFetcher,
    private readonly store: ICorpusStore,
    sleep?: Sleeper
  ) {
    super(config, fetcher, sleep);
  }

  async crawl(signal?: AbortSignal): Promise<SystematicCrawlSummary> {
    this.beginRun();
    this.corpus = this.store.load();
    this.knownIds = new Set(this.corpus.pages.map(page => page.id));

    const { startOldid, endOldid, concurrency, saveEvery, batchDelayMs } = this.config;
    const startFrom = Math.max(startOldid - 1, this.corpus.lastOldid) + 1;

    this.logger.info(
      `Starting systematic crawl of oldid ${startOldid}-${endOldid} from ${startFrom} ` +
      `(${concurrency} concurrent, saving every ${saveEvery} pages)`
    );

    let pagesSinceSave = 0;
    let failed = false;
    let failure: unknown;

    try {
      for (let batchStart = startFrom; batchStart <= endOldid; batchStart += concurrency) {
        if (!this.shouldContinue(signal)) {
          this.logger.info(`Stopped by request at oldid ${this.corpus.lastOldid}`);
          break;
        }

        const batchEnd = Math.min(batchStart + concurrency - 1, endOldid);
        const oldids = range(batchStart, batchEnd);
        this.logger.debug(`Processing batch: oldid ${batchStart} to ${batchEnd}`);

        const entries = await this.fetchBatch(oldids.map(oldid => ({ kind: 'oldid' as const, oldid })));
        entries.forEach((entry, index) => {
          pagesSinceSave += this.merge(entry);
          this.corpus.lastOldid = Math.max(this.corpus.lastOldid, oldids[index]);
        });

        if (pagesSinceSave >= saveEvery) {
          this.save();
          pagesSinceSave = 0;
        }

        const progress = this.getProgress();
        this.logger.info(
          `Progress: ${progress.percentage.toFixed(1)}% | Total pages collected: ${this.corpus.pages.length}`
        );

        if (batchEnd < endOldid) {
          await this.sleep(batchDelayMs, signal);
        }
      }
    } catch (error) {
      failed = true;
      failure = error;
      this.logger.error(`Crawl aborted at oldid ${this.corpus.lastOldid}: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      this.logger.info('Final save...');
      this.save();
    }

    const completed = this.corpus.lastOldid >= endOldid;
    this.finishRun(completed, failed);
    if (failed) {
      throw failure;
    }

    if (completed) {
      this.logger.info(`Completed: all oldids up to ${endOldid} processed, ${this.corpus.pages.length} pages collected`);
    } else {
      this.logger.info(`Stopped at oldid ${this.corpus.lastOldid}, run again to continue`);
    }

    return {
      mode: 'systematic',
      completed,
      lastOldid: this.corpus.lastOldid,
      totalPages: this.corpus.pages.length,
      stats: this.snapshotStats()
    };
  }

  getProgress(): CrawlProgress {
    const { startOldid, endOldid } = this.config;
    const total = endOldid - startOldid + 1;
    const processed = Math.min(Math.max(this.corpus.lastOldid - startOldid + 1, 0), total);

    return {
      collectedPages: this.corpus.pages.length,
      processed,
      total,
      percentage: total > 0 ? (processed / total) * 100 : 100,
      stats: this.snapshotStats()
    };
  }

  getPages(): readonly Page[] {
    return this.corpus.pages;
  }

  /**
   * @returns 1 if the entry added a page, otherwise 0
   */
  private merge(entry: BatchEntry): number {
    if (!entry.result.ok) {
      this.record('failed', entry);
      return 0;
    }

    const page = entry.result.page;
    if (this.knownIds.has(page.id)) {
      this.record('ignored', entry);
      return 0;
    }

    this.knownIds.add(page.id);
    this.corpus.pages.push(page);
    this.record('accepted', entry);
    return 1;
  }

  private save(): void {
    this.persistSafely(`saving corpus at oldid ${this.corpus.lastOldid}`, () => this.store.save(this.corpus));
  }
}

function range(from: number, to: number): number[] {
  return Array.from({ length: Math.max(to - from + 1, 0) }, (_, index) => from + index);
}
