import { BaseCrawler, Sleeper } from './BaseCrawler';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { ICheckpointStore } from '../interfaces/ICheckpointStore';
import { CheckpointState, CrawlProgress, CrawlerConfig, Page, RandomCrawlSummary } from '../interfaces/types';
import { StateUtils } from '../utils/StateUtils';

/**
 * Collects `targetPages` distinct pages by drawing random pages.
 *
 * A draw whose url is already in the checkpoint is dropped without counting
 * toward the target. Dropped slots are not refilled within a batch unless
 * `refillDuplicates` is set, which adds one extra round per batch.
 */
export class RandomDiscoveryCrawler extends BaseCrawler<RandomCrawlSummary> {
  private checkpoint: CheckpointState = StateUtils.emptyCheckpointState();

  constructor(
    config: CrawlerConfig,
    fetcher: IPageFetcher,
    private readonly store: ICheckpointStore,
    sleep?: Sleeper
  ) {
    super(config, fetcher, sleep);
  }

  async crawl(signal?: AbortSignal): Promise<RandomCrawlSummary> {
    this.beginRun();
    this.checkpoint = this.store.load();

    const { targetPages, concurrency, checkpointEvery, batchDelayMs, maxIdleBatches } = this.config;

    if (this.collected() >= targetPages) {
      this.logger.info(`Target of ${targetPages} pages already met with ${this.collected()} pages, nothing to do`);
      this.finishRun(true, false);
      return this.summary(true);
    }

    this.logger.info(
      `Starting random discovery: ${this.collected()}/${targetPages} pages, ` +
      `${concurrency} concurrent, checkpoint every ${checkpointEvery} pages`
    );

    let idleBatches = 0;
    let failed = false;
    let failure: unknown;

    try {
      while (this.shouldContinue(signal)) {
        const need = targetPages - this.collected();
        if (need <= 0) {
          break;
        }

        const batchSize = Math.min(concurrency, need);
        let added = await this.runBatch(batchSize);
        if (this.config.refillDuplicates && added < batchSize && this.shouldContinue(signal)) {
          added += await this.runBatch(batchSize - added);
        }

        if (added > 0 && this.collected() % checkpointEvery === 0) {
          this.saveCheckpoint();
        }

        this.logger.info(`Progress: ${this.collected()}/${targetPages} pages (+${added} this batch)`);

        idleBatches = added === 0 ? idleBatches + 1 : 0;
        if (idleBatches >= maxIdleBatches) {
          this.logger.warn(`No new pages in ${idleBatches} consecutive batches, stopping`);
          break;
        }

        if (this.collected() < targetPages) {
          await this.sleep(batchDelayMs, signal);
        }
      }
    } catch (error) {
      failed = true;
      failure = error;
      this.logger.error(`Random discovery aborted: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      this.persistFinalState();
    }

    const completed = this.collected() >= targetPages;
    this.finishRun(completed, failed);
    if (failed) {
      throw failure;
    }
    return this.summary(completed);
  }

  getProgress(): CrawlProgress {
    const total = this.config.targetPages;
    const processed = Math.min(this.collected(), total);
    return {
      collectedPages: this.collected(),
      processed,
      total,
      percentage: total > 0 ? (processed / total) * 100 : 100,
      stats: this.snapshotStats()
    };
  }

  getPages(): readonly Page[] {
    return this.checkpoint.scrapedData;
  }

  /**
   * Draw `size` random pages and merge the new ones
   * @returns Number of pages added
   */
  private async runBatch(size: number): Promise<number> {
    const entries = await this.fetchBatch(Array.from({ length: size }, () => ({ kind: 'random' as const })));

    let added = 0;
    for (const entry of entries) {
      if (!entry.result.ok) {
        this.record('failed', entry);
      } else if (StateUtils.addCheckpointPage(this.checkpoint, entry.result.page)) {
        added += 1;
        this.record('accepted', entry);
      } else {
        this.logger.debug(`Duplicate draw skipped: ${entry.result.page.url}`);
        this.record('ignored', entry);
      }
    }
    return added;
  }

  private saveCheckpoint(): void {
    this.persistSafely('saving checkpoint', () => this.store.save(this.checkpoint));
  }

  /**
   * A finished run trades its checkpoint for the final corpus; anything
   * else keeps the checkpoint so the next run resumes
   */
  private persistFinalState(): void {
    if (this.collected() < this.config.targetPages) {
      this.saveCheckpoint();
      return;
    }

    const written = this.persistSafely('writing final corpus', () => this.store.writeFinal(this.checkpoint.scrapedData));
    if (written) {
      this.persistSafely('removing checkpoint', () => this.store.clear());
    } else {
      this.saveCheckpoint();
    }
  }

  private collected(): number {
    return this.checkpoint.scrapedData.length;
  }

  private summary(completed: boolean): RandomCrawlSummary {
    return {
      mode: 'random',
      completed,
      totalPages: this.collected(),
      stats: this.snapshotStats()
    };
  }
}
