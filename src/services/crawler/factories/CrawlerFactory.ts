import { ICrawler } from '../interfaces/ICrawler';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { CrawlMode, CrawlerConfig } from '../interfaces/types';
import { Semaphore } from '../implementations/Semaphore';
import { WikiPageFetcher } from '../implementations/WikiPageFetcher';
import { JsonCorpusStore } from '../implementations/JsonCorpusStore';
import { CheckpointStore } from '../implementations/CheckpointStore';
import { SystematicCrawler } from '../implementations/SystematicCrawler';
import { RandomDiscoveryCrawler } from '../implementations/RandomDiscoveryCrawler';
import { Sleeper } from '../implementations/BaseCrawler';

/**
 * Wires a crawler together from one configuration value: one semaphore
 * per crawler, shared by all of its fetches.
 */
export class CrawlerFactory {
  constructor(
    private readonly config: CrawlerConfig,
    private readonly sleep?: Sleeper
  ) {}

  createFetcher(): IPageFetcher {
    return new WikiPageFetcher(this.config, new Semaphore(this.config.concurrency));
  }

  createSystematicCrawler(fetcher: IPageFetcher = this.createFetcher()): SystematicCrawler {
    return new SystematicCrawler(this.config, fetcher, new JsonCorpusStore(this.config.corpusFile), this.sleep);
  }

  createRandomDiscoveryCrawler(fetcher: IPageFetcher = this.createFetcher()): RandomDiscoveryCrawler {
    const store = new CheckpointStore({
      checkpointFile: this.config.checkpointFile,
      randomCorpusFile: this.config.randomCorpusFile,
      summaryFile: this.config.summaryFile
    });
    return new RandomDiscoveryCrawler(this.config, fetcher, store, this.sleep);
  }

  /**
   * Get a crawler for the given mode
   */
  create(mode: CrawlMode, fetcher?: IPageFetcher): ICrawler {
    return mode === 'systematic'
      ? this.createSystematicCrawler(fetcher)
      : this.createRandomDiscoveryCrawler(fetcher);
  }
}
