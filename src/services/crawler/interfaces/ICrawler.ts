import { CrawlProgress, CrawlSummary, CrawlerState } from './types';

/**
 * Interface for crawler implementations.
 */
export interface ICrawler<TSummary extends CrawlSummary = CrawlSummary> {
  /**
   * Run the crawl from the last persisted position until done or stopped.
   * State is persisted one last time however the run ends.
   * @param signal Optional abort signal, checked between batches
   */
  crawl(signal?: AbortSignal): Promise<TSummary>;

  /**
   * Ask the crawler to finish its current batch and stop
   */
  stop(): void;

  getState(): CrawlerState;

  getProgress(): CrawlProgress;
}
