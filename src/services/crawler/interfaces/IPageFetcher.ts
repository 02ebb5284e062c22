import { FetchResult, FetchTarget } from './types';

/**
 * Interface for page fetchers.
 * A fetch never rejects: network and extraction failures come back as
 * `{ ok: false }` results so one bad page cannot abort a batch.
 */
export interface IPageFetcher {
  /**
   * Fetch and extract one page
   * @param target An oldid to load, or a random page draw
   */
  fetch(target: FetchTarget): Promise<FetchResult>;
}
