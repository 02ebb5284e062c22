import { CheckpointState, CorpusState, Page } from '../interfaces/types';

/**
 * Utilities for the in-memory crawl states
 */
export class StateUtils {
  static emptyCorpusState(): CorpusState {
    return { pages: [], totalPages: 0, lastUpdated: 0, lastOldid: 0 };
  }

  static emptyCheckpointState(): CheckpointState {
    return { scrapedData: [], scrapedUrls: new Set(), lastSaved: 0 };
  }

  /**
   * Build a checkpoint state from pages, keeping the first page seen for
   * each url so that the url set and the page list stay the same size
   * @param pages Pages in their persisted order
   * @param lastSaved Timestamp of the persisted state
   * @returns The state and the number of duplicate pages dropped
   */
  static rebuildCheckpointState(pages: readonly Page[], lastSaved = 0): { state: CheckpointState; duplicates: number } {
    const state: CheckpointState = { scrapedData: [], scrapedUrls: new Set(), lastSaved };
    let duplicates = 0;
    for (const page of pages) {
      if (!StateUtils.addCheckpointPage(state, page)) {
        duplicates += 1;
      }
    }
    return { state, duplicates };
  }

  /**
   * Add a page unless its url was already scraped
   * @returns True if the page was added
   */
  static addCheckpointPage(state: CheckpointState, page: Page): boolean {
    if (state.scrapedUrls.has(page.url)) {
      return false;
    }
    state.scrapedUrls.add(page.url);
    state.scrapedData.push(page);
    return true;
  }
}
