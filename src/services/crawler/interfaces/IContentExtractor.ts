import { ExtractedPage } from './types';

/**
 * Interface for turning a wiki page body into structured fields.
 * Implementations are pure: no network, no state.
 */
export interface IContentExtractor {
  /**
   * Extract title, text content and categories from HTML
   * @param html The raw page body
   */
  extract(html: string): ExtractedPage;
}
