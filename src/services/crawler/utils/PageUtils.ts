import { Page } from '../interfaces/types';

export interface PageFields {
  id: string;
  oldid?: number;
  title: string;
  url: string;
  content: string;
  categories: readonly string[];
  scrapedAt?: number;
}

/**
 * Utilities for building and measuring pages
 */
export class PageUtils {
  /**
   * Collapse every run of whitespace to one space and trim the ends
   */
  static normalizeWhitespace(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
  }

  /**
   * Number of whitespace-separated tokens
   */
  static countWords(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
  }

  /**
   * Current time in seconds since the epoch, the unit persisted files use
   */
  static nowSeconds(): number {
    return Date.now() / 1000;
  }

  /**
   * Build a frozen page; the word count is always derived from the content
   * @param fields Page fields
   * @returns The immutable page
   */
  static createPage(fields: PageFields): Page {
    const page: Page = {
      id: fields.id,
      ...(fields.oldid !== undefined ? { oldid: fields.oldid } : {}),
      title: fields.title,
      url: fields.url,
      content: fields.content,
      categories: Object.freeze(PageUtils.uniqueInOrder(fields.categories)),
      wordCount: PageUtils.countWords(fields.content),
      scrapedAt: fields.scrapedAt ?? PageUtils.nowSeconds()
    };
    return Object.freeze(page);
  }

  static uniqueInOrder(values: readonly string[]): string[] {
    return Array.from(new Set(values));
  }
}
