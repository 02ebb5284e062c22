import * as cheerio from 'cheerio';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { ExtractedPage } from '../interfaces/types';
import { PageUtils } from '../utils/PageUtils';

/**
 * Boxes inside the content container that carry navigation rather than
 * article text
 */
const NOISE_SELECTOR = [
  'div.navbox', 'div.infobox', 'div.toc',
  'table.navbox', 'table.infobox', 'table.toc',
  'script', 'style'
].join(', ');

/**
 * Content extractor for MediaWiki page bodies, using Cheerio.
 *
 * - title: `h1#firstHeading`, else the document `<title>`
 * - content: text of `#mw-content-text` with noise boxes removed
 * - categories: text of every link pointing at a `Category:` page
 */
export class MediaWikiExtractor implements IContentExtractor {
  extract(html: string): ExtractedPage {
    const $ = cheerio.load(html);

    const heading = $('h1#firstHeading').first();
    const documentTitle = $('title').first();
    let title: string | null = null;
    if (heading.length) {
      title = heading.text().trim();
    } else if (documentTitle.length) {
      title = documentTitle.text().trim();
    }

    const container = $('#mw-content-text').first();
    let content = '';
    if (container.length) {
      container.find(NOISE_SELECTOR).remove();
      content = PageUtils.normalizeWhitespace(container.text());
    }

    const categories: string[] = [];
    $('a[href*="Category:"]').each((_, element) => {
      const category = $(element).text().trim();
      if (category && !categories.includes(category)) {
        categories.push(category);
      }
    });

    return {
      title,
      content,
      categories,
      hasContentContainer: container.length > 0
    };
  }
}
