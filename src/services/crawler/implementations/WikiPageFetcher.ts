import axios, { AxiosInstance } from 'axios';
import { URL } from 'url';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { IConcurrencyGate } from '../interfaces/IConcurrencyGate';
import { CrawlerConfig, FetchResult, FetchTarget } from '../interfaces/types';
import { ExtractionError, NetworkError } from '../errors';
import { MediaWikiExtractor } from './MediaWikiExtractor';
import { LoggingUtils } from '../utils/LoggingUtils';
import { PageUtils } from '../utils/PageUtils';

export type FetcherConfig = Pick<CrawlerConfig, 'baseUrl' | 'timeout' | 'userAgent'>;

export const MAX_REDIRECTS = 5;

interface RawResponse {
  status: number;
  body: string;
  /** URL the body was finally served from */
  url: string;
}

/**
 * Fetches wiki pages over HTTP with axios.
 * Every request runs inside the shared concurrency gate and every failure
 * is returned as a result value. Redirects are followed here rather than
 * by the HTTP client so the page URL is always the one that served it.
 */
export class WikiPageFetcher implements IPageFetcher {
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');

  constructor(
    private readonly config: FetcherConfig,
    private readonly gate: IConcurrencyGate,
    private readonly extractor: IContentExtractor = new MediaWikiExtractor(),
    private readonly http: AxiosInstance = axios
  ) {}

  /**
   * URL for a fetch target
   */
  buildUrl(target: FetchTarget): string {
    const base = this.config.baseUrl.replace(/\/+$/, '');
    if (target.kind === 'oldid') {
      return `${base}/index.php?oldid=${target.oldid}`;
    }
    return `${base}/index.php?title=Special:Random`;
  }

  async fetch(target: FetchTarget): Promise<FetchResult> {
    return this.gate.run(() => this.fetchInSlot(target));
  }

  private async fetchInSlot(target: FetchTarget): Promise<FetchResult> {
    const requestUrl = this.buildUrl(target);
    const startTime = Date.now();

    try {
      const response = await this.get(requestUrl);

      if (response.status !== 200) {
        this.logger.warn(`Failed to fetch ${response.url}: HTTP ${response.status}`);
        return { ok: false, error: new NetworkError(`HTTP ${response.status}`, response.url, response.status) };
      }

      const extracted = this.extractor.extract(response.body);
      if (extracted.title === null && !extracted.hasContentContainer) {
        this.logger.warn(`No wiki page structure at ${response.url}`);
        return { ok: false, error: new ExtractionError('Missing title and content containers', response.url) };
      }

      const page = PageUtils.createPage({
        id: target.kind === 'oldid' ? String(target.oldid) : response.url,
        oldid: target.kind === 'oldid' ? target.oldid : undefined,
        title: extracted.title || (target.kind === 'oldid' ? `Page ${target.oldid}` : response.url),
        url: response.url,
        content: extracted.content,
        categories: extracted.categories,
      });

      this.logger.debug(`${page.title} (${page.wordCount} words) in ${Date.now() - startTime}ms`);
      return { ok: true, page };
    } catch (error) {
      if (error instanceof NetworkError) {
        this.logger.warn(`Error fetching ${requestUrl}: ${error.message}`);
        return { ok: false, error };
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Error fetching ${requestUrl}: ${message}`);
      return { ok: false, error: new NetworkError(message, requestUrl, undefined, error) };
    }
  }

  /**
   * GET a URL, following up to MAX_REDIRECTS redirects
   */
  private async get(url: string): Promise<RawResponse> {
    let currentUrl = url;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.http.get<string>(currentUrl, {
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept': 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        timeout: this.config.timeout,
        maxRedirects: 0,
        responseType: 'text',
        validateStatus: () => true,
      });

      const location: unknown = response.headers['location'];
      if (response.status >= 300 && response.status < 400 && typeof location === 'string' && location) {
        currentUrl = new URL(location, currentUrl).toString();
        continue;
      }

      return { status: response.status, body: String(response.data ?? ''), url: currentUrl };
    }

    throw new NetworkError(`Too many redirects (more than ${MAX_REDIRECTS})`, url);
  }
}
