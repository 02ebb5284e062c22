import { ICheckpointStore } from '../interfaces/ICheckpointStore';
import { CheckpointState, Page } from '../interfaces/types';
import { ParseError } from '../errors';
import {
  checkpointFileSchema,
  describeSchemaError,
  finalCorpusFileSchema,
  fromPersistedPages,
  toPersistedPage
} from '../schemas';
import { FileUtils } from '../utils/FileUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { PageUtils } from '../utils/PageUtils';
import { StateUtils } from '../utils/StateUtils';

export interface CheckpointStorePaths {
  checkpointFile: string;
  randomCorpusFile: string;
  summaryFile: string;
}

/**
 * Number of categories listed per page in the summary
 */
const SUMMARY_CATEGORY_LIMIT = 3;

/**
 * File store for random-discovery crawls.
 *
 * While a run is in progress its state lives in the checkpoint file
 * `{ scraped_data, scraped_urls, last_saved, total_pages_scraped }`.
 * A finished run replaces it with the final corpus
 * `{ scraped_at, total_pages, pages }` and a plain-text summary.
 */
export class CheckpointStore implements ICheckpointStore {
  private readonly logger = LoggingUtils.createTaggedLogger('store');

  constructor(private readonly paths: CheckpointStorePaths) {}

  load(): CheckpointState {
    const fromCheckpoint = this.loadCheckpoint();
    if (fromCheckpoint) {
      return fromCheckpoint;
    }

    const fromFinal = this.loadFinalCorpus();
    if (fromFinal) {
      return fromFinal;
    }

    this.logger.info('No checkpoint or previous corpus found, starting fresh');
    return StateUtils.emptyCheckpointState();
  }

  save(state: CheckpointState): void {
    const lastSaved = PageUtils.nowSeconds();
    FileUtils.writeJsonAtomic(this.paths.checkpointFile, {
      scraped_data: state.scrapedData.map(toPersistedPage),
      scraped_urls: Array.from(state.scrapedUrls),
      last_saved: lastSaved,
      total_pages_scraped: state.scrapedData.length
    });
    state.lastSaved = lastSaved;
    this.logger.info(`Checkpoint saved: ${state.scrapedData.length} pages`);
  }

  writeFinal(pages: readonly Page[]): void {
    const scrapedAt = PageUtils.nowSeconds();
    FileUtils.writeJsonAtomic(this.paths.randomCorpusFile, {
      scraped_at: scrapedAt,
      total_pages: pages.length,
      pages: pages.map(toPersistedPage)
    });
    FileUtils.writeTextAtomic(this.paths.summaryFile, CheckpointStore.formatSummary(pages, scrapedAt));
    this.logger.info(`Saved ${pages.length} pages to ${this.paths.randomCorpusFile} and ${this.paths.summaryFile}`);
  }

  clear(): void {
    if (FileUtils.remove(this.paths.checkpointFile)) {
      this.logger.info(`Removed checkpoint ${this.paths.checkpointFile}`);
    }
  }

  /**
   * Human-readable listing of a finished corpus
   * @param pages The corpus pages
   * @param scrapedAt Seconds since the epoch
   */
  static formatSummary(pages: readonly Page[], scrapedAt: number): string {
    const lines = [
      'Wiki Scraping Summary',
      `Generated: ${new Date(scrapedAt * 1000).toISOString()}`,
      `Total pages: ${pages.length}`,
      ''
    ];

    pages.forEach((page, index) => {
      lines.push(`${index + 1}. ${page.title}`);
      lines.push(`   Words: ${page.wordCount}`);
      lines.push(`   URL: ${page.url}`);
      if (page.categories.length > 0) {
        lines.push(`   Categories: ${page.categories.slice(0, SUMMARY_CATEGORY_LIMIT).join(', ')}`);
      }
      lines.push('');
    });

    return lines.join('\n');
  }

  private loadCheckpoint(): CheckpointState | null {
    const raw = this.readFile(this.paths.checkpointFile);
    if (raw === null) {
      return null;
    }

    const parsed = checkpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logParseError(this.paths.checkpointFile, describeSchemaError(parsed.error));
      return null;
    }

    const { pages, dropped } = fromPersistedPages(parsed.data.scraped_data);
    const { state, duplicates } = StateUtils.rebuildCheckpointState(pages, parsed.data.last_saved ?? 0);
    if (dropped > 0 || duplicates > 0) {
      this.logger.warn(`Checkpoint cleanup: ${dropped} malformed and ${duplicates} duplicate pages dropped`);
    }
    if (parsed.data.scraped_urls.length !== state.scrapedUrls.size) {
      this.logger.warn(
        `Rebuilt url set from scraped pages (${parsed.data.scraped_urls.length} persisted, ${state.scrapedUrls.size} rebuilt)`
      );
    }

    this.logger.info(`Resuming from checkpoint with ${state.scrapedData.length} pages`);
    return state;
  }

  private loadFinalCorpus(): CheckpointState | null {
    const raw = this.readFile(this.paths.randomCorpusFile);
    if (raw === null) {
      return null;
    }

    const parsed = finalCorpusFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logParseError(this.paths.randomCorpusFile, describeSchemaError(parsed.error));
      return null;
    }

    const { pages } = fromPersistedPages(parsed.data.pages);
    const { state } = StateUtils.rebuildCheckpointState(pages, parsed.data.scraped_at ?? 0);
    this.logger.info(`Loaded ${state.scrapedData.length} pages from finished corpus ${this.paths.randomCorpusFile}`);
    return state;
  }

  private readFile(filePath: string): unknown {
    try {
      return FileUtils.readJson(filePath);
    } catch (error) {
      this.logParseError(filePath, error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  private logParseError(filePath: string, detail: string): void {
    const error = new ParseError(`Ignoring unreadable ${filePath}: ${detail}`, filePath);
    this.logger.error(error.message);
  }
}
