import { ICorpusStore } from '../interfaces/ICorpusStore';
import { CorpusState } from '../interfaces/types';
import { ParseError } from '../errors';
import { corpusFileSchema, describeSchemaError, fromPersistedPages, toPersistedPage } from '../schemas';
import { FileUtils } from '../utils/FileUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { PageUtils } from '../utils/PageUtils';
import { StateUtils } from '../utils/StateUtils';

/**
 * JSON file store for systematic crawls:
 * `{ pages, total_pages, last_updated, last_oldid }`
 */
export class JsonCorpusStore implements ICorpusStore {
  private readonly logger = LoggingUtils.createTaggedLogger('store');

  constructor(private readonly filePath: string) {}

  load(): CorpusState {
    let raw: unknown;
    try {
      raw = FileUtils.readJson(this.filePath);
    } catch (error) {
      this.logger.error(`Error loading ${this.filePath}, starting fresh: ${describe(error)}`);
      return StateUtils.emptyCorpusState();
    }

    if (raw === null) {
      this.logger.info(`No existing ${this.filePath} found, starting fresh`);
      return StateUtils.emptyCorpusState();
    }

    const parsed = corpusFileSchema.safeParse(raw);
    if (!parsed.success) {
      const error = new ParseError(`Unexpected corpus layout: ${describeSchemaError(parsed.error)}`, this.filePath);
      this.logger.error(`Error loading ${this.filePath}, starting fresh: ${error.message}`);
      return StateUtils.emptyCorpusState();
    }

    const { pages, dropped } = fromPersistedPages(parsed.data.pages);
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} malformed page entries from ${this.filePath}`);
    }

    this.logger.info(`Loaded ${pages.length} pages from ${this.filePath} (last oldid: ${parsed.data.last_oldid})`);
    return {
      pages,
      totalPages: pages.length,
      lastUpdated: parsed.data.last_updated ?? 0,
      lastOldid: parsed.data.last_oldid
    };
  }

  save(state: CorpusState): void {
    state.totalPages = state.pages.length;
    state.lastUpdated = PageUtils.nowSeconds();

    FileUtils.writeJsonAtomic(this.filePath, {
      pages: state.pages.map(toPersistedPage),
      total_pages: state.totalPages,
      last_updated: state.lastUpdated,
      last_oldid: state.lastOldid
    });
    this.logger.info(`Saved ${state.totalPages} pages to ${this.filePath} (last oldid: ${state.lastOldid})`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
