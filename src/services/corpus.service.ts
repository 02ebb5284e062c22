import { z } from 'zod';
import logger from '../utils/logger';
import { Page } from './crawler/interfaces/types';
import { fromPersistedPages } from './crawler/schemas';
import { FileUtils } from './crawler/utils/FileUtils';

/**
 * Both corpus layouts (systematic and random discovery) keep their pages
 * under `pages`; other keys are carried through untouched
 */
const corpusPagesSchema = z.object({
  pages: z.array(z.unknown()),
}).passthrough();

const titledEntrySchema = z.object({ title: z.string() }).passthrough();

export interface CurationResult {
  removed: number;
  remaining: number;
}

/**
 * Read-only access to a persisted corpus, plus the one curation step that
 * rewrites it.
 */
export class CorpusService {
  /**
   * Load the pages of a corpus file
   * @param filePath Corpus file in either layout
   * @returns The pages, or an empty list when the file is missing or unreadable
   */
  static loadPages(filePath: string): Page[] {
    let raw: unknown;
    try {
      raw = FileUtils.readJson(filePath);
    } catch (error) {
      logger.error(`Error loading wiki data: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    if (raw === null) {
      logger.error(`Wiki data file ${filePath} not found`);
      return [];
    }

    const parsed = corpusPagesSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error(`Wiki data file ${filePath} has no pages list`);
      return [];
    }

    const { pages, dropped } = fromPersistedPages(parsed.data.pages);
    if (dropped > 0) {
      logger.warn(`Skipped ${dropped} malformed pages in ${filePath}`);
    }
    logger.info(`Loaded ${pages.length} wiki pages`);
    return pages;
  }

  /**
   * Rewrite a corpus without the pages whose title contains `needle`
   * (case-sensitive)
   * @throws Error when the needle is empty or the file is not a corpus
   * @throws PersistenceError when the rewrite fails
   */
  static removePagesByTitle(filePath: string, needle: string): CurationResult {
    if (!needle) {
      throw new Error('Title filter must not be empty');
    }

    const raw = FileUtils.readJson(filePath);
    if (raw === null) {
      throw new Error(`Corpus file ${filePath} not found`);
    }
    const parsed = corpusPagesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Corpus file ${filePath} has no pages list`);
    }

    const kept = parsed.data.pages.filter(entry => {
      const titled = titledEntrySchema.safeParse(entry);
      return !(titled.success && titled.data.title.includes(needle));
    });
    const removed = parsed.data.pages.length - kept.length;

    const updated: Record<string, unknown> = { ...parsed.data, pages: kept };
    if ('total_pages' in parsed.data) {
      updated.total_pages = kept.length;
    }
    FileUtils.writeJsonAtomic(filePath, updated);

    logger.info(`Removed ${removed} pages with "${needle}" in the title, ${kept.length} remain`);
    return { removed, remaining: kept.length };
  }
}
