import { z } from 'zod';
import { Page } from './interfaces/types';
import { PageUtils } from './utils/PageUtils';

/**
 * Page as it appears in every persisted file. Files written by older runs
 * carry no `id`; it is derived from `oldid` or `url` on load.
 */
export const persistedPageSchema = z.object({
  oldid: z.number().int().optional(),
  id: z.string().optional(),
  title: z.string(),
  url: z.string(),
  content: z.string().default(''),
  categories: z.array(z.string()).default([]),
  word_count: z.number().optional(),
  scraped_at: z.number().optional(),
});

export type PersistedPage = z.input<typeof persistedPageSchema>;

export const corpusFileSchema = z.object({
  pages: z.array(z.unknown()).default([]),
  total_pages: z.number().optional(),
  last_updated: z.number().optional(),
  last_oldid: z.number().int().nonnegative().default(0),
});

export const checkpointFileSchema = z.object({
  scraped_data: z.array(z.unknown()).default([]),
  scraped_urls: z.array(z.string()).default([]),
  last_saved: z.number().optional(),
  total_pages_scraped: z.number().optional(),
});

export const finalCorpusFileSchema = z.object({
  scraped_at: z.number().optional(),
  total_pages: z.number().optional(),
  pages: z.array(z.unknown()).default([]),
});

export function toPersistedPage(page: Page): PersistedPage {
  return {
    ...(page.oldid !== undefined ? { oldid: page.oldid } : {}),
    id: page.id,
    title: page.title,
    url: page.url,
    content: page.content,
    categories: [...page.categories],
    word_count: page.wordCount,
    scraped_at: page.scrapedAt,
  };
}

/**
 * Parse one persisted page entry
 * @returns The page, or null when the entry is malformed
 */
export function fromPersistedPage(entry: unknown): Page | null {
  const parsed = persistedPageSchema.safeParse(entry);
  if (!parsed.success) {
    return null;
  }
  const data = parsed.data;
  return PageUtils.createPage({
    id: data.id ?? (data.oldid !== undefined ? String(data.oldid) : data.url),
    oldid: data.oldid,
    title: data.title,
    url: data.url,
    content: data.content,
    categories: data.categories,
    scrapedAt: data.scraped_at ?? 0,
  });
}

/**
 * Parse a list of persisted page entries, dropping malformed ones
 * @returns The pages and how many entries were dropped
 */
export function fromPersistedPages(entries: readonly unknown[]): { pages: Page[]; dropped: number } {
  const pages: Page[] = [];
  let dropped = 0;
  for (const entry of entries) {
    const page = fromPersistedPage(entry);
    if (page) {
      pages.push(page);
    } else {
      dropped += 1;
    }
  }
  return { pages, dropped };
}

export function describeSchemaError(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
