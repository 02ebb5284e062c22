import fs from 'fs';
import os from 'os';
import path from 'path';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { ICorpusStore } from '../interfaces/ICorpusStore';
import { ICheckpointStore } from '../interfaces/ICheckpointStore';
import { CheckpointState, CorpusState, CrawlerConfig, FetchResult, FetchTarget, Page } from '../interfaces/types';
import { NetworkError } from '../errors';
import { PageUtils } from '../utils/PageUtils';
import { StateUtils } from '../utils/StateUtils';

export const TEST_BASE_URL = 'https://wiki.test';

export const noSleep = async (): Promise<void> => undefined;

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'wiki-ask-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testCrawlerConfig(dir: string, overrides: Partial<CrawlerConfig> = {}): CrawlerConfig {
  return {
    baseUrl: TEST_BASE_URL,
    concurrency: 5,
    timeout: 1000,
    userAgent: 'test-agent',
    batchDelayMs: 0,
    startOldid: 1,
    endOldid: 12,
    saveEvery: 50,
    targetPages: 10,
    checkpointEvery: 10,
    refillDuplicates: false,
    maxIdleBatches: 50,
    corpusFile: path.join(dir, 'corpus.json'),
    randomCorpusFile: path.join(dir, 'random.json'),
    checkpointFile: path.join(dir, 'checkpoint.json'),
    summaryFile: path.join(dir, 'summary.txt'),
    ...overrides
  };
}

export function makeOldidPage(oldid: number, overrides: Partial<Page> = {}): Page {
  return PageUtils.createPage({
    id: String(oldid),
    oldid,
    title: `Page ${oldid}`,
    url: `${TEST_BASE_URL}/index.php?oldid=${oldid}`,
    content: `content of page ${oldid}`,
    categories: [],
    scrapedAt: 1700000000,
    ...overrides
  });
}

export function makeRandomPage(slug: string): Page {
  const url = `${TEST_BASE_URL}/index.php/${slug}`;
  return PageUtils.createPage({
    id: url,
    title: slug,
    url,
    content: `about ${slug}`,
    categories: ['Random'],
    scrapedAt: 1700000000
  });
}

/**
 * Fetcher that answers from a script and records every target it was asked for
 */
export class ScriptedFetcher implements IPageFetcher {
  readonly calls: FetchTarget[] = [];

  constructor(private readonly respond: (target: FetchTarget, call: number) => FetchResult | Promise<FetchResult>) {}

  async fetch(target: FetchTarget): Promise<FetchResult> {
    const call = this.calls.length;
    this.calls.push(target);
    return this.respond(target, call);
  }
}

/**
 * Serves `Page N` for every oldid except the failing ones
 */
export function oldidFetcher(failing: readonly number[] = []): ScriptedFetcher {
  return new ScriptedFetcher(target => {
    if (target.kind !== 'oldid') {
      throw new Error('unexpected random fetch');
    }
    if (failing.includes(target.oldid)) {
      return { ok: false, error: new NetworkError('HTTP 404', `${TEST_BASE_URL}/index.php?oldid=${target.oldid}`, 404) };
    }
    return { ok: true, page: makeOldidPage(target.oldid) };
  });
}

/**
 * Serves random pages named by the given sequence of slugs, in call order
 */
export function randomFetcher(slugs: readonly string[]): ScriptedFetcher {
  return new ScriptedFetcher((_, call) => {
    const slug = slugs[call];
    if (slug === undefined) {
      return { ok: false, error: new NetworkError('script exhausted', `${TEST_BASE_URL}/random`) };
    }
    return { ok: true, page: makeRandomPage(slug) };
  });
}

/**
 * In-memory corpus store that remembers what each save contained
 */
export class MemoryCorpusStore implements ICorpusStore {
  readonly saves: Array<{ pageIds: string[]; lastOldid: number }> = [];

  constructor(private persisted: CorpusState = StateUtils.emptyCorpusState()) {}

  load(): CorpusState {
    return { ...this.persisted, pages: [...this.persisted.pages] };
  }

  save(state: CorpusState): void {
    this.saves.push({ pageIds: state.pages.map(page => page.id), lastOldid: state.lastOldid });
    this.persisted = { ...state, pages: [...state.pages], totalPages: state.pages.length };
  }
}

/**
 * In-memory checkpoint store that remembers every write
 */
export class MemoryCheckpointStore implements ICheckpointStore {
  readonly saves: Array<{ pages: number; urls: number }> = [];
  readonly finals: Page[][] = [];
  cleared = 0;

  constructor(private persisted: readonly Page[] = []) {}

  load(): CheckpointState {
    return StateUtils.rebuildCheckpointState(this.persisted).state;
  }

  save(state: CheckpointState): void {
    this.saves.push({ pages: state.scrapedData.length, urls: state.scrapedUrls.size });
    this.persisted = [...state.scrapedData];
  }

  writeFinal(pages: readonly Page[]): void {
    this.finals.push([...pages]);
    this.persisted = [...pages];
  }

  clear(): void {
    this.cleared += 1;
  }
}
