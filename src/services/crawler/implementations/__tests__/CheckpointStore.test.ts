import fs from 'fs';
import path from 'path';
import { CheckpointStore } from '../CheckpointStore';
import { PageUtils } from '../../utils/PageUtils';
import { StateUtils } from '../../utils/StateUtils';
import { FileUtils } from '../../utils/FileUtils';
import { PersistenceError } from '../../errors';
import { makeRandomPage, makeTempDir, removeTempDir } from '../../test-utils/fixtures';

describe('CheckpointStore', () => {
  let dir: string;
  let paths: { checkpointFile: string; randomCorpusFile: string; summaryFile: string };
  let store: CheckpointStore;

  beforeEach(() => {
    dir = makeTempDir();
    paths = {
      checkpointFile: path.join(dir, 'checkpoint.json'),
      randomCorpusFile: path.join(dir, 'random.json'),
      summaryFile: path.join(dir, 'summary.txt')
    };
    store = new CheckpointStore(paths);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeTempDir(dir);
  });

  describe('load', () => {
    it('should start fresh when nothing was persisted', () => {
      const state = store.load();

      expect(state.scrapedData).toEqual([]);
      expect(state.scrapedUrls.size).toBe(0);
    });

    it('should resume from a saved checkpoint', () => {
      const { state } = StateUtils.rebuildCheckpointState(['a', 'b'].map(makeRandomPage));

      store.save(state);
      const loaded = store.load();

      expect(loaded.scrapedData.map(page => page.title)).toEqual(['a', 'b']);
      expect(Array.from(loaded.scrapedUrls)).toEqual(['https://wiki.test/index.php/a', 'https://wiki.test/index.php/b']);
      expect(loaded.lastSaved).toBe(state.lastSaved);
      expect(state.lastSaved).toBeGreaterThan(0);
    });

    it('should rebuild the url set from the pages and drop duplicates', () => {
      const a = { title: 'a', url: 'https://wiki.test/a' };
      fs.writeFileSync(paths.checkpointFile, JSON.stringify({
        scraped_data: [a, a, { title: 'b', url: 'https://wiki.test/b' }],
        scraped_urls: ['https://wiki.test/a', 'https://wiki.test/b', 'https://wiki.test/c'],
        last_saved: 5,
        total_pages_scraped: 3
      }));

      const state = store.load();

      expect(state.scrapedData).toHaveLength(2);
      expect(Array.from(state.scrapedUrls)).toEqual(['https://wiki.test/a', 'https://wiki.test/b']);
      expect(state.scrapedData[0].id).toBe('https://wiki.test/a');
      expect(state.lastSaved).toBe(5);
    });

    it('should fall back to the finished corpus when there is no checkpoint', () => {
      store.writeFinal(['a', 'b', 'c'].map(makeRandomPage));

      expect(store.load().scrapedData.map(page => page.title)).toEqual(['a', 'b', 'c']);
    });

    it('should prefer the checkpoint over the finished corpus', () => {
      store.writeFinal(['a', 'b', 'c'].map(makeRandomPage));
      store.save(StateUtils.rebuildCheckpointState([makeRandomPage('d')]).state);

      expect(store.load().scrapedData.map(page => page.title)).toEqual(['d']);
    });

    it('should ignore an unreadable checkpoint', () => {
      fs.writeFileSync(paths.checkpointFile, 'not json');

      expect(store.load().scrapedData).toEqual([]);
    });
  });

  describe('save', () => {
    it('should keep the previous checkpoint intact when the rename fails', () => {
      store.save(StateUtils.rebuildCheckpointState(['a', 'b'].map(makeRandomPage)).state);
      const before = fs.readFileSync(paths.checkpointFile, 'utf-8');
      jest.spyOn(FileUtils, 'commit').mockImplementation(() => {
        throw new Error('rename failed');
      });

      const { state } = StateUtils.rebuildCheckpointState(['a', 'b', 'c'].map(makeRandomPage));
      expect(() => store.save(state)).toThrow(PersistenceError);

      jest.restoreAllMocks();
      expect(fs.readFileSync(paths.checkpointFile, 'utf-8')).toBe(before);
      expect(store.load().scrapedData.map(page => page.title)).toEqual(['a', 'b']);
      expect(fs.readdirSync(dir)).toEqual(['checkpoint.json']);
    });
  });

  describe('writeFinal and clear', () => {
    it('should write the final corpus, its summary and remove the checkpoint', () => {
      const pages = ['a', 'b'].map(makeRandomPage);
      store.save(StateUtils.rebuildCheckpointState(pages).state);

      store.writeFinal(pages);
      store.clear();

      const corpus = JSON.parse(fs.readFileSync(paths.randomCorpusFile, 'utf-8'));
      expect(Object.keys(corpus)).toEqual(['scraped_at', 'total_pages', 'pages']);
      expect(corpus.total_pages).toBe(2);
      expect(fs.readFileSync(paths.summaryFile, 'utf-8')).toContain('1. a\n   Words: 2\n');
      expect(fs.existsSync(paths.checkpointFile)).toBe(false);
    });

    it('should tolerate clearing a missing checkpoint', () => {
      expect(() => store.clear()).not.toThrow();
    });
  });

  describe('formatSummary', () => {
    it('should list each page with at most three categories', () => {
      const pages = [
        PageUtils.createPage({
          id: 'https://wiki.test/Lighthouse',
          title: 'Lighthouse',
          url: 'https://wiki.test/Lighthouse',
          content: 'tall white tower',
          categories: ['Places', 'Coast', 'Towers', 'Landmarks'],
          scrapedAt: 0
        }),
        PageUtils.createPage({ id: 'https://wiki.test/Bare', title: 'Bare', url: 'https://wiki.test/Bare', content: '', categories: [], scrapedAt: 0 })
      ];

      expect(CheckpointStore.formatSummary(pages, 0)).toBe([
        'Wiki Scraping Summary',
        'Generated: 1970-01-01T00:00:00.000Z',
        'Total pages: 2',
        '',
        '1. Lighthouse',
        '   Words: 3',
        '   URL: https://wiki.test/Lighthouse',
        '   Categories: Places, Coast, Towers',
        '',
        '2. Bare',
        '   Words: 0',
        '   URL: https://wiki.test/Bare',
        ''
      ].join('\n'));
    });
  });
});
