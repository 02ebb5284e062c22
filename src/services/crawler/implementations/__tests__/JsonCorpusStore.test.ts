import fs from 'fs';
import path from 'path';
import { JsonCorpusStore } from '../JsonCorpusStore';
import { PersistenceError } from '../../errors';
import { FileUtils } from '../../utils/FileUtils';
import { makeOldidPage, makeTempDir, removeTempDir } from '../../test-utils/fixtures';

describe('JsonCorpusStore', () => {
  let dir: string;
  let file: string;
  let store: JsonCorpusStore;

  beforeEach(() => {
    dir = makeTempDir();
    file = path.join(dir, 'corpus.json');
    store = new JsonCorpusStore(file);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeTempDir(dir);
  });

  describe('load', () => {
    it('should start fresh when there is no file', () => {
      expect(store.load()).toEqual({ pages: [], totalPages: 0, lastUpdated: 0, lastOldid: 0 });
    });

    it('should start fresh when the file is not valid JSON', () => {
      fs.writeFileSync(file, '{"pages": [');

      expect(store.load().pages).toEqual([]);
    });

    it('should start fresh when the file has the wrong layout', () => {
      fs.writeFileSync(file, JSON.stringify({ pages: 'none', last_oldid: 4 }));

      expect(store.load()).toEqual({ pages: [], totalPages: 0, lastUpdated: 0, lastOldid: 0 });
    });

    it('should derive missing ids and drop malformed entries', () => {
      fs.writeFileSync(file, JSON.stringify({
        pages: [
          { oldid: 3, title: 'Three', url: 'https://wiki.test/index.php?oldid=3' },
          { title: 5 }
        ],
        last_oldid: 3
      }));

      const state = store.load();

      expect(state.lastOldid).toBe(3);
      expect(state.pages).toEqual([{
        id: '3',
        oldid: 3,
        title: 'Three',
        url: 'https://wiki.test/index.php?oldid=3',
        content: '',
        categories: [],
        wordCount: 0,
        scrapedAt: 0
      }]);
    });
  });

  describe('save', () => {
    it('should write the corpus layout and read it back', () => {
      store.save({ pages: [makeOldidPage(1), makeOldidPage(2)], totalPages: 0, lastUpdated: 0, lastOldid: 7 });

      const written = JSON.parse(fs.readFileSync(file, 'utf-8'));
      expect(Object.keys(written)).toEqual(['pages', 'total_pages', 'last_updated', 'last_oldid']);
      expect(written.total_pages).toBe(2);
      expect(written.pages[0]).toEqual({
        oldid: 1,
        id: '1',
        title: 'Page 1',
        url: 'https://wiki.test/index.php?oldid=1',
        content: 'content of page 1',
        categories: [],
        word_count: 4,
        scraped_at: 1700000000
      });

      const loaded = store.load();
      expect(loaded.pages.map(page => page.id)).toEqual(['1', '2']);
      expect(loaded.totalPages).toBe(2);
      expect(loaded.lastOldid).toBe(7);
    });

    it('should keep the previous file intact when the write fails', () => {
      store.save({ pages: [makeOldidPage(1)], totalPages: 1, lastUpdated: 0, lastOldid: 1 });
      const before = fs.readFileSync(file, 'utf-8');
      jest.spyOn(FileUtils, 'commit').mockImplementation(() => {
        throw new Error('rename failed');
      });

      expect(() => store.save({ pages: [makeOldidPage(1), makeOldidPage(2)], totalPages: 1, lastUpdated: 0, lastOldid: 2 }))
        .toThrow(PersistenceError);
      expect(fs.readFileSync(file, 'utf-8')).toBe(before);
      expect(fs.readdirSync(dir)).toEqual(['corpus.json']);
    });
  });
});
