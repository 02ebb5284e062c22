import fs from 'fs';
import { CrawlerFactory } from '../CrawlerFactory';
import { SystematicCrawler } from '../../implementations/SystematicCrawler';
import { RandomDiscoveryCrawler } from '../../implementations/RandomDiscoveryCrawler';
import { WikiPageFetcher } from '../../implementations/WikiPageFetcher';
import {
  makeTempDir,
  noSleep,
  oldidFetcher,
  randomFetcher,
  removeTempDir,
  testCrawlerConfig
} from '../../test-utils/fixtures';

describe('CrawlerFactory', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should create a crawler for each mode', () => {
    const factory = new CrawlerFactory(testCrawlerConfig(dir), noSleep);

    expect(factory.create('systematic')).toBeInstanceOf(SystematicCrawler);
    expect(factory.create('random')).toBeInstanceOf(RandomDiscoveryCrawler);
    expect(factory.createFetcher()).toBeInstanceOf(WikiPageFetcher);
  });

  it('should persist a systematic crawl to the corpus file', async () => {
    const config = testCrawlerConfig(dir);
    const factory = new CrawlerFactory(config, noSleep);

    await factory.createSystematicCrawler(oldidFetcher([4])).crawl();

    const corpus = JSON.parse(fs.readFileSync(config.corpusFile, 'utf-8'));
    expect(corpus.total_pages).toBe(11);
    expect(corpus.last_oldid).toBe(12);
  });

  it('should finish a random crawl once and leave a rerun with nothing to do', async () => {
    const config = testCrawlerConfig(dir, { targetPages: 3 });
    const factory = new CrawlerFactory(config, noSleep);

    await factory.createRandomDiscoveryCrawler(randomFetcher(['a', 'b', 'c'])).crawl();

    expect(fs.existsSync(config.randomCorpusFile)).toBe(true);
    expect(fs.existsSync(config.summaryFile)).toBe(true);
    expect(fs.existsSync(config.checkpointFile)).toBe(false);

    const fetcher = randomFetcher([]);
    const summary = await factory.createRandomDiscoveryCrawler(fetcher).crawl();

    expect(summary).toMatchObject({ completed: true, totalPages: 3 });
    expect(fetcher.calls).toHaveLength(0);
  });
});
