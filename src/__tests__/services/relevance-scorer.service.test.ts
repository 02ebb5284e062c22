import {
  RelevanceScorerService,
  countOccurrences,
  rankPages,
  scorePage,
  wholeWordPattern
} from '../../services/relevance-scorer.service';
import { PageUtils } from '../../services/crawler/utils/PageUtils';
import { Page } from '../../services/crawler/interfaces/types';

function wikiPage(title: string, content: string, categories: string[] = []): Page {
  return PageUtils.createPage({
    id: title,
    title,
    url: `https://wiki.test/index.php/${encodeURIComponent(title)}`,
    content,
    categories,
    scrapedAt: 0
  });
}

describe('Relevance scorer', () => {
  const dockerSetup = wikiPage('Docker Setup', 'docker container deployment guide', ['DevOps']);
  const randomTopic = wikiPage('Random Topic', 'unrelated text docker mentioned once');
  const docker = [{ term: 'docker', weight: 10 }];

  describe('countOccurrences', () => {
    it('should count non-overlapping matches', () => {
      expect(countOccurrences('aaaa', 'aa')).toBe(2);
      expect(countOccurrences('abc', '')).toBe(0);
    });
  });

  describe('wholeWordPattern', () => {
    it('should match whole words in any script', () => {
      expect(wholeWordPattern('straße').test('die straße hier')).toBe(true);
      expect(wholeWordPattern('straße').test('straßen')).toBe(false);
      expect(wholeWordPattern('вики').test('моя вики')).toBe(true);
    });

    it('should need a word character beyond a keyword that ends in punctuation', () => {
      expect(wholeWordPattern('c++').test('c++ basics')).toBe(false);
      expect(wholeWordPattern('c++').test('c++x')).toBe(true);
    });
  });

  describe('scorePage', () => {
    it('should add title, content and title-word points for a titled page', () => {
      // substring 200 + content 20 + whole word in title 250 + leading content 50 + title word 30
      expect(scorePage(dockerSetup, docker)).toBe(550);
    });

    it('should score a content-only mention from the content terms alone', () => {
      expect(scorePage(randomTopic, docker)).toBe(70);
    });

    it('should give category matches their own points', () => {
      expect(scorePage(wikiPage('Guide', '', ['DevOps']), [{ term: 'devops', weight: 1 }])).toBe(15);
    });

    it('should only give whole-word content points within the first 200 words', () => {
      const content = `${'filler '.repeat(200)}target`;

      expect(scorePage(wikiPage('Notes', content), [{ term: 'target', weight: 1 }])).toBe(2);
    });

    it('should treat regular expression characters in keywords literally', () => {
      expect(scorePage(wikiPage('C++ basics', ''), [{ term: 'c++', weight: 1 }])).toBe(20);
    });

    it('should treat accented letters as part of a word', () => {
      // substring 20 + whole word in title 25 + title word 3
      expect(scorePage(wikiPage('Café Guide', ''), [{ term: 'café', weight: 1 }])).toBe(48);
      // content 2 + leading content 5
      expect(scorePage(wikiPage('Notes', 'über alles'), [{ term: 'über', weight: 1 }])).toBe(7);
      // content occurrence only: "cafés" continues the word
      expect(scorePage(wikiPage('Notes', 'cafés'), [{ term: 'café', weight: 1 }])).toBe(2);
    });

    it('should grow with keyword weight', () => {
      const light = scorePage(dockerSetup, [{ term: 'docker', weight: 1 }]);
      const heavy = scorePage(dockerSetup, [{ term: 'docker', weight: 2 }]);

      expect(light).toBe(55);
      expect(heavy).toBe(110);
      expect(scorePage(dockerSetup, [{ term: 'kubernetes', weight: 9 }])).toBe(0);
    });

    it('should rank an exact title match above a content mention', () => {
      const exact = wikiPage('Docker', '');
      const mention = wikiPage('Notes', 'docker');
      const keywords = [{ term: 'docker', weight: 1 }];

      expect(scorePage(exact, keywords)).toBe(78);
      expect(scorePage(mention, keywords)).toBe(7);
    });
  });

  describe('rankPages', () => {
    it('should rank the titled page above the passing mention', () => {
      const ranked = rankPages([randomTopic, dockerSetup], docker, 10);

      expect(ranked.map(result => [result.page.title, result.score])).toEqual([
        ['Docker Setup', 550],
        ['Random Topic', 70]
      ]);
    });

    it('should drop pages without a match and cut to topN', () => {
      const unrelated = wikiPage('Gardening', 'tomatoes');

      expect(rankPages([unrelated, randomTopic, dockerSetup], docker, 1).map(result => result.page.title)).toEqual(['Docker Setup']);
      expect(rankPages([unrelated], docker, 5)).toEqual([]);
      expect(rankPages([dockerSetup], docker, 0)).toEqual([]);
    });

    it('should keep corpus order for equal scores', () => {
      const first = wikiPage('First', 'docker');
      const second = wikiPage('Second', 'docker');

      expect(rankPages([first, second], docker, 2).map(result => result.page.title)).toEqual(['First', 'Second']);
    });
  });

  describe('RelevanceScorerService', () => {
    it('should return the top pages only', () => {
      const service = new RelevanceScorerService();

      expect(service.topPages([randomTopic, dockerSetup], docker)).toEqual([dockerSetup, randomTopic]);
    });
  });
});
