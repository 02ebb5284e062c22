import {
  ChatService,
  EMPTY_QUESTION_REPLY,
  NO_CONTEXT_TEXT,
  formatContextPages
} from '../../services/chat.service';
import { PageUtils } from '../../services/crawler/utils/PageUtils';
import { mockDeep, DeepMockProxy } from 'jest-mock-extended';
import { ITextGenerator } from '../../types/query';

const dockerSetup = PageUtils.createPage({
  id: '1',
  oldid: 1,
  title: 'Docker Setup',
  url: 'https://wiki.test/index.php?oldid=1',
  content: 'docker container deployment guide',
  categories: ['DevOps', 'Tools'],
  scrapedAt: 0
});

const gardening = PageUtils.createPage({
  id: '2',
  oldid: 2,
  title: 'Gardening',
  url: 'https://wiki.test/index.php?oldid=2',
  content: 'tomatoes need sun',
  categories: [],
  scrapedAt: 0
});

const options = { topN: 10, wikiName: 'Test Wiki' };

describe('ChatService', () => {
  let generator: DeepMockProxy<ITextGenerator>;

  beforeEach(() => {
    generator = mockDeep<ITextGenerator>();
  });

  describe('formatContextPages', () => {
    it('should render each page as a numbered block', () => {
      expect(formatContextPages([dockerSetup, gardening], 'Test Wiki')).toBe(
        'Relevant Test Wiki Pages:\n\n' +
        '=== Page 1: Docker Setup ===\n' +
        'Categories: DevOps, Tools\n' +
        'URL: https://wiki.test/index.php?oldid=1\n' +
        'Content: docker container deployment guide\n\n' +
        '=== Page 2: Gardening ===\n' +
        'URL: https://wiki.test/index.php?oldid=2\n' +
        'Content: tomatoes need sun\n\n'
      );
    });

    it('should say so when no page matched', () => {
      expect(formatContextPages([], 'Test Wiki')).toBe(NO_CONTEXT_TEXT);
    });
  });

  describe('ask', () => {
    it('should answer an empty question without calling the generator', async () => {
      const service = new ChatService([dockerSetup], generator, options);

      await expect(service.ask('   ')).resolves.toBe(EMPTY_QUESTION_REPLY);
      expect(generator.generate).not.toHaveBeenCalled();
    });

    it('should answer from the relevant pages only', async () => {
      generator.generate
        .mockResolvedValueOnce('docker:10')
        .mockResolvedValueOnce('Use the setup guide.');
      const service = new ChatService([gardening, dockerSetup], generator, options);

      const answer = await service.ask('  How do I set up docker? ');

      expect(answer).toBe('Use the setup guide.');
      expect(generator.generate).toHaveBeenCalledTimes(2);
      const prompt = generator.generate.mock.calls[1][0];
      expect(prompt).toContain('=== Page 1: Docker Setup ===');
      expect(prompt).not.toContain('Gardening');
      expect(prompt).toContain('User Question: How do I set up docker?\n');
    });

    it('should skip keyword extraction when the corpus is empty', async () => {
      generator.generate.mockResolvedValue('I do not know.');
      const service = new ChatService([], generator, options);

      await service.ask('anything');

      expect(generator.generate).toHaveBeenCalledTimes(1);
      expect(generator.generate.mock.calls[0][0]).toContain(NO_CONTEXT_TEXT);
    });

    it('should turn a generator failure into an error reply', async () => {
      generator.generate.mockRejectedValue(new Error('service unavailable'));
      const service = new ChatService([dockerSetup], generator, options);

      await expect(service.ask('docker')).resolves.toBe('AI Error: service unavailable');
    });
  });

  describe('pageCount', () => {
    it('should report the corpus size', () => {
      expect(new ChatService([dockerSetup, gardening], generator, options).pageCount).toBe(2);
    });
  });
});
