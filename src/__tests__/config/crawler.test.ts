import { buildCrawlerConfig } from '../../config/crawler';
import { ConfigError } from '../../services/crawler/errors';

describe('buildCrawlerConfig', () => {
  it('should apply overrides over the defaults and freeze the result', () => {
    const config = buildCrawlerConfig({ baseUrl: 'https://wiki.test', concurrency: 4, startOldid: 10, endOldid: 20 });

    expect(config).toMatchObject({ baseUrl: 'https://wiki.test', concurrency: 4, startOldid: 10, endOldid: 20 });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should reject a concurrency below one', () => {
    expect(() => buildCrawlerConfig({ concurrency: 0 })).toThrow(ConfigError);
    expect(() => buildCrawlerConfig({ concurrency: 0 }))
      .toThrow('Invalid crawler configuration: concurrency: Number must be greater than 0');
  });

  it('should reject a range that starts after it ends', () => {
    expect(() => buildCrawlerConfig({ startOldid: 30, endOldid: 20 }))
      .toThrow('Invalid crawler configuration: startOldid: startOldid must not exceed endOldid');
  });
});
