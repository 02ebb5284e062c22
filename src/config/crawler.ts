import { z } from 'zod';
import config from './index';
import { CrawlerConfig } from '../services/crawler/interfaces/types';
import { ConfigError } from '../services/crawler/errors';
import { describeSchemaError } from '../services/crawler/schemas';

const positiveInt = z.number().int().positive();

const crawlerConfigSchema = z.object({
  baseUrl: z.string().url(),
  concurrency: positiveInt,
  timeout: positiveInt,
  userAgent: z.string().min(1),
  batchDelayMs: z.number().int().nonnegative(),
  startOldid: positiveInt,
  endOldid: positiveInt,
  saveEvery: positiveInt,
  targetPages: z.number().int().nonnegative(),
  checkpointEvery: positiveInt,
  refillDuplicates: z.boolean(),
  maxIdleBatches: positiveInt,
  corpusFile: z.string().min(1),
  randomCorpusFile: z.string().min(1),
  checkpointFile: z.string().min(1),
  summaryFile: z.string().min(1),
}).refine(value => value.startOldid <= value.endOldid, {
  message: 'startOldid must not exceed endOldid',
  path: ['startOldid'],
});

/**
 * Defaults taken from the environment-backed application config
 */
export function defaultCrawlerConfig(): CrawlerConfig {
  return {
    baseUrl: config.wiki.baseUrl,
    ...config.crawler,
    ...config.storage,
  };
}

/**
 * Build the frozen configuration a crawler run is constructed with
 * @param overrides Values that win over the environment defaults
 * @throws ConfigError when a value is out of range
 */
export function buildCrawlerConfig(overrides: Partial<CrawlerConfig> = {}): Readonly<CrawlerConfig> {
  const parsed = crawlerConfigSchema.safeParse({ ...defaultCrawlerConfig(), ...overrides });
  if (!parsed.success) {
    throw new ConfigError(`Invalid crawler configuration: ${describeSchemaError(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}
