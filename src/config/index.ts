import * as dotenv from 'dotenv';
import logger from '../utils/logger';

// Load environment variables always
const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

const config = {
  projectName: process.env.PROJECT_NAME || 'WikiAsk',
  projectVersion: process.env.PROJECT_VERSION || '0.1.0',
  server: {
    port: Number(process.env.PORT) || 8000,
    nodeEnv: process.env.NODE_ENV || 'development',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  security: {
    corsOrigin: process.env.CORS_ORIGIN || '*',
  },
  wiki: {
    baseUrl: process.env.WIKI_BASE_URL || 'https://wiki.fosscell.org',
    name: process.env.WIKI_NAME || 'FOSSCELL Wiki',
  },
  crawler: {
    concurrency: Number(process.env.CRAWL_CONCURRENCY) || 50,
    timeout: Number(process.env.CRAWL_TIMEOUT_MS) || 30000, // 30 seconds
    batchDelayMs: Number(process.env.CRAWL_BATCH_DELAY_MS) || 500,
    userAgent:
      process.env.CRAWL_USER_AGENT ||
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36',
    startOldid: Number(process.env.CRAWL_START_OLDID) || 1,
    endOldid: Number(process.env.CRAWL_END_OLDID) || 2606,
    saveEvery: Number(process.env.CRAWL_SAVE_EVERY) || 50,
    targetPages: Number(process.env.CRAWL_TARGET_PAGES) || 1000,
    checkpointEvery: Number(process.env.CRAWL_CHECKPOINT_EVERY) || 10,
    refillDuplicates: process.env.CRAWL_REFILL_DUPLICATES === 'true',
    maxIdleBatches: Number(process.env.CRAWL_MAX_IDLE_BATCHES) || 50,
  },
  storage: {
    corpusFile: process.env.CORPUS_FILE || 'wiki_data.json',
    randomCorpusFile: process.env.RANDOM_CORPUS_FILE || 'wiki_random_data.json',
    checkpointFile: process.env.CHECKPOINT_FILE || 'scraper_checkpoint.json',
    summaryFile: process.env.SUMMARY_FILE || 'wiki_summary.txt',
  },
  generator: {
    url: process.env.GENERATOR_URL || 'http://localhost:5000/generate',
    timeout: Number(process.env.GENERATOR_TIMEOUT_MS) || 30000,
  },
  chat: {
    topN: Number(process.env.CHAT_TOP_N) || 10,
  },
};

export default config;
