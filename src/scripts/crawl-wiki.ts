#!/usr/bin/env node
/**
 * Crawl Wiki CLI Script
 *
 * Builds or resumes the local wiki corpus. Systematic mode walks a range of
 * revision ids; random mode draws random pages until a target count of
 * distinct pages is reached. Ctrl+C stops after the current batch and saves.
 *
 * @example
 * ```
 * npm run crawl -- --mode systematic --start 1 --end 2606 --concurrency 50
 * npm run crawl -- --mode random --target 500
 * ```
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from '../utils/logger';
import { buildCrawlerConfig } from '../config/crawler';
import { CrawlerFactory } from '../services/crawler/factories/CrawlerFactory';
import { CrawlMode, CrawlerConfig } from '../services/crawler/interfaces/types';
import { LogLevel, LoggingUtils } from '../services/crawler/utils/LoggingUtils';

interface CliArgs {
  mode: CrawlMode;
  start?: number;
  end?: number;
  target?: number;
  concurrency?: number;
  delay?: number;
  'refill-duplicates': boolean;
  verbose: boolean;
  check: boolean;
}

function parseArgs(): CliArgs {
  return yargs(hideBin(process.argv))
    .usage('Usage: $0 --mode <systematic|random> [options]')
    .option('mode', {
      choices: ['systematic', 'random'] as const,
      default: 'systematic' as const,
      describe: 'Walk a revision id range, or draw random pages'
    })
    .option('start', {
      type: 'number',
      describe: 'First oldid (systematic mode)'
    })
    .option('end', {
      type: 'number',
      describe: 'Last oldid, inclusive (systematic mode)'
    })
    .option('target', {
      type: 'number',
      describe: 'Number of distinct pages to collect (random mode)'
    })
    .option('concurrency', {
      type: 'number',
      alias: 'c',
      describe: 'Maximum concurrent requests'
    })
    .option('delay', {
      type: 'number',
      describe: 'Milliseconds to wait between batches'
    })
    .option('refill-duplicates', {
      type: 'boolean',
      default: false,
      describe: 'Retry slots lost to duplicate random draws within the same batch'
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable more detailed logging'
    })
    .option('check', {
      type: 'boolean',
      default: false,
      describe: 'Validate the configuration and exit without crawling'
    })
    .help()
    .alias('help', 'h')
    .parseSync();
}

function toOverrides(args: CliArgs): Partial<CrawlerConfig> {
  const overrides: { -readonly [K in keyof CrawlerConfig]?: CrawlerConfig[K] } = {
    refillDuplicates: args['refill-duplicates']
  };
  if (args.start !== undefined) overrides.startOldid = args.start;
  if (args.end !== undefined) overrides.endOldid = args.end;
  if (args.target !== undefined) overrides.targetPages = args.target;
  if (args.concurrency !== undefined) overrides.concurrency = args.concurrency;
  if (args.delay !== undefined) overrides.batchDelayMs = args.delay;
  return overrides;
}

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.verbose) {
    logger.level = 'debug';
    LoggingUtils.setLogLevel(LogLevel.DEBUG);
    logger.debug('Verbose logging enabled');
  }

  const crawlerConfig = buildCrawlerConfig(toOverrides(args));

  if (args.check) {
    console.log('✅ Configuration validated successfully');
    console.log(`  Mode: ${args.mode}`);
    console.log(`  Base URL: ${crawlerConfig.baseUrl}`);
    console.log(`  Concurrency: ${crawlerConfig.concurrency}`);
    if (args.mode === 'systematic') {
      console.log(`  Range: oldid ${crawlerConfig.startOldid} to ${crawlerConfig.endOldid}`);
      console.log(`  Save every: ${crawlerConfig.saveEvery} pages -> ${crawlerConfig.corpusFile}`);
    } else {
      console.log(`  Target: ${crawlerConfig.targetPages} pages`);
      console.log(`  Checkpoint every: ${crawlerConfig.checkpointEvery} pages -> ${crawlerConfig.checkpointFile}`);
    }
    return;
  }

  const crawler = new CrawlerFactory(crawlerConfig).create(args.mode);
  const controller = new AbortController();

  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      logger.warn('Second interrupt received, exiting without waiting');
      process.exit(130);
    }
    logger.info('Interrupt received, finishing current batch and saving...');
    controller.abort();
    crawler.stop();
  });

  const summary = await crawler.crawl(controller.signal);
  const { stats } = summary;
  logger.info(
    `${summary.completed ? 'Completed' : 'Stopped'}: ${summary.totalPages} pages in corpus ` +
    `(${stats.accepted} new, ${stats.ignored} duplicates, ${stats.failed} failed over ${stats.batches} batches)`
  );
  if (summary.mode === 'systematic' && !summary.completed) {
    logger.info(`Stopped at oldid ${summary.lastOldid}, run again to continue`);
  }
}

main().catch(error => {
  logger.error(`Crawl failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
