#!/usr/bin/env node
/**
 * Curate Corpus CLI Script
 *
 * Removes every page whose title contains the given text and rewrites the
 * corpus file in place.
 *
 * @example
 * ```
 * npm run curate -- --remove "User talk:"
 * ```
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import inquirer from 'inquirer';
import config from '../config';
import logger from '../utils/logger';
import { CorpusService } from '../services/corpus.service';

async function promptForNeedle(): Promise<string> {
  const { needle } = await inquirer.prompt<{ needle: string }>({
    type: 'input',
    name: 'needle',
    message: 'Enter the text to remove titles from:',
    validate: (input: string) => input.length > 0 ? true : 'Text is required'
  });
  return needle;
}

async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .usage('Usage: $0 [--remove <text>] [--file <corpus.json>]')
    .option('remove', {
      type: 'string',
      describe: 'Drop pages whose title contains this text (case-sensitive)'
    })
    .option('file', {
      type: 'string',
      default: config.storage.corpusFile,
      describe: 'Corpus file to rewrite'
    })
    .help()
    .alias('help', 'h')
    .parseSync();

  const needle = argv.remove ?? await promptForNeedle();
  const result = CorpusService.removePagesByTitle(argv.file, needle);
  console.log(`Removed ${result.removed} pages, ${result.remaining} remain in ${argv.file}`);
}

main().catch(error => {
  logger.error(`Curation failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
