#!/usr/bin/env node
/**
 * Wiki Chat CLI Script
 *
 * Ask questions about the crawled wiki from the terminal, either once with
 * `--question` or in an interactive session.
 *
 * @example
 * ```
 * npm run chat -- --question "How do I set up docker?"
 * npm run chat
 * ```
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import inquirer from 'inquirer';
import config from '../config';
import logger from '../utils/logger';
import { ChatService } from '../services/chat.service';
import { CorpusService } from '../services/corpus.service';
import { HttpTextGenerator } from '../services/text-generator.service';

const EXIT_WORDS = new Set(['quit', 'exit', 'bye', 'q']);

async function runInteractive(chat: ChatService): Promise<void> {
  console.log(`🤖 ${config.wiki.name} AI Chatbot`);
  console.log(`📚 Loaded ${chat.pageCount} wiki pages`);
  console.log("Type 'quit', 'exit', or 'bye' to stop");

  for (;;) {
    const { question } = await inquirer.prompt<{ question: string }>({
      type: 'input',
      name: 'question',
      message: 'You:'
    });

    const trimmed = question.trim();
    if (EXIT_WORDS.has(trimmed.toLowerCase())) {
      console.log('👋 Goodbye! Thanks for chatting!');
      return;
    }
    if (!trimmed) {
      continue;
    }

    const answer = await chat.ask(trimmed);
    console.log(`🤖 AI: ${answer}`);
  }
}

async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .usage('Usage: $0 [--question <text>] [options]')
    .option('question', {
      type: 'string',
      alias: 'q',
      describe: 'Ask one question and exit'
    })
    .option('corpus', {
      type: 'string',
      default: config.storage.corpusFile,
      describe: 'Corpus file to answer from'
    })
    .option('top', {
      type: 'number',
      default: config.chat.topN,
      describe: 'Number of pages given to the generator as context'
    })
    .help()
    .alias('help', 'h')
    .parseSync();

  const pages = CorpusService.loadPages(argv.corpus);
  const chat = new ChatService(pages, new HttpTextGenerator(config.generator.url, config.generator.timeout), {
    topN: argv.top,
    wikiName: config.wiki.name
  });

  if (argv.question !== undefined) {
    console.log(await chat.ask(argv.question));
    return;
  }
  await runInteractive(chat);
}

process.on('SIGINT', () => {
  console.log('\n👋 Goodbye!');
  process.exit(0);
});

main().catch(error => {
  logger.error(`Chat failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
