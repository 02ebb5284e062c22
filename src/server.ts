import config from './config';
import logger from './utils/logger';
import { createApp } from './app';
import { ChatService } from './services/chat.service';
import { CorpusService } from './services/corpus.service';
import { HttpTextGenerator } from './services/text-generator.service';

const startServer = () => {
  const pages = CorpusService.loadPages(config.storage.corpusFile);
  const generator = new HttpTextGenerator(config.generator.url, config.generator.timeout);
  const chatService = new ChatService(pages, generator, {
    topN: config.chat.topN,
    wikiName: config.wiki.name,
  });

  const app = createApp(chatService);
  app.listen(config.server.port, () => {
    logger.info(`Web chatbot running at http://localhost:${config.server.port} with ${pages.length} pages`);
  });
};

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (error) => {
  logger.error('Unhandled Rejection:', error);
  process.exit(1);
});

try {
  startServer();
} catch (error) {
  logger.error('Error starting server:', error);
  process.exit(1);
}
