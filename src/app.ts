import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import config from './config';
import { createHealthRouter } from './routes/health';
import { createChatRouter } from './routes/chat';
import { createHomeRouter } from './routes/home';
import { AppError, errorHandler } from './middleware/errorHandler';
import { ChatService } from './services/chat.service';

/**
 * Build the HTTP app around a chat service
 */
export function createApp(chatService: ChatService) {
  const app = express();

  // Apply security middleware
  app.use(helmet());
  app.use(cors({
    origin: config.security.corsOrigin,
  }));

  // Parse JSON bodies
  app.use(express.json());

  // Routes
  app.use('/health', createHealthRouter(() => chatService.pageCount));
  app.use('/chat', createChatRouter(chatService));
  app.use(createHomeRouter(() => ({ wikiName: chatService.wikiName, pageCount: chatService.pageCount })));

  app.use((req, res, next) => {
    next(new AppError(`Route ${req.method} ${req.originalUrl} not found`, 404));
  });

  // Error handling - must be after routes
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    errorHandler(err, req, res, next);
  });

  return app;
}
