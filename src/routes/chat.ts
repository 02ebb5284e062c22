import { Router } from 'express';
import logger from '../utils/logger';
import { validateChatRequest, ChatRequestBody } from '../middleware/chatValidator';

/**
 * Anything that can answer a chat message
 */
export interface ChatResponder {
  ask(question: string): Promise<string>;
}

export function createChatRouter(responder: ChatResponder): Router {
  const router = Router();

  router.post('/', validateChatRequest, async (req, res, next) => {
    const { message }: ChatRequestBody = req.body;
    try {
      const response = await responder.ask(message);
      res.status(200).json({ response });
    } catch (error) {
      logger.error(`Chat request failed: ${error instanceof Error ? error.message : String(error)}`);
      next(error);
    }
  });

  return router;
}
