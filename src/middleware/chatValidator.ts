import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppError } from './errorHandler';

export const MAX_MESSAGE_LENGTH = 2000;

export const chatRequestSchema = z.object({
  message: z.string({
    required_error: 'message is required',
    invalid_type_error: 'message must be a string',
  }).max(MAX_MESSAGE_LENGTH, `message must be at most ${MAX_MESSAGE_LENGTH} characters`),
});

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;

/**
 * Reject chat requests whose body is not `{ message: string }`; the parsed
 * body replaces `req.body`
 */
export const validateChatRequest = (req: Request, res: Response, next: NextFunction) => {
  const parsed = chatRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => issue.message).join('; ');
    return next(new AppError(message, 400));
  }

  req.body = parsed.data;
  return next();
};
