import { Request, Response } from 'express';
import { validateChatRequest, MAX_MESSAGE_LENGTH } from '../../middleware/chatValidator';
import { AppError } from '../../middleware/errorHandler';

describe('validateChatRequest', () => {
  const res = {} as Response;

  const run = (body: unknown) => {
    const req = { body } as Request;
    const next = jest.fn();
    validateChatRequest(req, res, next);
    return { req, next };
  };

  it('should pass a valid body through', () => {
    const { req, next } = run({ message: 'hello', extra: true });

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({ message: 'hello' });
  });

  it('should reject an overlong message with a 400 error', () => {
    const { next } = run({ message: 'x'.repeat(MAX_MESSAGE_LENGTH + 1) });

    const error = next.mock.calls[0][0];
    expect(error).toBeInstanceOf(AppError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('message must be at most 2000 characters');
  });
});
