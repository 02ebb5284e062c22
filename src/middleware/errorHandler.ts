import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

export class AppError extends Error {
  statusCode: number;
  status: string;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.status = `${statusCode}`.startsWith('4') ? 'fail' : 'error';
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * express.json() rejects an unparseable body with a SyntaxError tagged
 * `entity.parse.failed`
 */
function isMalformedBody(err: Error): boolean {
  return err.name === 'SyntaxError' && 'type' in err && err.type === 'entity.parse.failed';
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
) => {
  const known = isMalformedBody(err) ? new AppError('Request body is not valid JSON', 400) : err;

  if (known instanceof AppError) {
    logger.warn(`${req.method} ${req.originalUrl} -> ${known.statusCode}: ${known.message}`);

    return res.status(known.statusCode).json({
      status: known.status,
      message: known.message,
    });
  }

  logger.error(`${req.method} ${req.originalUrl} failed`, known);

  return res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
};
