import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../../utils/logger';

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function statusFor(err: Error, res: Response): number {
  if (err instanceof HttpError) return err.statusCode;
  if (err instanceof ZodError) return 400;
  return res.statusCode !== 200 ? res.statusCode : 500;
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const statusCode = statusFor(err, res);

  if (statusCode >= 500) {
    logger.error('Error occurred:', { path: req.path, error: err.message, stack: err.stack });
  } else {
    logger.warn('Request rejected', { path: req.path, statusCode, error: err.message });
  }

  res.status(statusCode).json({
    error: {
      message: err instanceof ZodError ? 'Invalid request' : err.message,
      ...(err instanceof ZodError && { issues: err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) }),
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    },
  });
}
