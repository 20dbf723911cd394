import { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

/**
 * Tracker error handler: consistent JSON responses. DeskError subclasses carry their own status.
 */
export function errorHandler(
  err: ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode ?? 500;
  const message = statusCode >= 500 && process.env.NODE_ENV === 'production'
    ? 'Internal server error'
    : err.message || 'Internal server error';

  if (statusCode >= 500) {
    logger.error('Tracker', err.message, { stack: err.stack });
  } else {
    logger.warn('Tracker', err.message);
  }

  res.status(statusCode).json({
    error: message,
    ...(err.code ? { code: err.code } : {})
  });
}
