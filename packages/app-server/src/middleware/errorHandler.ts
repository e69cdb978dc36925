/**
 * Error Handler Middleware
 *
 * Catches unhandled errors and returns consistent JSON responses.
 * A URL that cannot be built or a missing configuration value is a
 * programming error: it surfaces as a 500 like any other AppError.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { AppError, NotFoundError } from '../errors.js';
import type { StructuredLogger } from '../logger.js';

export interface ErrorHandlerOptions {
  logger: StructuredLogger;
  /** Include error messages of unexpected 500s in the response (default: not in production) */
  exposeMessages?: boolean;
}

export function createErrorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  const { logger, exposeMessages = process.env.NODE_ENV !== 'production' } = options;

  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const appError = err instanceof AppError
      ? err
      : new AppError(err instanceof Error ? err.message : 'Internal server error');

    logger.error(`Request failed: ${appError.message}`, err, {
      method: req.method,
      path: req.path,
      status: appError.statusCode,
      code: appError.code,
      requestId: res.getHeader('x-request-id'),
    });

    const message = err instanceof AppError || exposeMessages
      ? appError.message
      : 'Internal server error';

    res.status(appError.statusCode).json({
      success: false,
      error: {
        code: appError.code,
        message,
      },
    });
  };
}

/**
 * Not found handler for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}
