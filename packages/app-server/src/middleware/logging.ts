/**
 * Request Logging Middleware
 *
 * Logs incoming requests with request IDs for tracing.
 */

import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { StructuredLogger } from '../logger.js';

function headerValue(value: string | string[] | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createRequestLogger(logger: StructuredLogger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    const requestId = headerValue(req.headers['x-request-id']) ?? randomUUID();
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const meta = {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration: Date.now() - start,
        requestId,
      };

      if (res.statusCode >= 500) {
        logger.error(`${req.method} ${req.path} ${res.statusCode}`, undefined, meta);
      } else if (res.statusCode >= 400) {
        logger.warn(`${req.method} ${req.path} ${res.statusCode}`, meta);
      } else if (req.path !== '/healthz') {
        logger.info(`${req.method} ${req.path} ${res.statusCode}`, meta);
      }
    });

    next();
  };
}
