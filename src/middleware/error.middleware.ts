import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { EngineError, QueryValidationError, RateLimitExceededError, errorMessage } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';

export function errorMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof EngineError) {
    if (err instanceof RateLimitExceededError) {
      res.setHeader('Retry-After', String(err.retryAfterSeconds));
    }
    const level = err.status >= 500 ? 'error' : 'warn';
    logger[level]('http:engine_error', {
      correlationId: req.correlationId,
      path: req.path,
      status: err.status,
      code: err.code,
      error: err.message,
    });
    const issues = err instanceof QueryValidationError ? err.issues : undefined;
    res.status(err.status).json(createErrorResponse(err.message, issues, err.code));
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json(createErrorResponse('Request body is not valid JSON', undefined, 'invalid_json'));
    return;
  }

  logger.error('http:unhandled_error', {
    correlationId: req.correlationId,
    path: req.path,
    error: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'internal_error'));
}
