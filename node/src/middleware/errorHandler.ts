// node/src/middleware/errorHandler.ts — last-resort mapping of thrown errors to JSON responses
import type { Request, Response, NextFunction } from 'express';
import { AppError, errorMessage } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';
import { logger } from '@/services/logger';
import { correlationIdOf } from './correlation';

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('http:error', { path: req.path, code: err.code, error: err.message, correlationId: correlationIdOf(res) });
    }
    res.status(err.statusCode).json(createErrorResponse(err.code, err.message));
    return;
  }
  logger.error('http:unhandled', { path: req.path, error: errorMessage(err), correlationId: correlationIdOf(res) });
  res.status(500).json(createErrorResponse('INTERNAL', errorMessage(err)));
}
