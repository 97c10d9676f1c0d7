import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isAppError } from '../domain/errors.js';
import { logger, redactSensitive } from '../infra/logger.js';
import type { Env } from '../infra/env.js';
import { mapErrorToResponse } from './jobMapper.js';

/**
 * Global error handler middleware: AppErrors keep their status code,
 * schema failures are 400, anything else is a 500 with a generic message
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };

    if (isAppError(err)) {
      logger.log(err.statusCode >= 500 ? 'error' : 'warn', 'Application error', {
        code: err.code,
        message: err.message,
        details: redactSensitive(err.details),
        stack: env.NODE_ENV === 'development' && err.statusCode >= 500 ? err.stack : undefined,
        ...context,
      });
      res.status(err.statusCode).json(mapErrorToResponse(err));
      return;
    }

    if (err instanceof ZodError) {
      const issues = err.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      logger.warn('Request validation failed', { issues, ...context });
      res.status(400).json({
        error: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: { issues },
      });
      return;
    }

    // body-parser errors carry the status to send
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status === 400 && err.name === 'SyntaxError') {
      logger.warn('Invalid JSON in request', { message: err.message, ...context });
      res.status(400).json({ error: 'INVALID_JSON', message: 'Invalid JSON in request body' });
      return;
    }
    if (status === 413) {
      res.status(413).json({ error: 'PAYLOAD_TOO_LARGE', message: err.message });
      return;
    }

    logger.error('Unexpected error', {
      message: err.message,
      name: err.name,
      stack: err.stack,
      ...context,
    });
    res.status(500).json({
      error: 'INTERNAL_SERVER_ERROR',
      message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    });
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
