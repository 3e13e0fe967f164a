import type { NextFunction, Request, Response } from 'express';
import { isMailboxError } from '../errors/mailbox.errors';

/**
 * Global error handler middleware
 * MailboxError carries its own status and code; anything else is a 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isMailboxError(err)) {
    if (err.statusCode >= 500) {
      console.error('Error:', { code: err.code, message: err.message, path: req.path, method: req.method });
    }
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal Server Error';
  console.error('Error:', {
    message,
    statusCode: 500,
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
    method: req.method,
  });

  // Don't leak error details in production
  res.status(500).json({
    error: process.env.NODE_ENV === 'development' ? message : 'Internal Server Error',
    code: 'internal_error',
  });
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not Found',
    path: req.path,
  });
}
