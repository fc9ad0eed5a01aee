import type { Request, Response, NextFunction } from 'express';
import { HttpError, ValidationError, toError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('HTTP');

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ValidationError) {
    return res.status(400).json({
      error: err.message,
      details: err.issues,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.message });
  }

  const error = toError(err);
  logger.error('Unhandled error', { method: req.method, path: req.path, error });

  res.status(500).json({
    error: 'Internal server error'
  });
}
