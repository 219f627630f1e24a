import type { Request, Response, NextFunction } from 'express';
import { InvalidPortError, PersistenceError } from '../models/errors.js';
import { logger } from '../services/logger.js';

// Request logging
export function requestLogger(req: Request, _res: Response, next: NextFunction): void {
  logger.info({ method: req.method, url: req.url }, 'incoming request');
  next();
}

// JSON error handler
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  logger.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'Internal server error' });
}

// Validate required body fields
export function validateBody(requiredFields: string[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.body || typeof req.body !== 'object') {
      res.status(400).json({ error: 'Request body must be a JSON object' });
      return;
    }
    for (const field of requiredFields) {
      if (req.body[field] === undefined || req.body[field] === null || req.body[field] === '') {
        res.status(400).json({ error: `Missing required field: ${field}` });
        return;
      }
    }
    next();
  };
}

// Map store errors to responses; anything else goes to the error handler
export function sendStoreError(err: unknown, res: Response, next: NextFunction): void {
  if (err instanceof InvalidPortError) {
    res.status(400).json({ error: err.message, code: err.code, invalid: err.invalid });
    return;
  }
  if (err instanceof PersistenceError) {
    logger.error({ err }, 'persistence failure');
    res.status(500).json({ error: err.message, code: err.code });
    return;
  }
  next(err);
}
