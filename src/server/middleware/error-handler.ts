/**
 * Express error middleware for the API.
 *
 * Validation failures (and malformed JSON bodies) become 400 responses;
 * everything else is logged and returned as a 500.
 */

import type { Request, Response, NextFunction } from 'express';
import { errorMessage, isValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

function statusOf(err: unknown): number {
  if (isValidationError(err)) return 400;
  // body-parser attaches the HTTP status it wants
  const status = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  const message = errorMessage(err);
  if (status >= 500) {
    log.error(message, { method: req.method, path: req.path });
  } else {
    log.debug(message, { method: req.method, path: req.path, status });
  }
  res.status(status).json({ error: message });
}
