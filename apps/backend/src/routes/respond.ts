import type { Response } from 'express';
import { ConfigError, errorMessage, httpStatusFor } from '../errors.js';

/** Log and send `{ error }` with the status matching the error class. */
export function sendError(res: Response, tag: string, err: unknown): void {
  const status = httpStatusFor(err);
  const message = errorMessage(err);
  console.error(`[${tag}] error:`, message);
  res.status(status).json(
    err instanceof ConfigError ? { error: 'Invalid configuration', violations: err.violations } : { error: message },
  );
}
