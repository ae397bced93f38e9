import type { Request, Response, NextFunction } from 'express';
import { toError } from '../errors.js';

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  console.error('[Server] Error:', err);

  const error = toError(err);

  // Handle specific error types (body-parser sets status on malformed bodies)
  const status = statusOf(err);
  if (status) {
    return res.status(status).json({
      error: error.message || 'An error occurred'
    });
  }

  // Default to 500 internal server error
  res.status(500).json({
    error: error.message || 'Internal server error'
  });
}
