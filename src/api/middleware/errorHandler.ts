import type { Request, Response, NextFunction } from 'express';
import { CircuitOpenError, GatewayError } from '../../errors.js';

/**
 * Map gateway errors to HTTP responses. Anything else is a 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof GatewayError) {
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      console.error(`[API] ${err.name}: ${err.message}`);
    }
    if (err instanceof CircuitOpenError && err.retryAfterMs !== undefined) {
      res.setHeader('Retry-After', String(Math.max(1, Math.ceil(err.retryAfterMs / 1000))));
    }
    res.status(status).json({ success: false, error: err.message, code: err.code });
    return;
  }

  console.error('Unhandled error:', err);
  res.status(500).json({
    success: false,
    error: process.env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
  });
}
