import type { Request, Response, NextFunction, RequestHandler } from 'express';
import crypto from 'node:crypto';

/**
 * Constant-time comparison of two API keys.
 */
export function apiKeyMatches(candidate: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(candidate).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Bearer token authentication against the gateway's configured API key.
 */
export function authenticate(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({
        success: false,
        error: 'Unauthorized: Missing or invalid Authorization header',
        code: 'UNAUTHORIZED',
      });
      return;
    }

    if (!apiKeyMatches(authHeader.substring(7), apiKey)) {
      res.status(401).json({
        success: false,
        error: 'Unauthorized: Invalid API key',
        code: 'UNAUTHORIZED',
      });
      return;
    }

    next();
  };
}
