import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

export interface RateLimitSettings {
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

/**
 * Rate limiter for API routes (per client IP).
 */
export function createApiRateLimiter(settings: RateLimitSettings): RequestHandler {
  return rateLimit({
    windowMs: settings.rateLimitWindowMs,
    limit: settings.rateLimitMaxRequests,
    message: { success: false, error: 'Too many requests, please try again later', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
