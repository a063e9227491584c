import 'express-async-errors';
import express, { type Express } from 'express';
import helmet from 'helmet';
import { authenticate } from './api/middleware/auth.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import { createApiRateLimiter, type RateLimitSettings } from './api/middleware/rateLimit.js';
import { envelopeRoutes } from './api/routes/envelopes.js';
import { healthRoutes } from './api/routes/health.js';
import type { SignatureEnvelopePort } from './providers/types.js';

export interface AppOptions extends RateLimitSettings {
  /** API key callers present as a Bearer token */
  apiKey: string;
  /** Active e-signature provider */
  provider: SignatureEnvelopePort;
}

/**
 * Build the HTTP surface over a provider adapter.
 */
export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  // Health check (no auth required)
  app.use(healthRoutes(options.provider));

  app.use(
    '/api/envelopes',
    createApiRateLimiter(options),
    authenticate(options.apiKey),
    envelopeRoutes(options.provider),
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use(errorHandler);

  return app;
}
