import { Router } from 'express';
import type { SignatureEnvelopePort } from '../../providers/types.js';

export const VERSION = '0.1.0';

/**
 * GET /health: liveness plus the state of the provider's circuit breaker.
 * Reports `degraded` while the breaker is not closed.
 */
export function healthRoutes(provider: SignatureEnvelopePort): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const { providerId, circuit } = provider.getHealth();

    res.json({
      success: true,
      data: {
        status: circuit.state === 'CLOSED' ? 'ok' : 'degraded',
        version: VERSION,
        provider: providerId,
        circuit,
        timestamp: new Date().toISOString(),
      },
    });
  });

  return router;
}
