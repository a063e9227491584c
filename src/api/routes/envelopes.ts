import { Router } from 'express';
import { z } from 'zod';
import { validate, sendValidationError } from '../middleware/validate.js';
import { ENVELOPE_STATUSES, type SignatureEnvelope, type SignatureEnvelopePort } from '../../providers/types.js';

// ─── Schemas ─────────────────────────────────────────────────────────

const createEnvelopeSchema = z.object({
  id: z.string().uuid().optional(),
  title: z.string().min(1).max(500),
  description: z.string().max(5000).optional(),
  createdBy: z.string().min(1).optional(),
});

const updateEnvelopeSchema = z.object({
  title: z.string().min(1).max(500).optional(),
  description: z.string().max(5000).optional(),
});

const sendEnvelopeSchema = z.object({
  sentBy: z.string().min(1).optional(),
});

const voidEnvelopeSchema = z.object({
  reason: z.string().max(1000).optional(),
  voidedBy: z.string().min(1).optional(),
});

const listEnvelopesSchema = z.object({
  status: z.enum(ENVELOPE_STATUSES).optional(),
  createdBy: z.string().min(1).optional(),
  sentBy: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

type CreateEnvelopeBody = z.infer<typeof createEnvelopeSchema>;
type UpdateEnvelopeBody = z.infer<typeof updateEnvelopeSchema>;
type SendEnvelopeBody = z.infer<typeof sendEnvelopeSchema>;
type VoidEnvelopeBody = z.infer<typeof voidEnvelopeSchema>;

// ─── Routes ──────────────────────────────────────────────────────────

export function envelopeRoutes(provider: SignatureEnvelopePort): Router {
  const router = Router();

  /**
   * POST /api/envelopes
   * Create an envelope on the provider.
   */
  router.post('/', validate(createEnvelopeSchema), async (req, res) => {
    const body: CreateEnvelopeBody = req.body;
    const envelope = await provider.createEnvelope(body);
    res.status(201).json({ success: true, data: envelope });
  });

  /**
   * GET /api/envelopes
   * List envelopes by status, creator or sender (provider-wide otherwise).
   */
  router.get('/', async (req, res) => {
    const result = listEnvelopesSchema.safeParse(req.query);
    if (!result.success) {
      sendValidationError(res, result.error.issues);
      return;
    }

    const { status, createdBy, sentBy, limit } = result.data;
    let envelopes: SignatureEnvelope[];
    if (status) {
      envelopes = await provider.getEnvelopesByStatus(status, limit);
    } else if (createdBy) {
      envelopes = await provider.getEnvelopesByCreator(createdBy, limit);
    } else if (sentBy) {
      envelopes = await provider.getEnvelopesBySender(sentBy, limit);
    } else {
      envelopes = await provider.getEnvelopesByProvider(provider.providerId, limit);
    }

    res.json({ success: true, data: envelopes });
  });

  /**
   * GET /api/envelopes/:id
   */
  router.get('/:id', async (req, res) => {
    const envelope = await provider.getEnvelope(req.params.id);
    res.json({ success: true, data: envelope });
  });

  /**
   * PUT /api/envelopes/:id
   */
  router.put('/:id', validate(updateEnvelopeSchema), async (req, res) => {
    const body: UpdateEnvelopeBody = req.body;
    const envelope = await provider.updateEnvelope({ ...body, id: req.params.id });
    res.json({ success: true, data: envelope });
  });

  /**
   * DELETE /api/envelopes/:id
   * Forget the envelope locally; the remote request is not touched.
   */
  router.delete('/:id', async (req, res) => {
    await provider.deleteEnvelope(req.params.id);
    res.status(204).end();
  });

  /**
   * POST /api/envelopes/:id/send
   */
  router.post('/:id/send', validate(sendEnvelopeSchema), async (req, res) => {
    const body: SendEnvelopeBody = req.body;
    const envelope = await provider.sendEnvelope(req.params.id, body.sentBy);
    res.json({ success: true, data: envelope });
  });

  /**
   * POST /api/envelopes/:id/void
   */
  router.post('/:id/void', validate(voidEnvelopeSchema), async (req, res) => {
    const body: VoidEnvelopeBody = req.body;
    const envelope = await provider.voidEnvelope(req.params.id, body.reason, body.voidedBy);
    res.json({ success: true, data: envelope });
  });

  return router;
}
