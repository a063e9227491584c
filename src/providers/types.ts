/**
 * Provider-neutral envelope model and the port every e-signature provider
 * adapter implements.
 */

import type { CircuitBreakerMetrics } from '../resilience/circuitBreaker.js';

// ─── Envelope ───────────────────────────────────────────────────────

export const ENVELOPE_STATUSES = ['DRAFT', 'SENT', 'COMPLETED', 'VOIDED', 'EXPIRED'] as const;

export type EnvelopeStatus = (typeof ENVELOPE_STATUSES)[number];

export interface SignatureEnvelope {
  /** Local envelope id */
  readonly id: string;
  /** Identifier of the provider that holds the envelope */
  readonly provider: string;
  readonly title?: string;
  readonly description?: string;
  readonly status: EnvelopeStatus;
  /** Identifier of the signature request on the remote platform */
  readonly externalEnvelopeId: string;
  readonly createdAt: Date;
  readonly createdBy?: string;
}

export interface CreateEnvelopeInput {
  /** Local id to use; generated when omitted */
  id?: string;
  title?: string;
  description?: string;
  createdBy?: string;
}

export interface UpdateEnvelopeInput {
  id: string;
  title?: string;
  description?: string;
}

// ─── Port ───────────────────────────────────────────────────────────

export interface ProviderHealth {
  providerId: string;
  circuit: CircuitBreakerMetrics;
}

export interface SignatureEnvelopePort {
  /** Provider identifier (logalty, ...) */
  readonly providerId: string;

  /** Human-readable provider name */
  readonly displayName: string;

  /** Create the envelope on the remote platform and register its id */
  createEnvelope(input: CreateEnvelopeInput): Promise<SignatureEnvelope>;

  /** Fetch the current state of an envelope from the remote platform */
  getEnvelope(envelopeId: string): Promise<SignatureEnvelope>;

  /** Update an envelope */
  updateEnvelope(input: UpdateEnvelopeInput): Promise<SignatureEnvelope>;

  /** Forget an envelope */
  deleteEnvelope(envelopeId: string): Promise<void>;

  /** Send an envelope to its signers */
  sendEnvelope(envelopeId: string, sentBy?: string): Promise<SignatureEnvelope>;

  /** Void (cancel) an envelope */
  voidEnvelope(envelopeId: string, reason?: string, voidedBy?: string): Promise<SignatureEnvelope>;

  getEnvelopesByStatus(status: EnvelopeStatus, limit?: number): Promise<SignatureEnvelope[]>;

  getEnvelopesByCreator(createdBy: string, limit?: number): Promise<SignatureEnvelope[]>;

  getEnvelopesBySender(sentBy: string, limit?: number): Promise<SignatureEnvelope[]>;

  getEnvelopesByProvider(providerId: string, limit?: number): Promise<SignatureEnvelope[]>;

  /** Report the state of the remote connection */
  getHealth(): ProviderHealth;
}
