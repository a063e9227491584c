/**
 * Logalty e-signature envelope adapter.
 *
 * Logalty is a Spanish Trust Service Provider offering simple, advanced and
 * qualified electronic signatures under eIDAS. This adapter maps the
 * provider-neutral envelope port onto Logalty signature requests:
 *
 * - every call carries a bearer token from the TokenManager
 * - every remote exchange runs through the fault-tolerance policy
 * - local envelope ids are paired with Logalty request ids in the EnvelopeIdRegistry
 * - Logalty statuses are normalized to the canonical envelope lifecycle
 *
 * The remote platform is authoritative for envelope state; this adapter only
 * reflects it.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { LogaltySettings } from '../../config/index.js';
import { EnvelopeCreationError, RemoteApiError } from '../../errors.js';
import type { FaultTolerancePolicy } from '../../resilience/policy.js';
import type {
  CreateEnvelopeInput,
  EnvelopeStatus,
  ProviderHealth,
  SignatureEnvelope,
  SignatureEnvelopePort,
  UpdateEnvelopeInput,
} from '../types.js';
import type { EnvelopeIdRegistry } from './idRegistry.js';
import { normalizeStatus } from './statusMapper.js';
import type { TokenManager } from './tokenManager.js';
import type { HttpTransport, TransportRequest } from './transport.js';

export const LOGALTY_PROVIDER_ID = 'logalty';

export type LogaltyRequestSettings = Pick<
  LogaltySettings,
  | 'apiVersion'
  | 'defaultEmailSubject'
  | 'defaultEmailMessage'
  | 'defaultSignatureType'
  | 'enableBiometricSignature'
  | 'enableSmsVerification'
  | 'enableVideoIdentification'
>;

export interface LogaltyAdapterDeps {
  settings: LogaltyRequestSettings;
  transport: HttpTransport;
  tokenManager: TokenManager;
  policy: FaultTolerancePolicy;
  idRegistry: EnvelopeIdRegistry;
  /** Clock used for creation timestamps (default: current time) */
  now?: () => Date;
  /** Local id generator (default: UUID v4) */
  generateId?: () => string;
}

/** Body of a Logalty signature request creation */
export interface LogaltySignatureRequest {
  title: string;
  message: string;
  signatureType: string;
  biometricEnabled: boolean;
  smsVerificationEnabled: boolean;
  videoIdentificationEnabled: boolean;
}

const createResponseSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().transform(String)]),
});

const signatureRequestSchema = z.object({
  title: z.string().nullish(),
  message: z.string().nullish(),
  status: z.string().nullish(),
  createdAt: z.string().nullish(),
});

export class LogaltySignatureEnvelopeAdapter implements SignatureEnvelopePort {
  readonly providerId = LOGALTY_PROVIDER_ID;
  readonly displayName = 'Logalty eSignature';

  private readonly settings: LogaltyRequestSettings;
  private readonly transport: HttpTransport;
  private readonly tokenManager: TokenManager;
  private readonly policy: FaultTolerancePolicy;
  private readonly idRegistry: EnvelopeIdRegistry;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: LogaltyAdapterDeps) {
    this.settings = deps.settings;
    this.transport = deps.transport;
    this.tokenManager = deps.tokenManager;
    this.policy = deps.policy;
    this.idRegistry = deps.idRegistry;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? (() => uuidv4());
  }

  // ─── Envelope Lifecycle ─────────────────────────────────────────────

  async createEnvelope(input: CreateEnvelopeInput): Promise<SignatureEnvelope> {
    const request = this.buildSignatureRequest(input);

    const response = await this.call('createEnvelope', {
      method: 'POST',
      path: this.requestsPath(),
      json: { ...request },
    });

    const parsed = createResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new EnvelopeCreationError('Logalty accepted the signature request but returned no request id');
    }

    const remoteId = parsed.data.id;
    const id = input.id ?? this.generateId();
    this.idRegistry.put(id, remoteId);

    console.log(`[LogaltyAdapter] Signature envelope created: ${id} -> ${remoteId}`);

    return snapshot({
      id,
      provider: this.providerId,
      title: request.title,
      description: input.description,
      status: 'DRAFT',
      externalEnvelopeId: remoteId,
      createdAt: this.now(),
      createdBy: input.createdBy,
    });
  }

  async getEnvelope(envelopeId: string): Promise<SignatureEnvelope> {
    const remoteId = this.idRegistry.remoteIdOf(envelopeId);

    const response = await this.call('getEnvelope', {
      method: 'GET',
      path: this.requestsPath(remoteId),
    });

    return this.mapResponseToEnvelope(response, envelopeId, remoteId);
  }

  /**
   * Logalty exposes no update call for signature requests: the changes are
   * not transmitted and the current remote state is returned.
   */
  async updateEnvelope(input: UpdateEnvelopeInput): Promise<SignatureEnvelope> {
    console.log(`[LogaltyAdapter] Update of ${input.id} is not transmitted upstream; returning current state`);
    return this.getEnvelope(input.id);
  }

  /**
   * Local-only: forgets the id pairing, the remote request is left untouched.
   */
  async deleteEnvelope(envelopeId: string): Promise<void> {
    if (this.idRegistry.remove(envelopeId)) {
      console.log(`[LogaltyAdapter] Envelope ${envelopeId} removed from local registry`);
    }
  }

  async sendEnvelope(envelopeId: string, sentBy?: string): Promise<SignatureEnvelope> {
    const remoteId = this.idRegistry.remoteIdOf(envelopeId);

    await this.call(
      'sendEnvelope',
      { method: 'POST', path: `${this.requestsPath(remoteId)}/send` },
      { expectBody: false },
    );

    console.log(`[LogaltyAdapter] Envelope ${envelopeId} sent${sentBy ? ` by ${sentBy}` : ''}`);

    return this.getEnvelope(envelopeId);
  }

  /**
   * The void reason is accepted but Logalty's void call is not wired:
   * the current remote state is returned unchanged.
   */
  async voidEnvelope(envelopeId: string, reason?: string, voidedBy?: string): Promise<SignatureEnvelope> {
    console.log(
      `[LogaltyAdapter] Void of ${envelopeId} requested${voidedBy ? ` by ${voidedBy}` : ''}` +
        `${reason ? ` (reason: ${reason})` : ''}; not transmitted upstream`,
    );
    return this.getEnvelope(envelopeId);
  }

  // ─── Queries ────────────────────────────────────────────────────────
  // Logalty offers no search over signature requests.

  async getEnvelopesByStatus(_status: EnvelopeStatus, _limit?: number): Promise<SignatureEnvelope[]> {
    return [];
  }

  async getEnvelopesByCreator(_createdBy: string, _limit?: number): Promise<SignatureEnvelope[]> {
    return [];
  }

  async getEnvelopesBySender(_sentBy: string, _limit?: number): Promise<SignatureEnvelope[]> {
    return [];
  }

  async getEnvelopesByProvider(_providerId: string, _limit?: number): Promise<SignatureEnvelope[]> {
    return [];
  }

  getHealth(): ProviderHealth {
    return {
      providerId: this.providerId,
      circuit: this.policy.circuitBreaker.getMetrics(),
    };
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  /**
   * Build the signature request body for Logalty.
   */
  buildSignatureRequest(input: CreateEnvelopeInput): LogaltySignatureRequest {
    return {
      title: input.title ?? this.settings.defaultEmailSubject,
      message: input.description ?? this.settings.defaultEmailMessage,
      signatureType: this.settings.defaultSignatureType,
      biometricEnabled: this.settings.enableBiometricSignature,
      smsVerificationEnabled: this.settings.enableSmsVerification,
      videoIdentificationEnabled: this.settings.enableVideoIdentification,
    };
  }

  private requestsPath(remoteId?: string): string {
    const base = `/api/${encodeURIComponent(this.settings.apiVersion)}/signature-requests`;
    return remoteId === undefined ? base : `${base}/${encodeURIComponent(remoteId)}`;
  }

  /**
   * Authenticate, then run the exchange through the fault-tolerance policy.
   * A 401 drops the cached token so the next operation fetches a new one.
   */
  private async call(
    operation: string,
    request: Omit<TransportRequest, 'token'>,
    options: { expectBody: boolean } = { expectBody: true },
  ): Promise<unknown> {
    const credential = await this.tokenManager.acquire();
    const authenticated: TransportRequest = { ...request, token: credential.value };

    try {
      return await this.policy.execute(`logalty.${operation}`, () =>
        options.expectBody ? this.transport.requestJson(authenticated) : this.transport.request(authenticated),
      );
    } catch (error) {
      if (error instanceof RemoteApiError && error.status === 401) {
        this.tokenManager.invalidate();
      }
      console.error(`[LogaltyAdapter] ${operation} failed:`, error instanceof Error ? error.message : error);
      throw error;
    }
  }

  /**
   * Map a Logalty signature request to the canonical envelope.
   */
  private mapResponseToEnvelope(response: unknown, envelopeId: string, remoteId: string): SignatureEnvelope {
    const parsed = signatureRequestSchema.safeParse(response ?? {});
    if (!parsed.success) {
      throw new RemoteApiError(200, `Logalty returned a malformed signature request for ${remoteId}`);
    }

    const { title, message, status, createdAt } = parsed.data;

    return snapshot({
      id: envelopeId,
      provider: this.providerId,
      title: title ?? undefined,
      description: message ?? undefined,
      status: normalizeStatus(status),
      externalEnvelopeId: remoteId,
      createdAt: parseTimestamp(createdAt) ?? this.now(),
    });
  }
}

function parseTimestamp(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

function snapshot(envelope: SignatureEnvelope): SignatureEnvelope {
  return Object.freeze(envelope);
}
