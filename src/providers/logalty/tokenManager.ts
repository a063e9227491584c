/**
 * OAuth client-credentials token manager for the Logalty API.
 *
 * Holds a single credential and decides whether to reuse or refresh it.
 * Refreshes are single-flight: callers arriving while a token exchange is in
 * progress wait for that exchange instead of starting their own.
 */

import { z } from 'zod';
import { CredentialAcquisitionError, describeError } from '../../errors.js';
import type { HttpTransport } from './transport.js';

export interface Credential {
  readonly value: string;
  readonly expiresAt: Date;
}

export interface TokenManagerConfig {
  clientId: string;
  clientSecret: string;
  /** Lifetime assumed when the token response carries no expires_in, in seconds */
  defaultExpirationSeconds: number;
  /** A credential is not reused within this margin of its expiry (default 60s) */
  safetyMarginMs?: number;
}

export const TOKEN_PATH = '/oauth/token';
export const DEFAULT_SAFETY_MARGIN_MS = 60_000;
/** One year, in seconds */
export const MAX_EXPIRES_IN_SECONDS = 365 * 86_400;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z
    .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
    .pipe(z.number().int().positive().max(MAX_EXPIRES_IN_SECONDS))
    .nullish(),
});

export class TokenManager {
  private credential: Credential | undefined;
  private refreshing: Promise<Credential> | undefined;
  private readonly safetyMarginMs: number;

  constructor(
    private readonly transport: HttpTransport,
    private readonly config: TokenManagerConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.safetyMarginMs = config.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
  }

  /**
   * Return a usable credential, exchanging client credentials for a new one
   * when the cached credential is missing or about to expire.
   */
  async acquire(): Promise<Credential> {
    const cached = this.credential;
    if (cached && this.isUsable(cached)) {
      return cached;
    }

    if (!this.refreshing) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = undefined;
      });
    }
    return this.refreshing;
  }

  /**
   * Drop the cached credential, e.g. after the remote API rejected it.
   */
  invalidate(): void {
    this.credential = undefined;
  }

  isUsable(credential: Credential): boolean {
    return this.now() < credential.expiresAt.getTime() - this.safetyMarginMs;
  }

  private async refresh(): Promise<Credential> {
    console.log('[TokenManager] Refreshing Logalty access token');

    let payload: unknown;
    try {
      payload = await this.transport.requestJson({
        method: 'POST',
        path: TOKEN_PATH,
        form: {
          grant_type: 'client_credentials',
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
        },
      });
    } catch (error) {
      throw new CredentialAcquisitionError(`Token exchange failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'body').join(', ');
      throw new CredentialAcquisitionError(`Malformed token response (${fields})`);
    }

    const expiresIn = parsed.data.expires_in ?? this.config.defaultExpirationSeconds;
    const credential: Credential = Object.freeze({
      value: parsed.data.access_token,
      expiresAt: new Date(this.now() + expiresIn * 1000),
    });
    this.credential = credential;

    console.log(`[TokenManager] Access token refreshed, expires at ${credential.expiresAt.toISOString()}`);
    return credential;
  }
}
