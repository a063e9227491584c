/**
 * Error taxonomy for the e-signature gateway.
 *
 * Every failure surfaced by a provider adapter is one of these classes, so a
 * caller can tell a fast-fail (circuit open) from an exhausted retry budget, a
 * missing envelope or a rejected creation.
 */

/**
 * Base error class for all gateway errors.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

/**
 * Thrown when the environment does not describe a valid configuration.
 */
export class ConfigurationError extends GatewayError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the token endpoint fails or answers with a malformed payload.
 * Never retried: token acquisition happens before the fault-tolerance policy.
 */
export class CredentialAcquisitionError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CREDENTIAL_ACQUISITION_ERROR', 502, options);
    this.name = 'CredentialAcquisitionError';
  }
}

/**
 * Thrown without contacting the remote system while a circuit breaker is open.
 */
export class CircuitOpenError extends GatewayError {
  constructor(
    public readonly circuitName: string,
    public readonly retryAfterMs?: number,
  ) {
    super(
      `Circuit breaker '${circuitName}' is open${retryAfterMs !== undefined ? `. Retry after ${Math.ceil(retryAfterMs / 1000)} seconds` : ''}`,
      'CIRCUIT_OPEN',
      503,
    );
    this.name = 'CircuitOpenError';
  }
}

export type TransientFailureKind = 'timeout' | 'connection';

/**
 * A timeout or connection-level I/O failure. The only error kind the retry
 * loop re-attempts.
 */
export class TransientNetworkError extends GatewayError {
  constructor(
    public readonly kind: TransientFailureKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, 'TRANSIENT_NETWORK_ERROR', 504, options);
    this.name = 'TransientNetworkError';
  }
}

/**
 * Thrown once every attempt of the retry budget failed with a transient error.
 */
export class RetriesExhaustedError extends GatewayError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: TransientNetworkError,
  ) {
    super(
      `${operation} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      'RETRIES_EXHAUSTED',
      504,
      { cause: lastError },
    );
    this.name = 'RetriesExhaustedError';
  }
}

/**
 * The remote platform answered, but with an error status or an unreadable body.
 */
export class RemoteApiError extends GatewayError {
  constructor(
    public readonly status: number,
    message: string,
    public readonly responseBody?: string,
  ) {
    super(message, 'REMOTE_API_ERROR', 502);
    this.name = 'RemoteApiError';
  }
}

/**
 * Thrown when no remote identifier is registered for a local envelope id.
 */
export class EnvelopeNotFoundError extends GatewayError {
  constructor(public readonly envelopeId: string) {
    super(`Envelope not found: ${envelopeId}`, 'ENVELOPE_NOT_FOUND', 404);
    this.name = 'EnvelopeNotFoundError';
  }
}

/**
 * Thrown when the remote platform accepted a create call but returned no identifier.
 */
export class EnvelopeCreationError extends GatewayError {
  constructor(message: string) {
    super(message, 'ENVELOPE_CREATION_ERROR', 502);
    this.name = 'EnvelopeCreationError';
  }
}

export function isTransient(error: unknown): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
