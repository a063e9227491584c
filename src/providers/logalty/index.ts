import type { LogaltySettings } from '../../config/index.js';
import { createFaultTolerancePolicy, type PolicyOptions } from '../../resilience/policy.js';
import { LogaltySignatureEnvelopeAdapter } from './adapter.js';
import { EnvelopeIdRegistry } from './idRegistry.js';
import { TokenManager } from './tokenManager.js';
import { HttpTransport } from './transport.js';

export { LOGALTY_PROVIDER_ID } from './adapter.js';

export interface LogaltyAdapterOptions {
  /** Custom fetch implementation (for testing) */
  fetch?: typeof fetch;
  /** Overrides for the circuit breaker, retry wait and clocks */
  policy?: PolicyOptions;
}

/**
 * Wire a Logalty adapter from validated settings: one transport, token
 * manager, policy and id registry per adapter instance.
 */
export function createLogaltyAdapter(
  settings: LogaltySettings,
  options: LogaltyAdapterOptions = {},
): LogaltySignatureEnvelopeAdapter {
  const transport = new HttpTransport({
    baseUrl: settings.baseUrl,
    timeoutMs: settings.readTimeoutMs,
    fetch: options.fetch,
  });

  const tokenManager = new TokenManager(
    transport,
    {
      clientId: settings.clientId,
      clientSecret: settings.clientSecret,
      defaultExpirationSeconds: settings.tokenExpiration,
    },
    options.policy?.now,
  );

  const policy = createFaultTolerancePolicy('logalty', {
    ...options.policy,
    retry: {
      maxAttempts: settings.maxRetries,
      waitDurationMs: settings.retryWaitMs,
      ...options.policy?.retry,
    },
  });

  console.log(
    `[LogaltyAdapter] Initialized with base URL ${settings.baseUrl}` +
      `${settings.sandboxMode ? ' (sandbox)' : ''}, max retries ${settings.maxRetries}`,
  );

  return new LogaltySignatureEnvelopeAdapter({
    settings,
    transport,
    tokenManager,
    policy,
    idRegistry: new EnvelopeIdRegistry(),
  });
}
