/**
 * Provider registry.
 * Maps provider identifiers to factories; the active provider is chosen by
 * configuration at startup.
 */

import type { Config } from '../config/index.js';
import { createLogaltyAdapter, LOGALTY_PROVIDER_ID, type LogaltyAdapterOptions } from './logalty/index.js';
import type { SignatureEnvelopePort } from './types.js';

export type ProviderOptions = LogaltyAdapterOptions;

export type ProviderFactory = (config: Config, options: ProviderOptions) => SignatureEnvelopePort;

export interface ProviderRegistration {
  id: string;
  displayName: string;
  factory: ProviderFactory;
}

export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderRegistration>();

  /**
   * Register a provider. Registering an id twice is an error.
   */
  register(registration: ProviderRegistration): this {
    const id = registration.id.toLowerCase();
    if (this.providers.has(id)) {
      throw new Error(`Provider already registered: ${id}`);
    }
    this.providers.set(id, { ...registration, id });
    return this;
  }

  has(id: string): boolean {
    return this.providers.has(id.toLowerCase());
  }

  list(): Array<{ id: string; displayName: string }> {
    return Array.from(this.providers.values()).map(({ id, displayName }) => ({ id, displayName }));
  }

  /**
   * Instantiate a provider by id.
   * Throws if the provider is not registered.
   */
  create(id: string, config: Config, options: ProviderOptions = {}): SignatureEnvelopePort {
    const registration = this.providers.get(id.toLowerCase());
    if (!registration) {
      const supported = Array.from(this.providers.keys()).join(', ') || 'none';
      throw new Error(`Unknown e-signature provider: ${id}. Supported providers: ${supported}.`);
    }
    return registration.factory(config, options);
  }
}

/**
 * Registry with every provider shipped in this package.
 */
export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry().register({
    id: LOGALTY_PROVIDER_ID,
    displayName: 'Logalty eSignature',
    factory: (config, options) => createLogaltyAdapter(config.logalty, options),
  });
}

/**
 * Instantiate the provider selected by `ESIGNATURE_PROVIDER`.
 */
export function createConfiguredProvider(
  config: Config,
  options: ProviderOptions = {},
  registry: ProviderRegistry = createDefaultRegistry(),
): SignatureEnvelopePort {
  return registry.create(config.esignatureProvider, config, options);
}
