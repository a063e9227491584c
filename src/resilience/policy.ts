/**
 * Fault-tolerance policy: retry decides how many attempts an operation gets,
 * the circuit breaker decides whether each attempt may reach the network.
 */

import { describeError } from '../errors.js';
import { CircuitBreaker, type CircuitBreakerConfig } from './circuitBreaker.js';
import { Retry, type RetryConfig, type Sleep } from './retry.js';

export class FaultTolerancePolicy {
  constructor(
    readonly circuitBreaker: CircuitBreaker,
    readonly retry: Retry,
  ) {}

  /**
   * Execute one logical operation. Each attempt passes through the breaker on
   * its own, so a breaker that opens mid-retry stops the remaining attempts
   * with a CircuitOpenError.
   */
  execute<T>(operation: string, call: () => Promise<T>): Promise<T> {
    return this.retry.execute(() => this.circuitBreaker.execute(call), operation);
  }
}

export interface PolicyOptions {
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  retry?: Partial<RetryConfig>;
  now?: () => number;
  sleep?: Sleep;
  /** Log transitions and retries to the console (default true) */
  logEvents?: boolean;
}

/**
 * Build a policy for a named remote dependency, with transition and retry
 * events logged.
 */
export function createFaultTolerancePolicy(name: string, options: PolicyOptions = {}): FaultTolerancePolicy {
  const circuitBreaker = new CircuitBreaker(name, options.circuitBreaker, options.now);
  const retry = new Retry(name, options.retry, options.sleep);

  if (options.logEvents ?? true) {
    circuitBreaker.onStateTransition((transition) => {
      console.warn(`[CircuitBreaker] ${transition.circuitName} state transition: ${transition.from} -> ${transition.to}`);
    });
    retry.onRetry((event) => {
      console.warn(
        `[Retry] ${event.operation} attempt ${event.nextAttempt} in ${event.waitMs}ms due to: ${describeError(event.lastError)}`,
      );
    });
  }

  return new FaultTolerancePolicy(circuitBreaker, retry);
}
