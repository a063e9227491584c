/**
 * Count-based circuit breaker.
 *
 * CLOSED records the outcome of every call in a sliding window; once the
 * window is full and the failure rate reaches the threshold the breaker opens.
 * OPEN rejects calls without running them until the wait duration has elapsed,
 * then the breaker moves to HALF_OPEN and lets a fixed number of trial calls
 * through. All trials succeeding closes the breaker, any trial failing opens
 * it again.
 */

import { CircuitOpenError } from '../errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Failure rate, in percent, at or above which the breaker opens */
  failureRateThreshold: number;
  /** Number of most recent call outcomes the failure rate is computed over */
  slidingWindowSize: number;
  /** How long the breaker stays open before allowing trial calls */
  waitDurationInOpenStateMs: number;
  /** Number of trial calls permitted while half-open */
  permittedCallsInHalfOpenState: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureRateThreshold: 50,
  slidingWindowSize: 10,
  waitDurationInOpenStateMs: 30_000,
  permittedCallsInHalfOpenState: 3,
};

export interface StateTransition {
  circuitName: string;
  from: CircuitState;
  to: CircuitState;
  at: Date;
}

export interface CircuitBreakerMetrics {
  state: CircuitState;
  bufferedCalls: number;
  failedCalls: number;
  /** Failure rate over the buffered calls, in percent */
  failureRate: number;
}

export type StateTransitionListener = (transition: StateTransition) => void;

export class CircuitBreaker {
  readonly name: string;
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;

  private state: CircuitState = 'CLOSED';
  /** true = failure; oldest first */
  private outcomes: boolean[] = [];
  private openedAt = 0;
  private halfOpenPermits = 0;
  private halfOpenSuccesses = 0;
  // Bumped on every transition so calls started in an earlier state are not
  // recorded against the new one.
  private generation = 0;
  private readonly listeners = new Set<StateTransitionListener>();

  constructor(name: string, config?: Partial<CircuitBreakerConfig>, now: () => number = Date.now) {
    this.name = name;
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.now = now;

    if (this.config.slidingWindowSize < 1) {
      throw new RangeError('slidingWindowSize must be at least 1');
    }
    if (this.config.permittedCallsInHalfOpenState < 1) {
      throw new RangeError('permittedCallsInHalfOpenState must be at least 1');
    }
  }

  async execute<T>(call: () => Promise<T>): Promise<T> {
    const generation = this.acquirePermission();

    let result: T;
    try {
      result = await call();
    } catch (error) {
      this.record(generation, false);
      throw error;
    }
    this.record(generation, true);
    return result;
  }

  getState(): CircuitState {
    this.checkOpenTimeout();
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    const state = this.getState();
    const failedCalls = this.outcomes.filter((failed) => failed).length;
    return {
      state,
      bufferedCalls: this.outcomes.length,
      failedCalls,
      failureRate: this.outcomes.length === 0 ? 0 : (failedCalls / this.outcomes.length) * 100,
    };
  }

  /**
   * Subscribe to state transitions. Returns an unsubscribe function.
   */
  onStateTransition(listener: StateTransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  reset(): void {
    this.transitionTo('CLOSED');
  }

  private acquirePermission(): number {
    this.checkOpenTimeout();

    if (this.state === 'OPEN') {
      throw new CircuitOpenError(this.name, this.openedAt + this.config.waitDurationInOpenStateMs - this.now());
    }

    if (this.state === 'HALF_OPEN') {
      if (this.halfOpenPermits >= this.config.permittedCallsInHalfOpenState) {
        throw new CircuitOpenError(this.name);
      }
      this.halfOpenPermits++;
    }

    return this.generation;
  }

  private record(generation: number, success: boolean): void {
    if (generation !== this.generation) return;

    if (this.state === 'HALF_OPEN') {
      if (!success) {
        this.transitionTo('OPEN');
        return;
      }
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.permittedCallsInHalfOpenState) {
        this.transitionTo('CLOSED');
      }
      return;
    }

    if (this.state !== 'CLOSED') return;

    this.outcomes.push(!success);
    if (this.outcomes.length > this.config.slidingWindowSize) {
      this.outcomes.shift();
    }

    if (this.outcomes.length === this.config.slidingWindowSize) {
      const failures = this.outcomes.filter((failed) => failed).length;
      if ((failures / this.outcomes.length) * 100 >= this.config.failureRateThreshold) {
        this.transitionTo('OPEN');
      }
    }
  }

  private checkOpenTimeout(): void {
    if (this.state === 'OPEN' && this.now() - this.openedAt >= this.config.waitDurationInOpenStateMs) {
      this.transitionTo('HALF_OPEN');
    }
  }

  private transitionTo(to: CircuitState): void {
    const from = this.state;

    this.state = to;
    this.generation++;
    this.outcomes = [];
    this.halfOpenPermits = 0;
    this.halfOpenSuccesses = 0;
    if (to === 'OPEN') {
      this.openedAt = this.now();
    }

    if (from === to) return;

    const transition: StateTransition = { circuitName: this.name, from, to, at: new Date(this.now()) };
    for (const listener of this.listeners) {
      listener(transition);
    }
  }
}
