/**
 * Fixed-interval retry for transient failures.
 */

import { RetriesExhaustedError, TransientNetworkError, isTransient } from '../errors.js';

export interface RetryConfig {
  /** Additional attempts after the first one (0-10) */
  maxAttempts: number;
  /** Wait between two attempts in milliseconds */
  waitDurationMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  waitDurationMs: 2000,
};

export const MAX_RETRY_ATTEMPTS = 10;

export interface RetryEvent {
  retryName: string;
  operation: string;
  /** Number of the attempt about to start (2 for the first retry) */
  nextAttempt: number;
  lastError: TransientNetworkError;
  waitMs: number;
}

export type RetryListener = (event: RetryEvent) => void;

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class Retry {
  readonly name: string;
  readonly config: RetryConfig;
  private readonly sleep: Sleep;
  private readonly listeners = new Set<RetryListener>();

  constructor(name: string, config?: Partial<RetryConfig>, sleep: Sleep = defaultSleep) {
    this.name = name;
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.sleep = sleep;

    const { maxAttempts, waitDurationMs } = this.config;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 0 || maxAttempts > MAX_RETRY_ATTEMPTS) {
      throw new RangeError(`maxAttempts must be an integer between 0 and ${MAX_RETRY_ATTEMPTS}`);
    }
    if (waitDurationMs < 0) {
      throw new RangeError('waitDurationMs must not be negative');
    }
  }

  /**
   * Run `call`, re-running it after each transient failure until it succeeds
   * or the budget is spent. Any other failure propagates on the spot.
   */
  async execute<T>(call: () => Promise<T>, operation: string = this.name): Promise<T> {
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await call();
      } catch (error) {
        if (!isTransient(error)) throw error;
        if (attempt > this.config.maxAttempts) {
          throw new RetriesExhaustedError(operation, attempt, error);
        }

        const event: RetryEvent = {
          retryName: this.name,
          operation,
          nextAttempt: attempt + 1,
          lastError: error,
          waitMs: this.config.waitDurationMs,
        };
        for (const listener of this.listeners) {
          listener(event);
        }

        await this.sleep(this.config.waitDurationMs);
      }
    }
  }

  /**
   * Subscribe to retry events. Returns an unsubscribe function.
   */
  onRetry(listener: RetryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
