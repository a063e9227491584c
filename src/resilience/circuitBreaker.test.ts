import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CircuitBreaker, type StateTransition } from './circuitBreaker.js';
import { CircuitOpenError } from '../errors.js';

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  const succeed = () => breaker.execute(() => Promise.resolve('ok'));
  const fail = () => breaker.execute(() => Promise.reject(new Error('boom'))).catch(() => undefined);

  async function record(successes: number, failures: number): Promise<void> {
    for (let i = 0; i < successes; i++) await succeed();
    for (let i = 0; i < failures; i++) await fail();
  }

  async function openBreaker(): Promise<void> {
    await record(5, 5);
    expect(breaker.getState()).toBe('OPEN');
  }

  beforeEach(() => {
    now = 1_000_000;
    breaker = new CircuitBreaker('test', undefined, () => now);
  });

  describe('closed state', () => {
    it('should start closed', () => {
      expect(breaker.getState()).toBe('CLOSED');
    });

    it('should not evaluate the failure rate before the window is full', async () => {
      await record(0, 9);
      expect(breaker.getState()).toBe('CLOSED');
    });

    it('should stay closed below the failure threshold', async () => {
      await record(6, 4);
      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics()).toEqual({
        state: 'CLOSED',
        bufferedCalls: 10,
        failedCalls: 4,
        failureRate: 40,
      });
    });

    it('should open when half of the last 10 calls failed', async () => {
      await record(5, 5);
      expect(breaker.getState()).toBe('OPEN');
    });

    it('should evict the oldest outcome as a new one is recorded', async () => {
      await record(6, 4);
      // Window becomes 5 successes / 5 failures once the first success drops out
      await fail();
      expect(breaker.getState()).toBe('OPEN');
    });

    it('should pass through the result and the error of the call', async () => {
      await expect(succeed()).resolves.toBe('ok');
      await expect(breaker.execute(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    });
  });

  describe('open state', () => {
    it('should reject calls without running them', async () => {
      await openBreaker();

      const call = vi.fn(() => Promise.resolve('ok'));
      await expect(breaker.execute(call)).rejects.toBeInstanceOf(CircuitOpenError);
      expect(call).not.toHaveBeenCalled();
    });

    it('should report the remaining wait time', async () => {
      await openBreaker();
      now += 10_000;

      const error = await breaker.execute(() => Promise.resolve('ok')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error).toMatchObject({ circuitName: 'test', retryAfterMs: 20_000 });
    });

    it('should stay open for 30 seconds', async () => {
      await openBreaker();
      now += 29_999;
      expect(breaker.getState()).toBe('OPEN');
    });

    it('should move to half-open after 30 seconds', async () => {
      await openBreaker();
      now += 30_000;
      expect(breaker.getState()).toBe('HALF_OPEN');
    });
  });

  describe('half-open state', () => {
    beforeEach(async () => {
      await openBreaker();
      now += 30_000;
    });

    it('should permit at most 3 trial calls', async () => {
      const pending: Array<() => void> = [];
      const trial = () =>
        breaker.execute(() => new Promise<string>((resolve) => pending.push(() => resolve('ok'))));

      const trials = [trial(), trial(), trial()];
      await expect(breaker.execute(() => Promise.resolve('ok'))).rejects.toBeInstanceOf(CircuitOpenError);

      pending.forEach((release) => release());
      await expect(Promise.all(trials)).resolves.toEqual(['ok', 'ok', 'ok']);
    });

    it('should close and reset the window after 3 successful trials', async () => {
      await record(3, 0);
      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics().bufferedCalls).toBe(0);

      // A fresh window: 9 failures are not enough to open again
      await record(0, 9);
      expect(breaker.getState()).toBe('CLOSED');
    });

    it('should reopen on a failed trial and restart the wait', async () => {
      await record(2, 1);
      expect(breaker.getState()).toBe('OPEN');

      now += 29_999;
      expect(breaker.getState()).toBe('OPEN');
      now += 1;
      expect(breaker.getState()).toBe('HALF_OPEN');
    });
  });

  describe('events', () => {
    it('should notify listeners of every transition', async () => {
      const transitions: StateTransition[] = [];
      breaker.onStateTransition((t) => transitions.push(t));

      await openBreaker();
      now += 30_000;
      await record(3, 0);

      expect(transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
        'CLOSED->OPEN',
        'OPEN->HALF_OPEN',
        'HALF_OPEN->CLOSED',
      ]);
      expect(transitions[0]?.circuitName).toBe('test');
    });

    it('should stop notifying after unsubscribe', async () => {
      const listener = vi.fn();
      const unsubscribe = breaker.onStateTransition(listener);
      unsubscribe();

      await openBreaker();
      expect(listener).not.toHaveBeenCalled();
    });
  });

  it('should ignore outcomes of calls started before a transition', async () => {
    await record(5, 4);

    let releaseSlow: () => void = () => {};
    const slow = breaker.execute(() => new Promise<void>((resolve) => (releaseSlow = () => resolve())));

    await fail();
    expect(breaker.getState()).toBe('OPEN');

    now += 30_000;
    expect(breaker.getState()).toBe('HALF_OPEN');

    // Completes in HALF_OPEN but was permitted while CLOSED: not a trial
    releaseSlow();
    await slow;
    await record(2, 0);
    expect(breaker.getState()).toBe('HALF_OPEN');
    await record(1, 0);
    expect(breaker.getState()).toBe('CLOSED');
  });

  it('should close on reset', async () => {
    await openBreaker();
    breaker.reset();
    expect(breaker.getState()).toBe('CLOSED');
    await expect(succeed()).resolves.toBe('ok');
  });
});
