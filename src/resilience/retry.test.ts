import { describe, it, expect, vi } from 'vitest';
import { Retry, type RetryEvent } from './retry.js';
import { RemoteApiError, RetriesExhaustedError, TransientNetworkError } from '../errors.js';

const timeout = () => new TransientNetworkError('timeout', 'GET /x timed out after 10ms');

describe('Retry', () => {
  it('should return the first successful result without waiting', async () => {
    const sleep = vi.fn(() => Promise.resolve());
    const retry = new Retry('test', { maxAttempts: 3 }, sleep);
    const call = vi.fn(() => Promise.resolve('done'));

    await expect(retry.execute(call)).resolves.toBe('done');
    expect(call).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry transient failures with a fixed wait', async () => {
    const sleep = vi.fn(() => Promise.resolve());
    const retry = new Retry('test', { maxAttempts: 2, waitDurationMs: 2000 }, sleep);
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockResolvedValueOnce('done');

    await expect(retry.execute(call)).resolves.toBe('done');
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it('should give up after maxAttempts retries', async () => {
    const retry = new Retry('test', { maxAttempts: 2, waitDurationMs: 0 }, () => Promise.resolve());
    const lastError = timeout();
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(lastError);

    const error = await retry.execute(call, 'logalty.getEnvelope').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(error).toMatchObject({ operation: 'logalty.getEnvelope', attempts: 3, lastError });
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('should make a single attempt when the budget is zero', async () => {
    const retry = new Retry('test', { maxAttempts: 0 }, () => Promise.resolve());
    const call = vi.fn(() => Promise.reject(timeout()));

    await expect(retry.execute(call)).rejects.toMatchObject({ attempts: 1 });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('should not retry non-transient failures', async () => {
    const sleep = vi.fn(() => Promise.resolve());
    const retry = new Retry('test', { maxAttempts: 3 }, sleep);
    const rejected = new RemoteApiError(400, 'POST /x failed: HTTP 400');
    const call = vi.fn(() => Promise.reject(rejected));

    await expect(retry.execute(call)).rejects.toBe(rejected);
    expect(call).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should emit an event before each retry', async () => {
    const retry = new Retry('test', { maxAttempts: 2, waitDurationMs: 5 }, () => Promise.resolve());
    const events: RetryEvent[] = [];
    retry.onRetry((event) => events.push(event));

    await retry.execute(() => Promise.reject(timeout()), 'op').catch(() => undefined);

    expect(events.map((e) => [e.operation, e.nextAttempt, e.waitMs])).toEqual([
      ['op', 2, 5],
      ['op', 3, 5],
    ]);
  });

  it('should reject a budget outside 0-10', () => {
    expect(() => new Retry('test', { maxAttempts: 11 })).toThrow(RangeError);
    expect(() => new Retry('test', { maxAttempts: -1 })).toThrow(RangeError);
    expect(() => new Retry('test', { maxAttempts: 1.5 })).toThrow(RangeError);
  });

  it('should default to 3 retries 2 seconds apart', () => {
    expect(new Retry('test').config).toEqual({ maxAttempts: 3, waitDurationMs: 2000 });
  });
});
