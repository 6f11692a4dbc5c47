import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy } from '../src/canvas/RetryPolicy.js';
import { FatalError, RetryExhaustedError, TransientError } from '../src/errors.js';
import { FakeClock } from './helpers.js';

describe('RetryPolicy', () => {
  it('returns the first success without waiting', async () => {
    const clock = new FakeClock();
    const policy = new RetryPolicy({ maxAttempts: 3, backoffMs: 500, clock });

    await expect(policy.run('op', async () => 'done')).resolves.toBe('done');
    expect(clock.sleeps).toEqual([]);
  });

  it('waits the fixed backoff between transient failures', async () => {
    const clock = new FakeClock();
    const policy = new RetryPolicy({ maxAttempts: 5, backoffMs: 500, clock });
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransientError('502', 502))
      .mockRejectedValueOnce(new TransientError('502', 502))
      .mockResolvedValueOnce(42);

    await expect(policy.run('op', fn)).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([500, 500]);
  });

  it('does not retry other failures', async () => {
    const clock = new FakeClock();
    const policy = new RetryPolicy({ maxAttempts: 5, backoffMs: 500, clock });
    const fn = vi.fn().mockRejectedValue(new FatalError('nope', 500));

    await expect(policy.run('op', fn)).rejects.toBeInstanceOf(FatalError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports exhaustion with the attempt count and last error', async () => {
    const clock = new FakeClock();
    const policy = new RetryPolicy({ maxAttempts: 3, backoffMs: 500, clock });
    const last = new TransientError('third', 502);
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransientError('first', 502))
      .mockRejectedValueOnce(new TransientError('second', 502))
      .mockRejectedValueOnce(last);

    const err = await policy.run('Fetch board', fn).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err instanceof RetryExhaustedError && [err.attempts, err.lastError, err.message])
      .toEqual([3, last, 'Fetch board failed after 3 attempts: third']);
    expect(clock.sleeps).toEqual([500, 500]);
  });

  it('uses a custom transient predicate', async () => {
    const clock = new FakeClock();
    const policy = new RetryPolicy({
      maxAttempts: 2,
      backoffMs: 10,
      clock,
      isTransient: (err) => err instanceof FatalError && err.status === 503,
    });
    const fn = vi.fn()
      .mockRejectedValueOnce(new FatalError('unavailable', 503))
      .mockResolvedValueOnce('ok');

    await expect(policy.run('op', fn)).resolves.toBe('ok');
    expect(clock.sleeps).toEqual([10]);
  });

  it('gives each run its own budget', async () => {
    const clock = new FakeClock();
    const policy = new RetryPolicy({ maxAttempts: 2, backoffMs: 10, clock });
    const flaky = () => vi.fn()
      .mockRejectedValueOnce(new TransientError('502', 502))
      .mockResolvedValueOnce('ok');

    await policy.run('a', flaky());
    await expect(policy.run('b', flaky())).resolves.toBe('ok');
  });

  it('stops waiting when cancelled', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    clock.onSleep = () => controller.abort();
    const policy = new RetryPolicy({ maxAttempts: 5, backoffMs: 10, clock });
    const fn = vi.fn().mockRejectedValue(new TransientError('502', 502));

    await expect(policy.run('op', fn, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, backoffMs: 10 })).toThrow(RangeError);
  });
});
