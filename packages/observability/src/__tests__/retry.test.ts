import { describe, it, expect, jest } from '@jest/globals';
import { computeBackoffDelay, withExponentialBackoff } from '../index';

describe('computeBackoffDelay', () => {
  const policy = { baseDelayMs: 1000, maxDelayMs: 60000, jitterRatio: 0.1 };

  it('doubles from the base delay and stops at the cap', () => {
    const noJitter = () => 0;
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, policy, noJitter))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
    expect(computeBackoffDelay(10, policy, noJitter)).toBe(60000);
  });

  it('adds jitter proportional to the delay', () => {
    expect(computeBackoffDelay(2, policy, () => 0.5)).toBe(2100);
    expect(computeBackoffDelay(2, { baseDelayMs: 1000, maxDelayMs: 60000 }, () => 0.5)).toBe(2000);
  });
});

describe('withExponentialBackoff', () => {
  it('retries until the call succeeds', async () => {
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('unavailable'))
      .mockRejectedValueOnce(new Error('unavailable'))
      .mockResolvedValueOnce('ok');
    const wait = jest.fn((_ms: number) => Promise.resolve());
    const onRetry = jest.fn();

    await expect(
      withExponentialBackoff(fn, { maxAttempts: 3, baseDelayMs: 100, jitterRatio: 0, wait, onRetry })
    ).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt with the last error', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('still unavailable'));

    await expect(
      withExponentialBackoff(fn, { maxAttempts: 2, wait: () => Promise.resolve() })
    ).rejects.toThrow('still unavailable');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors the caller marks as permanent', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('forbidden'));

    await expect(
      withExponentialBackoff(fn, { shouldRetry: () => false, wait: () => Promise.resolve() })
    ).rejects.toThrow('forbidden');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
