/**
 * Unit tests for the retry policy
 *
 * @module tests/unit/utils/backoff
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AttemptTimeoutError,
  RetryAbortedError,
  RetryPolicy,
  abortableSleep,
  calculateBackoffDelay,
  type RetryAttempt,
  type RetryNotice,
} from '../../../src/utils/backoff.js';

describe('calculateBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles from the base delay', () => {
    expect(calculateBackoffDelay(0)).toBe(1000);
    expect(calculateBackoffDelay(1)).toBe(2000);
    expect(calculateBackoffDelay(2)).toBe(4000);
  });

  it('caps at maxDelayMs', () => {
    expect(calculateBackoffDelay(10, { maxDelayMs: 5000 })).toBe(5000);
  });

  it('applies jitter within the configured fraction', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoffDelay(0, { jitterFraction: 0.25 })).toBe(750);
  });
});

describe('RetryPolicy.execute', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('returns the first success without waiting', async () => {
    const policy = new RetryPolicy();
    const fn = vi.fn(async (_attempt: RetryAttempt) => 'ok');
    await expect(policy.execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn.mock.calls[0][0].attempt).toBe(1);
  });

  it('retries transient failures with exponential delays', async () => {
    const policy = new RetryPolicy();
    const notices: RetryNotice[] = [];
    const fn = vi
      .fn<(attempt: RetryAttempt) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    const promise = policy.execute(fn, { onRetry: (notice) => notices.push(notice) });
    await vi.advanceTimersByTimeAsync(1000);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(2000);

    await expect(promise).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(notices.map(({ attempt, delayMs }) => ({ attempt, delayMs }))).toEqual([
      { attempt: 1, delayMs: 1000 },
      { attempt: 2, delayMs: 2000 },
    ]);
  });

  it('re-throws the last error once attempts are exhausted', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2 });
    const fn = vi
      .fn<(attempt: RetryAttempt) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('last'));

    const assertion = expect(policy.execute(fn)).rejects.toThrow('last');
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors the predicate rejects', async () => {
    const policy = new RetryPolicy();
    const fn = vi.fn<(attempt: RetryAttempt) => Promise<string>>().mockRejectedValue(new Error('fatal'));

    await expect(policy.execute(fn, { shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('times out a hung attempt and aborts its signal', async () => {
    const policy = new RetryPolicy({ maxAttempts: 1, attemptTimeoutMs: 500 });
    let attemptSignal: AbortSignal | undefined;
    const fn = (attempt: RetryAttempt) => {
      attemptSignal = attempt.signal;
      return new Promise<string>(() => {});
    };

    const assertion = expect(policy.execute(fn)).rejects.toThrow(AttemptTimeoutError);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(attemptSignal?.aborted).toBe(true);
  });

  it('reports the attempt number in the timeout message', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, attemptTimeoutMs: 500, baseDelayMs: 100 });
    const fn = () => new Promise<string>(() => {});

    const assertion = expect(policy.execute(fn)).rejects.toThrow('Attempt 2 timed out after 500ms');
    await vi.advanceTimersByTimeAsync(500 + 100 + 500);
    await assertion;
  });

  it('cancels during the backoff wait', async () => {
    const policy = new RetryPolicy();
    const controller = new AbortController();
    const fn = vi.fn<(attempt: RetryAttempt) => Promise<string>>().mockRejectedValue(new Error('transient'));

    const assertion = expect(policy.execute(fn, { signal: controller.signal })).rejects.toThrow(RetryAbortedError);
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();
    await assertion;
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('cancels a running attempt and aborts its signal', async () => {
    const policy = new RetryPolicy();
    const controller = new AbortController();
    let attemptSignal: AbortSignal | undefined;
    const fn = (attempt: RetryAttempt) => {
      attemptSignal = attempt.signal;
      return new Promise<string>(() => {});
    };

    const assertion = expect(policy.execute(fn, { signal: controller.signal })).rejects.toThrow(RetryAbortedError);
    controller.abort();
    await assertion;
    expect(attemptSignal?.aborted).toBe(true);
  });

  it('does not start when the signal is already aborted', async () => {
    const policy = new RetryPolicy();
    const fn = vi.fn(async (_attempt: RetryAttempt) => 'ok');
    await expect(policy.execute(fn, { signal: AbortSignal.abort() })).rejects.toThrow(RetryAbortedError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('abortableSleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const sleep = abortableSleep(200).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(199);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await sleep;
    expect(done).toBe(true);
  });

  it('rejects immediately on an aborted signal', async () => {
    await expect(abortableSleep(1000, AbortSignal.abort())).rejects.toThrow(RetryAbortedError);
  });
});
