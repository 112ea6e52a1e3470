/**
 * Tests for Retry + Timeout Utility
 *
 * Tests exponential backoff, retry exhaustion and per-attempt timeouts.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  AttemptTimeoutError,
  calculateBackoff,
  isRetryableError,
  withRetry,
  withTimeout,
} from '../../lib/reliability/client_wrap';

function statusError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, sleep };
}

describe('isRetryableError', () => {
  it('should return true for 429 status', () => {
    expect(isRetryableError(statusError('Rate limited', 429))).toBe(true);
  });

  it('should return true for 503 status', () => {
    expect(isRetryableError(statusError('Service Unavailable', 503))).toBe(true);
  });

  it('should return true for a statusCode property', () => {
    expect(isRetryableError(Object.assign(new Error('Bad gateway'), { statusCode: 502 }))).toBe(true);
  });

  it('should return true for rate limit message', () => {
    expect(isRetryableError(new Error('Rate limit exceeded'))).toBe(true);
  });

  it('should return true for timeout errors', () => {
    expect(isRetryableError(new AttemptTimeoutError(100))).toBe(true);
  });

  it('should return false for 400 status', () => {
    expect(isRetryableError(statusError('Bad Request', 400))).toBe(false);
  });

  it('should return false for 401 status even with a retryable message', () => {
    expect(isRetryableError(statusError('network unauthorized', 401))).toBe(false);
  });

  it('should return false for non-errors', () => {
    expect(isRetryableError('boom')).toBe(false);
  });
});

describe('calculateBackoff', () => {
  it('should double the delay on every attempt', () => {
    expect(calculateBackoff(1, 1000, 60_000, 0)).toBe(1000);
    expect(calculateBackoff(2, 1000, 60_000, 0)).toBe(2000);
    expect(calculateBackoff(3, 1000, 60_000, 0)).toBe(4000);
  });

  it('should cap at maxDelayMs', () => {
    expect(calculateBackoff(10, 1000, 5000, 0)).toBe(5000);
  });

  it('should stay within the jitter band', () => {
    for (let i = 0; i < 20; i++) {
      const delay = calculateBackoff(1, 1000, 60_000, 0.5);
      expect(delay).toBeGreaterThanOrEqual(500);
      expect(delay).toBeLessThanOrEqual(1500);
    }
  });
});

describe('withRetry', () => {
  it('should return the first successful result without sleeping', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should wait base, 2x base, 4x base between transient failures', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn()
      .mockRejectedValueOnce(statusError('unavailable', 503))
      .mockRejectedValueOnce(statusError('unavailable', 503))
      .mockRejectedValueOnce(statusError('unavailable', 503))
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, { maxAttempts: 4, baseDelayMs: 1000, sleep })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('should rethrow the last error once attempts are exhausted', async () => {
    const { delays, sleep } = recordingSleep();
    const last = statusError('still unavailable', 503);
    const fn = vi.fn()
      .mockRejectedValueOnce(statusError('unavailable', 503))
      .mockRejectedValueOnce(last);

    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 10, sleep })).rejects.toBe(last);
    expect(delays).toEqual([10]);
  });

  it('should not retry permanent errors', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn().mockRejectedValue(statusError('Bad Request', 400));

    await expect(withRetry(fn, { sleep })).rejects.toThrow('Bad Request');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should prefer a provider retry-after hint over the computed delay', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn()
      .mockRejectedValueOnce(statusError('slow down', 429))
      .mockResolvedValueOnce('ok');

    await withRetry(fn, { baseDelayMs: 1000, retryAfterMs: () => 7000, sleep });
    expect(delays).toEqual([7000]);
  });

  it('should pass the attempt number and report retries', async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();
    const seen: number[] = [];

    await withRetry(async ({ attempt }) => {
      seen.push(attempt);
      if (attempt < 3) throw statusError('unavailable', 503);
      return attempt;
    }, { maxAttempts: 3, baseDelayMs: 100, sleep, onRetry });

    expect(seen).toEqual([1, 2, 3]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(expect.objectContaining({ attempt: 2, maxAttempts: 3, delayMs: 200 }));
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject with AttemptTimeoutError and abort the signal', async () => {
    vi.useFakeTimers();
    let captured: AbortSignal | undefined;
    const pending = withTimeout((signal) => {
      captured = signal;
      return new Promise<string>(() => {});
    }, 1000);

    const assertion = expect(pending).rejects.toBeInstanceOf(AttemptTimeoutError);
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    expect(captured?.aborted).toBe(true);
  });

  it('should resolve when the call beats the timeout', async () => {
    await expect(withTimeout(async () => 'fast', 1000)).resolves.toBe('fast');
  });

  it('should not time out when no timeout is set', async () => {
    await expect(withTimeout(async () => 'unbounded', null)).resolves.toBe('unbounded');
  });
});

describe('withRetry with a per-attempt timeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should count a timed-out attempt and retry', async () => {
    vi.useFakeTimers();
    const { delays, sleep } = recordingSleep();
    const signals: AbortSignal[] = [];

    const pending = withRetry(({ attempt, signal }) => {
      signals.push(signal);
      return attempt === 1 ? new Promise<string>(() => {}) : Promise.resolve('ok');
    }, { attemptTimeoutMs: 1000, baseDelayMs: 100, sleep });

    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toBe('ok');
    expect(signals).toHaveLength(2);
    expect(signals[0].aborted).toBe(true);
    expect(signals[1].aborted).toBe(false);
    expect(delays).toEqual([100]);
  });

  it('should fail once every attempt has timed out', async () => {
    vi.useFakeTimers();
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const pending = withRetry(() => {
      calls++;
      return new Promise<string>(() => {});
    }, { maxAttempts: 3, attemptTimeoutMs: 1000, baseDelayMs: 100, sleep });
    const assertion = expect(pending).rejects.toBeInstanceOf(AttemptTimeoutError);

    await vi.advanceTimersByTimeAsync(3000);

    await assertion;
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });
});
