import { describe, expect, it, vi } from "vitest";
import { RetryError, exponentialBackoff, withRetry } from "../retry";

const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, sleep };
};

describe('exponentialBackoff', () => {
  it('doubles from one second', () => {
    expect([0, 1, 2, 3].map(exponentialBackoff)).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result after sleeping between failures', async () => {
    const { delays, sleep } = recordingSleep();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockRejectedValueOnce(new Error('busy'))
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce('done');

    const result = await withRetry(operation, { maxAttempts: 4, isRetryable: () => true, sleep });

    expect(result).toBe('done');
    expect(operation).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(operation.mock.calls.map(([context]) => context)).toEqual([
      { attempt: 0, isFinalAttempt: false },
      { attempt: 1, isFinalAttempt: false },
      { attempt: 2, isFinalAttempt: false },
      { attempt: 3, isFinalAttempt: true },
    ]);
  });

  it('gives up immediately on a non-retryable error', async () => {
    const { delays, sleep } = recordingSleep();
    const cause = new Error('invalid key');
    const operation = vi.fn().mockRejectedValue(cause);

    const failure = withRetry(operation, { maxAttempts: 3, isRetryable: () => false, sleep });

    await expect(failure).rejects.toBeInstanceOf(RetryError);
    await expect(failure).rejects.toMatchObject({
      message: 'invalid key',
      attempts: 1,
      retryable: false,
      cause,
    });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('reports the last error once attempts run out', async () => {
    const { delays, sleep } = recordingSleep();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(
      withRetry(operation, { maxAttempts: 2, isRetryable: () => true, sleep })
    ).rejects.toMatchObject({ message: 'second', attempts: 2, retryable: true });
    expect(delays).toEqual([1000]);
  });

  it('passes the delay to onRetry and honours a custom backoff', async () => {
    const { delays, sleep } = recordingSleep();
    const onRetry = vi.fn();
    const error = new Error('flaky');
    const operation = vi.fn().mockRejectedValueOnce(error).mockResolvedValueOnce(7);

    const result = await withRetry(operation, {
      maxAttempts: 3,
      isRetryable: () => true,
      backoff: attempt => (attempt + 1) * 10,
      sleep,
      onRetry,
    });

    expect(result).toBe(7);
    expect(onRetry).toHaveBeenCalledWith(error, 0, 10);
    expect(delays).toEqual([10]);
  });

  it('always makes at least one attempt', async () => {
    const operation = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(operation, { maxAttempts: 0, isRetryable: () => true })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledWith({ attempt: 0, isFinalAttempt: true });
  });
});
