export interface AttemptContext {
  attempt: number; // zero-based
  isFinalAttempt: boolean;
}

export interface RetryOptions {
  maxAttempts: number;
  isRetryable: (error: unknown) => boolean;
  /** Delay in ms before the attempt after `attempt`. Defaults to 2^attempt seconds. */
  backoff?: (attempt: number) => number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export const exponentialBackoff = (attempt: number): number => 2 ** attempt * 1000;

/**
 * Thrown once `withRetry` gives up. `retryable` tells whether the last error
 * was transient (attempts ran out) or fatal (gave up straight away).
 */
export class RetryError extends Error {
  readonly attempts: number;
  readonly retryable: boolean;

  constructor(cause: unknown, attempts: number, retryable: boolean) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(reason, { cause });
    this.name = 'RetryError';
    this.attempts = attempts;
    this.retryable = retryable;
  }
}

export const withRetry = async <T>(
  operation: (context: AttemptContext) => Promise<T>,
  options: RetryOptions
): Promise<T> => {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const backoff = options.backoff ?? exponentialBackoff;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    const isFinalAttempt = attempt === maxAttempts - 1;
    try {
      return await operation({ attempt, isFinalAttempt });
    } catch (error) {
      const retryable = options.isRetryable(error);
      if (!retryable || isFinalAttempt) {
        throw new RetryError(error, attempt + 1, retryable);
      }
      const delayMs = backoff(attempt);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
};
