import { ConcurrencyConflictError, VersionConflictError } from './errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: Sleep;
  onRetry?: (attempt: number, delayMs: number, error: VersionConflictError) => void;
}

/**
 * Run a read-modify-write operation, re-running it from scratch whenever the
 * write loses a version race. Attempt n waits baseDelayMs × n before the next
 * one; any error other than a version conflict propagates untouched.
 */
export async function retryOnConflict<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof VersionConflictError)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new ConcurrencyConflictError(
          `Cart was modified concurrently; gave up after ${attempt} attempts`
        );
      }

      const delayMs = options.baseDelayMs * attempt;
      options.onRetry?.(attempt, delayMs, error);
      await wait(delayMs);
    }
  }
}
