// pattern: Imperative Shell

/**
 * Retry logic shared across all model adapters.
 * Each adapter provides its own isRetryableError predicate.
 */

export type RetryOptions = {
  maxAttempts: number;
  initialBackoffMs: number;
  onError?: (error: unknown, attempt: number) => void;
};

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialBackoffMs: 1000,
};

export async function callWithRetry<T>(
  fn: () => Promise<T>,
  isRetryableError: (error: unknown) => boolean,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const { maxAttempts, initialBackoffMs, onError } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      onError?.(error, attempt);

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < maxAttempts - 1) {
        const backoffMs = initialBackoffMs * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, backoffMs));
      }
    }
  }

  throw lastError;
}
