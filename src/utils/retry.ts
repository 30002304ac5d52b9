/**
 * Timing and retry utilities for API calls
 */

/**
 * Clock abstraction so waits can run on virtual time in tests.
 */
export interface TimeSource {
  nowMs(): number;
  sleepMs(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: TimeSource = {
  nowMs: () => Date.now(),
  sleepMs: (ms) => sleep(ms),
};

export interface RetryOptions {
  /** Return false to rethrow immediately. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const label = options.label ? `${options.label}: ` : '';
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      if (attempt < maxRetries) {
        const delay = baseDelay * Math.pow(2, attempt);
        const message = error instanceof Error ? error.message : String(error);
        console.warn(
          `${label}Request failed (attempt ${attempt + 1}/${maxRetries + 1}): ${message}. Retrying in ${delay}ms...`
        );
        await wait(delay);
      }
    }
  }

  throw lastError;
}
