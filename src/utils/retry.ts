import { errorMessage, isTransientError } from '../errors';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Prefix for log lines */
  label?: string;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs an idempotent operation, retrying transient storage failures with
 * exponential backoff. Non-transient errors are rethrown immediately.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;
  const maxDelay = options.maxDelayMs ?? 30_000;
  const label = options.label ?? 'Retry';

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.attempts || !shouldRetry(error)) {
        throw error;
      }
      const delay = Math.min(maxDelay, options.baseDelayMs * 2 ** (attempt - 1));
      console.warn(`[${label}] Attempt ${attempt}/${options.attempts} failed: ${errorMessage(error)}. Retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}
