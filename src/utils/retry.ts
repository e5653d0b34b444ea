export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  factor: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Run `work`, replaying it with exponential backoff while `shouldRetry` says so.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(work: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let attempt = 1;

  for (;;) {
    try {
      return await work();
    } catch (error) {
      if (attempt >= options.attempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = options.baseDelayMs * options.factor ** (attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
