export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

const BACKOFF_MULTIPLIER = 2;
const JITTER_MS = 250;

/**
 * Runs `operation` up to `retries + 1` times with exponential backoff and jitter.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { retries, baseDelayMs, shouldRetry = () => true, sleep = defaultSleep } = options;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }

      const delay = baseDelayMs * Math.pow(BACKOFF_MULTIPLIER, attempt) + Math.floor(Math.random() * JITTER_MS);
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
