export type RetryOptions = {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const backoffDelayMs = (attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number =>
  Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);

/**
 * Runs fn until it resolves or the retry budget is spent. The last error is
 * rethrown unchanged. `attempt` is 0 for the first call.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs, shouldRetry = () => true, onRetry, sleep: wait = sleep } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxRetries || !shouldRetry(err)) throw err;
      const delayMs = backoffDelayMs(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(err, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}

/**
 * Races fn against a timer. The signal handed to fn aborts when the timer
 * fires so the underlying request can be cancelled too.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
