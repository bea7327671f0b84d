import { createConcurrencyLimiter, type ConcurrencyLimiter } from './concurrency';
import { LlmError } from './errors';
import type { SchemaLike } from './json';
import { withRetry, withTimeout } from './retry';

/**
 * The one seam between the pipeline and a language model: a prompt goes in,
 * schema-validated output comes out, failures are LlmError.
 */
export type LlmRequest<T> = {
  /** Which stage is asking; used for logs and by test doubles. */
  purpose: string;
  system: string;
  user: string;
  schema: SchemaLike<T>;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
};

export interface LlmService {
  completeJson<T>(request: LlmRequest<T>): Promise<T>;
}

export type LlmGatewayOptions = {
  concurrency: number;
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Wraps an LlmService with the run's call policy: at most `concurrency` calls
 * in flight, a timeout per call, and retries with backoff for every LlmError.
 * Backoff waits happen outside the concurrency slot.
 */
export class LlmGateway implements LlmService {
  private readonly limit: ConcurrencyLimiter;

  constructor(
    private readonly inner: LlmService,
    private readonly options: LlmGatewayOptions,
  ) {
    this.limit = createConcurrencyLimiter(options.concurrency);
  }

  completeJson<T>(request: LlmRequest<T>): Promise<T> {
    const { maxRetries, baseDelayMs, maxDelayMs, sleep } = this.options;
    return withRetry(() => this.limit(() => this.callOnce(request)), {
      maxRetries,
      baseDelayMs,
      maxDelayMs,
      sleep,
      shouldRetry: (err) => err instanceof LlmError,
      onRetry: (err, attempt, delayMs) =>
        console.warn(
          `[llm] ${request.purpose} attempt ${attempt} failed (${err instanceof LlmError ? err.kind : 'error'}), retrying in ${delayMs}ms`,
        ),
    });
  }

  private async callOnce<T>(request: LlmRequest<T>): Promise<T> {
    try {
      return await withTimeout(
        (signal) => this.inner.completeJson({ ...request, signal }),
        this.options.timeoutMs,
        () => new LlmError('timeout', `${request.purpose} timed out after ${this.options.timeoutMs}ms`),
      );
    } catch (err) {
      if (err instanceof LlmError) throw err;
      throw new LlmError('unavailable', err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}
