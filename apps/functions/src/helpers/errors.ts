/**
 * Error taxonomy for the pipeline.
 *
 * fatal            abort the run before any opportunity is processed
 * degraded-source  one document or one listing source lost, run continues
 * recoverable      retried with backoff, then the item is marked degraded/failed
 * policy           forbidden action attempted by a caller
 */
export type ErrorCategory = 'fatal' | 'degraded-source' | 'recoverable' | 'policy';

export abstract class PipelineError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─── Fatal ────────────────────────────────────────────────────────────────────

export class EmptyProfileError extends PipelineError {
  readonly category = 'fatal';
}

export class ConfigurationError extends PipelineError {
  readonly category = 'fatal';
}

// ─── Degraded source ──────────────────────────────────────────────────────────

export class ExtractionError extends PipelineError {
  readonly category = 'degraded-source';

  constructor(readonly documentId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SourceUnavailableError extends PipelineError {
  readonly category = 'degraded-source';

  constructor(readonly source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ─── Recoverable ──────────────────────────────────────────────────────────────

export type LlmErrorKind = 'timeout' | 'rate_limit' | 'malformed_output' | 'unavailable';

export class LlmError extends PipelineError {
  readonly category = 'recoverable';

  constructor(readonly kind: LlmErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SubmissionError extends PipelineError {
  readonly category = 'recoverable';

  constructor(message: string, readonly portalStatus?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ─── Policy ───────────────────────────────────────────────────────────────────

export class PolicyViolationError extends PipelineError {
  readonly category = 'policy';
}

/** Another caller already holds the submission claim for this opportunity. */
export class DuplicateSubmissionError extends PipelineError {
  readonly category = 'policy';
}

export const isFatal = (err: unknown): boolean => err instanceof PipelineError && err.category === 'fatal';

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  if (typeof err === 'string') return err;
  return 'Unknown error';
};
