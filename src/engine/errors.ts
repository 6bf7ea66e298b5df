/**
 * Error taxonomy for the translation pipeline
 */

export type PipelineErrorCode =
  | 'CHUNKING_ERROR'
  | 'GENERATION_TRANSIENT'
  | 'GENERATION_FATAL'
  | 'CRITICAL_QUALITY'
  | 'PERSISTENCE_ERROR'
  | 'JOB_CANCELLED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  /** Generation attempts spent before the error surfaced */
  attempts?: number;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or empty input document. Never retried. */
export class ChunkingError extends PipelineError {
  constructor(message: string) {
    super('CHUNKING_ERROR', message);
  }
}

/** Timeout, rate limit, server error or malformed output. Retried within the budget. */
export class GenerationTransientError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('GENERATION_TRANSIENT', message, options);
    this.status = options?.status;
  }
}

/** Bad request or authentication failure. Fails the owning chunk or stage at once. */
export class GenerationFatalError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('GENERATION_FATAL', message, options);
    this.status = options?.status;
  }
}

/** Raised by the critique stage to halt a job before assembly */
export class CriticalQualityError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CRITICAL_QUALITY', message);
    this.issues = issues;
  }
}

/** Job store unavailable; the job stays in its last durable state */
export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_ERROR', message, options);
  }
}

/** A job with the same id is already stored */
export class JobExistsError extends PersistenceError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job ${jobId} already exists`);
    this.jobId = jobId;
  }
}

/** The job was deleted while work was in flight */
export class JobCancelledError extends PipelineError {
  constructor(jobId?: string) {
    super('JOB_CANCELLED', jobId ? `Job ${jobId} was cancelled` : 'Job was cancelled');
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof GenerationFatalError) return false;
  if (error instanceof JobCancelledError) return false;
  if (error instanceof ChunkingError) return false;
  // transient and unclassified errors share the retry budget
  return true;
}

export function describeError(error: unknown): string {
  if (error instanceof PipelineError) {
    const suffix = error.attempts && error.attempts > 1 ? ` (after ${error.attempts} attempts)` : '';
    return `${error.message}${suffix}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
