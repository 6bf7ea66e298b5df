/**
 * Retry with exponential backoff for generation calls
 */

import {
  GenerationTransientError,
  JobCancelledError,
  PipelineError,
  isRetryableError,
} from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Upper bound for a single attempt */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 16000,
  multiplier: 2,
  timeoutMs: 120000,
};

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Sleep that wakes early, rejecting, when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new JobCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new JobCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run one attempt with its own abort signal, linked to the job signal
 * and fired when the attempt exceeds `timeoutMs`.
 */
async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(new GenerationTransientError(`Generation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } catch (error) {
    if (timedOut) {
      throw new GenerationTransientError(`Generation timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Execute `operation` until it succeeds, a non-retryable error occurs,
 * or the attempt budget is spent. The last error is rethrown with
 * `attempts` set when it is a PipelineError.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const { signal, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new JobCancelledError();
    }

    try {
      const value = await runAttempt(operation, policy.timeoutMs, signal);
      return { value, attempts: attempt };
    } catch (error) {
      if (signal?.aborted) {
        throw new JobCancelledError();
      }
      if (!isRetryableError(error) || attempt >= policy.maxAttempts) {
        if (error instanceof PipelineError) {
          error.attempts = attempt;
        }
        throw error;
      }

      const delayMs = backoffDelay(policy, attempt);
      onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, signal);
    }
  }
}
