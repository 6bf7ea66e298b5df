/**
 * Bounded worker pool
 *
 * Tasks wait in a queue; at most `concurrency` of them are in flight.
 * Outcomes are reported in completion order and returned once every
 * task has settled, which is the stage barrier for the engine.
 */

import { JobCancelledError } from '../errors.js';

export type TaskOutcome<TTask, TResult> =
  | { task: TTask; ok: true; value: TResult }
  | { task: TTask; ok: false; error: unknown };

export interface PoolRunOptions<TTask, TResult> {
  signal?: AbortSignal;
  onStart?: (task: TTask) => void | Promise<void>;
  onSettled?: (outcome: TaskOutcome<TTask, TResult>) => void | Promise<void>;
}

export class WorkerPool {
  readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`WorkerPool: concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /**
   * Handler errors become failed outcomes. Errors thrown by the hooks stop
   * the pool from taking new tasks and are rethrown after in-flight work settles.
   */
  async run<TTask, TResult>(
    tasks: readonly TTask[],
    handler: (task: TTask) => Promise<TResult>,
    options: PoolRunOptions<TTask, TResult> = {}
  ): Promise<TaskOutcome<TTask, TResult>[]> {
    const { signal, onStart, onSettled } = options;
    const queue = [...tasks];
    const outcomes: TaskOutcome<TTask, TResult>[] = [];
    let halted = false;

    const worker = async (): Promise<void> => {
      while (queue.length > 0 && !halted && !signal?.aborted) {
        const [task] = queue.splice(0, 1);

        try {
          await onStart?.(task);
          let outcome: TaskOutcome<TTask, TResult>;
          try {
            outcome = { task, ok: true, value: await handler(task) };
          } catch (error) {
            outcome = { task, ok: false, error };
          }

          outcomes.push(outcome);
          if (!signal?.aborted) {
            await onSettled?.(outcome);
          }
        } catch (hookError) {
          halted = true;
          throw hookError;
        }
      }
    };

    const workerCount = Math.min(this.concurrency, queue.length);
    const results = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));

    if (signal?.aborted) {
      throw new JobCancelledError();
    }
    for (const result of results) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
    }

    return outcomes;
  }
}
