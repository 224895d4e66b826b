/**
 * Bounded-concurrency execution for independent probes
 */

import { Logger } from '../logger/Logger';
import { LogLevel } from '../../types/enums';

/**
 * Task function type for parallel execution
 */
export type AsyncTask<T> = () => Promise<T>;

/**
 * Options for parallel execution
 */
export interface ParallelExecutionOptions {
  /** Maximum concurrent tasks */
  concurrency: number;
  /** Stops scheduling new tasks once aborted; running tasks are awaited */
  signal?: AbortSignal;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Result of parallel execution. `results` is index-aligned with the task
 * list: a slot stays undefined when its task failed or never started.
 */
export interface ParallelResult<T> {
  results: Array<T | undefined>;
  errors: Error[];
  completedCount: number;
  failedCount: number;
  /** Tasks never started because the signal aborted */
  skippedCount: number;
  duration: number;
}

/**
 * Runs tasks with at most `concurrency` in flight. Each worker pulls the
 * next unstarted task, so a slow task never holds back a whole batch.
 * A failed task is recorded and the rest still run. Tasks bound their own
 * running time.
 */
export async function executeParallel<T>(
  tasks: AsyncTask<T>[],
  options: ParallelExecutionOptions
): Promise<ParallelResult<T>> {
  const {
    concurrency,
    signal,
    logger = new Logger(LogLevel.INFO, 'ParallelExecutor'),
  } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const startTime = Date.now();
  const results: Array<T | undefined> = new Array<T | undefined>(tasks.length).fill(undefined);
  const errors: Error[] = [];
  let completedCount = 0;
  let failedCount = 0;
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (!signal?.aborted && nextIndex < tasks.length) {
      const taskIndex = nextIndex++;
      const task = tasks[taskIndex];
      if (!task) continue;

      try {
        results[taskIndex] = await task();
        completedCount++;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        errors.push(err);
        failedCount++;
        logger.warn(`Task ${taskIndex} failed: ${err.message}`);
      }
    }
  };

  const workerCount = Math.min(concurrency, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const skippedCount = tasks.length - completedCount - failedCount;
  const duration = Date.now() - startTime;
  logger.debug(
    `Parallel execution complete: ${completedCount} succeeded, ${failedCount} failed, ${skippedCount} skipped in ${duration}ms`
  );

  return {
    results,
    errors,
    completedCount,
    failedCount,
    skippedCount,
    duration,
  };
}
