/**
 * Parallel Executor
 *
 * Runs independent per-extension tasks with a bounded number in flight.
 * Results come back in input order.
 */

import { logger } from '../monitoring/logger.js';

export interface ExecutionResult<T> {
  taskId: string;
  success: boolean;
  result?: T;
  error?: Error;
}

export class ParallelExecutor {
  private readonly maxConcurrency: number;

  constructor(maxConcurrency: number = 4) {
    this.maxConcurrency = Math.max(1, Math.floor(maxConcurrency));
  }

  /**
   * Map every item through the executor, at most maxConcurrency at a time
   */
  async executeParallel<I, T>(
    items: readonly I[],
    executor: (item: I, index: number) => Promise<T>
  ): Promise<ExecutionResult<T>[]> {
    const results = new Array<ExecutionResult<T>>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        results[index] = await this.executeTask(`parallel-${index}`, () =>
          executor(items[index], index)
        );
      }
    };

    const workers = Array.from(
      { length: Math.min(this.maxConcurrency, items.length) },
      () => worker()
    );
    await Promise.all(workers);

    logger.debug('Parallel execution completed', {
      tasks: items.length,
      maxConcurrency: this.maxConcurrency,
      failed: results.filter((r) => !r.success).length,
    });

    return results;
  }

  /**
   * Execute a single task; failures are captured, never rethrown
   */
  async executeTask<T>(
    taskId: string,
    executor: () => Promise<T>
  ): Promise<ExecutionResult<T>> {
    try {
      return { taskId, success: true, result: await executor() };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.warn('Task failed', { taskId, error: failure.message });
      return { taskId, success: false, error: failure };
    }
  }
}
