/**
 * Bounded worker pool
 * Runs at most `size` tasks at once and reports every item's result
 * in submission order, whatever order the tasks finish in.
 */

import * as os from 'os';
import { logger } from './logger';

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolRunOptions {
  /**
   * Checked before each dispatch; returning false leaves the remaining items skipped
   */
  canDispatch?: () => boolean;
}

export interface TaskPool {
  readonly size: number;
  run<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
    options?: PoolRunOptions
  ): Promise<PoolResult<R>[]>;
}

export function defaultPoolSize(): number {
  return Math.max(1, Math.min(8, os.availableParallelism()));
}

export class WorkerPool implements TaskPool {
  readonly size: number;

  constructor(size: number = defaultPoolSize()) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  async run<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
    options: PoolRunOptions = {}
  ): Promise<PoolResult<R>[]> {
    const results: PoolResult<R>[] = items.map(() => ({ status: 'skipped' }));
    let next = 0;
    let stopped = false;

    const worker = async (): Promise<void> => {
      while (!stopped && next < items.length) {
        if (options.canDispatch && !options.canDispatch()) {
          stopped = true;
          return;
        }
        const index = next++;
        try {
          results[index] = { status: 'fulfilled', value: await task(items[index], index) };
        } catch (reason) {
          results[index] = { status: 'rejected', reason };
        }
      }
    };

    const workerCount = Math.min(this.size, items.length);
    logger.debug(`Dispatching ${items.length} tasks on ${workerCount} workers`);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }
}
