/**
 * Bounded worker pool for parallel API work
 *
 * Runs at most N tasks at once. Results are collected in completion order,
 * and a rejected task is reported and counted instead of failing the batch.
 */

export interface BoundedPoolOptions {
  maxConcurrent: number;
}

export interface BatchProgress {
  completed: number;
  total: number;
  startTime: number;
  elapsedMs: number;
  ratePerSecond: number;
}

export interface PoolRunHooks {
  onProgress?: (progress: BatchProgress) => void;
  onError?: (error: unknown, index: number) => void;
}

export interface PoolRunResult<T> {
  results: T[];
  failures: number;
}

const DEFAULT_OPTIONS: BoundedPoolOptions = {
  maxConcurrent: 10,
};

export class BoundedPool {
  private maxConcurrent: number;
  private activeCount: number = 0;
  private queue: Array<{ resolve: () => void }> = [];

  constructor(options: Partial<BoundedPoolOptions> = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(opts.maxConcurrent) || opts.maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${opts.maxConcurrent}`);
    }
    this.maxConcurrent = opts.maxConcurrent;
  }

  get active(): number {
    return this.activeCount;
  }

  private async acquire(): Promise<void> {
    if (this.activeCount < this.maxConcurrent) {
      this.activeCount++;
      return;
    }

    // Wait for a slot to be available
    return new Promise((resolve) => {
      this.queue.push({ resolve });
    });
  }

  private release(): void {
    this.activeCount--;
    const next = this.queue.shift();
    if (next) {
      this.activeCount++;
      next.resolve();
    }
  }

  /**
   * Execute all tasks with controlled concurrency.
   *
   * @returns Fulfilled values in the order the tasks finished, plus the
   * number of tasks that rejected.
   */
  async run<T>(tasks: Array<() => Promise<T>>, hooks: PoolRunHooks = {}): Promise<PoolRunResult<T>> {
    if (tasks.length === 0) {
      return { results: [], failures: 0 };
    }

    const results: T[] = [];
    let failures = 0;
    let completed = 0;
    const startTime = Date.now();

    const wrappedTasks = tasks.map((task, index) => async () => {
      await this.acquire();

      try {
        results.push(await task());
      } catch (error) {
        failures++;
        if (hooks.onError) {
          hooks.onError(error, index);
        } else {
          console.error(`Task ${index} failed:`, error);
        }
      } finally {
        this.release();
        completed++;

        if (hooks.onProgress) {
          const elapsedMs = Date.now() - startTime;
          hooks.onProgress({
            completed,
            total: tasks.length,
            startTime,
            elapsedMs,
            ratePerSecond: elapsedMs > 0 ? completed / (elapsedMs / 1000) : completed,
          });
        }
      }
    });

    await Promise.all(wrappedTasks.map((t) => t()));

    if (failures > 0) {
      console.warn(`${failures} of ${tasks.length} tasks failed during batch execution`);
    }

    return { results, failures };
  }
}
