/**
 * Worker Pool for bounding concurrent file resolutions
 *
 * Each resolve() call (cache lookup, up to two oracle calls, snapping) occupies one slot.
 * Defaults to max(4, available parallelism). Tasks start in submission order.
 *
 * Logging is minimal - only failures, slow tasks and shutdown are logged.
 */
import * as os from 'os';
import { WORKER_POOL_MIN_WORKERS, WORKER_POOL_SLOW_TASK_MS } from '../constants';

export function defaultMaxWorkers(): number {
  return Math.max(WORKER_POOL_MIN_WORKERS, os.availableParallelism());
}

export type WorkerPoolStats = {
  active: number;
  queued: number;
  max: number;
};

type PendingTask = {
  label: string;
  start: () => void;
  cancel: (error: Error) => void;
};

export class WorkerPool {
  private readonly maxWorkers: number;
  private active = 0;
  private nextTaskId = 1;
  private pending: PendingTask[] = [];
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(maxWorkers: number = defaultMaxWorkers()) {
    this.maxWorkers = Math.max(1, maxWorkers);
  }

  /**
   * Run a task in the next free slot. The label names the task in slow/failure logs.
   */
  execute<T>(task: () => Promise<T>, label?: string): Promise<T> {
    const name = label ?? `task #${this.nextTaskId++}`;
    return new Promise<T>((resolve, reject) => {
      if (this.closed) {
        reject(new Error('WorkerPool is shut down'));
        return;
      }

      const start = (): void => {
        // The slot is taken before the task starts so a burst of submissions never overshoots
        this.active++;
        const startedAt = Date.now();
        void Promise.resolve()
          .then(task)
          .then(
            (result) => {
              const elapsed = Date.now() - startedAt;
              if (elapsed > WORKER_POOL_SLOW_TASK_MS) {
                console.warn(`[WorkerPool] ${name} took ${elapsed}ms`);
              }
              this.release();
              resolve(result);
            },
            (error: unknown) => {
              console.error(`[WorkerPool] ${name} failed after ${Date.now() - startedAt}ms:`, error);
              this.release();
              reject(error);
            }
          );
      };

      if (this.active < this.maxWorkers) {
        start();
      } else {
        this.pending.push({ label: name, start, cancel: reject });
      }
    });
  }

  getStats(): WorkerPoolStats {
    return { active: this.active, queued: this.pending.length, max: this.maxWorkers };
  }

  /**
   * Resolves once nothing is running or waiting.
   */
  waitForCompletion(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Refuse new tasks and reject the ones still waiting; running tasks finish normally.
   */
  shutdown(): void {
    this.closed = true;
    const dropped = this.pending.splice(0);
    for (const task of dropped) {
      task.cancel(new Error('WorkerPool shut down before the task started'));
    }
    if (dropped.length > 0) {
      console.log(`[WorkerPool] Shut down, dropped ${dropped.length} waiting tasks (${dropped[0].label}, ...)`);
    }
    this.notifyIfIdle();
  }

  private release(): void {
    this.active--;
    while (!this.closed && this.active < this.maxWorkers) {
      const next = this.pending.shift();
      if (!next) break;
      next.start();
    }
    this.notifyIfIdle();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
