import { EventEmitter } from 'events';
import { createChildLogger } from '../config/logger.js';
import type { Executor } from '../core/types.js';

const logger = createChildLogger('executor');

function run(task: () => Promise<void>): Promise<void> {
  let promise: Promise<void>;
  try {
    promise = task();
  } catch (error) {
    promise = Promise.reject(error);
  }
  return promise.catch((error: unknown) => {
    logger.error({ err: error }, 'Executor task failed');
  });
}

/**
 * Starts each task on the caller's turn. The task keeps running after its first
 * suspension point, so `execute` still returns without waiting for it.
 */
export const directExecutor: Executor = {
  execute(task) {
    void run(task);
  },
};

/**
 * Starts each task on the next macrotask, after the caller has fully returned.
 */
export const deferredExecutor: Executor = {
  execute(task) {
    setImmediate(() => {
      void run(task);
    });
  },
};

/**
 * PoolExecutor runs at most `concurrency` tasks at a time. Further tasks wait in
 * submission order. Emits `idle` whenever the last running task finishes with
 * nothing left in the queue.
 */
export class PoolExecutor extends EventEmitter implements Executor {
  private queue: Array<() => Promise<void>> = [];
  private running = 0;

  constructor(public readonly concurrency: number) {
    super();
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  execute(task: () => Promise<void>): void {
    this.queue.push(task);
    this.next();
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Resolves once no task is running or queued.
   */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.once('idle', resolve));
  }

  private next(): void {
    while (this.running < this.concurrency) {
      const task = this.queue.shift();
      if (!task) break;
      this.running++;
      void run(task).finally(() => {
        this.running--;
        if (this.running === 0 && this.queue.length === 0) {
          this.emit('idle');
        }
        this.next();
      });
    }
  }
}

export type ExecutorKind = 'direct' | 'deferred' | 'pool';

export function createExecutor(kind: ExecutorKind, poolSize: number): Executor {
  switch (kind) {
    case 'direct':
      return directExecutor;
    case 'deferred':
      return deferredExecutor;
    case 'pool':
      return new PoolExecutor(poolSize);
  }
}
