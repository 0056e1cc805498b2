import { describe, it, expect, vi, beforeEach } from 'vitest';

const log = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  trace: vi.fn(),
}));

vi.mock('../config/logger.js', () => ({
  createChildLogger: () => log,
}));

import { PoolExecutor, createExecutor, deferredExecutor, directExecutor } from './executors.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('directExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should start the task before returning', () => {
    const started: string[] = [];

    directExecutor.execute(async () => {
      started.push('task');
    });
    started.push('caller');

    expect(started).toEqual(['task', 'caller']);
  });

  it('should log a failing task instead of rejecting', async () => {
    const failure = new Error('boom');

    directExecutor.execute(async () => {
      throw failure;
    });
    await new Promise((resolve) => setImmediate(resolve));

    expect(log.error).toHaveBeenCalledWith({ err: failure }, 'Executor task failed');
  });

  it('should log a task that throws synchronously', async () => {
    const failure = new Error('sync boom');

    directExecutor.execute(() => {
      throw failure;
    });
    await new Promise((resolve) => setImmediate(resolve));

    expect(log.error).toHaveBeenCalledWith({ err: failure }, 'Executor task failed');
  });
});

describe('deferredExecutor', () => {
  it('should start the task after the caller returns', async () => {
    const started: string[] = [];
    const done = deferred();

    deferredExecutor.execute(async () => {
      started.push('task');
      done.resolve();
    });
    started.push('caller');
    await done.promise;

    expect(started).toEqual(['caller', 'task']);
  });
});

describe('PoolExecutor', () => {
  it('should reject a non-positive concurrency', () => {
    expect(() => new PoolExecutor(0)).toThrow('Pool concurrency must be a positive integer, got 0');
  });

  it('should run at most `concurrency` tasks at once', async () => {
    const pool = new PoolExecutor(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((gate, index) => {
      pool.execute(async () => {
        started.push(index);
        await gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(1);

    gates[0].resolve();
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));

    gates[1].resolve();
    gates[2].resolve();
    await pool.onIdle();

    expect(pool.active).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it('should keep running after a task fails', async () => {
    const pool = new PoolExecutor(1);
    const ran: string[] = [];

    pool.execute(async () => {
      throw new Error('boom');
    });
    pool.execute(async () => {
      ran.push('second');
    });
    await pool.onIdle();

    expect(ran).toEqual(['second']);
  });

  it('should resolve onIdle immediately when nothing is queued', async () => {
    await expect(new PoolExecutor(1).onIdle()).resolves.toBeUndefined();
  });
});

describe('createExecutor', () => {
  it('should build the configured executor', () => {
    expect(createExecutor('direct', 4)).toBe(directExecutor);
    expect(createExecutor('deferred', 4)).toBe(deferredExecutor);

    const pool = createExecutor('pool', 4);
    expect(pool).toBeInstanceOf(PoolExecutor);
    if (pool instanceof PoolExecutor) {
      expect(pool.concurrency).toBe(4);
    }
  });
});
