import { describe, it, expect } from 'vitest';
import { ConcurrentExecutor, SerialExecutor } from '../executors.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SerialExecutor', () => {
  it('should run jobs in order on a later turn', async () => {
    const executor = new SerialExecutor();
    const order: number[] = [];

    executor.enqueue(() => {
      order.push(1);
    });
    executor.enqueue(() => {
      order.push(2);
    });

    expect(order).toEqual([]);
    expect(executor.size).toBe(2);

    await new Promise((resolve) => setImmediate(resolve));

    expect(order).toEqual([1, 2]);
    expect(executor.size).toBe(0);
  });

  it('should run jobs enqueued by a job after the current ones', async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];

    executor.enqueue(() => {
      order.push('a');
      executor.enqueue(() => {
        order.push('c');
      });
    });
    executor.enqueue(() => {
      order.push('b');
    });
    await new Promise((resolve) => setImmediate(resolve));

    expect(order).toEqual(['a', 'b', 'c']);
  });
});

describe('ConcurrentExecutor', () => {
  it('should run jobs concurrently without a ceiling', () => {
    const executor = new ConcurrentExecutor();
    const gate = deferred();

    executor.enqueue(() => gate.promise);
    executor.enqueue(() => gate.promise);
    executor.enqueue(() => gate.promise);

    expect(executor.activeCount).toBe(3);
    expect(executor.waitingCount).toBe(0);
    gate.resolve();
  });

  it('should hold jobs over the ceiling until a slot frees', async () => {
    const executor = new ConcurrentExecutor({ maxConcurrent: 1 });
    const first = deferred();
    const order: string[] = [];
    const second = deferred();

    executor.enqueue(async () => {
      await first.promise;
      order.push('first');
    });
    executor.enqueue(() => {
      order.push('second');
      second.resolve();
    });

    expect(executor.activeCount).toBe(1);
    expect(executor.waitingCount).toBe(1);

    first.resolve();
    await second.promise;

    expect(order).toEqual(['first', 'second']);
  });

  it('should keep running after a failing job', async () => {
    const executor = new ConcurrentExecutor({ maxConcurrent: 1, name: 'failing' });
    const done = deferred();
    const logged: unknown[] = [];
    const originalError = console.error;
    console.error = (...args: unknown[]) => {
      logged.push(args[0]);
    };

    executor.enqueue(() => Promise.reject(new Error('boom')));
    executor.enqueue(() => done.resolve());
    await done.promise;

    console.error = originalError;
    expect(logged).toEqual(['Unhandled error in failing executor job:']);
  });

  it('should reject a ceiling below one', () => {
    expect(() => new ConcurrentExecutor({ maxConcurrent: 0 })).toThrow('maxConcurrent must be at least 1, got 0');
  });
});
