/**
 * Tests for the execution bridge.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BridgeFuture,
  ExecutionBridge,
  Semaphore,
  executionBridgeConstructions,
  getExecutionBridge,
  resetExecutionBridge,
} from '../bridge/index.js';
import { OperationCancelledError } from '../errors/index.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ExecutionBridge', () => {
  beforeEach(() => {
    resetExecutionBridge();
  });

  describe('singleton', () => {
    it('should construct exactly once under concurrent first use', async () => {
      const bridges = await Promise.all(
        Array.from({ length: 25 }, async () => getExecutionBridge({ maxWorkers: 4 }))
      );

      expect(executionBridgeConstructions()).toBe(1);
      expect(new Set(bridges).size).toBe(1);
      expect(bridges[0]).toBe(ExecutionBridge.instance());
    });

    it('should ignore options after the first use', () => {
      getExecutionBridge({ maxWorkers: 3 });
      expect(getExecutionBridge({ maxWorkers: 10 }).stats().maxWorkers).toBe(3);
    });

    it('should default to 32 workers', () => {
      expect(getExecutionBridge().stats().maxWorkers).toBe(32);
    });
  });

  describe('run', () => {
    it('should run independent callers concurrently', async () => {
      const bridge = getExecutionBridge({ maxWorkers: 1 });
      const started = Date.now();

      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          bridge.run(async () => {
            await sleep(50);
            return i;
          })
        )
      );

      expect(results).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(Date.now() - started).toBeLessThan(300);
    });

    it('should propagate failures unchanged and count them', async () => {
      const bridge = getExecutionBridge();
      const failure = new Error('boom');

      await expect(bridge.run(async () => Promise.reject(failure))).rejects.toBe(failure);
      expect(bridge.stats()).toMatchObject({ failed: 1, completed: 0, inFlight: 0 });
    });
  });

  describe('submit', () => {
    it('should bound concurrent work to the worker count', async () => {
      const bridge = getExecutionBridge({ maxWorkers: 2 });
      const gates = [deferred<number>(), deferred<number>(), deferred<number>(), deferred<number>()];
      let started = 0;

      const futures = gates.map((gate) =>
        bridge.submit(async () => {
          started++;
          return gate.promise;
        })
      );
      await flush();

      expect(started).toBe(2);
      expect(bridge.stats()).toMatchObject({ inFlight: 2, queued: 2 });

      gates[0]?.resolve(0);
      await flush();
      expect(started).toBe(3);

      gates.forEach((gate, i) => gate.resolve(i));
      expect(await Promise.all(futures)).toEqual([0, 1, 2, 3]);
      expect(bridge.stats()).toMatchObject({ inFlight: 0, queued: 0, completed: 4 });
    });

    it('should never start a cancelled operation that was still queued', async () => {
      const bridge = getExecutionBridge({ maxWorkers: 1 });
      const gate = deferred<string>();
      let secondStarted = false;

      const first = bridge.submit(() => gate.promise);
      const second = bridge.submit(async () => {
        secondStarted = true;
        return 'second';
      });
      await flush();

      expect(second.cancel('no longer needed')).toBe(true);
      await expect(second).rejects.toThrow('Operation cancelled: no longer needed');

      gate.resolve('first');
      expect(await first).toBe('first');
      await flush();

      expect(secondStarted).toBe(false);
      expect(second.cancelled).toBe(true);
      expect(bridge.stats().cancelled).toBe(1);
    });

    it('should abort the signal of an in-flight operation', async () => {
      const bridge = getExecutionBridge();
      let aborted = false;

      const future = bridge.submit(
        (signal) =>
          new Promise<string>((_, reject) => {
            signal.addEventListener('abort', () => {
              aborted = true;
              reject(new Error('aborted by caller'));
            });
          })
      );
      await flush();

      future.cancel();

      await expect(future).rejects.toBeInstanceOf(OperationCancelledError);
      expect(aborted).toBe(true);
      expect(future.signal.aborted).toBe(true);
      await flush();
      expect(bridge.stats()).toMatchObject({ cancelled: 1, failed: 0, inFlight: 0 });
    });

    it('should not cancel a settled future', async () => {
      const future = getExecutionBridge().submit(async () => 5);

      expect(await future).toBe(5);
      expect(future.done).toBe(true);
      expect(future.cancel()).toBe(false);
      expect(future.cancelled).toBe(false);
    });
  });
});

describe('BridgeFuture', () => {
  it('should support catch and finally', async () => {
    let finished = false;
    const future = new BridgeFuture<number>(async () => {
      throw new Error('nope');
    });

    const recovered = await future
      .catch(() => -1)
      .finally(() => {
        finished = true;
      });

    expect(recovered).toBe(-1);
    expect(finished).toBe(true);
  });
});

describe('Semaphore', () => {
  it('should hand permits to waiters in order', async () => {
    const semaphore = new Semaphore(1);
    const order: number[] = [];

    await semaphore.acquire();
    const second = semaphore.acquire().then(() => order.push(2));
    const third = semaphore.acquire().then(() => order.push(3));

    expect(semaphore.pending).toBe(2);
    semaphore.release();
    await second;
    semaphore.release();
    await third;

    expect(order).toEqual([2, 3]);
    expect(semaphore.available).toBe(0);
  });
});
