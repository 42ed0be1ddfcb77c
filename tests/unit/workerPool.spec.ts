// tests/unit/workerPool.spec.ts

import { describe, expect, it, jest } from '@jest/globals';
import { runWithConcurrency } from '../../src/services/workerPool';
import { delay } from '../helpers/fakeTransport';

describe('runWithConcurrency', () => {
  it('never runs more tasks than the limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const items = Array.from({ length: 10 }, (_, i) => i);

    await runWithConcurrency(items, 3, async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(item % 3);
      inFlight--;
    });

    expect(maxInFlight).toBe(3);
  });

  it('visits every item exactly once', async () => {
    const seen: number[] = [];
    const summary = await runWithConcurrency(['a', 'b', 'c', 'd', 'e'], 2, async (_item, index) => {
      await delay(5 - index);
      seen.push(index);
    });

    expect(summary).toEqual({ started: 5, skipped: 0 });
    expect([...seen].sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it('stops starting tasks once the signal aborts', async () => {
    const controller = new AbortController();
    const task = jest.fn(async (_item: string, index: number) => {
      if (index === 1) controller.abort();
    });

    const summary = await runWithConcurrency(['a', 'b', 'c', 'd', 'e'], 1, task, controller.signal);

    expect(summary).toEqual({ started: 2, skipped: 3 });
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('starts nothing when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = jest.fn(async () => undefined);

    const summary = await runWithConcurrency([1, 2, 3], 2, task, controller.signal);

    expect(summary).toEqual({ started: 0, skipped: 3 });
    expect(task).not.toHaveBeenCalled();
  });

  it('handles an empty list', async () => {
    await expect(runWithConcurrency([], 4, async () => undefined)).resolves.toEqual({ started: 0, skipped: 0 });
  });

  it('rejects a non-positive limit', async () => {
    await expect(runWithConcurrency([1], 0, async () => undefined)).rejects.toThrow(RangeError);
  });
});
