import { setTimeout as sleep } from 'node:timers/promises';
import { describe, expect, it } from 'vitest';
import { runBounded } from '../src/pool.js';

describe('runBounded', () => {
  it('keeps at most the given number of tasks in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const delays = [30, 5, 20, 1, 10, 15];

    const tasks = delays.map((delay, index) => async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(delay);
      inFlight -= 1;
      return index;
    });

    const results = await runBounded(tasks, 2);

    expect(peak).toBe(2);
    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : -1))).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('reports a rejected task without stopping the others', async () => {
    const error = new Error('boom');
    const results = await runBounded(
      [
        async () => 'a',
        async () => {
          throw error;
        },
        async () => 'c',
      ],
      3,
    );

    expect(results).toEqual([
      { status: 'fulfilled', value: 'a' },
      { status: 'rejected', reason: error },
      { status: 'fulfilled', value: 'c' },
    ]);
  });

  it('returns an empty list for no tasks', async () => {
    expect(await runBounded([], 4)).toEqual([]);
  });
});
