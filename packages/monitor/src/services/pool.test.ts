import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from './pool';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('mapWithConcurrency', () => {
  it('visits every item', async () => {
    const seen: number[] = [];
    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async n => {
      seen.push(n);
    });
    expect(seen.sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('never runs more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 1));
      running--;
    });
    expect(peak).toBe(3);
  });

  it('lets a slow item overlap with the rest', async () => {
    const gate = deferred();
    const order: string[] = [];
    const run = mapWithConcurrency(['slow', 'a', 'b'], 2, async item => {
      if (item === 'slow') await gate.promise;
      order.push(item);
      if (item === 'b') gate.resolve();
    });
    await run;
    expect(order).toEqual(['a', 'b', 'slow']);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => {})).resolves.toBeUndefined();
  });

  it('rethrows a worker failure after the other lanes finish', async () => {
    const done: number[] = [];
    const run = mapWithConcurrency([1, 2, 3], 2, async n => {
      if (n === 1) throw new Error('lane failed');
      await new Promise(resolve => setTimeout(resolve, 1));
      done.push(n);
    });
    await expect(run).rejects.toThrow('lane failed');
    expect(done).toEqual([2, 3]);
  });
});
