import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from './limiter.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

describe('ConcurrencyLimiter', () => {
  it('never runs more than the limit at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let peak = 0;
    let current = 0;

    await limiter.map([1, 2, 3, 4, 5, 6], async () => {
      current++;
      peak = Math.max(peak, current);
      await new Promise(r => setTimeout(r, 5));
      current--;
    });

    expect(peak).toBe(2);
    expect(limiter.running).toBe(0);
  });

  it('returns results in input order regardless of completion order', async () => {
    const limiter = new ConcurrencyLimiter(3);
    const results = await limiter.map([30, 10, 20], async (ms) => {
      await new Promise(r => setTimeout(r, ms));
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it('starts queued tasks as running ones settle', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    const order: string[] = [];

    const first = limiter.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = limiter.run(async () => {
      order.push('second:start');
    });

    await new Promise(r => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('releases its slot when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });
});
