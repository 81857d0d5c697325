import { describe, expect, it } from 'vitest';

import { runWithConcurrency, summarizeDurations } from '../../src/core/execution-loop.js';

describe('execution loop helpers', () => {
  it('runs async work in bounded concurrency while preserving result ordering', async () => {
    const started: number[] = [];
    const resolved: number[] = [];
    const items = [1, 2, 3, 4, 5];
    let active = 0;
    let peak = 0;

    const results = await runWithConcurrency(items, 2, async (item) => {
      started.push(item);
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 6 - item));
      active -= 1;
      resolved.push(item);
      return item * 10;
    });

    expect(started.length).toBe(items.length);
    expect(resolved.length).toBe(items.length);
    expect(peak).toBe(2);
    expect(results).toEqual([10, 20, 30, 40, 50]);
  });

  it('falls back to a single worker for unusable concurrency values', async () => {
    expect(await runWithConcurrency([], 4, async (item: number) => item)).toEqual([]);
    expect(await runWithConcurrency(['a', 'b'], 0, async (item, index) => `${index}:${item}`)).toEqual([
      '0:a',
      '1:b'
    ]);
    expect(await runWithConcurrency([3], Number.NaN, async (item) => item + 1)).toEqual([4]);
  });

  it('summarizes per-item durations', () => {
    const summary = summarizeDurations([4, 8, 12, 16, 20]);
    expect(summary.count).toBe(5);
    expect(summary.totalMs).toBe(60);
    expect(summary.averageMs).toBe(12);
    expect(summary.maxMs).toBe(20);
    expect(summary.p95Ms).toBe(20);
  });

  it('ignores negative and non-finite samples', () => {
    expect(summarizeDurations([5, -1, Number.NaN, Number.POSITIVE_INFINITY])).toEqual({
      count: 1,
      totalMs: 5,
      averageMs: 5,
      maxMs: 5,
      p95Ms: 5
    });
    expect(summarizeDurations([])).toEqual({ count: 0, totalMs: 0, averageMs: 0, maxMs: 0, p95Ms: 0 });
  });
});
