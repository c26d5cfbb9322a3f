/**
 * Concurrency helper tests
 */

import { describe, it, expect } from 'vitest';
import { parallelMap } from '../concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('parallelMap', () => {
  it('should keep input order', async () => {
    const result = await parallelMap([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(result).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should bound concurrency', async () => {
    let active = 0;
    let peak = 0;

    await parallelMap([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should start items in order', async () => {
    const started: number[] = [];

    await parallelMap([0, 1, 2, 3, 4], 2, async (item) => {
      started.push(item);
      await delay(1);
    });

    expect(started).toEqual([0, 1, 2, 3, 4]);
  });

  it('should handle an empty list', async () => {
    await expect(parallelMap([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should reject with the first error', async () => {
    await expect(
      parallelMap([1, 2, 3], 1, async (item) => {
        if (item === 2) {
          throw new Error('item 2 failed');
        }
        return item;
      })
    ).rejects.toThrow('item 2 failed');
  });
});
