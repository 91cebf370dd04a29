import { describe, it, expect } from 'vitest';
import { runWithConcurrency } from '../runWithConcurrency.js';

describe('runWithConcurrency', () => {
  it('結果を入力と同じ順序で返す', async () => {
    const delays = [30, 5, 20, 1, 10];

    const results = await runWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
  });

  it('同時実行数が limit を超えない', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await runWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 4, async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inFlight--;
    });

    expect(maxInFlight).toBe(4);
  });

  it('空の入力ではワーカーを呼ばない', async () => {
    let called = false;
    const results = await runWithConcurrency([], 4, async () => {
      called = true;
    });

    expect(results).toEqual([]);
    expect(called).toBe(false);
  });

  it('ワーカーのエラーは呼び出し元に伝わる', async () => {
    await expect(
      runWithConcurrency([1, 2, 3], 2, async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
  });
});
