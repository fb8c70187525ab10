import { describe, it, expect, vi } from 'vitest';
import { withRetry, withTimeout } from './retry.js';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => attempt);
    await expect(withRetry(fn, { attempts: 3, backoffMs: 0 })).resolves.toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry with linear backoff then succeed', async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`fail ${calls}`);
        return 'ok';
      },
      {
        attempts: 5,
        backoffMs: 100,
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );

    expect(result).toBe('ok');
    expect(delays).toEqual([100, 200]);
  });

  it('should rethrow the last error when the budget is exhausted', async () => {
    const onRetry = vi.fn();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`fail ${calls}`);
        },
        { attempts: 3, backoffMs: 0, onRetry },
      ),
    ).rejects.toThrow('fail 3');
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should stop early when shouldRetry returns false', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });
    await expect(
      withRetry(fn, { attempts: 5, backoffMs: 0, shouldRetry: () => false }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('should resolve when the promise settles in time', async () => {
    await expect(
      withTimeout(Promise.resolve(5), 50, () => new Error('late')),
    ).resolves.toBe(5);
  });

  it('should reject with the timeout error', async () => {
    const never = new Promise<number>(() => {});
    await expect(withTimeout(never, 10, () => new Error('late'))).rejects.toThrow(
      'late',
    );
  });
});
