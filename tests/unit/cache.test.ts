/**
 * Focus:
 * - time-based expiry driven by an injected clock
 * - get-or-compute memoization
 * - sharing of in-flight computations
 */

import { MemoCache, forecastCacheKey } from '@/cache';

describe('MemoCache (unit)', () => {
  let now: number;
  let cache: MemoCache<string>;

  beforeEach(() => {
    now = 1_000;
    cache = new MemoCache<string>(() => now);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - values are readable until their TTL elapses
   */
  test('returns a stored value until it expires', () => {
    cache.set('a', 'one', 500);

    now = 1_499;
    expect(cache.get('a')).toBe('one');

    now = 1_500;
    expect(cache.get('a')).toBeNull();
    expect(cache.size()).toBe(0);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - compute runs once per key inside the window
   */
  test('computes on a miss and reuses the value on a hit', async () => {
    const compute = jest.fn().mockResolvedValue('fresh');

    await expect(cache.getOrCompute('k', 300_000, compute)).resolves.toBe('fresh');
    await expect(cache.getOrCompute('k', 300_000, compute)).resolves.toBe('fresh');

    expect(compute).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies Recovery behavior:
   * - an expired entry triggers a new computation
   */
  test('recomputes once the window has elapsed', async () => {
    const compute = jest
      .fn()
      .mockResolvedValueOnce('first')
      .mockResolvedValueOnce('second');

    await cache.getOrCompute('k', 300_000, compute);

    now += 300_000;
    await expect(cache.getOrCompute('k', 300_000, compute)).resolves.toBe('second');

    expect(compute).toHaveBeenCalledTimes(2);
  });

  /**
   * Purpose:
   * Verifies Concurrency behavior:
   * - callers arriving while a compute is pending share it
   */
  test('shares a pending computation between concurrent callers', async () => {
    let release: (value: string) => void = () => undefined;
    const compute = jest.fn(
      () => new Promise<string>((resolve) => {
        release = resolve;
      })
    );

    const first = cache.getOrCompute('k', 1_000, compute);
    const second = cache.getOrCompute('k', 1_000, compute);

    release('shared');

    await expect(Promise.all([first, second])).resolves.toEqual(['shared', 'shared']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - rejections propagate and are not stored
   */
  test('does not store failed computations', async () => {
    const compute = jest
      .fn()
      .mockRejectedValueOnce(new Error('upstream down'))
      .mockResolvedValueOnce('recovered');

    await expect(cache.getOrCompute('k', 1_000, compute)).rejects.toThrow('upstream down');
    expect(cache.get('k')).toBeNull();

    await expect(cache.getOrCompute('k', 1_000, compute)).resolves.toBe('recovered');
    expect(compute).toHaveBeenCalledTimes(2);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - lookup tells stored values apart from freshly computed ones
   * - a caller joining a pending compute counts as computed
   */
  test('lookup reports where the value came from', async () => {
    let release: (value: string) => void = () => undefined;
    const compute = jest.fn(
      () => new Promise<string>((resolve) => {
        release = resolve;
      })
    );

    const first = cache.lookup('k', 1_000, compute);
    const joined = cache.lookup('k', 1_000, compute);
    release('v');

    await expect(first).resolves.toEqual({ value: 'v', origin: 'computed' });
    await expect(joined).resolves.toEqual({ value: 'v', origin: 'computed' });
    await expect(cache.lookup('k', 1_000, compute)).resolves.toEqual({
      value: 'v',
      origin: 'cached',
    });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  test('keeps keys independent', async () => {
    const compute = jest.fn().mockResolvedValue('v');

    await cache.getOrCompute('a', 1_000, compute);
    await cache.getOrCompute('b', 1_000, compute);

    expect(compute).toHaveBeenCalledTimes(2);
  });

  test('sweep drops only expired entries', () => {
    cache.set('short', 's', 100);
    cache.set('long', 'l', 10_000);

    now += 100;

    expect(cache.sweep()).toBe(1);
    expect(cache.get('short')).toBeNull();
    expect(cache.get('long')).toBe('l');
  });

  test('clear empties the cache', () => {
    cache.set('a', 'one', 1_000);
    cache.clear();

    expect(cache.size()).toBe(0);
  });
});

describe('forecastCacheKey (unit)', () => {
  it('combines coordinates and units', () => {
    expect(forecastCacheKey(48.85, 2.35, 'celsius')).toBe('forecast:48.85:2.35:celsius');
  });

  it('distinguishes units for the same coordinates', () => {
    expect(forecastCacheKey(1, 2, 'celsius')).not.toBe(forecastCacheKey(1, 2, 'fahrenheit'));
  });
});
