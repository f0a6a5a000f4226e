import { CacheService } from '@/services/cacheService';

describe('CacheService', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  it('serves a stored value until it expires', async () => {
    const cache = new CacheService<number>({ now: clock });
    const fetchFn = jest.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);

    expect(await cache.getCachedData('key', fetchFn, 1)).toBe(1);
    now += 59_000;
    expect(await cache.getCachedData('key', fetchFn, 1)).toBe(1);
    now += 1_000;
    expect(await cache.getCachedData('key', fetchFn, 1)).toBe(2);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('keeps keys apart', async () => {
    const cache = new CacheService<string>({ now: clock });

    await cache.getCachedData('a', async () => 'first');
    expect(await cache.getCachedData('b', async () => 'second')).toBe('second');
    expect(cache.size).toBe(2);
  });

  it('always fetches when disabled', async () => {
    const cache = new CacheService<number>({ enabled: false, now: clock });
    const fetchFn = jest.fn().mockResolvedValue(7);

    await cache.getCachedData('key', fetchFn);
    await cache.getCachedData('key', fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it('does not store a failed fetch', async () => {
    const cache = new CacheService<number>({ now: clock });

    await expect(cache.getCachedData('key', () => Promise.reject(new Error('offline')))).rejects.toThrow('offline');
    expect(await cache.getCachedData('key', async () => 3)).toBe(3);
  });

  it('invalidates one key or everything', async () => {
    const cache = new CacheService<number>({ now: clock });
    await cache.getCachedData('a', async () => 1);
    await cache.getCachedData('b', async () => 2);

    cache.invalidate('a');
    expect(cache.size).toBe(1);

    cache.invalidate();
    expect(cache.size).toBe(0);
  });

  it('prunes expired entries', async () => {
    const cache = new CacheService<number>({ now: clock });
    await cache.getCachedData('short', async () => 1, 1);
    await cache.getCachedData('long', async () => 2, 10);

    now += 5 * 60_000;

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
  });
});
