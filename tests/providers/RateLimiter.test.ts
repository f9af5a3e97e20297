/**
 * RateLimiter and ResponseCache Tests
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { RateLimiter } from '../../src/services/providers/tmdb/RateLimiter.js';
import { ResponseCache } from '../../src/services/providers/tmdb/ResponseCache.js';

describe('RateLimiter', () => {
  it('should run calls immediately while under the limit', async () => {
    const limiter = new RateLimiter(3, 10);

    const results = await Promise.all([1, 2, 3].map(n => limiter.execute(async () => n * 2)));

    expect(results).toEqual([2, 4, 6]);
    expect(limiter.getRequestCount()).toBe(3);
    expect(limiter.getRemainingRequests()).toBe(0);
  });

  it('should hold the next call until the window frees a slot', async () => {
    const limiter = new RateLimiter(2, 0.1);
    const started = Date.now();

    await limiter.execute(async () => 'a');
    await limiter.execute(async () => 'b');
    await limiter.execute(async () => 'c');

    expect(Date.now() - started).toBeGreaterThanOrEqual(90);
  });

  it('should propagate errors from the wrapped call', async () => {
    const limiter = new RateLimiter();

    await expect(
      limiter.execute(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await limiter.execute(async () => 'next')).toBe('next');
  });
});

describe('ResponseCache', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should build keys from sorted parameters without undefined values', () => {
    expect(ResponseCache.buildKey('/search/movie', { query: 'dune', page: 1, language: undefined })).toBe(
      '/search/movie?page=1&query=dune'
    );
    expect(ResponseCache.buildKey('/movie/603/images')).toBe('/movie/603/images');
  });

  it('should expire entries after their TTL', () => {
    jest.useFakeTimers();
    const cache = new ResponseCache(60);
    cache.set('/movie/603', { id: 603 });

    jest.advanceTimersByTime(59_000);
    expect(cache.get('/movie/603')).toEqual({ id: 603 });

    jest.advanceTimersByTime(1_000);
    expect(cache.get('/movie/603')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should prune only expired entries', () => {
    jest.useFakeTimers();
    const cache = new ResponseCache();
    cache.set('short', 1, 1);
    cache.set('long', 2, 100);

    jest.advanceTimersByTime(2_000);

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get('long')).toBe(2);
  });

  it('should evict the oldest entry when full and nothing has expired', () => {
    const cache = new ResponseCache(60, 2);
    cache.set('first', 1);
    cache.set('second', 2);
    cache.set('third', 3);

    expect(cache.size).toBe(2);
    expect([cache.get('first'), cache.get('second'), cache.get('third')]).toEqual([undefined, 2, 3]);
  });

  it('should prune expired entries before evicting live ones', () => {
    jest.useFakeTimers();
    const cache = new ResponseCache(60, 2);
    cache.set('stale', 1, 1);
    cache.set('live', 2, 100);
    jest.advanceTimersByTime(2_000);

    cache.set('new', 3);

    expect(cache.size).toBe(2);
    expect([cache.get('live'), cache.get('new')]).toEqual([2, 3]);
  });

  it('should ignore writes with a non-positive TTL', () => {
    const cache = new ResponseCache();
    cache.set('key', 'value', 0);

    expect(cache.get('key')).toBeUndefined();
    expect(cache.size).toBe(0);
  });
});
