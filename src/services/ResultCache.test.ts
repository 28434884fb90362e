import { describe, expect, it } from 'vitest';
import { ResultCache } from './ResultCache.js';

describe('ResultCache', () => {
  it('keeps entries apart by kind, location and granularity', () => {
    const cache = new ResultCache<string>();
    cache.set({ kind: 'noise', locationId: 'a1', granularity: 'raw' }, 'raw a1');
    cache.set({ kind: 'noise', locationId: 'a1', granularity: 'hourly' }, 'hourly a1');
    cache.set({ kind: 'stats', locationId: 'a1' }, 'stats a1');

    expect(cache.get({ kind: 'noise', locationId: 'a1', granularity: 'hourly' })).toBe('hourly a1');
    expect(cache.get({ kind: 'noise', locationId: 'a2', granularity: 'hourly' })).toBeUndefined();
    expect(cache.size).toBe(3);
  });

  it('replaces an entry on set', () => {
    const cache = new ResultCache<number[]>();
    cache.set({ kind: 'locations' }, [1, 2]);
    cache.set({ kind: 'locations' }, [3]);

    expect(cache.get({ kind: 'locations' })).toEqual([3]);
  });

  it('invalidates the entries matching a partial key', () => {
    const cache = new ResultCache<string>();
    cache.set({ kind: 'locations' }, 'all');
    cache.set({ kind: 'stats', locationId: 'a1' }, 'stats a1');
    cache.set({ kind: 'noise', locationId: 'a1', granularity: 'raw' }, 'raw a1');
    cache.set({ kind: 'stats', locationId: 'b2' }, 'stats b2');

    expect(cache.invalidate({ locationId: 'a1' })).toBe(2);
    expect(cache.has({ kind: 'stats', locationId: 'b2' })).toBe(true);
    expect(cache.has({ kind: 'locations' })).toBe(true);

    expect(cache.invalidate()).toBe(2);
    expect(cache.size).toBe(0);
  });
});
