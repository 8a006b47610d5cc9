import { describe, it, expect } from 'vitest';
import { CacheKeys, SessionCache } from '../src/lib/sessionCache';
import type { ChartSonification } from '../src/lib/schemas';

const sonification: ChartSonification = { planets: [], ascendantSign: 'Leo', dominantFrequency: 126.22, totalDuration: 20 };

describe('SessionCache', () => {
  it('reports nothing for keys never set', () => {
    const cache = new SessionCache();
    expect(cache.has(CacheKeys.dailyReading)).toBe(false);
    expect(cache.get(CacheKeys.dailyReading)).toBeUndefined();
  });

  it('overwrites on repeated set', () => {
    const cache = new SessionCache();
    cache.set('k', { v: 1 });
    cache.set('k', { v: 2 });
    expect(cache.has('k')).toBe(true);
    expect(cache.get<{ v: number }>('k')).toEqual({ v: 2 });
    expect(cache.size).toBe(1);
  });

  it('keeps instances independent', () => {
    const a = new SessionCache();
    const b = new SessionCache();
    a.set(CacheKeys.alignment, 'x');
    a.userSonification = sonification;
    expect(b.has(CacheKeys.alignment)).toBe(false);
    expect(b.userSonification).toBeNull();
  });

  it('deletes single entries', () => {
    const cache = new SessionCache();
    cache.set(CacheKeys.playlistInsight, 'insight');
    expect(cache.delete(CacheKeys.playlistInsight)).toBe(true);
    expect(cache.delete(CacheKeys.playlistInsight)).toBe(false);
    expect(cache.has(CacheKeys.playlistInsight)).toBe(false);
  });

  it('clears sonification slots without touching entries', () => {
    const cache = new SessionCache();
    cache.userSonification = sonification;
    cache.dailySonification = sonification;
    cache.set(CacheKeys.dailyReading, 'reading');
    cache.clearSonification();
    expect(cache.userSonification).toBeNull();
    expect(cache.dailySonification).toBeNull();
    expect(cache.get(CacheKeys.dailyReading)).toBe('reading');
  });

  it('clearAll empties everything', () => {
    const cache = new SessionCache();
    cache.userSonification = sonification;
    cache.friends = [];
    cache.set(CacheKeys.zodiacSeasonCard, {});
    cache.clearAll();
    expect(cache.userSonification).toBeNull();
    expect(cache.friends).toBeNull();
    expect(cache.size).toBe(0);
  });
});
