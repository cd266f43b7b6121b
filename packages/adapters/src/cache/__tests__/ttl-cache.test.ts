import { describe, it, expect } from '@jest/globals';
import { TtlCache } from '../ttl-cache.js';
import { DeterministicClock } from '../../clock/clock.js';

const EPOCH = Date.parse('2024-03-10T14:00:00Z');

function makeCache(maxEntries = 3, ttlMs = 60_000) {
  const clock = new DeterministicClock(EPOCH);
  return { clock, cache: new TtlCache<string>({ ttlMs, maxEntries, clock }) };
}

describe('TtlCache', () => {
  it('rejects non-positive limits', () => {
    expect(() => new TtlCache<string>({ ttlMs: 0, maxEntries: 1 })).toThrow(RangeError);
    expect(() => new TtlCache<string>({ ttlMs: 1000, maxEntries: 0 })).toThrow(RangeError);
  });

  it('serves an entry until its ttl has elapsed', () => {
    const { clock, cache } = makeCache();
    cache.set('45.52,-122.68', 'clear');

    clock.advance(59_999);
    expect(cache.get('45.52,-122.68')).toBe('clear');

    clock.advance(1);
    expect(cache.get('45.52,-122.68')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('evicts the oldest entry once full', () => {
    const { cache } = makeCache(2);
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe('2');
    expect(cache.get('c')).toBe('3');
  });

  it('re-setting a key moves it to the back of the eviction order', () => {
    const { cache } = makeCache(2);
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('a', '1b');
    cache.set('c', '3');

    expect(cache.get('a')).toBe('1b');
    expect(cache.get('b')).toBeUndefined();
  });

  it('drops expired entries before evicting live ones', () => {
    const { clock, cache } = makeCache(2, 1000);
    cache.set('old', 'x');
    clock.advance(500);
    cache.set('live', 'y');
    clock.advance(600);
    cache.set('new', 'z');

    expect(cache.get('live')).toBe('y');
    expect(cache.get('new')).toBe('z');
    expect(cache.size).toBe(2);
  });

  it('reports hits, misses and fresh entries', () => {
    const { clock, cache } = makeCache(3, 1000);
    cache.set('a', '1');
    cache.set('b', '2');
    cache.get('a');
    cache.get('zzz');
    clock.advance(1000);

    expect(cache.stats()).toEqual({
      totalEntries: 2,
      validEntries: 0,
      hits: 1,
      misses: 1,
      hitRate: 0.5,
      ttlMs: 1000,
      maxEntries: 3,
    });

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
