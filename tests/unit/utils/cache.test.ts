import { describe, it, expect, beforeEach } from 'vitest';
import { TTLCache } from '../../../src/utils/cache.js';

describe('TTLCache', () => {
  let clock: number;
  let cache: TTLCache<string, number>;

  beforeEach(() => {
    clock = 1_000;
    cache = new TTLCache<string, number>(100, () => clock);
  });

  it('should return a value before it expires', () => {
    cache.set('a', 1);
    clock += 99;

    expect(cache.get('a')).toBe(1);
    expect(cache.getEntry('a')).toEqual({ value: 1, insertedAt: 1_000, expiresAt: 1_100 });
  });

  it('should evict at the expiry instant', () => {
    cache.set('a', 1);
    clock += 100;

    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should honour a per-entry ttl', () => {
    cache.set('a', 1, 10);
    clock += 10;

    expect(cache.has('a')).toBe(false);
  });

  it('should update a live entry without moving its expiry', () => {
    cache.set('a', 1);
    clock += 50;

    expect(cache.update('a', (value) => value + 1)).toBe(true);
    expect(cache.getEntry('a')).toEqual({ value: 2, insertedAt: 1_000, expiresAt: 1_100 });
  });

  it('should refuse to update a missing or expired entry', () => {
    cache.set('a', 1);
    clock += 100;

    expect(cache.update('a', (value) => value + 1)).toBe(false);
    expect(cache.update('b', (value) => value + 1)).toBe(false);
  });

  it('should prune only expired entries', () => {
    cache.set('old', 1);
    clock += 60;
    cache.set('new', 2);
    clock += 50;

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get('new')).toBe(2);
  });

  it('should delete and clear', () => {
    cache.set('a', 1);
    cache.set('b', 2);

    cache.delete('a');
    expect(cache.size).toBe(1);

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
