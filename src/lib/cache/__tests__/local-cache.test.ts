/**
 * Local Cache Tests
 * Unit tests for the bounded LRU/TTL tier
 */

import { ConfigurationError } from '../cache.errors';
import { NEVER_EXPIRES, RemovalReason } from '../cache.types';
import { expiryFor, LocalCache } from '../local-cache';
import { createTestClock, TestClock } from '../../../__tests__/helpers/fixtures';

describe('LocalCache', () => {
  let clock: TestClock;
  let removals: Array<[string, RemovalReason]>;

  const createCache = (maxEntries: number, expiredScanWindow?: number) =>
    new LocalCache<string>({
      maxEntries,
      expiredScanWindow,
      now: clock.now,
      onRemove: (key, reason) => removals.push([key, reason]),
    });

  beforeEach(() => {
    clock = createTestClock();
    removals = [];
  });

  describe('constructor', () => {
    it('should reject a capacity below one', () => {
      expect(() => createCache(0)).toThrow(ConfigurationError);
      expect(() => createCache(0)).toThrow('Invalid maxEntries: must be a positive integer, got 0');
    });

    it('should reject a fractional capacity', () => {
      expect(() => createCache(2.5)).toThrow(ConfigurationError);
    });

    it('should reject an empty scan window', () => {
      expect(() => createCache(2, 0)).toThrow('Invalid expiredScanWindow: must be a positive integer, got 0');
    });
  });

  describe('get and set', () => {
    it('should return a value written before', () => {
      const cache = createCache(10);
      cache.set('a', 'alpha', 1000);

      const entry = cache.get('a');

      expect(entry?.value).toBe('alpha');
      expect(entry?.hits).toBe(1);
      expect(entry?.lastAccessed).toBe(clock.now());
    });

    it('should return undefined for an unknown key', () => {
      expect(createCache(10).get('missing')).toBeUndefined();
    });

    it('should give every write a higher version', () => {
      const cache = createCache(10);
      const first = cache.set('a', '1', 1000).version;
      const second = cache.set('b', '2', 1000).version;
      const third = cache.set('a', '3', 1000).version;

      expect(second).toBeGreaterThan(first);
      expect(third).toBeGreaterThan(second);
      expect(cache.currentVersion()).toBe(third);
    });

    it('should keep versions growing across delete and recreate', () => {
      const cache = createCache(10);
      const before = cache.set('a', '1', 1000).version;
      cache.delete('a');

      expect(cache.set('a', '2', 1000).version).toBeGreaterThan(before);
    });

    it('should keep createdAt when a key is overwritten', () => {
      const cache = createCache(10);
      const created = cache.set('a', '1', 1000).createdAt;
      clock.advance(10);

      const updated = cache.set('a', '2', 1000);

      expect(updated.createdAt).toBe(created);
      expect(updated.lastAccessed).toBe(created + 10);
    });

    it('should reject negative and non-finite TTLs', () => {
      const cache = createCache(10);
      expect(() => cache.set('a', 'x', -1)).toThrow(RangeError);
      expect(() => cache.set('a', 'x', Number.NaN)).toThrow(RangeError);
      expect(() => cache.set('a', 'x', Number.POSITIVE_INFINITY)).toThrow(RangeError);
      expect(cache.len()).toBe(0);
    });
  });

  describe('TTL', () => {
    it('should serve an entry until its TTL elapses', () => {
      const cache = createCache(10);
      cache.set('a', 'alpha', 100);

      clock.advance(99);
      expect(cache.get('a')?.value).toBe('alpha');

      clock.advance(1);
      expect(cache.get('a')).toBeUndefined();
      expect(removals).toEqual([['a', 'expired']]);
      expect(cache.len()).toBe(0);
    });

    it('should never expire entries written with TTL 0', () => {
      const cache = createCache(10);
      const entry = cache.set('a', 'forever', 0);

      clock.advance(365 * 24 * 60 * 60 * 1000);

      expect(entry.expiresAt).toBe(NEVER_EXPIRES);
      expect(cache.get('a')?.value).toBe('forever');
    });

    it('should expire lazily on peek without touching recency', () => {
      const cache = createCache(10);
      cache.set('a', 'alpha', 50);
      cache.set('b', 'beta', 1000);

      expect(cache.peek('a')?.hits).toBe(0);
      expect(cache.keys()).toEqual(['a', 'b']);

      clock.advance(50);
      expect(cache.peek('a')).toBeUndefined();
      expect(removals).toEqual([['a', 'expired']]);
    });
  });

  describe('LRU eviction', () => {
    it('should evict the least recently used key at capacity', () => {
      const cache = createCache(2);
      cache.set('A', 'a', 1000);
      cache.set('B', 'b', 1000);
      cache.get('A');
      cache.set('C', 'c', 1000);

      expect(cache.get('B')).toBeUndefined();
      expect(cache.get('A')?.value).toBe('a');
      expect(cache.get('C')?.value).toBe('c');
      expect(removals).toEqual([['B', 'evicted']]);
    });

    it('should never exceed capacity', () => {
      const cache = createCache(5);
      for (let i = 0; i < 50; i++) {
        cache.set(`key-${i}`, `value-${i}`, 1000);
        expect(cache.len()).toBeLessThanOrEqual(5);
      }

      expect(cache.keys()).toEqual(['key-45', 'key-46', 'key-47', 'key-48', 'key-49']);
      expect(removals).toHaveLength(45);
    });

    it('should not evict when replacing an existing key at capacity', () => {
      const cache = createCache(2);
      cache.set('A', 'a', 1000);
      cache.set('B', 'b', 1000);
      cache.set('A', 'a2', 1000);

      expect(cache.len()).toBe(2);
      expect(removals).toEqual([]);
      expect(cache.keys()).toEqual(['B', 'A']);
    });

    it('should break recency ties in insertion order', () => {
      const cache = createCache(3);
      cache.set('first', '1', 1000);
      cache.set('second', '2', 1000);
      cache.set('third', '3', 1000);
      cache.set('fourth', '4', 1000);

      expect(cache.keys()).toEqual(['second', 'third', 'fourth']);
    });

    it('should prefer an expired entry near the LRU end over a live one', () => {
      const cache = createCache(3);
      cache.set('live-old', '1', 1000);
      cache.set('short', '2', 10);
      cache.set('live-new', '3', 1000);
      clock.advance(10);

      cache.set('incoming', '4', 1000);

      expect(removals).toEqual([['short', 'expired']]);
      expect(cache.keys()).toEqual(['live-old', 'live-new', 'incoming']);
    });

    it('should fall back to LRU when no expired entry is inside the scan window', () => {
      const cache = createCache(3, 1);
      cache.set('live-old', '1', 1000);
      cache.set('short', '2', 10);
      cache.set('live-new', '3', 1000);
      clock.advance(10);

      cache.set('incoming', '4', 1000);

      expect(removals).toEqual([['live-old', 'evicted']]);
    });
  });

  describe('populate', () => {
    it('should insert when no newer local write exists', () => {
      const cache = createCache(10);
      const observed = cache.currentVersion();

      const result = cache.populate('a', 'remote', 1000, observed);

      expect(result.applied).toBe(true);
      expect(cache.peek('a')?.value).toBe('remote');
    });

    it('should keep a local write made after the observed version', () => {
      const cache = createCache(10);
      const observed = cache.currentVersion();
      cache.set('a', 'local', 1000);

      const result = cache.populate('a', 'remote', 1000, observed);

      expect(result.applied).toBe(false);
      expect(result.entry.value).toBe('local');
      expect(cache.peek('a')?.value).toBe('local');
    });
  });

  describe('delete and clear', () => {
    it('should be a no-op for an absent key', () => {
      const cache = createCache(10);
      expect(cache.delete('missing')).toBe(false);
      cache.set('a', 'x', 1000);
      expect(cache.delete('a')).toBe(true);
      expect(cache.delete('a')).toBe(false);
    });

    it('should not report explicit deletes as removals', () => {
      const cache = createCache(10);
      cache.set('a', 'x', 1000);
      cache.delete('a');
      cache.set('b', 'y', 1000);
      cache.clear();

      expect(removals).toEqual([]);
      expect(cache.len()).toBe(0);
    });
  });

  describe('scan', () => {
    it('should list live entries under a prefix', () => {
      const cache = createCache(10);
      cache.set('session:a', '1', 1000);
      cache.set('session:b', '2', 10);
      cache.set('metrics:a', '3', 1000);
      clock.advance(10);

      expect(cache.scan('session:').map((entry) => entry.key)).toEqual(['session:a']);
    });
  });

  describe('beginSweep', () => {
    it('should remove expired entries in bounded batches', () => {
      const cache = createCache(10);
      for (let i = 0; i < 5; i++) {
        cache.set(`short-${i}`, 'x', 10);
      }
      cache.set('long', 'y', 1000);
      clock.advance(10);

      const sweep = cache.beginSweep();
      expect(sweep.step(2)).toEqual({ examined: 2, removed: 2, done: false });
      expect(sweep.step(2)).toEqual({ examined: 2, removed: 2, done: false });
      expect(sweep.step(2)).toEqual({ examined: 2, removed: 1, done: true });

      expect(cache.keys()).toEqual(['long']);
      expect(removals.every(([, reason]) => reason === 'expired')).toBe(true);
    });

    it('should not examine more keys than the cache held when it began', () => {
      const cache = createCache(10);
      cache.set('a', '1', 1000);
      cache.set('b', '2', 1000);

      const sweep = cache.beginSweep();
      cache.get('a');

      const progress = sweep.step(10);
      expect(progress.examined).toBeLessThanOrEqual(2);
      expect(progress.done).toBe(true);
    });

    it('should finish immediately on an empty cache', () => {
      expect(createCache(10).beginSweep().step(5)).toEqual({ examined: 0, removed: 0, done: true });
    });
  });

  describe('expiryFor', () => {
    it('should add the TTL to the current time', () => {
      expect(expiryFor(250, 1000)).toBe(1250);
    });

    it('should map TTL 0 to the sentinel', () => {
      expect(expiryFor(0, 1000)).toBe(NEVER_EXPIRES);
    });
  });
});
