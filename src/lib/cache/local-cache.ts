/**
 * Local Cache Tier
 * Bounded in-process cache with LRU eviction and per-entry TTL
 *
 * Recency is the insertion order of the backing Map: a read or write removes
 * the key and inserts it again, so the first key is always the least recently
 * used one and keys touched at the same instant keep FIFO order.
 * Every method is synchronous, so each call is atomic on the event loop.
 */

import { ConfigurationError } from './cache.errors';
import { CacheEntry, NEVER_EXPIRES, RemovalListener, RemovalReason } from './cache.types';

export interface LocalCacheOptions {
  maxEntries: number;
  now?: () => number;
  onRemove?: RemovalListener;
  expiredScanWindow?: number;  // LRU-end entries checked for an expired victim before evicting a live one
}

export interface PopulateResult<V> {
  entry: CacheEntry<V>;
  applied: boolean;
}

export interface SweepProgress {
  examined: number;
  removed: number;
  done: boolean;
}

const DEFAULT_EXPIRED_SCAN_WINDOW = 8;

export class LocalCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly onRemove?: RemovalListener;
  private readonly expiredScanWindow: number;
  private sequence = 0;

  constructor(options: LocalCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new ConfigurationError('maxEntries', `must be a positive integer, got ${options.maxEntries}`);
    }

    const scanWindow = options.expiredScanWindow ?? DEFAULT_EXPIRED_SCAN_WINDOW;
    if (!Number.isInteger(scanWindow) || scanWindow < 1) {
      throw new ConfigurationError('expiredScanWindow', `must be a positive integer, got ${scanWindow}`);
    }

    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
    this.onRemove = options.onRemove;
    this.expiredScanWindow = scanWindow;
  }

  /**
   * Get a live entry and mark it most recently used.
   * An expired entry is removed and reported as a miss.
   */
  get(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    const now = this.now();
    if (now >= entry.expiresAt) {
      this.remove(key, 'expired');
      return undefined;
    }

    entry.lastAccessed = now;
    entry.hits++;
    this.touch(key, entry);
    return entry;
  }

  /**
   * Get a live entry without changing its recency
   */
  peek(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.remove(key, 'expired');
      return undefined;
    }

    return entry;
  }

  /**
   * Insert or replace an entry. ttlMs of 0 means the entry never expires.
   */
  set(key: string, value: V, ttlMs: number): CacheEntry<V> {
    const now = this.now();
    const expiresAt = expiryFor(ttlMs, now);
    const existing = this.entries.get(key);

    if (existing) {
      existing.value = value;
      existing.expiresAt = expiresAt;
      existing.lastAccessed = now;
      existing.version = ++this.sequence;
      this.touch(key, existing);
      return existing;
    }

    if (this.entries.size >= this.maxEntries) {
      this.evictOne(now);
    }

    const entry: CacheEntry<V> = {
      key,
      value,
      expiresAt,
      lastAccessed: now,
      version: ++this.sequence,
      createdAt: now,
      hits: 0,
    };
    this.entries.set(key, entry);
    return entry;
  }

  /**
   * Insert a value fetched from elsewhere, unless a live entry was written
   * after `observedVersion`. A newer local write always wins.
   */
  populate(key: string, value: V, ttlMs: number, observedVersion: number): PopulateResult<V> {
    const current = this.peek(key);
    if (current && current.version > observedVersion) {
      return { entry: current, applied: false };
    }
    return { entry: this.set(key, value, ttlMs), applied: true };
  }

  /**
   * Remove an entry. No-op when absent.
   */
  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Live entries whose key starts with the prefix, without touching recency
   */
  scan(prefix: string): CacheEntry<V>[] {
    const now = this.now();
    const result: CacheEntry<V>[] = [];
    for (const entry of this.entries.values()) {
      if (entry.key.startsWith(prefix) && now < entry.expiresAt) {
        result.push(entry);
      }
    }
    return result;
  }

  /**
   * Start an incremental sweep over the entries present right now
   */
  beginSweep(): ExpirySweep<V> {
    return new ExpirySweep(this, this.entries.keys(), this.entries.size);
  }

  /**
   * Remove the entry if it is expired. Used by sweeps.
   */
  expireIfDue(key: string, now: number = this.now()): boolean {
    const entry = this.entries.get(key);
    if (entry && now >= entry.expiresAt) {
      this.remove(key, 'expired');
      return true;
    }
    return false;
  }

  /**
   * Keys in order from least to most recently used
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  len(): number {
    return this.entries.size;
  }

  capacity(): number {
    return this.maxEntries;
  }

  /**
   * Last issued write sequence
   */
  currentVersion(): number {
    return this.sequence;
  }

  clear(): void {
    this.entries.clear();
  }

  private touch(key: string, entry: CacheEntry<V>): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  /**
   * Make room for one insertion: an expired entry near the LRU end if there is
   * one, otherwise the least recently used entry.
   */
  private evictOne(now: number): void {
    let examined = 0;
    for (const entry of this.entries.values()) {
      if (examined++ >= this.expiredScanWindow) {
        break;
      }
      if (now >= entry.expiresAt) {
        this.remove(entry.key, 'expired');
        return;
      }
    }

    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.remove(oldest.value, 'evicted');
    }
  }

  private remove(key: string, reason: RemovalReason): void {
    if (this.entries.delete(key) && this.onRemove) {
      this.onRemove(key, reason);
    }
  }
}

/**
 * Incremental expiry sweep. Each step examines at most `batchSize` keys and
 * the whole sweep never examines more keys than the cache held when it began,
 * even when entries are touched (and so re-ordered) while it runs.
 */
export class ExpirySweep<V> {
  private remaining: number;
  private finished = false;

  constructor(
    private readonly cache: LocalCache<V>,
    private readonly cursor: Iterator<string>,
    budget: number
  ) {
    this.remaining = budget;
  }

  step(batchSize: number): SweepProgress {
    let examined = 0;
    let removed = 0;

    while (!this.finished && examined < batchSize) {
      if (this.remaining <= 0) {
        this.finished = true;
        break;
      }

      const next = this.cursor.next();
      if (next.done) {
        this.finished = true;
        break;
      }

      examined++;
      this.remaining--;
      if (this.cache.expireIfDue(next.value)) {
        removed++;
      }
    }

    if (this.remaining <= 0) {
      this.finished = true;
    }

    return { examined, removed, done: this.finished };
  }
}

/**
 * Absolute expiry for a TTL in milliseconds
 */
export function expiryFor(ttlMs: number, now: number): number {
  assertValidTtl(ttlMs);
  if (ttlMs === 0) {
    return NEVER_EXPIRES;
  }
  return Math.min(now + ttlMs, NEVER_EXPIRES);
}

export function assertValidTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new RangeError(`TTL must be a finite, non-negative number of milliseconds, got ${ttlMs}`);
  }
}
