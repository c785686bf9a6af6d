/**
 * State Manager
 * Two-tier state cache: local LRU/TTL tier in front of a shared remote store
 *
 * Reads are served from the local tier without touching the network and fall
 * back to the remote store on a miss (read-through). Writes land in the local
 * tier synchronously and are then mirrored to the remote store
 * (write-through). A remote failure never undoes a local write; it is handed
 * back to the caller.
 */

import { assertValidTimeout, RemoteCallGuard } from '../circuit-breaker/remote-call.guard';
import { RemoteGuardStats } from '../circuit-breaker/circuit-breaker.types';
import { resolveStateManagerConfig, StateManagerConfig, StateManagerConfigInput } from './cache.config';
import { classifyRemoteError, ComputeError, RemoteStoreError } from './cache.errors';
import { MetricsRecorder } from './cache.metrics';
import {
  CacheEntry,
  ComputeFn,
  ConflictState,
  GetResult,
  MetricsSnapshot,
  NamespaceMetrics,
  NEVER_EXPIRES,
  RemoteCallOptions,
  RemoteRecord,
  RemovalReason,
  WriteResult,
} from './cache.types';
import { KeyedLock } from './keyed-lock';
import { assertValidTtl, LocalCache } from './local-cache';
import { RemoteStore } from './remote.store';
import { Singleflight } from './singleflight';

export interface StateManagerOptions<V> extends StateManagerConfigInput {
  remote: RemoteStore<V>;
  metrics?: MetricsRecorder;
  now?: () => number;
}

export interface StateManagerStats {
  localSize: number;
  maxEntries: number;
  remoteStore: string;
  remoteAvailable: boolean;
  remoteGuard: RemoteGuardStats;
  inFlightComputations: number;
  reclamationRunning: boolean;
  metrics: Readonly<MetricsSnapshot>;
}

type RemoteOutcome<T> = { ok: true; value: T } | { ok: false; error: RemoteStoreError };

interface ReadTicket {
  stale: boolean;       // key invalidated or cleared while the read was in flight
  superseded: boolean;  // key written locally while the read was in flight
}

/**
 * Full cache key for a namespaced key. A namespace that already ends with a
 * colon is used as is; otherwise a colon separates the two parts.
 */
export function composeKey(namespace: string, key: string): string {
  if (namespace === '' || namespace.endsWith(':')) {
    return `${namespace}${key}`;
  }
  return `${namespace}:${key}`;
}

/**
 * Classify what a read-through found once the remote answer is back.
 * `observedVersion` is the local write sequence when the remote read started:
 * a local entry with a higher version was written while the read was in flight.
 */
export function resolveReadThrough<V>(
  local: CacheEntry<V> | undefined,
  remote: RemoteRecord<V> | null,
  observedVersion: number
): ConflictState | null {
  if (local && local.version > observedVersion) {
    return remote ? ConflictState.BOTH_CONFLICTING : ConflictState.LOCAL_ONLY;
  }
  if (remote) {
    return local ? ConflictState.BOTH_CONSISTENT : ConflictState.REMOTE_ONLY;
  }
  return local ? ConflictState.LOCAL_ONLY : null;
}

export class StateManager<V = unknown> {
  private readonly config: StateManagerConfig;
  private readonly local: LocalCache<V>;
  private readonly remote: RemoteStore<V>;
  private readonly guard: RemoteCallGuard;
  private readonly metricsRecorder: MetricsRecorder;
  private readonly flights = new Singleflight<V>();
  private readonly locks = new KeyedLock();
  private readonly pendingReads = new Map<string, Set<ReadTicket>>();
  private readonly now: () => number;
  private sweepTimer?: NodeJS.Timeout;
  private sweeping?: Promise<number>;
  private running: boolean = false;
  private closed: boolean = false;

  constructor(options: StateManagerOptions<V>) {
    const { remote, metrics, now, ...input } = options;
    this.config = resolveStateManagerConfig(input);
    this.remote = remote;
    this.metricsRecorder = metrics ?? new MetricsRecorder();
    this.now = now ?? Date.now;
    this.local = new LocalCache<V>({
      maxEntries: this.config.maxEntries,
      expiredScanWindow: this.config.expiredScanWindow,
      now: this.now,
      onRemove: (_key: string, reason: RemovalReason) => {
        this.metricsRecorder.increment(reason === 'expired' ? 'expirations' : 'evictions');
      },
    });
    this.guard = new RemoteCallGuard(this.config.circuitBreaker, remote.name);

    if (this.config.autoStart) {
      this.start();
    }
  }

  /**
   * Get a value. The local tier answers without any I/O; on a local miss the
   * remote store is consulted and a hit is copied into the local tier.
   * Remote failures are returned in the result, never thrown.
   */
  async get(namespace: string, key: string, options: RemoteCallOptions = {}): Promise<GetResult<V>> {
    const timeoutMs = this.resolveTimeout(options);
    const fullKey = composeKey(namespace, key);
    const entry = this.local.get(fullKey);

    if (entry) {
      this.metricsRecorder.increment('localHits');
      this.metricsRecorder.recordLookup(namespace, true);
      return { found: true, value: entry.value, source: 'local' };
    }

    this.metricsRecorder.increment('localMisses');
    const result = await this.readThrough(fullKey, timeoutMs);
    this.metricsRecorder.recordLookup(namespace, result.found);
    return result;
  }

  /**
   * Write locally, then mirror to the remote store.
   * ttlMs defaults to the configured TTL; 0 means no expiry.
   */
  async set(
    namespace: string,
    key: string,
    value: V,
    ttlMs?: number,
    options: RemoteCallOptions = {}
  ): Promise<WriteResult> {
    const timeoutMs = this.resolveTimeout(options);
    const fullKey = composeKey(namespace, key);
    const ttl = ttlMs ?? this.config.defaultTtlMs;
    const entry = this.local.set(fullKey, value, ttl);
    this.flagPendingReads('superseded', (pending) => pending === fullKey);
    this.metricsRecorder.increment('sets');

    const record: RemoteRecord<V> = {
      value,
      version: entry.version,
      expiresAt: entry.expiresAt,
      writtenAt: this.now(),
    };

    const outcome = await this.remoteCall(
      'set',
      () => this.remote.set(this.remoteKey(fullKey), record, ttl),
      timeoutMs
    );

    return outcome.ok
      ? { local: true, remote: true }
      : { local: true, remote: false, error: outcome.error };
  }

  /**
   * Drop a key from both tiers. The local delete always happens; a failed
   * remote delete is logged and reported, not thrown.
   */
  async invalidate(namespace: string, key: string, options: RemoteCallOptions = {}): Promise<WriteResult> {
    const timeoutMs = this.resolveTimeout(options);
    const fullKey = composeKey(namespace, key);
    this.local.delete(fullKey);
    this.flagPendingReads('stale', (pending) => pending === fullKey);
    this.metricsRecorder.increment('invalidations');

    const outcome = await this.remoteCall(
      'delete',
      () => this.remote.delete(this.remoteKey(fullKey)),
      timeoutMs
    );

    if (!outcome.ok) {
      console.warn(`[StateManager] Remote invalidate failed for ${fullKey}: ${outcome.error.message}`);
      return { local: true, remote: false, error: outcome.error };
    }
    return { local: true, remote: true };
  }

  /**
   * Cache-aside lookup. On a miss in both tiers `computeFn` runs once for all
   * concurrent callers of the same key; they share its value or its
   * ComputeError.
   */
  async getOrCompute(
    namespace: string,
    key: string,
    ttlMs: number | undefined,
    computeFn: ComputeFn<V>,
    options: RemoteCallOptions = {}
  ): Promise<V> {
    const timeoutMs = this.resolveTimeout(options);
    const ttl = ttlMs ?? this.config.defaultTtlMs;
    assertValidTtl(ttl);

    const fullKey = composeKey(namespace, key);
    const entry = this.local.get(fullKey);
    if (entry) {
      this.metricsRecorder.increment('localHits');
      this.metricsRecorder.recordLookup(namespace, true);
      return entry.value;
    }

    this.metricsRecorder.increment('localMisses');
    const { promise, shared } = this.flights.do(fullKey, () =>
      this.loadOrCompute(namespace, key, fullKey, ttl, computeFn, timeoutMs)
    );
    if (shared) {
      this.metricsRecorder.increment('singleflightJoins');
    }
    return promise;
  }

  /**
   * Whether a live value exists in either tier. Remote failures count as absent.
   */
  async exists(namespace: string, key: string, options: RemoteCallOptions = {}): Promise<boolean> {
    const timeoutMs = this.resolveTimeout(options);
    const fullKey = composeKey(namespace, key);
    if (this.local.peek(fullKey)) {
      return true;
    }

    const outcome = await this.remoteCall('get', () => this.remote.get(this.remoteKey(fullKey)), timeoutMs);
    return outcome.ok && outcome.value !== null && this.now() < outcome.value.expiresAt;
  }

  /**
   * Every live value of a namespace, keyed without the namespace.
   * Local values win over remote ones; without the remote tier only local
   * values are returned.
   */
  async getAll(namespace: string, options: RemoteCallOptions = {}): Promise<Record<string, V>> {
    const timeoutMs = this.resolveTimeout(options);
    const prefix = composeKey(namespace, '');
    const remotePrefix = this.remoteKey(prefix);
    const result: Record<string, V> = {};

    const listed = await this.remoteCall('keys', () => this.remote.keys(remotePrefix), timeoutMs);
    if (listed.ok) {
      const records = await Promise.all(
        listed.value.map(async (remoteKey) => ({
          key: remoteKey.slice(remotePrefix.length),
          outcome: await this.remoteCall('get', () => this.remote.get(remoteKey), timeoutMs),
        }))
      );
      const now = this.now();
      for (const { key, outcome } of records) {
        if (outcome.ok && outcome.value !== null && now < outcome.value.expiresAt) {
          result[key] = outcome.value.value;
        }
      }
    }

    for (const entry of this.local.scan(prefix)) {
      result[entry.key.slice(prefix.length)] = entry.value;
    }
    return result;
  }

  /**
   * Clear one namespace, or everything this manager knows about when no
   * namespace is given, from both tiers
   */
  async clear(namespace?: string, options: RemoteCallOptions = {}): Promise<WriteResult> {
    const timeoutMs = this.resolveTimeout(options);
    const prefix = namespace === undefined ? '' : composeKey(namespace, '');

    if (prefix === '') {
      this.local.clear();
    } else {
      for (const key of this.local.keys()) {
        if (key.startsWith(prefix)) {
          this.local.delete(key);
        }
      }
    }
    this.flagPendingReads('stale', (pending) => pending.startsWith(prefix));

    const remotePrefix = this.remoteKey(prefix);
    const listed = await this.remoteCall('keys', () => this.remote.keys(remotePrefix), timeoutMs);
    if (!listed.ok) {
      console.warn(`[StateManager] Remote clear failed for "${prefix}*": ${listed.error.message}`);
      return { local: true, remote: false, error: listed.error };
    }

    const deletions = await Promise.all(
      listed.value.map((remoteKey) => this.remoteCall('delete', () => this.remote.delete(remoteKey), timeoutMs))
    );
    const failed = deletions.find((outcome): outcome is { ok: false; error: RemoteStoreError } => !outcome.ok);
    if (failed) {
      console.warn(`[StateManager] Remote clear incomplete for "${prefix}*": ${failed.error.message}`);
      return { local: true, remote: false, error: failed.error };
    }
    return { local: true, remote: true };
  }

  /**
   * Run `fn` while no other holder of the same key's lock is running
   */
  withKeyLock<T>(namespace: string, key: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(composeKey(namespace, key), fn);
  }

  metrics(): Readonly<MetricsSnapshot> {
    return this.metricsRecorder.snapshot();
  }

  namespaceMetrics(): Record<string, NamespaceMetrics> {
    return this.metricsRecorder.namespaceSnapshot();
  }

  /**
   * Number of entries in the local tier
   */
  len(): number {
    return this.local.len();
  }

  /**
   * Local entry for a key without touching its recency, for diagnostics
   */
  inspect(namespace: string, key: string): Readonly<CacheEntry<V>> | undefined {
    const entry = this.local.peek(composeKey(namespace, key));
    return entry ? { ...entry } : undefined;
  }

  stats(): StateManagerStats {
    return {
      localSize: this.local.len(),
      maxEntries: this.local.capacity(),
      remoteStore: this.remote.name,
      remoteAvailable: this.remote.isAvailable(),
      remoteGuard: this.guard.getStats(),
      inFlightComputations: this.flights.size(),
      reclamationRunning: this.running,
      metrics: this.metricsRecorder.snapshot(),
    };
  }

  /**
   * Start the background reclamation loop
   */
  start(): void {
    if (this.running || this.closed) {
      return;
    }
    this.running = true;
    this.scheduleSweep();
    console.log(`[StateManager] Reclamation loop started (every ${this.config.sweepIntervalMs}ms)`);
  }

  /**
   * Stop the background reclamation loop. A sweep already running finishes
   * its current batch and stops.
   */
  stop(): void {
    this.running = false;
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * Remove every expired local entry now. Resolves with the number removed.
   */
  sweepNow(): Promise<number> {
    return this.runSweep(false);
  }

  /**
   * Stop the loop and the remote guard. The remote store itself belongs to
   * whoever created it.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stop();
    if (this.sweeping) {
      await this.sweeping;
    }
    this.guard.shutdown();
    console.log('[StateManager] Closed');
  }

  private async loadOrCompute(
    namespace: string,
    key: string,
    fullKey: string,
    ttlMs: number,
    computeFn: ComputeFn<V>,
    timeoutMs: number
  ): Promise<V> {
    const cached = await this.readThrough(fullKey, timeoutMs);
    this.metricsRecorder.recordLookup(namespace, cached.found);
    if (cached.found) {
      return cached.value;
    }

    this.metricsRecorder.increment('computes');
    let value: V;
    try {
      value = await computeFn();
    } catch (error: unknown) {
      this.metricsRecorder.increment('computeErrors');
      throw new ComputeError(fullKey, error);
    }

    const written = await this.set(namespace, key, value, ttlMs, { timeoutMs });
    if (written.error) {
      console.warn(`[StateManager] Computed value for ${fullKey} kept locally only: ${written.error.message}`);
    }
    return value;
  }

  /**
   * Remote half of a lookup, after a local miss
   */
  private async readThrough(fullKey: string, timeoutMs: number): Promise<GetResult<V>> {
    const observedVersion = this.local.currentVersion();
    const ticket = this.openTicket(fullKey);

    const outcome = await this.remoteCall('get', () => this.remote.get(this.remoteKey(fullKey)), timeoutMs);
    this.closeTicket(fullKey, ticket);

    if (!outcome.ok) {
      return { found: false, error: outcome.error };
    }

    const now = this.now();
    const record = outcome.value !== null && now < outcome.value.expiresAt ? outcome.value : null;
    const local = this.local.peek(fullKey);
    if (ticket.superseded && record) {
      this.metricsRecorder.increment('conflicts');
    }

    switch (resolveReadThrough(local, record, observedVersion)) {
      case ConflictState.BOTH_CONFLICTING:
        this.metricsRecorder.increment('remoteHits');
        return this.localResult(local);

      case ConflictState.LOCAL_ONLY:
        this.metricsRecorder.increment('remoteMisses');
        return this.localResult(local);

      case ConflictState.REMOTE_ONLY:
      case ConflictState.BOTH_CONSISTENT: {
        if (!record) {
          break;
        }
        this.metricsRecorder.increment('remoteHits');
        // A read that lost to an invalidate or a local write never repopulates
        if (!ticket.stale && !ticket.superseded) {
          const ttl = record.expiresAt === NEVER_EXPIRES ? this.config.defaultTtlMs : record.expiresAt - now;
          const populated = this.local.populate(fullKey, record.value, ttl, observedVersion);
          return { found: true, value: populated.entry.value, source: populated.applied ? 'remote' : 'local' };
        }
        return { found: true, value: record.value, source: 'remote' };
      }
    }

    this.metricsRecorder.increment('remoteMisses');
    return { found: false };
  }

  private localResult(entry: CacheEntry<V> | undefined): GetResult<V> {
    return entry ? { found: true, value: entry.value, source: 'local' } : { found: false };
  }

  /**
   * Run a remote store call under the guard. Failures come back as values.
   */
  private async remoteCall<T>(
    operation: string,
    call: () => Promise<T>,
    timeoutMs: number
  ): Promise<RemoteOutcome<T>> {
    try {
      const value = await this.guard.execute(operation, call, timeoutMs);
      return { ok: true, value };
    } catch (error: unknown) {
      this.metricsRecorder.increment('remoteErrors');
      return { ok: false, error: classifyRemoteError(error, operation, timeoutMs) };
    }
  }

  /**
   * Per-call deadline, or the configured one. Checked before a call touches
   * either tier.
   */
  private resolveTimeout(options: RemoteCallOptions): number {
    const timeoutMs = options.timeoutMs ?? this.config.remoteTimeoutMs;
    assertValidTimeout(timeoutMs);
    return timeoutMs;
  }

  private remoteKey(fullKey: string): string {
    return `${this.config.keyPrefix}${fullKey}`;
  }

  private openTicket(fullKey: string): ReadTicket {
    const ticket: ReadTicket = { stale: false, superseded: false };
    let tickets = this.pendingReads.get(fullKey);
    if (!tickets) {
      tickets = new Set();
      this.pendingReads.set(fullKey, tickets);
    }
    tickets.add(ticket);
    return ticket;
  }

  private closeTicket(fullKey: string, ticket: ReadTicket): void {
    const tickets = this.pendingReads.get(fullKey);
    if (tickets) {
      tickets.delete(ticket);
      if (tickets.size === 0) {
        this.pendingReads.delete(fullKey);
      }
    }
  }

  /**
   * Keep in-flight reads of keys changed since they started from writing
   * back into the local tier
   */
  private flagPendingReads(flag: keyof ReadTicket, matches: (fullKey: string) => boolean): void {
    for (const [fullKey, tickets] of this.pendingReads) {
      if (matches(fullKey)) {
        for (const ticket of tickets) {
          ticket[flag] = true;
        }
      }
    }
  }

  private scheduleSweep(): void {
    this.sweepTimer = setTimeout(() => {
      this.sweepTimer = undefined;
      this.sweeping = this.runSweep(true)
        .catch((error: unknown) => {
          console.error('[StateManager] Reclamation sweep failed:', error);
          return 0;
        })
        .finally(() => {
          this.sweeping = undefined;
          if (this.running) {
            this.scheduleSweep();
          }
        });
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  /**
   * Sweep expired entries in bounded batches, yielding to the event loop
   * between batches so callers are never held up for a whole sweep
   */
  private async runSweep(fromLoop: boolean): Promise<number> {
    const sweep = this.local.beginSweep();
    let removed = 0;

    for (;;) {
      const progress = sweep.step(this.config.sweepBatchSize);
      removed += progress.removed;
      if (progress.done || (fromLoop && !this.running)) {
        break;
      }
      await new Promise<void>((resolve) => setImmediate(resolve));
    }

    return removed;
  }
}
