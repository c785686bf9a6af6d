/**
 * Cache Types
 * Type definitions for the two-tier state cache
 */

import type { RemoteStoreError } from './cache.errors';

/**
 * Expiry sentinel for entries written without a TTL.
 * expiresAt is always a number; this value stands for "no TTL".
 */
export const NEVER_EXPIRES = Number.MAX_SAFE_INTEGER;

/**
 * Local cache entry
 */
export interface CacheEntry<V> {
  key: string;
  value: V;
  expiresAt: number;          // Epoch ms, NEVER_EXPIRES when written without TTL
  lastAccessed: number;       // Epoch ms of the last successful read or write
  version: number;            // Tier-wide write sequence at the last write
  createdAt: number;
  hits: number;
}

/**
 * Envelope stored in the remote tier
 */
export interface RemoteRecord<V> {
  value: V;
  version: number;
  expiresAt: number;
  writtenAt: number;
}

/**
 * Why an entry left the local tier without being invalidated
 */
export type RemovalReason = 'evicted' | 'expired';

export type RemovalListener = (key: string, reason: RemovalReason) => void;

/**
 * Where a value was served from
 */
export type ValueSource = 'local' | 'remote';

export type GetResult<V> =
  | { found: true; value: V; source: ValueSource }
  | { found: false; error?: RemoteStoreError };

/**
 * Outcome of a write-through or invalidation.
 * The local tier is always updated; the remote tier may lag behind.
 */
export interface WriteResult {
  local: true;
  remote: boolean;
  error?: RemoteStoreError;
}

/**
 * Per-call options for operations that may reach the remote tier
 */
export interface RemoteCallOptions {
  timeoutMs?: number;
}

export type ComputeFn<V> = () => V | Promise<V>;

/**
 * Read-through conflict classification
 */
export enum ConflictState {
  LOCAL_ONLY = 'local_only',
  REMOTE_ONLY = 'remote_only',
  BOTH_CONSISTENT = 'both_consistent',
  BOTH_CONFLICTING = 'both_conflicting',
}

/**
 * Counters exposed to monitoring
 */
export interface MetricsSnapshot {
  localHits: number;
  localMisses: number;
  remoteHits: number;
  remoteMisses: number;
  remoteErrors: number;
  evictions: number;
  expirations: number;
  sets: number;
  invalidations: number;
  computes: number;
  computeErrors: number;
  conflicts: number;
  singleflightJoins: number;
  hitRate: number;
}

export type MetricCounter = Exclude<keyof MetricsSnapshot, 'hitRate'>;

export interface NamespaceMetrics {
  hits: number;
  misses: number;
}
