/**
 * Remote Store
 * Contract for the shared key-value tier plus an in-process implementation
 */

import { RemoteRecord } from './cache.types';

/**
 * Shared store used for cross-instance consistency.
 * `get` resolves null for an absent key; connectivity problems reject.
 */
export interface RemoteStore<V> {
  readonly name: string;
  get(key: string): Promise<RemoteRecord<V> | null>;
  set(key: string, record: RemoteRecord<V>, ttlMs: number): Promise<void>;  // ttlMs 0 = no expiry
  delete(key: string): Promise<void>;
  keys(prefix: string): Promise<string[]>;
  isAvailable(): boolean;
  close(): Promise<void>;
}

export type RemoteFailureMode = 'unavailable' | 'timeout';

export type RemoteOperation = 'get' | 'set' | 'delete' | 'keys';

export interface InMemoryRemoteStoreOptions {
  latencyMs?: number;
  now?: () => number;
}

interface StoredRecord<V> {
  record: RemoteRecord<V>;
  expiresAt: number;
}

/**
 * Remote store kept in process memory. Values are structured-cloned on the way
 * in and out, like a serializing store would. Used when no Redis URL is
 * configured and as the remote tier in tests, where failures can be injected.
 */
export class InMemoryRemoteStore<V> implements RemoteStore<V> {
  readonly name = 'memory';
  private readonly records = new Map<string, StoredRecord<V>>();
  private readonly now: () => number;
  private latencyMs: number;
  private failure: RemoteFailureMode | null = null;
  private readonly calls: Record<RemoteOperation, number> = { get: 0, set: 0, delete: 0, keys: 0 };

  constructor(options: InMemoryRemoteStoreOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<RemoteRecord<V> | null> {
    await this.enter('get');
    const stored = this.records.get(key);
    if (!stored) {
      return null;
    }
    if (this.now() >= stored.expiresAt) {
      this.records.delete(key);
      return null;
    }
    return structuredClone(stored.record);
  }

  async set(key: string, record: RemoteRecord<V>, ttlMs: number): Promise<void> {
    await this.enter('set');
    this.records.set(key, {
      record: structuredClone(record),
      expiresAt: ttlMs > 0 ? this.now() + ttlMs : Number.POSITIVE_INFINITY,
    });
  }

  async delete(key: string): Promise<void> {
    await this.enter('delete');
    this.records.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    await this.enter('keys');
    const now = this.now();
    return Array.from(this.records.entries())
      .filter(([key, stored]) => key.startsWith(prefix) && now < stored.expiresAt)
      .map(([key]) => key);
  }

  isAvailable(): boolean {
    return this.failure === null;
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  /**
   * Make every following call fail, or restore normal operation with null.
   * 'timeout' calls never settle, so the caller's deadline decides.
   */
  failWith(mode: RemoteFailureMode | null): void {
    this.failure = mode;
  }

  setLatency(latencyMs: number): void {
    this.latencyMs = latencyMs;
  }

  callCount(operation: RemoteOperation): number {
    return this.calls[operation];
  }

  size(): number {
    return this.records.size;
  }

  private async enter(operation: RemoteOperation): Promise<void> {
    this.calls[operation]++;

    if (this.failure === 'unavailable') {
      throw Object.assign(new Error(`connect ECONNREFUSED (in-memory ${operation})`), { code: 'ECONNREFUSED' });
    }
    if (this.failure === 'timeout') {
      await new Promise<never>(() => undefined);
    }
    if (this.latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
    }
  }
}
