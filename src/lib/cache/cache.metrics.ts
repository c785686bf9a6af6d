/**
 * Cache Metrics
 * Hit/miss/eviction/error counters for the state cache
 *
 * Counters are plain numbers. Every recorder call runs to completion on the
 * event loop, so an increment can never interleave with another one and a
 * snapshot never waits on a writer.
 */

import { MetricCounter, MetricsSnapshot, NamespaceMetrics } from './cache.types';

type Counters = Record<MetricCounter, number>;

function emptyCounters(): Counters {
  return {
    localHits: 0,
    localMisses: 0,
    remoteHits: 0,
    remoteMisses: 0,
    remoteErrors: 0,
    evictions: 0,
    expirations: 0,
    sets: 0,
    invalidations: 0,
    computes: 0,
    computeErrors: 0,
    conflicts: 0,
    singleflightJoins: 0,
  };
}

export class MetricsRecorder {
  private counters: Counters = emptyCounters();
  private namespaces = new Map<string, NamespaceMetrics>();

  increment(counter: MetricCounter, amount: number = 1): void {
    this.counters[counter] += amount;
  }

  /**
   * Record a lookup outcome for a namespace
   */
  recordLookup(namespace: string, hit: boolean): void {
    let entry = this.namespaces.get(namespace);
    if (!entry) {
      entry = { hits: 0, misses: 0 };
      this.namespaces.set(namespace, entry);
    }
    if (hit) {
      entry.hits++;
    } else {
      entry.misses++;
    }
  }

  snapshot(): Readonly<MetricsSnapshot> {
    const c = this.counters;
    const hits = c.localHits + c.remoteHits;
    // A remote lookup only happens after a local miss, so local hits plus
    // local misses is the number of lookups.
    const lookups = c.localHits + c.localMisses;

    return Object.freeze({
      ...c,
      hitRate: lookups > 0 ? hits / lookups : 0,
    });
  }

  namespaceSnapshot(): Record<string, NamespaceMetrics> {
    const result: Record<string, NamespaceMetrics> = {};
    for (const [namespace, entry] of this.namespaces) {
      result[namespace] = { ...entry };
    }
    return result;
  }

  reset(): void {
    this.counters = emptyCounters();
    this.namespaces.clear();
  }
}
