/**
 * State Helpers
 * Read-modify-write operations built on StateManager, serialized per key
 */

import { WriteResult } from './cache.types';
import { StateManager } from './state.manager';

export const DEFAULT_LIST_MAX_SIZE = 1000;

export interface HelperOptions {
  ttlMs?: number;
  onRemoteFailure?: (result: WriteResult) => void;
}

/**
 * Add `amount` to a numeric value. A missing or non-numeric value counts as 0.
 */
export async function incrementCounter(
  manager: StateManager<unknown>,
  namespace: string,
  key: string,
  amount: number = 1,
  options: HelperOptions = {}
): Promise<number> {
  return manager.withKeyLock(namespace, key, async () => {
    const current = await manager.get(namespace, key);
    const base = current.found && typeof current.value === 'number' ? current.value : 0;
    const next = base + amount;

    const written = await manager.set(namespace, key, next, options.ttlMs);
    reportRemoteFailure(written, options);
    return next;
  });
}

/**
 * Append an item to a list, keeping only the newest `maxSize` items.
 * A missing or non-array value starts a new list.
 */
export async function appendToList(
  manager: StateManager<unknown>,
  namespace: string,
  key: string,
  item: unknown,
  maxSize: number = DEFAULT_LIST_MAX_SIZE,
  options: HelperOptions = {}
): Promise<unknown[]> {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
  }

  return manager.withKeyLock(namespace, key, async () => {
    const current = await manager.get(namespace, key);
    const list: unknown[] = current.found && Array.isArray(current.value) ? [...current.value, item] : [item];
    const trimmed = list.length > maxSize ? list.slice(list.length - maxSize) : list;

    const written = await manager.set(namespace, key, trimmed, options.ttlMs);
    reportRemoteFailure(written, options);
    return [...trimmed];
  });
}

function reportRemoteFailure(result: WriteResult, options: HelperOptions): void {
  if (!result.error) {
    return;
  }
  if (options.onRemoteFailure) {
    options.onRemoteFailure(result);
  } else {
    console.warn(`[StateHelpers] Remote write failed: ${result.error.message}`);
  }
}
