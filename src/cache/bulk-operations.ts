// ---------------------------------------------------------------------------
// Batch helpers over BoundedCache.
// ---------------------------------------------------------------------------

import type { Awaitable } from "../core/types.js";
import type { BoundedCache } from "./bounded-cache.js";

/** Put every pair; `ttlMs` overrides the cache default when given. */
export function putAll<K, V>(
  cache: BoundedCache<K, V>,
  entries: Iterable<readonly [K, V]>,
  ttlMs?: number | null,
): void {
  for (const [key, value] of entries) {
    cache.put(key, value, ttlMs);
  }
}

/** Values for the keys that are present and unexpired. */
export function getAll<K, V>(cache: BoundedCache<K, V>, keys: Iterable<K>): Map<K, V> {
  const result = new Map<K, V>();
  for (const key of keys) {
    const value = cache.get(key);
    if (value !== undefined) {
      result.set(key, value);
    }
  }
  return result;
}

/** Returns how many of the keys were present. */
export function removeAll<K, V>(cache: BoundedCache<K, V>, keys: Iterable<K>): number {
  let removed = 0;
  for (const key of keys) {
    if (cache.remove(key) !== undefined) {
      removed++;
    }
  }
  return removed;
}

/** Drop the cached value and load it again. */
export function refresh<K, V, L extends V | null | undefined>(
  cache: BoundedCache<K, V>,
  key: K,
  loader: (key: K) => Awaitable<L>,
): Promise<V | L> {
  cache.remove(key);
  return cache.get(key, loader);
}
