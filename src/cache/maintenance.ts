// ---------------------------------------------------------------------------
// Maintenance and inspection passes over any inspectable cache.
// ---------------------------------------------------------------------------

import type { CacheEntryInfo, InspectableCache } from "../core/types.js";

function isExpiredAt(entry: CacheEntryInfo<unknown>, now: number): boolean {
  return entry.expiresAt !== null && now > entry.expiresAt;
}

// ── Sweeps and eviction ────────────────────────────────────────────────────

/**
 * Remove every entry whose expiry has passed. "Now" is read once, so the
 * count matches exactly the entries expired at call time.
 */
export function cleanExpired<K, V>(cache: InspectableCache<K, V>): number {
  const now = Date.now();
  const expired = cache
    .snapshot()
    .filter((entry) => isExpiredAt(entry, now))
    .map((entry) => entry.key);

  for (const key of expired) {
    cache.remove(key);
  }
  return expired.length;
}

/**
 * Remove up to `count` entries, least recently accessed first, whatever
 * TTL they have left.
 */
export function evictLRU<K, V>(cache: InspectableCache<K, V>, count: number): number {
  if (count <= 0) {
    return 0;
  }

  const victims = cache
    .snapshot()
    .sort((a, b) => a.lastAccessed - b.lastAccessed)
    .slice(0, count)
    .map((entry) => entry.key);

  for (const key of victims) {
    cache.remove(key);
  }
  return victims.length;
}

/** Remove entries created more than `ageMs` ago. */
export function evictOlderThan<K, V>(cache: InspectableCache<K, V>, ageMs: number): number {
  const keys = getKeysByAge(cache, ageMs);
  for (const key of keys) {
    cache.remove(key);
  }
  return keys.length;
}

// ── Inspection ─────────────────────────────────────────────────────────────

/** Live (unexpired) entries keyed by cache key. */
export function getAllEntries<K, V>(cache: InspectableCache<K, V>): Map<K, CacheEntryInfo<K>> {
  const now = Date.now();
  const result = new Map<K, CacheEntryInfo<K>>();
  for (const entry of cache.snapshot()) {
    if (!isExpiredAt(entry, now)) {
      result.set(entry.key, entry);
    }
  }
  return result;
}

export function getKeysByAge<K, V>(cache: InspectableCache<K, V>, olderThanMs: number): K[] {
  const threshold = Date.now() - olderThanMs;
  return cache
    .snapshot()
    .filter((entry) => entry.createdAt < threshold)
    .map((entry) => entry.key);
}

export function getKeysByAccessCount<K, V>(
  cache: InspectableCache<K, V>,
  minAccesses: number,
): K[] {
  return cache
    .snapshot()
    .filter((entry) => entry.accessCount >= minAccesses)
    .map((entry) => entry.key);
}
