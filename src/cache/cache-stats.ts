// ---------------------------------------------------------------------------
// Statistics snapshots shared by both cache variants.
// ---------------------------------------------------------------------------

import type { CacheEntryInfo, CacheStats } from "../core/types.js";

/**
 * Build a stats snapshot from the live entries of a cache.
 *
 * `hitRate` is `size / totalAccesses`, not a hit/miss ratio.
 */
export function computeStats<K>(
  entries: readonly CacheEntryInfo<K>[],
  maxSize: number,
  expiredCount: number,
): CacheStats {
  let totalAccesses = 0;
  for (const entry of entries) {
    totalAccesses += entry.accessCount;
  }

  const size = entries.length;
  return {
    size,
    maxSize,
    totalAccesses,
    hitRate: totalAccesses > 0 ? size / totalAccesses : 0,
    expiredCount,
  };
}

/** Fraction of capacity in use, between 0 and 1. */
export function cacheUtilization(stats: CacheStats): number {
  return stats.maxSize > 0 ? stats.size / stats.maxSize : 0;
}

/** One-line human-readable rendering, for logs. */
export function formatCacheStats(stats: CacheStats): string {
  const utilization = (cacheUtilization(stats) * 100).toFixed(2);
  const hitRate = (stats.hitRate * 100).toFixed(2);
  return (
    `CacheStats{size=${stats.size}, maxSize=${stats.maxSize}, ` +
    `utilization=${utilization}%, hitRate=${hitRate}%, ` +
    `totalAccesses=${stats.totalAccesses}, expired=${stats.expiredCount}}`
  );
}
