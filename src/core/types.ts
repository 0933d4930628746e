// ---------------------------------------------------------------------------
// Core types for the campus cache library.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Function shapes ─────────────────────────────────────────────────────────

/** A value that may or may not be wrapped in a promise. */
export type Awaitable<T> = T | Promise<T>;

/**
 * Produces the value for a missing key. Expected to be idempotent: the
 * caches collapse concurrent loads of the same key into one call.
 */
export type Loader<K, V> = (key: K) => Awaitable<V | null | undefined>;

// ── Inspection ──────────────────────────────────────────────────────────────

/**
 * Read-only view of a cached entry. Taking one does not count as an
 * access.
 */
export interface CacheEntryInfo<K> {
  readonly key: K;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  /** Epoch milliseconds, or `null` when the entry never expires. */
  readonly expiresAt: number | null;
  readonly lastAccessed: number;
  readonly accessCount: number;
}

/**
 * A cache that exposes its entries for maintenance passes.
 *
 * `snapshot()` must include entries that have expired but have not yet
 * been swept.
 */
export interface InspectableCache<K, V> {
  snapshot(): CacheEntryInfo<K>[];
  remove(key: K): V | undefined;
}

/** Point-in-time statistics for a cache instance. */
export interface CacheStats {
  size: number;
  maxSize: number;
  /** Sum of `accessCount` over the live entries. */
  totalAccesses: number;
  /** `size / totalAccesses`, or 0 when nothing has been read. */
  hitRate: number;
  /** Expired entries removed by the sweep that preceded the snapshot. */
  expiredCount: number;
}

// ── Configuration ───────────────────────────────────────────────────────────

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface LoggingConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

export interface CacheConfig {
  maxSize: number;
  defaultTtlMs: number;
  warmUpConcurrency: number;
}

export interface AppConfig {
  env: "development" | "test" | "production";
  cache: CacheConfig;
  logging: LoggingConfig;
}
