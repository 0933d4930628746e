// ---------------------------------------------------------------------------
// A cached value together with its timing and access bookkeeping.
// ---------------------------------------------------------------------------

import type { CacheEntryInfo } from "../core/types.js";

/** TTLs are non-negative finite milliseconds, or `null` for "never". */
export function assertTtl(ttlMs: number | null): void {
  if (ttlMs !== null && !(Number.isFinite(ttlMs) && ttlMs >= 0)) {
    throw new RangeError("ttlMs must be a non-negative finite number or null");
  }
}

/**
 * Wraps a cached value with creation time, optional expiry, last-access
 * time, access count, and free-form metadata.
 *
 * All times are epoch milliseconds. `expiresAt` is fixed at construction;
 * only `lastAccessed` and `accessCount` change afterwards (plus the
 * metadata map, which is independent of the value).
 */
export class CacheEntry<V> {
  readonly createdAt: number;
  readonly expiresAt: number | null;
  private readonly storedValue: V;
  private accessedAt: number;
  private accesses = 0;
  private readonly meta = new Map<string, unknown>();

  /**
   * @param ttlMs - Lifetime from `now`; `null` means the entry never expires.
   */
  constructor(value: V, ttlMs: number | null, now: number = Date.now()) {
    this.storedValue = value;
    this.createdAt = now;
    this.expiresAt = ttlMs === null ? null : now + ttlMs;
    this.accessedAt = now;
  }

  /**
   * Read the value. Every read counts as an access: `lastAccessed` moves to
   * `now` and `accessCount` goes up by one.
   */
  value(now: number = Date.now()): V {
    this.accessedAt = now;
    this.accesses++;
    return this.storedValue;
  }

  isExpired(now: number = Date.now()): boolean {
    return this.expiresAt !== null && now > this.expiresAt;
  }

  get lastAccessed(): number {
    return this.accessedAt;
  }

  get accessCount(): number {
    return this.accesses;
  }

  age(now: number = Date.now()): number {
    return now - this.createdAt;
  }

  idleTime(now: number = Date.now()): number {
    return now - this.accessedAt;
  }

  setMetadata(key: string, value: unknown): void {
    this.meta.set(key, value);
  }

  getMetadata(key: string): unknown {
    return this.meta.get(key);
  }

  /** A copy of the metadata map; changing it leaves the entry untouched. */
  metadata(): Record<string, unknown> {
    return Object.fromEntries(this.meta);
  }

  /** Snapshot for inspection. Not an access. */
  describe<K>(key: K): CacheEntryInfo<K> {
    return {
      key,
      createdAt: this.createdAt,
      expiresAt: this.expiresAt,
      lastAccessed: this.accessedAt,
      accessCount: this.accesses,
    };
  }
}
