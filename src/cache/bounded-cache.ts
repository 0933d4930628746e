// ---------------------------------------------------------------------------
// Capacity-bounded in-memory cache with per-entry TTL and load-on-miss.
// ---------------------------------------------------------------------------

import { AsyncLocalStorage } from "node:async_hooks";
import type { Logger } from "pino";
import type {
  Awaitable,
  CacheEntryInfo,
  CacheStats,
  InspectableCache,
  Loader,
} from "../core/types.js";
import { ConcurrencyPool } from "../utils/concurrency.js";
import { CacheEntry, assertTtl } from "./cache-entry.js";
import { computeStats } from "./cache-stats.js";

/** Default capacity: 1000 entries. */
export const DEFAULT_MAX_SIZE = 1_000;

/** Default time-to-live: 1 hour. */
export const DEFAULT_TTL_MS = 3_600_000;

/**
 * A bounded cache whose entries expire after a time-to-live.
 *
 * - On `put`, if a new key would exceed capacity, the entry with the
 *   smallest `createdAt` is evicted. Access recency plays no part; use
 *   `LruCache` for that.
 * - Plain `get` treats expired entries as absent but leaves them in place.
 *   `size`, `keySet` and `stats` sweep them out first.
 * - `get(key, loader)` runs loaders through a single-slot queue shared by
 *   every key, so at most one load started from outside is in flight per
 *   cache instance. A load made from inside a running loader (a nested
 *   key, or a recursive memoized call) re-enters the slot it already
 *   holds instead of queueing behind itself.
 * - When a loader settles, an entry written for the same key in the
 *   meantime is kept and returned; the loaded value is discarded.
 *
 * Synchronous operations run to completion on the event loop and never
 * interleave with each other. A loader that never settles stalls every
 * later load on the same instance; there is no timeout.
 */
export class BoundedCache<K, V> implements InspectableCache<K, V> {
  private readonly store = new Map<K, CacheEntry<V>>();
  private readonly loadQueue = new ConcurrencyPool(1);
  /** Set while the calling async chain holds the load slot. */
  private readonly loadScope = new AsyncLocalStorage<true>();
  readonly maxSize: number;
  readonly defaultTtlMs: number | null;
  private readonly logger: Logger | undefined;

  /**
   * @param defaultTtlMs - Lifetime for entries put without a TTL; `null`
   *   keeps them until removed or evicted.
   */
  constructor(
    maxSize: number = DEFAULT_MAX_SIZE,
    defaultTtlMs: number | null = DEFAULT_TTL_MS,
    logger?: Logger,
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError("maxSize must be a positive integer");
    }
    assertTtl(defaultTtlMs);
    this.maxSize = maxSize;
    this.defaultTtlMs = defaultTtlMs;
    this.logger = logger;
  }

  /** Returns the value, or `undefined` if missing or expired. */
  get(key: K): V | undefined;
  /**
   * Returns the cached value, loading and storing it on a miss.
   *
   * The loader's own result is returned even when it is `null` or
   * `undefined` (in which case nothing is stored). Loader errors reject
   * the returned promise unchanged.
   */
  get<L extends V | null | undefined>(
    key: K,
    loader: (key: K) => Awaitable<L>,
  ): Promise<V | L>;
  get(
    key: K,
    loader?: Loader<K, V>,
  ): V | undefined | Promise<V | null | undefined> {
    const hit = this.liveValue(key);

    if (!loader) {
      return hit;
    }
    if (hit !== undefined) {
      return Promise.resolve(hit);
    }
    return this.load(key, loader);
  }

  /**
   * Store `value` under `key`. A `null` or `undefined` key or value is
   * ignored without error.
   *
   * @param ttlMs - Overrides the default TTL; `null` means never expire.
   */
  put(key: K, value: V, ttlMs?: number | null): void {
    if (key == null || value == null) {
      return;
    }
    const ttl = ttlMs === undefined ? this.defaultTtlMs : ttlMs;
    assertTtl(ttl);

    if (!this.store.has(key) && this.store.size >= this.maxSize) {
      this.evictOldest();
    }

    this.store.set(key, new CacheEntry(value, ttl));
  }

  remove(key: K): V | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    this.store.delete(key);
    return entry.value();
  }

  /** True if a live entry exists. Does not count as an access. */
  containsKey(key: K): boolean {
    const entry = this.store.get(key);
    return entry !== undefined && !entry.isExpired();
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    this.purgeExpired();
    return this.store.size;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  keySet(): Set<K> {
    this.purgeExpired();
    return new Set(this.store.keys());
  }

  stats(): CacheStats {
    const expiredCount = this.purgeExpired();
    return computeStats(this.snapshot(), this.maxSize, expiredCount);
  }

  /** Loads queued or running through `get(key, loader)`. */
  get pendingLoads(): number {
    return this.loadQueue.activeCount + this.loadQueue.pendingCount;
  }

  /** Every stored entry, expired ones included. Not an access. */
  snapshot(): CacheEntryInfo<K>[] {
    const result: CacheEntryInfo<K>[] = [];
    for (const [key, entry] of this.store) {
      result.push(entry.describe(key));
    }
    return result;
  }

  private load(
    key: K,
    loader: Loader<K, V>,
  ): Promise<V | null | undefined> {
    if (this.loadScope.getStore()) {
      return this.loadHeld(key, loader);
    }
    return this.loadQueue.run<V | null | undefined>(() =>
      this.loadScope.run(true, () => this.loadHeld(key, loader)),
    );
  }

  /** Body of a load, run by the holder of the load slot. */
  private async loadHeld(
    key: K,
    loader: Loader<K, V>,
  ): Promise<V | null | undefined> {
    // Another load may have filled the key while this one was queued.
    const cached = this.liveValue(key);
    if (cached !== undefined) {
      return cached;
    }

    this.logger?.debug({ key: String(key) }, "cache load");
    const loaded = await loader(key);

    const written = this.liveValue(key);
    if (written !== undefined) {
      return written;
    }
    if (loaded != null) {
      this.put(key, loaded);
    }
    return loaded;
  }

  private liveValue(key: K): V | undefined {
    const entry = this.store.get(key);
    return entry && !entry.isExpired() ? entry.value() : undefined;
  }

  private purgeExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (entry.isExpired(now)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private evictOldest(): void {
    let oldestKey: K | undefined;
    let oldestCreatedAt = Infinity;

    for (const [key, entry] of this.store) {
      if (entry.createdAt < oldestCreatedAt) {
        oldestKey = key;
        oldestCreatedAt = entry.createdAt;
      }
    }

    if (oldestKey !== undefined) {
      this.store.delete(oldestKey);
      this.logger?.debug({ key: String(oldestKey) }, "cache evicted oldest entry");
    }
  }
}
