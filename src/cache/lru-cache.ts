// ---------------------------------------------------------------------------
// Access-ordered LRU cache with an expiry side table.
// ---------------------------------------------------------------------------

import type { CacheEntryInfo, CacheStats, InspectableCache } from "../core/types.js";
import { assertTtl } from "./cache-entry.js";
import { computeStats } from "./cache-stats.js";

/** Node of the recency list. Head is least recently used, tail most. */
interface LruNode<K, V> {
  key: K;
  value: V;
  createdAt: number;
  lastAccessed: number;
  accessCount: number;
  prev: LruNode<K, V> | null;
  next: LruNode<K, V> | null;
}

/**
 * A least-recently-used cache.
 *
 * Values live in an intrusive doubly linked list indexed by a `Map`; every
 * successful `get` (and every `put` over an existing key) moves the node to
 * the tail. When an insertion pushes the size past `maxSize`, the head node
 * is dropped along with its row in the expiry side table.
 *
 * This class is NOT synchronized. It suits single-owner use; callers that
 * share an instance across interleaving async tasks must serialize access
 * themselves, or the value list and expiry table may disagree between
 * steps. Use `BoundedCache` when that matters.
 */
export class LruCache<K, V> implements InspectableCache<K, V> {
  private readonly nodes = new Map<K, LruNode<K, V>>();
  private readonly expiries = new Map<K, number>();
  private head: LruNode<K, V> | null = null;
  private tail: LruNode<K, V> | null = null;
  readonly maxSize: number;
  readonly defaultTtlMs: number | null;

  /**
   * @param defaultTtlMs - Lifetime for entries put without a TTL; `null`
   *   (the default) keeps them until evicted.
   */
  constructor(maxSize: number, defaultTtlMs: number | null = null) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError("maxSize must be a positive integer");
    }
    assertTtl(defaultTtlMs);
    this.maxSize = maxSize;
    this.defaultTtlMs = defaultTtlMs;
  }

  /**
   * Sweeps every expired key out of the cache, then returns the value and
   * marks it most recently used.
   */
  get(key: K): V | undefined {
    const now = Date.now();
    this.sweepExpired(now);

    if (this.isExpired(key, now)) {
      this.remove(key);
      return undefined;
    }

    const node = this.nodes.get(key);
    if (!node) {
      return undefined;
    }

    this.moveToTail(node);
    node.lastAccessed = now;
    node.accessCount++;
    return node.value;
  }

  /**
   * Insert or replace a value. Returns the previous value, if any.
   *
   * @param ttlMs - Lifetime of this entry; omitted, the default TTL
   *   applies. `null`, or no default, clears any earlier expiry.
   */
  put(key: K, value: V, ttlMs?: number | null): V | undefined {
    const ttl = ttlMs === undefined ? this.defaultTtlMs : ttlMs;
    assertTtl(ttl);
    const now = Date.now();
    if (ttl === null) {
      this.expiries.delete(key);
    } else {
      this.expiries.set(key, now + ttl);
    }

    const existing = this.nodes.get(key);
    if (existing) {
      const previous = existing.value;
      existing.value = value;
      existing.lastAccessed = now;
      this.moveToTail(existing);
      return previous;
    }

    const node: LruNode<K, V> = {
      key,
      value,
      createdAt: now,
      lastAccessed: now,
      accessCount: 0,
      prev: null,
      next: null,
    };
    this.nodes.set(key, node);
    this.append(node);

    if (this.nodes.size > this.maxSize && this.head) {
      this.remove(this.head.key);
    }
    return undefined;
  }

  remove(key: K): V | undefined {
    this.expiries.delete(key);
    const node = this.nodes.get(key);
    if (!node) {
      return undefined;
    }
    this.unlink(node);
    this.nodes.delete(key);
    return node.value;
  }

  /** True if the key is present and unexpired. Does not touch recency. */
  containsKey(key: K): boolean {
    return this.nodes.has(key) && !this.isExpired(key, Date.now());
  }

  clear(): void {
    this.expiries.clear();
    this.nodes.clear();
    this.head = null;
    this.tail = null;
  }

  size(): number {
    return this.nodes.size;
  }

  isEmpty(): boolean {
    return this.nodes.size === 0;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    const result: K[] = [];
    for (let node = this.head; node; node = node.next) {
      result.push(node.key);
    }
    return result;
  }

  keySet(): Set<K> {
    return new Set(this.keys());
  }

  /**
   * Milliseconds until the key expires: `undefined` if the key is absent or
   * has no TTL, 0 once the expiry has passed.
   */
  remainingTtl(key: K): number | undefined {
    const expiresAt = this.expiries.get(key);
    if (expiresAt === undefined || !this.nodes.has(key)) {
      return undefined;
    }
    return Math.max(0, expiresAt - Date.now());
  }

  /**
   * Restart the key's TTL from now, with `ttlMs` or the default. Returns
   * false if the key is absent, expired, or there is no TTL to apply.
   */
  refreshTtl(key: K, ttlMs?: number): boolean {
    const ttl = ttlMs ?? this.defaultTtlMs;
    assertTtl(ttl);
    const now = Date.now();
    if (ttl === null || !this.nodes.has(key) || this.isExpired(key, now)) {
      return false;
    }
    this.expiries.set(key, now + ttl);
    return true;
  }

  stats(): CacheStats {
    const expiredCount = this.sweepExpired(Date.now());
    return computeStats(this.snapshot(), this.maxSize, expiredCount);
  }

  /** Entries from least to most recently used, expired ones included. */
  snapshot(): CacheEntryInfo<K>[] {
    const result: CacheEntryInfo<K>[] = [];
    for (let node = this.head; node; node = node.next) {
      result.push({
        key: node.key,
        createdAt: node.createdAt,
        expiresAt: this.expiries.get(node.key) ?? null,
        lastAccessed: node.lastAccessed,
        accessCount: node.accessCount,
      });
    }
    return result;
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private isExpired(key: K, now: number): boolean {
    const expiresAt = this.expiries.get(key);
    return expiresAt !== undefined && now > expiresAt;
  }

  private sweepExpired(now: number): number {
    const expired: K[] = [];
    for (const [key, expiresAt] of this.expiries) {
      if (now > expiresAt) {
        expired.push(key);
      }
    }
    let removed = 0;
    for (const key of expired) {
      if (this.nodes.has(key)) {
        removed++;
      }
      this.remove(key);
    }
    return removed;
  }

  private append(node: LruNode<K, V>): void {
    node.prev = this.tail;
    node.next = null;
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
  }

  private unlink(node: LruNode<K, V>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }
    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }
    node.prev = null;
    node.next = null;
  }

  private moveToTail(node: LruNode<K, V>): void {
    if (this.tail === node) {
      return;
    }
    this.unlink(node);
    this.append(node);
  }
}
