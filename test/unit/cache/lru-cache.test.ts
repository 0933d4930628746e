// ---------------------------------------------------------------------------
// Tests for the LruCache (access-ordered cache with expiry side table).
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { LruCache } from "../../../src/cache/lru-cache.js";

describe("LruCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ── Basic get / put ─────────────────────────────────────────────────────

  it("returns undefined for a key that was never put", () => {
    const cache = new LruCache<string, number>(2);
    expect(cache.get("missing")).toBeUndefined();
  });

  it("put returns the previous value", () => {
    const cache = new LruCache<string, number>(2);
    expect(cache.put("a", 1)).toBeUndefined();
    expect(cache.put("a", 2)).toBe(1);
    expect(cache.get("a")).toBe(2);
    expect(cache.size()).toBe(1);
  });

  // ── LRU eviction ───────────────────────────────────────────────────────

  it("evicts the least recently used entry when over capacity", () => {
    const cache = new LruCache<string, number>(2);
    cache.put("a", 1);
    cache.put("b", 2);
    cache.put("c", 3);
    expect(cache.keys()).toEqual(["b", "c"]);
  });

  it("a get refreshes recency before eviction", () => {
    const cache = new LruCache<string, number>(2);
    cache.put("a", 1);
    cache.put("b", 2);
    expect(cache.get("a")).toBe(1);
    cache.put("c", 3);
    expect(cache.containsKey("b")).toBe(false);
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
  });

  it("replacing a value moves the key to most recently used", () => {
    const cache = new LruCache<string, number>(2);
    cache.put("a", 1);
    cache.put("b", 2);
    cache.put("a", 10);
    cache.put("c", 3);
    expect(cache.keys()).toEqual(["a", "c"]);
  });

  it("containsKey does not change recency", () => {
    const cache = new LruCache<string, number>(2);
    cache.put("a", 1);
    cache.put("b", 2);
    cache.containsKey("a");
    cache.put("c", 3);
    expect(cache.keys()).toEqual(["b", "c"]);
  });

  it("drops the evicted key's expiry along with the value", () => {
    const cache = new LruCache<string, number>(1);
    cache.put("a", 1, 1_000);
    cache.put("b", 2);
    expect(cache.remainingTtl("a")).toBeUndefined();
    expect(cache.snapshot().map((e) => e.key)).toEqual(["b"]);
  });

  it("throws RangeError when maxSize is less than 1", () => {
    expect(() => new LruCache<string, number>(0)).toThrow(RangeError);
  });

  // ── TTL ─────────────────────────────────────────────────────────────────

  it("returns undefined once the key's TTL has passed", () => {
    const cache = new LruCache<string, number>(5);
    cache.put("a", 1, 500);
    vi.advanceTimersByTime(501);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it("get sweeps every expired key, not just the requested one", () => {
    const cache = new LruCache<string, number>(5);
    cache.put("a", 1, 100);
    cache.put("b", 2, 100);
    cache.put("c", 3);
    vi.advanceTimersByTime(101);
    expect(cache.get("c")).toBe(3);
    expect(cache.keys()).toEqual(["c"]);
  });

  it("a put without TTL clears an earlier expiry", () => {
    const cache = new LruCache<string, number>(5);
    cache.put("a", 1, 100);
    cache.put("a", 2);
    vi.advanceTimersByTime(1_000);
    expect(cache.get("a")).toBe(2);
  });

  it("a null TTL clears the default expiry", () => {
    const cache = new LruCache<string, number>(5, 200);
    cache.put("a", 1, null);
    expect(cache.remainingTtl("a")).toBeUndefined();
    vi.advanceTimersByTime(1_000);
    expect(cache.get("a")).toBe(1);
  });

  it("throws RangeError for a negative or non-finite TTL", () => {
    const cache = new LruCache<string, number>(5);
    expect(() => cache.put("a", 1, -1)).toThrow(RangeError);
    expect(() => cache.put("a", 1, Number.NaN)).toThrow(RangeError);
    expect(cache.containsKey("a")).toBe(false);

    cache.put("b", 2);
    expect(() => cache.refreshTtl("b", -5)).toThrow(RangeError);
    expect(() => new LruCache<string, number>(5, Infinity)).toThrow(RangeError);
  });

  it("applies the default TTL when none is given", () => {
    const cache = new LruCache<string, number>(5, 200);
    cache.put("a", 1);
    expect(cache.remainingTtl("a")).toBe(200);
    vi.advanceTimersByTime(201);
    expect(cache.get("a")).toBeUndefined();
  });

  it("refreshTtl restarts the countdown", () => {
    const cache = new LruCache<string, number>(5);
    cache.put("a", 1, 100);
    vi.advanceTimersByTime(80);
    expect(cache.refreshTtl("a", 100)).toBe(true);
    vi.advanceTimersByTime(80);
    expect(cache.get("a")).toBe(1);
    expect(cache.refreshTtl("missing", 100)).toBe(false);
  });

  it("refreshTtl returns false when no TTL applies", () => {
    const cache = new LruCache<string, number>(5);
    cache.put("a", 1);
    expect(cache.refreshTtl("a")).toBe(false);
  });

  // ── remove / clear / stats ──────────────────────────────────────────────

  it("remove unlinks the key from the recency list", () => {
    const cache = new LruCache<string, number>(3);
    cache.put("a", 1);
    cache.put("b", 2);
    cache.put("c", 3);
    expect(cache.remove("b")).toBe(2);
    expect(cache.keys()).toEqual(["a", "c"]);
    cache.put("d", 4);
    cache.put("e", 5);
    expect(cache.keys()).toEqual(["c", "d", "e"]);
  });

  it("clear empties values and expiries", () => {
    const cache = new LruCache<string, number>(3);
    cache.put("a", 1, 100);
    cache.clear();
    expect(cache.isEmpty()).toBe(true);
    expect(cache.keys()).toEqual([]);
    expect(cache.remainingTtl("a")).toBeUndefined();
  });

  it("stats use size divided by total accesses", () => {
    const cache = new LruCache<string, number>(4);
    cache.put("a", 1);
    cache.put("b", 2);
    cache.put("c", 3, 50);
    cache.get("a");
    cache.get("a");
    cache.get("a");
    cache.get("b");
    vi.advanceTimersByTime(51);

    expect(cache.stats()).toEqual({
      size: 2,
      maxSize: 4,
      totalAccesses: 4,
      hitRate: 0.5,
      expiredCount: 1,
    });
  });
});
