// ---------------------------------------------------------------------------
// Tests for cache warm-up.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import type { Logger } from "pino";

import { BoundedCache } from "../../../src/cache/bounded-cache.js";
import { warmUp, warmUpAsync } from "../../../src/cache/warm-up.js";

interface LogRecord {
  level: number;
  msg: string;
  key?: string;
  error?: string;
}

/** A pino logger that keeps its JSON lines in memory. */
function memoryLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: "warn" },
    { write: (line: string) => void records.push(JSON.parse(line) as LogRecord) },
  );
  return { logger, records };
}

describe("warmUp", () => {
  it("loads every key into the cache", async () => {
    const cache = new BoundedCache<string, string>(10);
    const { logger } = memoryLogger();

    const report = await warmUp(cache, (key) => `course-${key}`, ["101", "102"], { logger });

    expect(report).toEqual({ loaded: 2, skipped: 0, failed: [] });
    expect(cache.get("101")).toBe("course-101");
    expect(cache.get("102")).toBe("course-102");
  });

  it("logs a failing key and keeps going", async () => {
    const cache = new BoundedCache<string, string>(10);
    const { logger, records } = memoryLogger();
    const loader = async (key: string): Promise<string> => {
      if (key === "bad") throw new Error("no such course");
      return key.toUpperCase();
    };

    const report = await warmUp(cache, loader, ["a", "bad", "c"], { logger });

    expect(report.loaded).toBe(2);
    expect(report.failed).toEqual([{ key: "bad", error: "no such course" }]);
    expect(cache.keySet()).toEqual(new Set(["a", "c"]));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 40,
      msg: "cache warm-up failed for key",
      key: "bad",
      error: "no such course",
    });
  });

  it("skips keys whose loader returns nothing", async () => {
    const cache = new BoundedCache<string, string>(10);
    const { logger } = memoryLogger();

    const report = await warmUp(
      cache,
      (key) => (key === "empty" ? undefined : key),
      ["empty", "x"],
      { logger },
    );

    expect(report).toEqual({ loaded: 1, skipped: 1, failed: [] });
    expect(cache.containsKey("empty")).toBe(false);
  });

  it("runs loaders in parallel up to the concurrency limit", async () => {
    const cache = new BoundedCache<number, number>(10);
    const { logger } = memoryLogger();
    let active = 0;
    let maxActive = 0;
    const loader = async (key: number): Promise<number> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return key * 2;
    };

    await warmUp(cache, loader, [1, 2, 3, 4, 5, 6], { concurrency: 3, logger });

    expect(maxActive).toBe(3);
    expect(cache.size()).toBe(6);
  });

  it("applies the given TTL to warmed entries", async () => {
    vi.useFakeTimers();
    try {
      const cache = new BoundedCache<string, string>(10);
      const { logger } = memoryLogger();
      await warmUp(cache, (key) => key, ["k"], { ttlMs: 100, logger });
      vi.advanceTimersByTime(101);
      expect(cache.get("k")).toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });

  it("rejects an invalid TTL before loading any key", async () => {
    const cache = new BoundedCache<string, string>(10);
    const { logger, records } = memoryLogger();
    const loader = vi.fn((key: string) => key);

    await expect(warmUp(cache, loader, ["a", "b"], { ttlMs: -1, logger })).rejects.toThrow(
      RangeError,
    );
    expect(loader).not.toHaveBeenCalled();
    expect(records).toEqual([]);
    expect(cache.isEmpty()).toBe(true);
  });
});

describe("warmUpAsync", () => {
  it("returns immediately and fills the cache in the background", async () => {
    const cache = new BoundedCache<string, string>(10);
    const { logger } = memoryLogger();

    const result = warmUpAsync(cache, async (key) => `v-${key}`, ["a", "b"], { logger });

    expect(result).toBeUndefined();
    expect(cache.size()).toBe(0);
    await vi.waitFor(() => {
      expect(cache.size()).toBe(2);
    });
  });
});
