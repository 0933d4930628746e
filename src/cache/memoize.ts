// ---------------------------------------------------------------------------
// Memoization on top of BoundedCache.
// ---------------------------------------------------------------------------

import { loadConfig } from "../config/config.js";
import type { Awaitable } from "../core/types.js";
import { BoundedCache } from "./bounded-cache.js";

/** Omitted settings fall back to the environment configuration. */
export interface MemoizeOptions {
  maxSize?: number;
  ttlMs?: number | null;
}

/** Internal key under which a memoized supplier stores its value. */
const SUPPLIER_KEY = "singleton";

/**
 * Cache `fn`'s result per argument.
 *
 * Arguments are compared the way `Map` keys are: primitives by value,
 * objects by identity. Loads share the private cache's single-slot queue,
 * so concurrent calls with the same argument run `fn` once. A `null` or
 * `undefined` result is returned but not cached. `fn` may call the memoized
 * function again (recursion); those inner calls run inside the outer load.
 */
export function memoize<T, R>(
  fn: (input: T) => Awaitable<R>,
  options: MemoizeOptions = {},
): (input: T) => Promise<R> {
  const defaults = loadConfig().cache;
  const cache = new BoundedCache<T, R>(
    options.maxSize ?? defaults.maxSize,
    options.ttlMs === undefined ? defaults.defaultTtlMs : options.ttlMs,
  );
  return (input) => cache.get(input, fn);
}

/**
 * Cache a zero-argument supplier's result for `ttlMs` (the configured
 * default TTL when omitted).
 */
export function memoizeSupplier<R>(
  supplier: () => Awaitable<R>,
  ttlMs: number | null = loadConfig().cache.defaultTtlMs,
): () => Promise<R> {
  const cache = new BoundedCache<string, R>(1, ttlMs);
  return () => cache.get(SUPPLIER_KEY, () => supplier());
}
