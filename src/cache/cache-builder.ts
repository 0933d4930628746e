// ---------------------------------------------------------------------------
// Fluent construction of BoundedCache instances.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { loadConfig } from "../config/config.js";
import type { CacheConfig } from "../core/types.js";
import { BoundedCache } from "./bounded-cache.js";

/** Starting values a builder applies when a setting is not called. */
export type CacheDefaults = Pick<CacheConfig, "maxSize" | "defaultTtlMs">;

/**
 * Collects settings for a `BoundedCache`. Arguments are validated by the
 * cache constructor when `build()` is called.
 */
export class CacheBuilder<K, V> {
  private size: number;
  private ttlMs: number | null;
  private log: Logger | undefined;

  constructor(defaults: CacheDefaults) {
    this.size = defaults.maxSize;
    this.ttlMs = defaults.defaultTtlMs;
  }

  maxSize(maxSize: number): this {
    this.size = maxSize;
    return this;
  }

  /** `null` builds a cache whose entries never expire by default. */
  defaultTtl(ttlMs: number | null): this {
    this.ttlMs = ttlMs;
    return this;
  }

  logger(logger: Logger): this {
    this.log = logger;
    return this;
  }

  build(): BoundedCache<K, V> {
    return new BoundedCache<K, V>(this.size, this.ttlMs, this.log);
  }
}

/**
 * Start a builder. Unset values come from `defaults`, which is the
 * environment configuration (`CAMPUS_CACHE_MAX_SIZE`,
 * `CAMPUS_CACHE_DEFAULT_TTL_MS`) unless given.
 */
export function cacheBuilder<K, V>(
  defaults: CacheDefaults = loadConfig().cache,
): CacheBuilder<K, V> {
  return new CacheBuilder<K, V>(defaults);
}
