// ---------------------------------------------------------------------------
// Public entry point for the campus cache library.
// ---------------------------------------------------------------------------

export { BoundedCache, DEFAULT_MAX_SIZE, DEFAULT_TTL_MS } from "./cache/bounded-cache.js";
export { LruCache } from "./cache/lru-cache.js";
export { CacheEntry } from "./cache/cache-entry.js";
export { CacheBuilder, cacheBuilder } from "./cache/cache-builder.js";
export type { CacheDefaults } from "./cache/cache-builder.js";
export { computeStats, cacheUtilization, formatCacheStats } from "./cache/cache-stats.js";
export {
  cleanExpired,
  evictLRU,
  evictOlderThan,
  getAllEntries,
  getKeysByAge,
  getKeysByAccessCount,
} from "./cache/maintenance.js";
export { memoize, memoizeSupplier } from "./cache/memoize.js";
export type { MemoizeOptions } from "./cache/memoize.js";
export { warmUp, warmUpAsync } from "./cache/warm-up.js";
export type { WarmUpOptions, WarmUpReport, WarmUpFailure } from "./cache/warm-up.js";
export { putAll, getAll, removeAll, refresh } from "./cache/bulk-operations.js";
export {
  generateKey,
  generateKeyWithPrefix,
  normalizeKey,
  generateHashKey,
} from "./cache/cache-keys.js";
export { loadConfig } from "./config/config.js";
export { createLogger, getDefaultLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export { CacheError, ConfigurationError } from "./core/errors.js";
export { ConcurrencyPool } from "./utils/concurrency.js";
export type {
  Awaitable,
  Loader,
  CacheEntryInfo,
  InspectableCache,
  CacheStats,
  AppConfig,
  CacheConfig,
  LoggingConfig,
  LogLevel,
} from "./core/types.js";
