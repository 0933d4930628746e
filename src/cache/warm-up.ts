// ---------------------------------------------------------------------------
// Cache warm-up: preload a batch of keys through a concurrency pool.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { loadConfig } from "../config/config.js";
import type { Loader } from "../core/types.js";
import { getDefaultLogger } from "../logging/logger.js";
import { ConcurrencyPool } from "../utils/concurrency.js";
import type { BoundedCache } from "./bounded-cache.js";
import { assertTtl } from "./cache-entry.js";

export interface WarmUpOptions {
  /** Loader calls in flight at once. Defaults to the configured value. */
  concurrency?: number;
  /** TTL for warmed entries; the cache default when omitted. */
  ttlMs?: number | null;
  logger?: Logger;
}

export interface WarmUpFailure<K> {
  key: K;
  error: string;
}

/** Outcome of a warm-up batch. */
export interface WarmUpReport<K> {
  /** Keys whose value was stored. */
  loaded: number;
  /** Keys whose loader returned `null` or `undefined`. */
  skipped: number;
  failed: WarmUpFailure<K>[];
}

/**
 * Load every key and store the non-null results.
 *
 * Loader calls fan out through a pool and bypass the cache's load queue,
 * so they run in parallel up to `concurrency`. A key whose loader throws
 * is logged at `warn` and recorded in the report; the rest of the batch
 * carries on. The returned promise never rejects because of a loader;
 * an invalid `ttlMs` rejects it before any loader runs.
 */
export async function warmUp<K, V>(
  cache: BoundedCache<K, V>,
  loader: Loader<K, V>,
  keys: Iterable<K>,
  options: WarmUpOptions = {},
): Promise<WarmUpReport<K>> {
  if (options.ttlMs !== undefined) {
    assertTtl(options.ttlMs);
  }
  const logger = options.logger ?? getDefaultLogger();
  const pool = new ConcurrencyPool(
    options.concurrency ?? loadConfig().cache.warmUpConcurrency,
  );
  const report: WarmUpReport<K> = { loaded: 0, skipped: 0, failed: [] };

  await Promise.all(
    Array.from(keys, (key) =>
      pool.run(async () => {
        try {
          const value = await loader(key);
          if (value == null) {
            report.skipped++;
            return;
          }
          cache.put(key, value, options.ttlMs);
          report.loaded++;
        } catch (err) {
          const error = err instanceof Error ? err.message : String(err);
          report.failed.push({ key, error });
          logger.warn({ key: String(key), error }, "cache warm-up failed for key");
        }
      }),
    ),
  );

  logger.debug(
    { loaded: report.loaded, skipped: report.skipped, failed: report.failed.length },
    "cache warm-up finished",
  );
  return report;
}

/**
 * Start `warmUp` in the background and return immediately. There is no
 * handle to await, observe or cancel the batch.
 */
export function warmUpAsync<K, V>(
  cache: BoundedCache<K, V>,
  loader: Loader<K, V>,
  keys: Iterable<K>,
  options: WarmUpOptions = {},
): void {
  const logger = options.logger ?? getDefaultLogger();
  void warmUp(cache, loader, keys, { ...options, logger }).catch((err: unknown) => {
    logger.error({ err }, "cache warm-up aborted");
  });
}
