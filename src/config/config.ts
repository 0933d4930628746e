// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults, validated by Zod.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

// ── Zod schema ──────────────────────────────────────────────────────────────

export const EnvSchema = z.object({
  CAMPUS_CACHE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  CAMPUS_CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1_000),
  CAMPUS_CACHE_DEFAULT_TTL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(3_600_000), // 1 hour
  CAMPUS_CACHE_WARMUP_CONCURRENCY: z.coerce.number().int().positive().default(8),
  CAMPUS_CACHE_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  CAMPUS_CACHE_LOG_PRETTY: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

/**
 * Load the library configuration from environment variables.
 *
 * Every setting has a hard-coded default so the library works with zero
 * configuration. Invalid values throw a `ConfigurationError` listing each
 * offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid cache configuration: ${issues.join("; ")}`,
      issues,
    );
  }

  const vars = parsed.data;
  return {
    env: vars.CAMPUS_CACHE_ENV,

    cache: {
      maxSize: vars.CAMPUS_CACHE_MAX_SIZE,
      defaultTtlMs: vars.CAMPUS_CACHE_DEFAULT_TTL_MS,
      warmUpConcurrency: vars.CAMPUS_CACHE_WARMUP_CONCURRENCY,
    },

    logging: {
      level: vars.CAMPUS_CACHE_LOG_LEVEL,
      prettyPrint: vars.CAMPUS_CACHE_LOG_PRETTY,
    },
  };
}
