// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import { pino } from "pino";
import type { Logger, LoggerOptions } from "pino";
import { loadConfig } from "../config/config.js";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type { Logger };

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default)
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for development
 */
export function createLogger(config: LoggingConfig): Logger {
  const baseOptions: LoggerOptions = {
    level: config.level,
    base: {
      service: "campus-cache",
      version: process.env["APP_VERSION"] ?? "dev",
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}

let defaultLogger: Logger | undefined;

/**
 * Logger used when a caller supplies none. Built on first use from
 * `loadConfig()`.
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger(loadConfig().logging);
  return defaultLogger;
}
