// ---------------------------------------------------------------------------
// Cache key helpers.
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";

/**
 * Join parts into a `:`-separated key. `null` and `undefined` render as
 * `"null"`; no parts at all gives `"empty"`.
 */
export function generateKey(...parts: unknown[]): string {
  if (parts.length === 0) {
    return "empty";
  }
  return parts.map((part) => (part == null ? "null" : String(part))).join(":");
}

export function generateKeyWithPrefix(
  prefix: string | null | undefined,
  ...parts: unknown[]
): string {
  const key = generateKey(...parts);
  return prefix != null ? `${prefix}:${key}` : key;
}

/** Lower-case, trim, and collapse whitespace runs to `_`. */
export function normalizeKey(key: string | null | undefined): string {
  if (key == null) {
    return "null";
  }
  return key.toLowerCase().trim().replace(/\s+/g, "_");
}

/** Fixed-length key derived from the JSON form of the parts. */
export function generateHashKey(...parts: unknown[]): string {
  const json = JSON.stringify(parts, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
  const digest = createHash("sha256").update(json).digest("hex");
  return `hash_${digest.slice(0, 16)}`;
}
