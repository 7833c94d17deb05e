import { createHash } from "node:crypto";

/** File extension used for every materialized cache entry. */
export const CACHE_ENTRY_EXTENSION = ".audio";

/**
 * Computes the content-addressed cache key for a remote audio URL:
 * lowercase SHA-256 hex of the URL string exactly as given (UTF-8).
 *
 * The raw string is hashed without normalisation, so two spellings of the
 * same resource are two entries.
 */
export function computeCacheKey(url: string): string {
  return createHash("sha256").update(url, "utf8").digest("hex");
}

/** File name of the cache entry for `key`. */
export function cacheEntryFileName(key: string): string {
  return `${key}${CACHE_ENTRY_EXTENSION}`;
}

/** Inverse of cacheEntryFileName; null for anything that is not a complete entry. */
export function parseCacheEntryFileName(fileName: string): string | null {
  const match = /^([a-f0-9]{64})\.audio$/.exec(fileName);
  return match?.[1] ?? null;
}
