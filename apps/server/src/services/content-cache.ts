import { randomUUID } from "node:crypto";
import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { cacheEntryFileName, computeCacheKey, parseCacheEntryFileName } from "../lib/cache-key.js";
import {
  DownloadFailedError,
  InvalidSourceError,
  PayloadTooLargeError,
  ServiceError,
  TimeoutError,
  isAbortError,
} from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { writeStreamToFile } from "../lib/stream-to-file.js";

const logger = createLogger("content-cache");

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ContentCacheOptions {
  cacheDir: string;
  downloadTimeoutMs: number;
  maxDownloadBytes: number;
  /** Entries older than this are stale: refetched on access, removed by evict(). */
  ttlMs?: number | null;
  /** evict() trims the oldest entries until the cache fits. */
  maxTotalBytes?: number | null;
  fetch?: FetchLike;
  now?: () => number;
}

/** A cache path the holder may read; the entry cannot be evicted until release(). */
export interface CacheLease {
  key: string;
  path: string;
  release(): void;
}

export interface CacheStats {
  entries: number;
  totalBytes: number;
  inFlight: number;
}

interface CacheEntryInfo {
  key: string;
  path: string;
  size: number;
  mtimeMs: number;
}

/**
 * Throws InvalidSourceError unless `url` parses as an absolute http(s) URL.
 */
export function assertFetchableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidSourceError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidSourceError(
      `Unsupported URL scheme "${parsed.protocol.replace(/:$/, "")}" (only http and https are allowed)`,
    );
  }
}

/**
 * Content-addressed store for remote audio, keyed by SHA-256 of the URL.
 *
 * - Single-flight per key: concurrent requests for one URL share one fetch.
 *   Different keys download in parallel.
 * - Entries are written to a `.part` temp file and renamed into place, so a
 *   present `<key>.audio` file is always complete.
 * - Failed downloads leave nothing behind.
 * - Leased entries are never evicted or cleared.
 */
export class ContentCache {
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly readers = new Map<string, number>();
  private readonly evicting = new Map<string, Promise<void>>();
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly ttlMs: number | null;
  private readonly maxTotalBytes: number | null;

  constructor(private readonly options: ContentCacheOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.ttlMs = options.ttlMs ?? null;
    this.maxTotalBytes = options.maxTotalBytes ?? null;
  }

  get directory(): string {
    return this.options.cacheDir;
  }

  async init(): Promise<void> {
    await mkdir(this.options.cacheDir, { recursive: true });
  }

  /** Path of the complete cache entry for `url`, downloading it first on a miss. */
  async getOrFetch(url: string): Promise<string> {
    assertFetchableUrl(url);
    return this.shared(url, computeCacheKey(url));
  }

  /** Like getOrFetch, but pins the entry until the lease is released. */
  async lease(url: string): Promise<CacheLease> {
    assertFetchableUrl(url);
    const key = computeCacheKey(url);
    // Pin before the first await so a concurrent evict() sees the reader.
    this.readers.set(key, (this.readers.get(key) ?? 0) + 1);

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      const remaining = (this.readers.get(key) ?? 1) - 1;
      if (remaining <= 0) {
        this.readers.delete(key);
      } else {
        this.readers.set(key, remaining);
      }
    };

    try {
      const path = await this.shared(url, key);
      return { key, path, release };
    } catch (err) {
      release();
      throw err;
    }
  }

  async stats(): Promise<CacheStats> {
    const entries = await this.listEntries();
    return {
      entries: entries.length,
      totalBytes: entries.reduce((sum, entry) => sum + entry.size, 0),
      inFlight: this.inFlight.size,
    };
  }

  /**
   * Applies TTL and size-bound eviction and removes orphaned temp files.
   * Returns the number of entries removed.
   */
  async evict(): Promise<number> {
    await this.removeOrphanedParts();
    if (this.ttlMs === null && this.maxTotalBytes === null) {
      return 0;
    }

    const entries = await this.listEntries();
    const survivors: CacheEntryInfo[] = [];
    let removed = 0;

    for (const entry of entries) {
      if (this.isExpired(entry.mtimeMs) && this.isEvictable(entry.key)) {
        await this.removeEntry(entry);
        removed++;
      } else {
        survivors.push(entry);
      }
    }

    if (this.maxTotalBytes !== null) {
      let total = survivors.reduce((sum, entry) => sum + entry.size, 0);
      const oldestFirst = [...survivors].sort((a, b) => a.mtimeMs - b.mtimeMs);
      for (const entry of oldestFirst) {
        if (total <= this.maxTotalBytes) break;
        if (!this.isEvictable(entry.key)) continue;
        await this.removeEntry(entry);
        total -= entry.size;
        removed++;
      }
    }

    if (removed > 0) {
      logger.info(`evicted ${removed} cache entr${removed === 1 ? "y" : "ies"}`);
    }
    return removed;
  }

  /** Removes every entry that is not leased or being downloaded. */
  async clear(): Promise<number> {
    await this.removeOrphanedParts();
    const entries = await this.listEntries();
    let removed = 0;
    for (const entry of entries) {
      if (!this.isEvictable(entry.key)) continue;
      await this.removeEntry(entry);
      removed++;
    }
    logger.info(`cleared ${removed} cache entr${removed === 1 ? "y" : "ies"}`);
    return removed;
  }

  // ─── Internals ───────────────────────────────────────────────────────────────

  private shared(url: string, key: string): Promise<string> {
    const existing = this.inFlight.get(key);
    if (existing) {
      logger.debug(`joining in-flight fetch for ${key}`);
      return existing;
    }

    const pending = this.materialize(url, key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, pending);
    return pending;
  }

  private async materialize(url: string, key: string): Promise<string> {
    const pendingEviction = this.evicting.get(key);
    if (pendingEviction) {
      await pendingEviction;
    }

    const entryPath = join(this.options.cacheDir, cacheEntryFileName(key));
    const current = await statIfPresent(entryPath);
    if (current && current.isFile() && current.size > 0 && !this.isExpired(current.mtimeMs)) {
      logger.debug(`hit ${key}`);
      return entryPath;
    }

    await this.download(url, key, entryPath);
    return entryPath;
  }

  private async download(url: string, key: string, entryPath: string): Promise<void> {
    const { cacheDir, downloadTimeoutMs, maxDownloadBytes } = this.options;
    await mkdir(cacheDir, { recursive: true });
    const tempPath = join(cacheDir, `${cacheEntryFileName(key)}.${randomUUID()}.part`);
    const startedAt = this.now();
    logger.info(`downloading ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(downloadTimeoutMs),
        redirect: "follow",
      });
    } catch (err) {
      throw this.toDownloadError(url, err);
    }

    if (!response.ok) {
      await discardBody(response);
      throw new DownloadFailedError(url, `HTTP ${response.status}`);
    }
    if (!response.body) {
      throw new DownloadFailedError(url, "empty response body");
    }

    const declaredLength = Number(response.headers.get("content-length") ?? NaN);
    if (Number.isFinite(declaredLength) && declaredLength > maxDownloadBytes) {
      await discardBody(response);
      throw new PayloadTooLargeError(maxDownloadBytes);
    }

    let bytes: number;
    try {
      bytes = await writeStreamToFile(response.body, tempPath, maxDownloadBytes);
    } catch (err) {
      throw this.toDownloadError(url, err);
    }

    if (bytes === 0) {
      await rm(tempPath, { force: true });
      throw new DownloadFailedError(url, "empty response body");
    }

    try {
      await rename(tempPath, entryPath);
    } catch (cause) {
      await rm(tempPath, { force: true });
      throw new DownloadFailedError(url, "could not commit cache entry", { cause });
    }

    logger.info(`cached ${url} (${bytes} bytes in ${this.now() - startedAt}ms)`);
  }

  private toDownloadError(url: string, err: unknown): ServiceError {
    if (err instanceof ServiceError) {
      return err;
    }
    if (isAbortError(err)) {
      return new TimeoutError("download", this.options.downloadTimeoutMs, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new DownloadFailedError(url, reason, { cause: err });
  }

  private isExpired(mtimeMs: number): boolean {
    return this.ttlMs !== null && this.now() - mtimeMs > this.ttlMs;
  }

  private isEvictable(key: string): boolean {
    return (this.readers.get(key) ?? 0) === 0 && !this.inFlight.has(key);
  }

  private async removeEntry(entry: CacheEntryInfo): Promise<void> {
    const removal = rm(entry.path, { force: true });
    this.evicting.set(entry.key, removal);
    try {
      await removal;
    } finally {
      if (this.evicting.get(entry.key) === removal) {
        this.evicting.delete(entry.key);
      }
    }
  }

  private async listEntries(): Promise<CacheEntryInfo[]> {
    const names = await readDirIfPresent(this.options.cacheDir);
    const entries: CacheEntryInfo[] = [];
    for (const name of names) {
      const key = parseCacheEntryFileName(name);
      if (!key) continue;
      const path = join(this.options.cacheDir, name);
      const info = await statIfPresent(path);
      if (!info || !info.isFile()) continue;
      entries.push({ key, path, size: info.size, mtimeMs: info.mtimeMs });
    }
    return entries;
  }

  private async removeOrphanedParts(): Promise<void> {
    const names = await readDirIfPresent(this.options.cacheDir);
    for (const name of names) {
      if (!name.endsWith(".part")) continue;
      const key = parseCacheEntryFileName(name.slice(0, name.indexOf(".audio") + ".audio".length));
      if (key && this.inFlight.has(key)) continue;
      await rm(join(this.options.cacheDir, name), { force: true });
    }
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function statIfPresent(path: string) {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}

async function readDirIfPresent(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (err) {
    if (isMissingFileError(err)) return [];
    throw err;
  }
}

async function discardBody(response: Response): Promise<void> {
  if (!response.body) return;
  await response.body.cancel().catch((err: unknown) => {
    logger.debug(`discarding response body raised: ${String(err)}`);
  });
}
