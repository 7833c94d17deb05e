import { mkdtemp, readFile, readdir, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { computeCacheKey } from "../lib/cache-key.js";
import {
  DownloadFailedError,
  InvalidSourceError,
  PayloadTooLargeError,
  TimeoutError,
} from "../lib/errors.js";
import { ContentCache, type ContentCacheOptions, type FetchLike } from "./content-cache.js";

const URL_A = "https://audio.example.test/a.wav";
const URL_B = "https://audio.example.test/b.wav";

describe("ContentCache", () => {
  let dir: string;
  let fetchMock: Mock<FetchLike>;

  function createCache(overrides: Partial<ContentCacheOptions> = {}): ContentCache {
    return new ContentCache({
      cacheDir: dir,
      downloadTimeoutMs: 1_000,
      maxDownloadBytes: 1_024,
      fetch: fetchMock,
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "content-cache-"));
    fetchMock = vi.fn<FetchLike>(async (input) => new Response(`bytes of ${input}`));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores the body under the sha256 key of the url", async () => {
    const cache = createCache();
    const path = await cache.getOrFetch(URL_A);

    expect(path).toBe(join(dir, `${computeCacheKey(URL_A)}.audio`));
    expect(await readFile(path, "utf8")).toBe(`bytes of ${URL_A}`);
  });

  it("fetches once for concurrent requests of the same url", async () => {
    let releaseBody: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseBody = resolve;
    });
    fetchMock.mockImplementation(async () => {
      await gate;
      return new Response("shared body");
    });
    const cache = createCache();

    const pending = Array.from({ length: 5 }, () => cache.getOrFetch(URL_A));
    releaseBody();
    const paths = await Promise.all(pending);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(new Set(paths).size).toBe(1);
    expect(await readFile(paths[0] ?? "", "utf8")).toBe("shared body");
  });

  it("downloads different urls independently", async () => {
    const cache = createCache();
    const [a, b] = await Promise.all([cache.getOrFetch(URL_A), cache.getOrFetch(URL_B)]);

    expect(a).not.toBe(b);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("serves later requests from disk", async () => {
    const cache = createCache();
    await cache.getOrFetch(URL_A);
    await cache.getOrFetch(URL_A);

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("leaves nothing behind when the server answers with an error", async () => {
    fetchMock.mockResolvedValueOnce(new Response("missing", { status: 404 }));
    const cache = createCache();

    const attempt = cache.getOrFetch(URL_A);
    await expect(attempt).rejects.toBeInstanceOf(DownloadFailedError);
    await expect(attempt).rejects.toThrow(`Failed to download audio from URL: ${URL_A} (HTTP 404)`);
    expect(await readdir(dir)).toEqual([]);

    await cache.getOrFetch(URL_A);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports network failures as download failures", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const cache = createCache();

    await expect(cache.getOrFetch(URL_A)).rejects.toThrow(
      `Failed to download audio from URL: ${URL_A} (fetch failed)`,
    );
  });

  it("reports aborted downloads as timeouts", async () => {
    fetchMock.mockRejectedValueOnce(Object.assign(new Error("aborted"), { name: "TimeoutError" }));
    const cache = createCache({ downloadTimeoutMs: 250 });

    const attempt = cache.getOrFetch(URL_A);
    await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
    await expect(attempt).rejects.toThrow("download timed out after 250ms");
  });

  it("rejects bodies over the size limit and removes the partial file", async () => {
    fetchMock.mockResolvedValueOnce(new Response("0123456789"));
    const cache = createCache({ maxDownloadBytes: 4 });

    await expect(cache.getOrFetch(URL_A)).rejects.toBeInstanceOf(PayloadTooLargeError);
    expect(await readdir(dir)).toEqual([]);
  });

  it("refuses schemes other than http and https without fetching", async () => {
    const cache = createCache();

    await expect(cache.getOrFetch("ftp://audio.example.test/a.wav")).rejects.toBeInstanceOf(
      InvalidSourceError,
    );
    await expect(cache.getOrFetch("not a url")).rejects.toThrow("Invalid URL: not a url");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  describe("eviction", () => {
    it("removes expired entries but keeps leased ones", async () => {
      let offsetMs = 0;
      const cache = createCache({ ttlMs: 60_000, now: () => Date.now() + offsetMs });
      const lease = await cache.lease(URL_A);
      await cache.getOrFetch(URL_B);

      offsetMs = 120_000;
      await expect(cache.evict()).resolves.toBe(1);
      expect(await readdir(dir)).toEqual([`${computeCacheKey(URL_A)}.audio`]);

      lease.release();
      await expect(cache.evict()).resolves.toBe(1);
      expect(await readdir(dir)).toEqual([]);
    });

    it("refetches an expired entry on access", async () => {
      let offsetMs = 0;
      const cache = createCache({ ttlMs: 60_000, now: () => Date.now() + offsetMs });
      await cache.getOrFetch(URL_A);

      offsetMs = 120_000;
      await cache.getOrFetch(URL_A);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("trims the oldest entries until the total fits", async () => {
      fetchMock.mockImplementation(async () => new Response("123456"));
      const cache = createCache({ maxTotalBytes: 10 });
      const urls = [URL_A, URL_B, "https://audio.example.test/c.wav"];
      const paths: string[] = [];
      for (const url of urls) {
        paths.push(await cache.getOrFetch(url));
      }
      const base = Math.floor(Date.now() / 1000) - 100;
      for (const [index, path] of paths.entries()) {
        await utimes(path, base + index, base + index);
      }

      await expect(cache.evict()).resolves.toBe(2);
      expect(await readdir(dir)).toEqual([`${computeCacheKey(urls[2] ?? "")}.audio`]);
    });

    it("does nothing without a ttl or size bound", async () => {
      const cache = createCache();
      await cache.getOrFetch(URL_A);

      await expect(cache.evict()).resolves.toBe(0);
      expect(await readdir(dir)).toHaveLength(1);
    });
  });

  it("clear() skips leased entries and removes stale temp files", async () => {
    const cache = createCache();
    const lease = await cache.lease(URL_A);
    await cache.getOrFetch(URL_B);
    await writeFile(join(dir, `${computeCacheKey(URL_B)}.audio.0000.part`), "half");

    await expect(cache.clear()).resolves.toBe(1);
    expect(await readdir(dir)).toEqual([`${computeCacheKey(URL_A)}.audio`]);
    lease.release();
  });

  it("reports entry count and total size", async () => {
    fetchMock.mockImplementation(async () => new Response("abcd"));
    const cache = createCache();
    await cache.getOrFetch(URL_A);
    await cache.getOrFetch(URL_B);

    await expect(cache.stats()).resolves.toEqual({ entries: 2, totalBytes: 8, inFlight: 0 });
  });
});
