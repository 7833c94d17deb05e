import {
  cacheClearResponseSchema,
  cacheStatsResponseSchema,
  type CacheClearResponse,
  type CacheStatsResponse,
} from "@speakercheck/shared";
import { Hono } from "hono";
import { validatedPayload } from "../lib/request-body.js";
import type { ContentCache } from "../services/content-cache.js";

export interface CacheRouteDeps {
  cache: ContentCache;
}

export function createCacheRoutes({ cache }: CacheRouteDeps): Hono {
  const app = new Hono();

  app.get("/cache", async (c) => {
    const stats = await cache.stats();
    const payload: CacheStatsResponse = {
      entries: stats.entries,
      total_bytes: stats.totalBytes,
      in_flight: stats.inFlight,
    };
    return c.json(validatedPayload(cacheStatsResponseSchema, payload, "cache"));
  });

  // Entries in use by running requests survive the clear.
  app.delete("/cache", async (c) => {
    const payload: CacheClearResponse = { success: true, removed: await cache.clear() };
    return c.json(validatedPayload(cacheClearResponseSchema, payload, "cache"));
  });

  return app;
}
