import { getConnInfo } from "@hono/node-server/conninfo";
import type { Context, MiddlewareHandler } from "hono";
import type { RequestStatsCollector } from "../services/request-stats.js";

/** Paths polled by load balancers; counting them would drown real traffic. */
const UNTRACKED_PATHS = new Set(["/health"]);

export function resolveClientIp(c: Context): string {
  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  if (forwarded) return forwarded;

  const realIp = c.req.header("x-real-ip")?.trim();
  if (realIp) return realIp;

  // getConnInfo needs the Node socket, which app.request() in tests lacks.
  try {
    return getConnInfo(c).remote.address ?? "unknown";
  } catch {
    return "unknown";
  }
}

/** Records one entry per request once the response is known. */
export function requestStats(collector: RequestStatsCollector): MiddlewareHandler {
  return async (c, next) => {
    const startedAt = performance.now();
    await next();

    if (UNTRACKED_PATHS.has(c.req.path)) return;

    const status = c.res.status;
    const success = status < 400;
    collector.record({
      endpoint: c.req.path,
      method: c.req.method,
      status,
      durationMs: performance.now() - startedAt,
      success,
      error: success ? null : (c.error?.message ?? `HTTP ${status}`),
      clientIp: resolveClientIp(c),
    });
  };
}
