import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { PayloadTooLargeError, toServiceError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { isBodyLimitError } from "./lib/request-body.js";
import { requestStats } from "./middleware/request-stats.js";
import { createCacheRoutes } from "./routes/cache-routes.js";
import { createConfigRoutes, type ServiceLimits } from "./routes/config-routes.js";
import { createEmbeddingRoutes } from "./routes/embeddings.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVerifyRoutes } from "./routes/verify.js";
import type { ContentCache } from "./services/content-cache.js";
import type { EmbeddingExtractor } from "./services/embedding-extractor.js";
import type { ModelLifecycleCoordinator } from "./services/model-coordinator.js";
import type { RequestStatsCollector } from "./services/request-stats.js";
import type { RuntimeSettings } from "./services/runtime-settings.js";
import type { VerificationService } from "./services/verification-service.js";

const logger = createLogger("http");

export interface AppDependencies {
  verification: VerificationService;
  models: ModelLifecycleCoordinator<EmbeddingExtractor>;
  settings: RuntimeSettings;
  stats: RequestStatsCollector;
  cache: ContentCache;
  limits: ServiceLimits;
  corsOrigin: string;
}

export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.use("*", cors({ origin: deps.corsOrigin }));
  app.use("*", requestStats(deps.stats));
  const tooLarge = () => new PayloadTooLargeError(deps.limits.maxContentLength);
  app.use(
    "*",
    bodyLimit({
      maxSize: deps.limits.maxContentLength,
      onError: (c) => c.json(tooLarge().toResponse(), 413),
    }),
  );

  app.route("/", createHealthRoutes(deps));
  app.route("/", createVerifyRoutes(deps));
  app.route("/", createEmbeddingRoutes(deps));
  app.route("/", createConfigRoutes(deps));
  app.route("/", createCacheRoutes(deps));

  app.notFound((c) => c.json({ success: false, error: "Endpoint not found" }, 404));

  app.onError((err, c) => {
    // Streamed bodies without a content-length overrun inside the handler.
    const error = isBodyLimitError(err) ? tooLarge() : toServiceError(err);
    const line = `${c.req.method} ${c.req.path} -> ${error.status} ${error.kind}: ${error.message}`;
    if (error.status >= 500) {
      logger.error(line, error.cause);
    } else {
      logger.warn(line);
    }
    return c.json(error.toResponse(), error.status);
  });

  return app;
}
