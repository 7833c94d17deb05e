import {
  SERVICE_NAME,
  SERVICE_VERSION,
  healthResponseSchema,
  serviceInfoResponseSchema,
  type HealthResponse,
  type ServiceInfoResponse,
} from "@speakercheck/shared";
import { Hono } from "hono";
import { createLogger } from "../lib/logger.js";
import { validatedPayload } from "../lib/request-body.js";
import type { EmbeddingExtractor } from "../services/embedding-extractor.js";
import type { ModelLifecycleCoordinator } from "../services/model-coordinator.js";
import type { RequestStatsCollector } from "../services/request-stats.js";

const logger = createLogger("health");

export interface HealthRouteDeps {
  models: ModelLifecycleCoordinator<EmbeddingExtractor>;
  stats: RequestStatsCollector;
}

const ENDPOINTS = [
  "GET /",
  "GET /health",
  "POST /verify",
  "POST /verify_batch",
  "POST /extract_embedding",
  "POST /compare_embeddings",
  "GET /config",
  "POST /config",
  "GET /models",
  "GET /cache",
  "DELETE /cache",
];

export function createHealthRoutes({ models, stats }: HealthRouteDeps): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    const payload: ServiceInfoResponse = {
      service: SERVICE_NAME,
      status: "running",
      model: models.currentConfig.modelId,
      device: models.currentConfig.device,
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
    };
    return c.json(validatedPayload(serviceInfoResponseSchema, payload, "service info"));
  });

  /**
   * 200 only when the model is ready. An idle or failed model gets a load
   * kicked off in the background so the next probe may succeed.
   */
  app.get("/health", (c) => {
    const model = models.describe();

    if (model.status === "UNLOADED" || model.status === "FAILED") {
      void models.ensureReady().catch((err: unknown) => {
        logger.warn(`background model load failed: ${String(err)}`);
      });
    }

    const status: HealthResponse["status"] =
      model.status === "READY" ? "healthy" : model.status === "LOADING" ? "degraded" : "unhealthy";
    const payload: HealthResponse = {
      status,
      model,
      uptime_seconds: stats.uptimeSeconds(),
      statistics: stats.snapshot(),
    };
    return c.json(validatedPayload(healthResponseSchema, payload, "health"), status === "healthy" ? 200 : 503);
  });

  return app;
}
