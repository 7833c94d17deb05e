import {
  AVAILABLE_MODELS,
  SUPPORTED_AUDIO_FORMATS,
  configResponseSchema,
  configUpdateRequestSchema,
  configUpdateResponseSchema,
  modelsResponseSchema,
  type ConfigResponse,
  type ConfigUpdateResponse,
  type ModelsResponse,
} from "@speakercheck/shared";
import { Hono } from "hono";
import { createLogger } from "../lib/logger.js";
import { readJsonBody, validatedPayload } from "../lib/request-body.js";
import type { EmbeddingExtractor, ModelConfig } from "../services/embedding-extractor.js";
import type { ModelLifecycleCoordinator } from "../services/model-coordinator.js";
import type { RuntimeSettings } from "../services/runtime-settings.js";

const logger = createLogger("config");

export interface ServiceLimits {
  maxContentLength: number;
  minAudioDurationSeconds: number;
  maxAudioDurationSeconds: number;
}

export interface ConfigRouteDeps {
  models: ModelLifecycleCoordinator<EmbeddingExtractor>;
  settings: RuntimeSettings;
  limits: ServiceLimits;
}

export function createConfigRoutes({ models, settings, limits }: ConfigRouteDeps): Hono {
  const app = new Hono();

  const currentConfig = (): ConfigResponse => {
    const { modelId, device } = models.currentConfig;
    const { threshold, comparison } = settings.snapshot();
    return {
      model_id: modelId,
      device,
      threshold,
      comparison,
      max_file_size: limits.maxContentLength,
      allowed_extensions: [...SUPPORTED_AUDIO_FORMATS],
      min_audio_duration: limits.minAudioDurationSeconds,
      max_audio_duration: limits.maxAudioDurationSeconds,
    };
  };

  app.get("/config", (c) => {
    return c.json(validatedPayload(configResponseSchema, currentConfig(), "config"));
  });

  /**
   * Threshold and comparison apply immediately. A new model id or device
   * reloads the model before responding; if that fails the reply is 503 and
   * the service keeps retrying on demand.
   */
  app.post("/config", async (c) => {
    const update = await readJsonBody(c, configUpdateRequestSchema);

    settings.update({ threshold: update.threshold, comparison: update.comparison });

    const before = models.currentConfig;
    const changes: Partial<ModelConfig> = {};
    if (update.model_id !== undefined && update.model_id !== before.modelId) {
      changes.modelId = update.model_id;
    }
    if (update.device !== undefined && update.device !== before.device) {
      changes.device = update.device;
    }
    if (changes.modelId !== undefined || changes.device !== undefined) {
      logger.info(`model change requested: ${JSON.stringify(changes)}`);
      await models.reload(changes);
    }

    const payload: ConfigUpdateResponse = { success: true, config: currentConfig() };
    return c.json(validatedPayload(configUpdateResponseSchema, payload, "config"));
  });

  app.get("/models", (c) => {
    const payload: ModelsResponse = {
      current_model: models.currentConfig.modelId,
      available_models: AVAILABLE_MODELS.map((model) => ({ ...model })),
    };
    return c.json(validatedPayload(modelsResponseSchema, payload, "models"));
  });

  return app;
}
