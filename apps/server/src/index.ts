import { serve } from "@hono/node-server";
import { mkdir } from "node:fs/promises";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createAudioValidator, skipAudioValidation } from "./lib/audio-validation.js";
import { createBackoffPolicy } from "./lib/backoff.js";
import { ConcurrencyLimiter } from "./lib/concurrency-limiter.js";
import { probeAudioFile } from "./lib/ffprobe.js";
import { createLogger, setLogLevel } from "./lib/logger.js";
import { AudioSourceResolver } from "./services/audio-resolver.js";
import { ContentCache } from "./services/content-cache.js";
import {
  createHttpExtractorLoader,
  disposeReplacedExtractor,
  type EmbeddingExtractor,
} from "./services/embedding-extractor.js";
import { ModelLifecycleCoordinator } from "./services/model-coordinator.js";
import { RequestStatsCollector } from "./services/request-stats.js";
import { purgeScratchDirectory } from "./services/resource-scope.js";
import { RuntimeSettings } from "./services/runtime-settings.js";
import { VerificationEngine } from "./services/verification-engine.js";
import { VerificationService } from "./services/verification-service.js";

const logger = createLogger("server");

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  await mkdir(config.scratchDir, { recursive: true });
  await purgeScratchDirectory(config.scratchDir);

  const cache = new ContentCache({
    cacheDir: config.cacheDir,
    downloadTimeoutMs: config.downloadTimeoutMs,
    maxDownloadBytes: config.maxContentLength,
    ttlMs: config.cacheTtlMs,
    maxTotalBytes: config.cacheMaxBytes,
  });
  await cache.init();

  const models = new ModelLifecycleCoordinator<EmbeddingExtractor>({
    config: config.model,
    load: createHttpExtractorLoader({
      baseUrl: config.inferenceServiceUrl,
      loadTimeoutMs: config.modelLoadTimeoutMs,
      extractTimeoutMs: config.extractTimeoutMs,
    }),
    dispose: (extractor): Promise<void> =>
      disposeReplacedExtractor(extractor, models.status === "UNLOADED" ? null : models.currentConfig),
    maxAttempts: config.modelLoadMaxAttempts,
    backoff: createBackoffPolicy(config.modelLoadBackoff),
    loadTimeoutMs: config.modelLoadTimeoutMs,
  });

  const settings = new RuntimeSettings({ threshold: config.threshold, comparison: config.comparison });
  const stats = new RequestStatsCollector(config.recentRequestsLimit);

  const verification = new VerificationService({
    resolver: new AudioSourceResolver({
      scratchDir: config.scratchDir,
      cache,
      maxUploadBytes: config.maxContentLength,
      localPathRoots: config.localPathRoots,
    }),
    validator: config.validateAudio
      ? createAudioValidator(probeAudioFile, {
          minSeconds: config.minAudioDurationSeconds,
          maxSeconds: config.maxAudioDurationSeconds,
        })
      : skipAudioValidation,
    models,
    engine: new VerificationEngine(() => settings.snapshot()),
    limiter: new ConcurrencyLimiter(config.extractConcurrency),
  });

  const app = createApp({
    verification,
    models,
    settings,
    stats,
    cache,
    limits: {
      maxContentLength: config.maxContentLength,
      minAudioDurationSeconds: config.minAudioDurationSeconds,
      maxAudioDurationSeconds: config.maxAudioDurationSeconds,
    },
    corsOrigin: config.corsOrigin,
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info(`listening on http://${config.host}:${info.port}`);
    logger.info(`model ${config.model.modelId} on ${config.model.device}, threshold ${config.threshold}`);
  });

  if (config.eagerModelLoad) {
    // Failures are recorded in the model state; requests retry on demand.
    void models.ensureReady().catch((err: unknown) => {
      logger.error(`initial model load failed: ${String(err)}`);
    });
  }

  const sweep = setInterval(() => {
    void cache.evict().catch((err: unknown) => {
      logger.error("cache sweep failed", err);
    });
  }, config.cacheSweepIntervalMs);
  sweep.unref();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);
    clearInterval(sweep);
    server.close((err) => {
      if (err) logger.error("error while closing the HTTP server", err);
      void models
        .shutdown()
        .catch((shutdownErr: unknown) => logger.error("model shutdown failed", shutdownErr))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logger.error("failed to start", err);
  process.exit(1);
});
