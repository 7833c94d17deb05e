import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  DEVICES,
  INFERENCE_SERVICE_BASE_URL_DEFAULT,
  MODEL_ID_DEFAULT,
  SIMILARITY_THRESHOLD_DEFAULT,
} from "@speakercheck/shared";

function expandHome(raw: string): string {
  return raw.startsWith("~") ? raw.replace("~", os.homedir()) : raw;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const dirSchema = (fallback: string) =>
  z
    .string()
    .min(1)
    .default(fallback)
    .transform((value) => path.resolve(expandHome(value)));

const envSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5002),
  MODEL_ID: z.string().min(1).default(MODEL_ID_DEFAULT),
  DEVICE: z.enum(DEVICES).default("cpu"),
  SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(SIMILARITY_THRESHOLD_DEFAULT),
  THRESHOLD_COMPARISON: z.enum(["gt", "gte"]).default("gt"),
  INFERENCE_SERVICE_URL: z.string().url().default(INFERENCE_SERVICE_BASE_URL_DEFAULT),
  CACHE_DIR: dirSchema(path.join(os.tmpdir(), "speaker_verification_cache")),
  SCRATCH_DIR: dirSchema(path.join(os.tmpdir(), "speakercheck-uploads")),
  CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(0),
  CACHE_MAX_BYTES: z.coerce.number().int().nonnegative().default(0),
  CACHE_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  VALIDATE_AUDIO: booleanFlag.default("true"),
  MIN_AUDIO_DURATION: z.coerce.number().nonnegative().default(0.5),
  MAX_AUDIO_DURATION: z.coerce.number().positive().default(30),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EXTRACT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  MODEL_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  MODEL_LOAD_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  MODEL_LOAD_BACKOFF: z.enum(["linear", "exponential"]).default("exponential"),
  MODEL_LOAD_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  MODEL_LOAD_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(30_000),
  EAGER_MODEL_LOAD: booleanFlag.default("true"),
  EXTRACT_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RECENT_REQUESTS_LIMIT: z.coerce.number().int().positive().default(100),
  LOCAL_PATH_ROOTS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
        .map((entry) => path.resolve(expandHome(entry))),
    ),
  CORS_ORIGIN: z.string().min(1).default("*"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ServerConfig = ReturnType<typeof loadConfig>;

/**
 * Parses start-up configuration from environment variables.
 * Throws with the offending variable names when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv) {
  // Empty strings count as unset so `FOO=` in a .env file falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const raw = parsed.data;
  if (raw.MIN_AUDIO_DURATION >= raw.MAX_AUDIO_DURATION) {
    throw new Error(
      `Invalid configuration: MIN_AUDIO_DURATION (${raw.MIN_AUDIO_DURATION}) must be below MAX_AUDIO_DURATION (${raw.MAX_AUDIO_DURATION})`,
    );
  }

  return {
    host: raw.HOST,
    port: raw.PORT,
    model: {
      modelId: raw.MODEL_ID,
      device: raw.DEVICE,
    },
    threshold: raw.SIMILARITY_THRESHOLD,
    comparison: raw.THRESHOLD_COMPARISON,
    inferenceServiceUrl: raw.INFERENCE_SERVICE_URL.replace(/\/+$/, ""),
    cacheDir: raw.CACHE_DIR,
    scratchDir: raw.SCRATCH_DIR,
    cacheTtlMs: raw.CACHE_TTL_SECONDS > 0 ? raw.CACHE_TTL_SECONDS * 1000 : null,
    cacheMaxBytes: raw.CACHE_MAX_BYTES > 0 ? raw.CACHE_MAX_BYTES : null,
    cacheSweepIntervalMs: raw.CACHE_SWEEP_INTERVAL_SECONDS * 1000,
    maxContentLength: raw.MAX_CONTENT_LENGTH,
    validateAudio: raw.VALIDATE_AUDIO,
    minAudioDurationSeconds: raw.MIN_AUDIO_DURATION,
    maxAudioDurationSeconds: raw.MAX_AUDIO_DURATION,
    downloadTimeoutMs: raw.DOWNLOAD_TIMEOUT_MS,
    extractTimeoutMs: raw.EXTRACT_TIMEOUT_MS,
    modelLoadTimeoutMs: raw.MODEL_LOAD_TIMEOUT_MS,
    modelLoadMaxAttempts: raw.MODEL_LOAD_MAX_ATTEMPTS,
    modelLoadBackoff: {
      kind: raw.MODEL_LOAD_BACKOFF,
      baseMs: raw.MODEL_LOAD_BACKOFF_BASE_MS,
      maxMs: raw.MODEL_LOAD_BACKOFF_MAX_MS,
    },
    eagerModelLoad: raw.EAGER_MODEL_LOAD,
    extractConcurrency: raw.EXTRACT_CONCURRENCY,
    recentRequestsLimit: raw.RECENT_REQUESTS_LIMIT,
    localPathRoots: raw.LOCAL_PATH_ROOTS,
    corsOrigin: raw.CORS_ORIGIN,
    logLevel: raw.LOG_LEVEL,
  } as const;
}
