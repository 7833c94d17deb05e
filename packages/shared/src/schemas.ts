import { z } from "zod";
import { DEVICES } from "./constants.js";

// ─── Inference service response schemas ───────────────────────────────────────

export const inferenceLoadResponseSchema = z.object({
  model_id: z.string().min(1),
  device: z.string().min(1),
  embedding_dim: z.number().int().positive(),
});

export type InferenceLoadResponseFromSchema = z.infer<typeof inferenceLoadResponseSchema>;

export const inferenceUnloadResponseSchema = z.object({
  model_id: z.string().min(1),
  unloaded: z.boolean(),
});

export const inferenceEmbedResponseSchema = z
  .object({
    embedding: z.array(z.number().finite()).min(1),
    dimension: z.number().int().positive(),
  })
  .refine((value) => value.embedding.length === value.dimension, {
    message: "dimension must match the embedding length",
    path: ["dimension"],
  });

export type InferenceEmbedResponseFromSchema = z.infer<typeof inferenceEmbedResponseSchema>;

// ─── Shared building blocks ───────────────────────────────────────────────────

const isoDatetimeSchema = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
    "Must be ISO 8601 datetime",
  );

export const modelStatusSchema = z.enum(["UNLOADED", "LOADING", "READY", "FAILED"]);

export type ModelStatusFromSchema = z.infer<typeof modelStatusSchema>;

export const deviceSchema = z.enum(DEVICES);

export const thresholdComparisonSchema = z.enum(["gt", "gte"]);

export const confidenceBandSchema = z.enum(["high", "medium"]);

export const errorKindSchema = z.enum([
  "INVALID_SOURCE",
  "DOWNLOAD_FAILED",
  "VALIDATION_FAILED",
  "MODEL_UNAVAILABLE",
  "EXTRACTION_ERROR",
  "TIMEOUT",
  "PAYLOAD_TOO_LARGE",
  "INTERNAL_ERROR",
]);

/** Cosine similarity lives in [-1, 1], so any useful threshold does too. */
export const thresholdSchema = z.number().min(-1).max(1);

/** Same bounds for thresholds sent as multipart form fields (strings). */
export const formThresholdSchema = z.coerce.number().min(-1).max(1);

export const audioSourceInputSchema = z.union([
  z.string().min(1),
  z.object({ url: z.string().min(1) }).strict(),
  z.object({ path: z.string().min(1) }).strict(),
]);

export type AudioSourceInputFromSchema = z.infer<typeof audioSourceInputSchema>;

export const embeddingVectorSchema = z.array(z.number().finite()).min(1);

export const audioInfoSchema = z.object({
  duration: z.number().nonnegative(),
  sample_rate: z.number().int().positive(),
  channels: z.number().int().positive(),
});

// ─── HTTP request schemas ─────────────────────────────────────────────────────

export const verifyJsonRequestSchema = z
  .object({
    audio1_url: z.string().min(1).optional(),
    audio1_path: z.string().min(1).optional(),
    audio2_url: z.string().min(1).optional(),
    audio2_path: z.string().min(1).optional(),
    threshold: thresholdSchema.optional(),
  })
  .refine(
    (value) =>
      (value.audio1_url ?? value.audio1_path) !== undefined &&
      (value.audio2_url ?? value.audio2_path) !== undefined,
    { message: "Missing audio sources. Provide either files, URLs, or paths" },
  );

export type VerifyJsonRequestFromSchema = z.infer<typeof verifyJsonRequestSchema>;

export const verifyBatchRequestSchema = z.object({
  reference: audioSourceInputSchema,
  candidates: z.array(audioSourceInputSchema).min(1),
  threshold: thresholdSchema.optional(),
});

export type VerifyBatchRequestFromSchema = z.infer<typeof verifyBatchRequestSchema>;

export const extractJsonRequestSchema = z
  .object({
    audio_url: z.string().min(1).optional(),
    audio_path: z.string().min(1).optional(),
  })
  .refine((value) => (value.audio_url ?? value.audio_path) !== undefined, {
    message: "Missing audio source",
  });

export type ExtractJsonRequestFromSchema = z.infer<typeof extractJsonRequestSchema>;

export const compareEmbeddingsRequestSchema = z
  .object({
    embedding1: embeddingVectorSchema,
    embedding2: embeddingVectorSchema,
    threshold: thresholdSchema.optional(),
  })
  .refine((value) => value.embedding1.length === value.embedding2.length, {
    message: "embedding1 and embedding2 must have the same dimension",
    path: ["embedding2"],
  });

export type CompareEmbeddingsRequestFromSchema = z.infer<typeof compareEmbeddingsRequestSchema>;

export const configUpdateRequestSchema = z
  .object({
    threshold: thresholdSchema.optional(),
    model_id: z.string().min(1).optional(),
    device: deviceSchema.optional(),
    comparison: thresholdComparisonSchema.optional(),
  })
  .strict();

export type ConfigUpdateRequestFromSchema = z.infer<typeof configUpdateRequestSchema>;

// ─── HTTP response schemas ────────────────────────────────────────────────────

export const verificationResultSchema = z.object({
  score: z.number().min(-1.000001).max(1.000001),
  threshold: thresholdSchema,
  is_same_speaker: z.boolean(),
  confidence: confidenceBandSchema,
  comparison: thresholdComparisonSchema,
});

export type VerificationResultFromSchema = z.infer<typeof verificationResultSchema>;

export const verifyResponseSchema = verificationResultSchema.extend({
  success: z.literal(true),
  inference_time: z.number().nonnegative(),
  audio1_info: audioInfoSchema.nullish(),
  audio2_info: audioInfoSchema.nullish(),
});

export type VerifyResponseFromSchema = z.infer<typeof verifyResponseSchema>;

export const batchItemResultSchema = z.discriminatedUnion("success", [
  z.object({
    candidate: audioSourceInputSchema,
    success: z.literal(true),
    result: verificationResultSchema,
  }),
  z.object({
    candidate: audioSourceInputSchema,
    success: z.literal(false),
    error: z.string(),
    error_kind: errorKindSchema,
  }),
]);

export const verifyBatchResponseSchema = z.object({
  success: z.literal(true),
  reference: audioSourceInputSchema,
  threshold: thresholdSchema,
  results: z.array(batchItemResultSchema),
});

export type VerifyBatchResponseFromSchema = z.infer<typeof verifyBatchResponseSchema>;

export const extractEmbeddingResponseSchema = z
  .object({
    success: z.literal(true),
    embedding: embeddingVectorSchema,
    dimension: z.number().int().positive(),
    model_id: z.string(),
    audio_info: audioInfoSchema.nullish(),
  })
  .refine((value) => value.embedding.length === value.dimension, {
    message: "dimension must match the embedding length",
    path: ["dimension"],
  });

export type ExtractEmbeddingResponseFromSchema = z.infer<typeof extractEmbeddingResponseSchema>;

export const compareEmbeddingsResponseSchema = verificationResultSchema.extend({
  success: z.literal(true),
  similarity: z.number(),
});

export type CompareEmbeddingsResponseFromSchema = z.infer<typeof compareEmbeddingsResponseSchema>;

export const requestRecordSchema = z.object({
  timestamp: isoDatetimeSchema,
  endpoint: z.string(),
  method: z.string(),
  status: z.number().int(),
  duration_ms: z.number().nonnegative(),
  success: z.boolean(),
  error: z.string().nullable(),
  client_ip: z.string(),
});

export const requestStatisticsSchema = z.object({
  total_requests: z.number().int().nonnegative(),
  success_count: z.number().int().nonnegative(),
  error_count: z.number().int().nonnegative(),
  success_rate: z.number().min(0).max(100),
  avg_response_time_ms: z.number().nonnegative(),
  recent_requests: z.array(requestRecordSchema),
});

export const modelStatusPayloadSchema = z.object({
  status: modelStatusSchema,
  model_id: z.string(),
  device: deviceSchema,
  attempt: z.number().int().nonnegative(),
  last_error: z.string().nullable(),
  loaded_at: isoDatetimeSchema.nullable(),
});

export const healthResponseSchema = z.object({
  status: z.enum(["healthy", "degraded", "unhealthy"]),
  model: modelStatusPayloadSchema,
  uptime_seconds: z.number().nonnegative(),
  statistics: requestStatisticsSchema,
});

export type HealthResponseFromSchema = z.infer<typeof healthResponseSchema>;

export const configResponseSchema = z.object({
  model_id: z.string(),
  device: deviceSchema,
  threshold: thresholdSchema,
  comparison: thresholdComparisonSchema,
  max_file_size: z.number().int().positive(),
  allowed_extensions: z.array(z.string()),
  min_audio_duration: z.number().nonnegative(),
  max_audio_duration: z.number().positive(),
});

export type ConfigResponseFromSchema = z.infer<typeof configResponseSchema>;

export const configUpdateResponseSchema = z.object({
  success: z.literal(true),
  config: configResponseSchema,
});

export const cacheStatsResponseSchema = z.object({
  entries: z.number().int().nonnegative(),
  total_bytes: z.number().int().nonnegative(),
  in_flight: z.number().int().nonnegative(),
});

export const cacheClearResponseSchema = z.object({
  success: z.literal(true),
  removed: z.number().int().nonnegative(),
});

export const modelDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
  language: z.string(),
  description: z.string(),
});

export const modelsResponseSchema = z.object({
  current_model: z.string(),
  available_models: z.array(modelDescriptorSchema),
});

export const serviceInfoResponseSchema = z.object({
  service: z.string(),
  status: z.literal("running"),
  model: z.string(),
  device: deviceSchema,
  version: z.string(),
  endpoints: z.array(z.string()),
});

export const errorResponseSchema = z.object({
  success: z.literal(false),
  error: z.string(),
  error_kind: errorKindSchema,
  retryable: z.boolean(),
});

export type ErrorResponseFromSchema = z.infer<typeof errorResponseSchema>;
