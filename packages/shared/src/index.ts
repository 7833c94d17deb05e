// ─── Inference service response types ─────────────────────────────────────────

export type { InferenceLoadResponse, InferenceEmbedResponse } from "./types.js";

export {
  inferenceLoadResponseSchema,
  inferenceUnloadResponseSchema,
  inferenceEmbedResponseSchema,
} from "./schemas.js";

export type {
  InferenceLoadResponseFromSchema,
  InferenceEmbedResponseFromSchema,
} from "./schemas.js";

// ─── Domain and HTTP types ────────────────────────────────────────────────────

export type {
  ModelStatus,
  Device,
  ThresholdComparison,
  ConfidenceBand,
  ErrorKind,
  AudioSourceInput,
  AudioInfo,
  VerificationResultPayload,
  VerifyResponse,
  BatchItemResult,
  VerifyBatchResponse,
  ExtractEmbeddingResponse,
  CompareEmbeddingsResponse,
  RequestRecordPayload,
  RequestStatistics,
  ModelStatusPayload,
  HealthResponse,
  ConfigResponse,
  ConfigUpdateResponse,
  CacheStatsResponse,
  CacheClearResponse,
  ModelDescriptor,
  ModelsResponse,
  ServiceInfoResponse,
  ErrorResponse,
} from "./types.js";

export {
  modelStatusSchema,
  deviceSchema,
  thresholdComparisonSchema,
  confidenceBandSchema,
  errorKindSchema,
  thresholdSchema,
  formThresholdSchema,
  audioSourceInputSchema,
  embeddingVectorSchema,
  audioInfoSchema,
  verifyJsonRequestSchema,
  verifyBatchRequestSchema,
  extractJsonRequestSchema,
  compareEmbeddingsRequestSchema,
  configUpdateRequestSchema,
  verificationResultSchema,
  verifyResponseSchema,
  batchItemResultSchema,
  verifyBatchResponseSchema,
  extractEmbeddingResponseSchema,
  compareEmbeddingsResponseSchema,
  requestRecordSchema,
  requestStatisticsSchema,
  modelStatusPayloadSchema,
  healthResponseSchema,
  configResponseSchema,
  configUpdateResponseSchema,
  cacheStatsResponseSchema,
  cacheClearResponseSchema,
  modelDescriptorSchema,
  modelsResponseSchema,
  serviceInfoResponseSchema,
  errorResponseSchema,
} from "./schemas.js";

export type {
  ModelStatusFromSchema,
  AudioSourceInputFromSchema,
  VerifyJsonRequestFromSchema,
  VerifyBatchRequestFromSchema,
  ExtractJsonRequestFromSchema,
  CompareEmbeddingsRequestFromSchema,
  ConfigUpdateRequestFromSchema,
  VerificationResultFromSchema,
  VerifyResponseFromSchema,
  VerifyBatchResponseFromSchema,
  ExtractEmbeddingResponseFromSchema,
  CompareEmbeddingsResponseFromSchema,
  HealthResponseFromSchema,
  ConfigResponseFromSchema,
  ErrorResponseFromSchema,
} from "./schemas.js";

// ─── State machine ────────────────────────────────────────────────────────────

export { canTransitionModel, VALID_MODEL_TRANSITIONS } from "./stateMachine.js";

// ─── Constants ────────────────────────────────────────────────────────────────

export {
  SIMILARITY_THRESHOLD_DEFAULT,
  CONFIDENCE_MARGIN,
  SUPPORTED_AUDIO_FORMATS,
  INFERENCE_SERVICE_BASE_URL_DEFAULT,
  MODEL_ID_DEFAULT,
  EMBEDDING_DIMENSION_DEFAULT,
  DEVICES,
  AVAILABLE_MODELS,
  SERVICE_NAME,
  SERVICE_VERSION,
} from "./constants.js";
