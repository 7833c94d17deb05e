// ─── Inference service response types ─────────────────────────────────────────
// Bodies returned by the inference service (snake_case fields).

export interface InferenceLoadResponse {
  model_id: string;
  device: string;
  embedding_dim: number;
}

export interface InferenceEmbedResponse {
  embedding: number[];
  dimension: number;
}

// ─── Domain types ─────────────────────────────────────────────────────────────

export type ModelStatus = "UNLOADED" | "LOADING" | "READY" | "FAILED";

export type Device = "cpu" | "cuda" | "mps";

/** `gt` decides "same speaker" on score > threshold, `gte` on score >= threshold. */
export type ThresholdComparison = "gt" | "gte";

export type ConfidenceBand = "high" | "medium";

export type ErrorKind =
  | "INVALID_SOURCE"
  | "DOWNLOAD_FAILED"
  | "VALIDATION_FAILED"
  | "MODEL_UNAVAILABLE"
  | "EXTRACTION_ERROR"
  | "TIMEOUT"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL_ERROR";

/**
 * Audio source as it appears in a JSON body. A bare string is a URL when it
 * carries a `scheme://` prefix and a local path otherwise.
 */
export type AudioSourceInput = string | { url: string } | { path: string };

export interface AudioInfo {
  duration: number;
  sample_rate: number;
  channels: number;
}

// ─── HTTP response types ──────────────────────────────────────────────────────

export interface VerificationResultPayload {
  score: number;
  threshold: number;
  is_same_speaker: boolean;
  confidence: ConfidenceBand;
  comparison: ThresholdComparison;
}

export interface VerifyResponse extends VerificationResultPayload {
  success: true;
  inference_time: number;
  audio1_info?: AudioInfo | null;
  audio2_info?: AudioInfo | null;
}

export type BatchItemResult =
  | { candidate: AudioSourceInput; success: true; result: VerificationResultPayload }
  | { candidate: AudioSourceInput; success: false; error: string; error_kind: ErrorKind };

export interface VerifyBatchResponse {
  success: true;
  reference: AudioSourceInput;
  threshold: number;
  results: BatchItemResult[];
}

export interface ExtractEmbeddingResponse {
  success: true;
  embedding: number[];
  dimension: number;
  model_id: string;
  audio_info?: AudioInfo | null;
}

export interface CompareEmbeddingsResponse extends VerificationResultPayload {
  success: true;
  /** Same value as `score`; kept for clients of the first API revision. */
  similarity: number;
}

export interface RequestRecordPayload {
  timestamp: string; // ISO 8601
  endpoint: string;
  method: string;
  status: number;
  duration_ms: number;
  success: boolean;
  error: string | null;
  client_ip: string;
}

export interface RequestStatistics {
  total_requests: number;
  success_count: number;
  error_count: number;
  success_rate: number; // percent, 0–100
  avg_response_time_ms: number;
  recent_requests: RequestRecordPayload[];
}

export interface ModelStatusPayload {
  status: ModelStatus;
  model_id: string;
  device: Device;
  attempt: number;
  last_error: string | null;
  loaded_at: string | null;
}

export interface HealthResponse {
  status: "healthy" | "degraded" | "unhealthy";
  model: ModelStatusPayload;
  uptime_seconds: number;
  statistics: RequestStatistics;
}

export interface ConfigResponse {
  model_id: string;
  device: Device;
  threshold: number;
  comparison: ThresholdComparison;
  max_file_size: number;
  allowed_extensions: string[];
  min_audio_duration: number;
  max_audio_duration: number;
}

export interface ConfigUpdateResponse {
  success: true;
  config: ConfigResponse;
}

export interface CacheStatsResponse {
  entries: number;
  total_bytes: number;
  in_flight: number;
}

export interface CacheClearResponse {
  success: true;
  removed: number;
}

export interface ModelDescriptor {
  id: string;
  name: string;
  language: string;
  description: string;
}

export interface ModelsResponse {
  current_model: string;
  available_models: ModelDescriptor[];
}

export interface ServiceInfoResponse {
  service: string;
  status: "running";
  model: string;
  device: Device;
  version: string;
  endpoints: string[];
}

export interface ErrorResponse {
  success: false;
  error: string;
  error_kind: ErrorKind;
  retryable: boolean;
}
