/** Decision threshold used when neither the config nor the request sets one. */
export const SIMILARITY_THRESHOLD_DEFAULT = 0.5;

/**
 * Distance from the threshold beyond which a decision is reported as "high"
 * confidence. A fixed heuristic, not a statistical guarantee.
 */
export const CONFIDENCE_MARGIN = 0.2;

/** Audio file extensions accepted for uploads. */
export const SUPPORTED_AUDIO_FORMATS = ["wav", "mp3", "flac", "m4a", "ogg", "wma", "aac"] as const;

/** Default base URL for the embedding inference service. */
export const INFERENCE_SERVICE_BASE_URL_DEFAULT = "http://localhost:5001";

export const MODEL_ID_DEFAULT = "iic/speech_campplus_sv_zh-cn_16k-common";

/** Embedding size of the default CAM++ model. Reported by the service at load time. */
export const EMBEDDING_DIMENSION_DEFAULT = 192;

export const DEVICES = ["cpu", "cuda", "mps"] as const;

export const AVAILABLE_MODELS = [
  {
    id: "iic/speech_campplus_sv_zh-cn_16k-common",
    name: "CAM++ Chinese",
    language: "Chinese",
    description: "CAM++ model for Chinese speakers",
  },
  {
    id: "iic/speech_eres2net_sv_zh-cn_16k-common",
    name: "ERes2Net Chinese",
    language: "Chinese",
    description: "ERes2Net model for Chinese speakers",
  },
  {
    id: "iic/speech_eres2net_sv_en_voxceleb_16k",
    name: "ERes2Net English",
    language: "English",
    description: "ERes2Net model trained on VoxCeleb",
  },
] as const;

export const SERVICE_NAME = "speakercheck";

export const SERVICE_VERSION = "0.1.0";
