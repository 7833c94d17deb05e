import {
  inferenceEmbedResponseSchema,
  inferenceLoadResponseSchema,
  inferenceUnloadResponseSchema,
  type Device,
} from "@speakercheck/shared";
import type { z } from "zod";
import { ExtractionError, TimeoutError, isAbortError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import type { FetchLike } from "./content-cache.js";

const logger = createLogger("extractor");

export interface ModelConfig {
  modelId: string;
  device: Device;
}

/** A loaded model that maps an audio file to a raw embedding vector. */
export interface EmbeddingExtractor {
  readonly modelId: string;
  readonly device: Device;
  readonly dimension: number;
  extract(audioPath: string): Promise<number[]>;
  /** Releases the model wherever it lives. */
  dispose?(): Promise<void>;
}

export type ExtractorLoader = (config: ModelConfig, signal?: AbortSignal) => Promise<EmbeddingExtractor>;

export interface HttpExtractorOptions {
  /** Base URL of the inference service, without a trailing slash. */
  baseUrl: string;
  loadTimeoutMs: number;
  extractTimeoutMs: number;
  fetch?: FetchLike;
}

class InferenceRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "InferenceRequestError";
  }

  /** A 4xx means the service refused this input; asking again will not help. */
  get rejectedInput(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

async function postJson<T>(
  fetchImpl: FetchLike,
  url: string,
  body: unknown,
  timeoutMs: number,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal?: AbortSignal,
): Promise<T> {
  const timeout = AbortSignal.timeout(timeoutMs);
  const response = await fetchImpl(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
  });

  if (!response.ok) {
    const detail = (await response.text()).slice(0, 500);
    throw new InferenceRequestError(
      `inference service returned HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
      response.status,
    );
  }

  let raw: unknown;
  try {
    raw = await response.json();
  } catch {
    throw new InferenceRequestError("inference service returned non-JSON output", response.status);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InferenceRequestError(
      `inference service response has unexpected shape: ${parsed.error.message}`,
      response.status,
    );
  }
  return parsed.data;
}

/**
 * Extractor backed by the inference sidecar, which owns the actual model
 * weights. Audio is passed by path, so the sidecar must see the same
 * filesystem as this service.
 */
export class HttpEmbeddingExtractor implements EmbeddingExtractor {
  constructor(
    readonly modelId: string,
    readonly device: Device,
    readonly dimension: number,
    private readonly options: HttpExtractorOptions,
    private readonly fetchImpl: FetchLike,
  ) {}

  async extract(audioPath: string): Promise<number[]> {
    const { baseUrl, extractTimeoutMs } = this.options;
    let result: z.output<typeof inferenceEmbedResponseSchema>;
    try {
      result = await postJson(
        this.fetchImpl,
        `${baseUrl}/embed`,
        { audio_path: audioPath, model_id: this.modelId },
        extractTimeoutMs,
        inferenceEmbedResponseSchema,
      );
    } catch (err) {
      if (isAbortError(err)) {
        throw new TimeoutError("extract", extractTimeoutMs, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      const retryable = !(err instanceof InferenceRequestError && err.rejectedInput);
      throw new ExtractionError(`Embedding extraction failed: ${reason}`, { cause: err, retryable });
    }

    if (result.dimension !== this.dimension) {
      throw new ExtractionError(
        `Embedding extraction failed: expected dimension ${this.dimension}, got ${result.dimension}`,
      );
    }
    return result.embedding;
  }

  /** Asks the inference service to drop this model from `device`. */
  async dispose(): Promise<void> {
    const { baseUrl, extractTimeoutMs } = this.options;
    try {
      await postJson(
        this.fetchImpl,
        `${baseUrl}/models/unload`,
        { model_id: this.modelId, device: this.device },
        extractTimeoutMs,
        inferenceUnloadResponseSchema,
      );
    } catch (err) {
      if (isAbortError(err)) {
        throw new TimeoutError("model_unload", extractTimeoutMs, { cause: err });
      }
      throw err;
    }
    logger.info(`unloaded model ${this.modelId} from ${this.device}`);
  }
}

/**
 * Disposes a replaced extractor unless `active` still names the same model on
 * the same device: the inference service keys models by that pair, so
 * unloading it would pull the model out from under the replacement.
 */
export async function disposeReplacedExtractor(
  extractor: EmbeddingExtractor,
  active: ModelConfig | null,
): Promise<void> {
  if (active && active.modelId === extractor.modelId && active.device === extractor.device) {
    logger.debug(`keeping ${extractor.modelId} on ${extractor.device} loaded for its replacement`);
    return;
  }
  await extractor.dispose?.();
}

/** Loader that asks the inference service to load `modelId` on `device`. */
export function createHttpExtractorLoader(options: HttpExtractorOptions): ExtractorLoader {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  return async ({ modelId, device }, signal) => {
    logger.info(`loading model ${modelId} on ${device} via ${options.baseUrl}`);
    let loaded: z.output<typeof inferenceLoadResponseSchema>;
    try {
      loaded = await postJson(
        fetchImpl,
        `${options.baseUrl}/models/load`,
        { model_id: modelId, device },
        options.loadTimeoutMs,
        inferenceLoadResponseSchema,
        signal,
      );
    } catch (err) {
      if (isAbortError(err)) {
        throw new TimeoutError("model_load", options.loadTimeoutMs, { cause: err });
      }
      throw err;
    }

    if (loaded.model_id !== modelId) {
      throw new Error(`inference service loaded "${loaded.model_id}" instead of "${modelId}"`);
    }

    return new HttpEmbeddingExtractor(modelId, device, loaded.embedding_dim, options, fetchImpl);
  };
}
