import {
  cacheClearResponseSchema,
  cacheStatsResponseSchema,
  compareEmbeddingsResponseSchema,
  configResponseSchema,
  configUpdateResponseSchema,
  errorResponseSchema,
  extractEmbeddingResponseSchema,
  healthResponseSchema,
  modelsResponseSchema,
  serviceInfoResponseSchema,
  verifyBatchResponseSchema,
  verifyResponseSchema,
} from "@speakercheck/shared";
import type {
  CompareEmbeddingsRequestFromSchema,
  ConfigUpdateRequestFromSchema,
  ErrorKind,
  ExtractJsonRequestFromSchema,
  VerifyBatchRequestFromSchema,
  VerifyJsonRequestFromSchema,
} from "@speakercheck/shared";
import type { z } from "zod";

export type ApiError = {
  kind: "network" | "validation" | "server";
  message: string;
  status?: number;
  /** Present when the server answered with its error body. */
  errorKind?: ErrorKind;
  retryable?: boolean;
};

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: ApiError };

export type AudioUpload = {
  data: Blob;
  filename: string;
};

export type ApiClientOptions = {
  baseUrl: string;
  fetch?: (input: string, init?: RequestInit) => Promise<Response>;
};

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type RequestOptions = {
  method?: "GET" | "POST" | "DELETE";
  json?: unknown;
  form?: FormData;
  /** Non-2xx statuses whose body still matches the success schema. */
  acceptStatuses?: readonly number[];
};

export function createApiClient(options: ApiClientOptions) {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const fetchImpl = options.fetch ?? ((input: string, init?: RequestInit) => fetch(input, init));

  async function request<T>(path: string, schema: Schema<T>, init: RequestOptions = {}): Promise<ApiResult<T>> {
    const headers: Record<string, string> = {};
    let body: string | FormData | undefined;
    if (init.form) {
      body = init.form;
    } else if (init.json !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(init.json);
    }

    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}${path}`, { method: init.method ?? "GET", headers, body });
    } catch (err) {
      return {
        ok: false,
        error: { kind: "network", message: String(err) },
      };
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      if (!response.ok) {
        return { ok: false, error: { kind: "server", message: `HTTP ${response.status}`, status: response.status } };
      }
      return {
        ok: false,
        error: { kind: "validation", message: `Invalid JSON response: ${String(err)}` },
      };
    }

    if (!response.ok && !(init.acceptStatuses ?? []).includes(response.status)) {
      const failure = errorResponseSchema.safeParse(json);
      return {
        ok: false,
        error: failure.success
          ? {
              kind: "server",
              message: failure.data.error,
              status: response.status,
              errorKind: failure.data.error_kind,
              retryable: failure.data.retryable,
            }
          : { kind: "server", message: `HTTP ${response.status}`, status: response.status },
      };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      return {
        ok: false,
        error: { kind: "validation", message: parsed.error.message },
      };
    }
    return { ok: true, data: parsed.data };
  }

  return {
    getServiceInfo: () => request("/", serviceInfoResponseSchema),

    /** Resolves with the health body for 503 too; inspect `data.status`. */
    getHealth: () => request("/health", healthResponseSchema, { acceptStatuses: [503] }),

    getModels: () => request("/models", modelsResponseSchema),

    verify: (body: VerifyJsonRequestFromSchema) =>
      request("/verify", verifyResponseSchema, { method: "POST", json: body }),

    verifyFiles: (audio1: AudioUpload, audio2: AudioUpload, threshold?: number) => {
      const form = new FormData();
      form.append("audio1", audio1.data, audio1.filename);
      form.append("audio2", audio2.data, audio2.filename);
      if (threshold !== undefined) form.append("threshold", String(threshold));
      return request("/verify", verifyResponseSchema, { method: "POST", form });
    },

    verifyBatch: (body: VerifyBatchRequestFromSchema) =>
      request("/verify_batch", verifyBatchResponseSchema, { method: "POST", json: body }),

    extractEmbedding: (body: ExtractJsonRequestFromSchema) =>
      request("/extract_embedding", extractEmbeddingResponseSchema, { method: "POST", json: body }),

    extractEmbeddingFile: (audio: AudioUpload) => {
      const form = new FormData();
      form.append("audio", audio.data, audio.filename);
      return request("/extract_embedding", extractEmbeddingResponseSchema, { method: "POST", form });
    },

    compareEmbeddings: (body: CompareEmbeddingsRequestFromSchema) =>
      request("/compare_embeddings", compareEmbeddingsResponseSchema, { method: "POST", json: body }),

    getConfig: () => request("/config", configResponseSchema),

    updateConfig: (changes: ConfigUpdateRequestFromSchema) =>
      request("/config", configUpdateResponseSchema, { method: "POST", json: changes }),

    getCacheStats: () => request("/cache", cacheStatsResponseSchema),

    clearCache: () => request("/cache", cacheClearResponseSchema, { method: "DELETE" }),
  };
}

export type ApiClient = ReturnType<typeof createApiClient>;
