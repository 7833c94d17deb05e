import { describe, expect, it } from "vitest";
import {
  audioSourceInputSchema,
  compareEmbeddingsRequestSchema,
  configUpdateRequestSchema,
  extractEmbeddingResponseSchema,
  extractJsonRequestSchema,
  formThresholdSchema,
  healthResponseSchema,
  inferenceEmbedResponseSchema,
  inferenceLoadResponseSchema,
  verifyBatchRequestSchema,
  verifyBatchResponseSchema,
  verifyJsonRequestSchema,
  errorResponseSchema,
  type HealthResponseFromSchema,
  type VerifyBatchRequestFromSchema,
  type VerifyJsonRequestFromSchema,
} from "./index.js";

describe("inferenceLoadResponseSchema", () => {
  it("accepts a valid load payload", () => {
    const parsed = inferenceLoadResponseSchema.parse({
      model_id: "iic/speech_campplus_sv_zh-cn_16k-common",
      device: "cpu",
      embedding_dim: 192,
    });
    expect(parsed.embedding_dim).toBe(192);
  });

  it("rejects a non-positive embedding dimension", () => {
    const parsed = inferenceLoadResponseSchema.safeParse({
      model_id: "m",
      device: "cpu",
      embedding_dim: 0,
    });
    expect(parsed.success).toBe(false);
  });
});

describe("inferenceEmbedResponseSchema", () => {
  it("accepts an embedding whose length matches its dimension", () => {
    const parsed = inferenceEmbedResponseSchema.parse({ embedding: [0.6, 0.8], dimension: 2 });
    expect(parsed.embedding).toEqual([0.6, 0.8]);
  });

  it("rejects a dimension that disagrees with the vector length", () => {
    const parsed = inferenceEmbedResponseSchema.safeParse({ embedding: [0.6, 0.8], dimension: 3 });
    expect(parsed.success).toBe(false);
  });

  it("rejects an empty embedding", () => {
    const parsed = inferenceEmbedResponseSchema.safeParse({ embedding: [], dimension: 1 });
    expect(parsed.success).toBe(false);
  });
});

describe("audioSourceInputSchema", () => {
  it("accepts a bare string", () => {
    expect(audioSourceInputSchema.parse("https://example.test/a.wav")).toBe(
      "https://example.test/a.wav",
    );
  });

  it("accepts url and path objects", () => {
    expect(audioSourceInputSchema.parse({ url: "https://example.test/a.wav" })).toEqual({
      url: "https://example.test/a.wav",
    });
    expect(audioSourceInputSchema.parse({ path: "/data/a.wav" })).toEqual({ path: "/data/a.wav" });
  });

  it("rejects an object carrying both url and path", () => {
    const result = audioSourceInputSchema.safeParse({ url: "https://x.test/a", path: "/a" });
    expect(result.success).toBe(false);
  });

  it("rejects an empty string", () => {
    expect(audioSourceInputSchema.safeParse("").success).toBe(false);
  });
});

describe("verifyJsonRequestSchema", () => {
  it("accepts a pair of URLs", () => {
    const parsed: VerifyJsonRequestFromSchema = verifyJsonRequestSchema.parse({
      audio1_url: "https://example.test/1.wav",
      audio2_url: "https://example.test/2.wav",
    });
    expect(parsed.audio1_url).toBe("https://example.test/1.wav");
  });

  it("accepts a URL mixed with a path and a threshold", () => {
    const parsed = verifyJsonRequestSchema.parse({
      audio1_url: "https://example.test/1.wav",
      audio2_path: "/data/2.wav",
      threshold: 0.7,
    });
    expect(parsed.threshold).toBe(0.7);
    expect(parsed.audio2_path).toBe("/data/2.wav");
  });

  it("rejects a request missing the second source", () => {
    const result = verifyJsonRequestSchema.safeParse({ audio1_path: "/data/1.wav" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(
        "Missing audio sources. Provide either files, URLs, or paths",
      );
    }
  });

  it("rejects a threshold outside [-1, 1]", () => {
    const result = verifyJsonRequestSchema.safeParse({
      audio1_path: "/a.wav",
      audio2_path: "/b.wav",
      threshold: 1.5,
    });
    expect(result.success).toBe(false);
  });
});

describe("formThresholdSchema", () => {
  it("coerces a numeric form field", () => {
    expect(formThresholdSchema.parse("0.7")).toBe(0.7);
  });

  it("rejects a non-numeric form field", () => {
    expect(formThresholdSchema.safeParse("high").success).toBe(false);
  });
});

describe("verifyBatchRequestSchema", () => {
  it("accepts mixed candidate shapes", () => {
    const parsed: VerifyBatchRequestFromSchema = verifyBatchRequestSchema.parse({
      reference: "/data/ref.wav",
      candidates: ["https://example.test/c1.wav", { path: "/data/c2.wav" }],
    });
    expect(parsed.candidates).toHaveLength(2);
  });

  it("rejects an empty candidate list", () => {
    const result = verifyBatchRequestSchema.safeParse({ reference: "/ref.wav", candidates: [] });
    expect(result.success).toBe(false);
  });
});

describe("extractJsonRequestSchema", () => {
  it("accepts an audio path", () => {
    expect(extractJsonRequestSchema.parse({ audio_path: "/a.wav" }).audio_path).toBe("/a.wav");
  });

  it("rejects a body with no source", () => {
    expect(extractJsonRequestSchema.safeParse({}).success).toBe(false);
  });
});

describe("compareEmbeddingsRequestSchema", () => {
  it("accepts two vectors of the same dimension", () => {
    const parsed = compareEmbeddingsRequestSchema.parse({
      embedding1: [1, 0],
      embedding2: [0, 1],
    });
    expect(parsed.embedding2).toEqual([0, 1]);
  });

  it("rejects vectors of different dimension", () => {
    const result = compareEmbeddingsRequestSchema.safeParse({
      embedding1: [1, 0],
      embedding2: [0, 1, 0],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["embedding2"]);
    }
  });
});

describe("configUpdateRequestSchema", () => {
  it("accepts a partial update", () => {
    expect(configUpdateRequestSchema.parse({ threshold: 0.6 })).toEqual({ threshold: 0.6 });
  });

  it("rejects unknown keys", () => {
    expect(configUpdateRequestSchema.safeParse({ max_file_size: 10 }).success).toBe(false);
  });

  it("rejects an unknown device", () => {
    expect(configUpdateRequestSchema.safeParse({ device: "tpu" }).success).toBe(false);
  });
});

describe("verifyBatchResponseSchema", () => {
  it("accepts mixed per-item outcomes", () => {
    const parsed = verifyBatchResponseSchema.parse({
      success: true,
      reference: "/ref.wav",
      threshold: 0.5,
      results: [
        {
          candidate: "/c1.wav",
          success: true,
          result: {
            score: 0.9,
            threshold: 0.5,
            is_same_speaker: true,
            confidence: "high",
            comparison: "gt",
          },
        },
        {
          candidate: "/missing.wav",
          success: false,
          error: "File not found: /missing.wav",
          error_kind: "INVALID_SOURCE",
        },
      ],
    });
    expect(parsed.results.map((item) => item.success)).toEqual([true, false]);
  });

  it("rejects a failed item without an error kind", () => {
    const result = verifyBatchResponseSchema.safeParse({
      success: true,
      reference: "/ref.wav",
      threshold: 0.5,
      results: [{ candidate: "/c.wav", success: false, error: "boom" }],
    });
    expect(result.success).toBe(false);
  });
});

describe("extractEmbeddingResponseSchema", () => {
  it("rejects a dimension that disagrees with the embedding", () => {
    const result = extractEmbeddingResponseSchema.safeParse({
      success: true,
      embedding: [1, 0],
      dimension: 192,
      model_id: "m",
    });
    expect(result.success).toBe(false);
  });
});

describe("healthResponseSchema", () => {
  const validHealth = {
    status: "healthy",
    model: {
      status: "READY",
      model_id: "iic/speech_campplus_sv_zh-cn_16k-common",
      device: "cpu",
      attempt: 1,
      last_error: null,
      loaded_at: "2026-02-18T10:00:00.000Z",
    },
    uptime_seconds: 12,
    statistics: {
      total_requests: 2,
      success_count: 1,
      error_count: 1,
      success_rate: 50,
      avg_response_time_ms: 12.5,
      recent_requests: [
        {
          timestamp: "2026-02-18T10:00:01.000Z",
          endpoint: "/verify",
          method: "POST",
          status: 400,
          duration_ms: 5,
          success: false,
          error: "File not found: /a.wav",
          client_ip: "127.0.0.1",
        },
      ],
    },
  };

  it("accepts a valid health payload", () => {
    const parsed: HealthResponseFromSchema = healthResponseSchema.parse(validHealth);
    expect(parsed.model.status).toBe("READY");
    expect(parsed.statistics.recent_requests).toHaveLength(1);
  });

  it("rejects an unknown model status", () => {
    const result = healthResponseSchema.safeParse({
      ...validHealth,
      model: { ...validHealth.model, status: "WARMING" },
    });
    expect(result.success).toBe(false);
  });

  it("rejects a success rate above 100", () => {
    const result = healthResponseSchema.safeParse({
      ...validHealth,
      statistics: { ...validHealth.statistics, success_rate: 150 },
    });
    expect(result.success).toBe(false);
  });
});

describe("errorResponseSchema", () => {
  it("accepts a typed error body", () => {
    const parsed = errorResponseSchema.parse({
      success: false,
      error: "Model unavailable",
      error_kind: "MODEL_UNAVAILABLE",
      retryable: true,
    });
    expect(parsed.retryable).toBe(true);
  });

  it("rejects an unknown error kind", () => {
    const result = errorResponseSchema.safeParse({
      success: false,
      error: "x",
      error_kind: "OOPS",
      retryable: false,
    });
    expect(result.success).toBe(false);
  });
});
