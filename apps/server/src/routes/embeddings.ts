import {
  compareEmbeddingsRequestSchema,
  compareEmbeddingsResponseSchema,
  extractEmbeddingResponseSchema,
  extractJsonRequestSchema,
  type CompareEmbeddingsResponse,
  type ExtractEmbeddingResponse,
} from "@speakercheck/shared";
import { Hono, type Context } from "hono";
import { InvalidSourceError } from "../lib/errors.js";
import { formFile, isMultipart, readFormBody, readJsonBody, validatedPayload } from "../lib/request-body.js";
import type { AudioSource } from "../services/audio-resolver.js";
import type { VerificationService } from "../services/verification-service.js";
import { pickSource, toResultPayload, uploadSource } from "./verify.js";

export interface EmbeddingRouteDeps {
  verification: VerificationService;
}

async function readExtractSource(c: Context): Promise<AudioSource> {
  if (isMultipart(c)) {
    const file = formFile(await readFormBody(c), "audio");
    if (!file) {
      throw new InvalidSourceError("No 'audio' file in request");
    }
    return uploadSource(file);
  }
  const body = await readJsonBody(c, extractJsonRequestSchema);
  return pickSource(body.audio_url, body.audio_path, "Missing audio source");
}

export function createEmbeddingRoutes({ verification }: EmbeddingRouteDeps): Hono {
  const app = new Hono();

  app.post("/extract_embedding", async (c) => {
    const source = await readExtractSource(c);
    const extracted = await verification.extractEmbedding(source);

    const payload: ExtractEmbeddingResponse = {
      success: true,
      embedding: extracted.embedding,
      dimension: extracted.embedding.length,
      model_id: extracted.modelId,
      audio_info: extracted.audioInfo,
    };
    return c.json(validatedPayload(extractEmbeddingResponseSchema, payload, "embedding"));
  });

  // Pure arithmetic: works even while the model is unavailable.
  app.post("/compare_embeddings", async (c) => {
    const body = await readJsonBody(c, compareEmbeddingsRequestSchema);
    const result = verification.compareEmbeddings(body.embedding1, body.embedding2, {
      threshold: body.threshold,
    });

    const payload: CompareEmbeddingsResponse = {
      success: true,
      ...toResultPayload(result),
      similarity: result.score,
    };
    return c.json(validatedPayload(compareEmbeddingsResponseSchema, payload, "comparison"));
  });

  return app;
}
