import {
  verifyBatchRequestSchema,
  verifyBatchResponseSchema,
  verifyJsonRequestSchema,
  verifyResponseSchema,
  formThresholdSchema,
  type BatchItemResult,
  type VerificationResultPayload,
  type VerifyBatchResponse,
  type VerifyResponse,
} from "@speakercheck/shared";
import { Hono, type Context } from "hono";
import { InvalidSourceError } from "../lib/errors.js";
import {
  formFile,
  formString,
  formatZodError,
  isMultipart,
  readFormBody,
  readJsonBody,
  validatedPayload,
} from "../lib/request-body.js";
import { toAudioSource, type AudioSource } from "../services/audio-resolver.js";
import type { VerificationResult } from "../services/verification-engine.js";
import type { VerificationService } from "../services/verification-service.js";

export interface VerifyRouteDeps {
  verification: VerificationService;
}

interface PairRequest {
  audio1: AudioSource;
  audio2: AudioSource;
  threshold?: number;
}

export function toResultPayload(result: VerificationResult): VerificationResultPayload {
  return {
    score: result.score,
    threshold: result.threshold,
    is_same_speaker: result.isSameSpeaker,
    confidence: result.confidence,
    comparison: result.comparison,
  };
}

export function uploadSource(file: File): AudioSource {
  return { kind: "upload", filename: file.name, content: file.stream() };
}

/** URL wins over path when both are given. */
export function pickSource(url: string | undefined, path: string | undefined, message: string): AudioSource {
  if (url !== undefined) return { kind: "url", url };
  if (path !== undefined) return { kind: "path", path };
  throw new InvalidSourceError(message);
}

function parseFormThreshold(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const parsed = formThresholdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSourceError(`threshold: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

async function readPairRequest(c: Context): Promise<PairRequest> {
  if (isMultipart(c)) {
    const body = await readFormBody(c);
    const audio1 = formFile(body, "audio1");
    const audio2 = formFile(body, "audio2");
    if (!audio1 || !audio2) {
      throw new InvalidSourceError("Both 'audio1' and 'audio2' files are required");
    }
    return {
      audio1: uploadSource(audio1),
      audio2: uploadSource(audio2),
      threshold: parseFormThreshold(formString(body, "threshold")),
    };
  }

  const missing = "Missing audio sources. Provide either files, URLs, or paths";
  const body = await readJsonBody(c, verifyJsonRequestSchema);
  return {
    audio1: pickSource(body.audio1_url, body.audio1_path, missing),
    audio2: pickSource(body.audio2_url, body.audio2_path, missing),
    threshold: body.threshold,
  };
}

/**
 * POST /verify: same speaker or not, for two uploads, URLs or local paths.
 * POST /verify_batch: one reference against many candidates.
 */
export function createVerifyRoutes({ verification }: VerifyRouteDeps): Hono {
  const app = new Hono();

  app.post("/verify", async (c) => {
    const request = await readPairRequest(c);
    const outcome = await verification.verifyPair(request.audio1, request.audio2, {
      threshold: request.threshold,
    });

    const payload: VerifyResponse = {
      success: true,
      ...toResultPayload(outcome.result),
      inference_time: outcome.inferenceSeconds,
      audio1_info: outcome.audio1Info,
      audio2_info: outcome.audio2Info,
    };
    return c.json(validatedPayload(verifyResponseSchema, payload, "verification"));
  });

  app.post("/verify_batch", async (c) => {
    const body = await readJsonBody(c, verifyBatchRequestSchema);
    const batch = await verification.verifyBatch(
      toAudioSource(body.reference),
      body.candidates.map(toAudioSource),
      { threshold: body.threshold },
    );

    const results = batch.outcomes.map((outcome, index): BatchItemResult => {
      const candidate = body.candidates[index] ?? "";
      return outcome.ok
        ? { candidate, success: true, result: toResultPayload(outcome.result) }
        : { candidate, success: false, error: outcome.error.message, error_kind: outcome.error.kind };
    });

    const payload: VerifyBatchResponse = {
      success: true,
      reference: body.reference,
      threshold: batch.threshold,
      results,
    };
    return c.json(validatedPayload(verifyBatchResponseSchema, payload, "batch verification"));
  });

  return app;
}
