import type { AudioInfo } from "@speakercheck/shared";
import type { AudioValidator } from "../lib/audio-validation.js";
import type { ConcurrencyLimiter } from "../lib/concurrency-limiter.js";
import { ExtractionError, InvalidSourceError, type ServiceError, toServiceError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { describeSource, type AudioSource, type SourceResolver } from "./audio-resolver.js";
import type { EmbeddingExtractor } from "./embedding-extractor.js";
import { withResourceScope, type ResourceScope } from "./resource-scope.js";
import { l2Normalize, type Embedding, type VerificationEngine, type VerificationResult } from "./verification-engine.js";

const logger = createLogger("verification");

/** The part of the model coordinator the pipeline needs. */
export interface ModelAccess {
  use<T>(fn: (extractor: EmbeddingExtractor) => Promise<T>): Promise<T>;
}

export interface VerificationServiceDeps {
  resolver: SourceResolver;
  validator: AudioValidator;
  models: ModelAccess;
  engine: VerificationEngine;
  limiter: ConcurrencyLimiter;
  now?: () => number;
}

export interface ExtractedEmbedding {
  embedding: number[];
  modelId: string;
  audioInfo: AudioInfo | null;
}

export interface PairVerification {
  result: VerificationResult;
  inferenceSeconds: number;
  audio1Info: AudioInfo | null;
  audio2Info: AudioInfo | null;
}

export type BatchOutcome =
  | { ok: true; result: VerificationResult }
  | { ok: false; error: ServiceError };

export interface BatchVerification {
  threshold: number;
  outcomes: BatchOutcome[];
  inferenceSeconds: number;
}

/**
 * resolve -> validate -> extract -> compare, with every temporary resource
 * scoped to the call that created it.
 */
export class VerificationService {
  private readonly now: () => number;

  constructor(private readonly deps: VerificationServiceDeps) {
    this.now = deps.now ?? (() => performance.now());
  }

  async verifyPair(
    source1: AudioSource,
    source2: AudioSource,
    options: { threshold?: number } = {},
  ): Promise<PairVerification> {
    return withResourceScope(async (scope) => {
      const startedAt = this.now();
      const [first, second] = await settleBoth(
        this.embedSource(scope, source1),
        this.embedSource(scope, source2),
      );
      const result = this.deps.engine.compare(first.embedding, second.embedding, options.threshold);
      const inferenceSeconds = elapsedSeconds(startedAt, this.now());
      logger.info(
        `verify score=${result.score.toFixed(4)} same=${result.isSameSpeaker} in ${inferenceSeconds}s`,
      );
      return {
        result,
        inferenceSeconds,
        audio1Info: first.audioInfo,
        audio2Info: second.audioInfo,
      };
    });
  }

  /**
   * Compares every candidate against one reference. A failing candidate
   * yields an error outcome in its slot; outcomes keep the input order.
   */
  async verifyBatch(
    reference: AudioSource,
    candidates: readonly AudioSource[],
    options: { threshold?: number } = {},
  ): Promise<BatchVerification> {
    return withResourceScope(async (scope) => {
      const startedAt = this.now();
      const ref = await this.embedSource(scope, reference);

      const outcomes = await Promise.all(
        candidates.map((candidate) => this.verifyCandidate(ref.embedding, candidate, options.threshold)),
      );

      const failed = outcomes.filter((o) => !o.ok).length;
      const inferenceSeconds = elapsedSeconds(startedAt, this.now());
      logger.info(`batch of ${candidates.length}: ${failed} failed, ${inferenceSeconds}s`);
      return {
        threshold: this.deps.engine.resolveThreshold(options.threshold),
        outcomes,
        inferenceSeconds,
      };
    });
  }

  extractEmbedding(source: AudioSource): Promise<ExtractedEmbedding> {
    return withResourceScope((scope) => this.embedSource(scope, source));
  }

  /** Compares two caller-supplied embeddings; no audio or model involved. */
  compareEmbeddings(a: Embedding, b: Embedding, options: { threshold?: number } = {}): VerificationResult {
    try {
      return this.deps.engine.compare(a, b, options.threshold);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new InvalidSourceError(`Invalid embeddings: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  // ─── Internals ───────────────────────────────────────────────────────────────

  private async verifyCandidate(
    reference: Embedding,
    candidate: AudioSource,
    threshold: number | undefined,
  ): Promise<BatchOutcome> {
    try {
      const extracted = await withResourceScope((scope) => this.embedSource(scope, candidate));
      return { ok: true, result: this.deps.engine.compare(reference, extracted.embedding, threshold) };
    } catch (err) {
      const error = toServiceError(err);
      logger.warn(`candidate ${describeSource(candidate)} failed: ${error.message}`);
      return { ok: false, error };
    }
  }

  private async embedSource(scope: ResourceScope, source: AudioSource): Promise<ExtractedEmbedding> {
    const { resolver, validator, models, limiter } = this.deps;
    const resolved = await scope.resolve(resolver, source);
    const audioInfo = await validator.validate(resolved.path);

    const { raw, modelId } = await models.use((extractor) =>
      limiter.run(async () => ({
        raw: await extractor.extract(resolved.path),
        modelId: extractor.modelId,
      })),
    );

    let embedding: number[];
    try {
      embedding = l2Normalize(raw);
    } catch (err) {
      throw new ExtractionError(`Extractor returned an unusable embedding for ${describeSource(source)}`, {
        cause: err,
      });
    }
    return { embedding, modelId, audioInfo };
  }
}

/**
 * Like Promise.all for two tasks, but waits for both before rethrowing,
 * so neither still runs when the caller's scope closes.
 */
async function settleBoth<A, B>(a: Promise<A>, b: Promise<B>): Promise<[A, B]> {
  const [first, second] = await Promise.allSettled([a, b]);
  if (first.status === "rejected") throw first.reason;
  if (second.status === "rejected") throw second.reason;
  return [first.value, second.value];
}

function elapsedSeconds(startedAt: number, endedAt: number): number {
  return Math.round(endedAt - startedAt) / 1000;
}
