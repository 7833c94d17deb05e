import {
  CONFIDENCE_MARGIN,
  type ConfidenceBand,
  type ThresholdComparison,
} from "@speakercheck/shared";
import type { DecisionSettings } from "./runtime-settings.js";

export type Embedding = readonly number[];

export interface VerificationResult {
  score: number;
  threshold: number;
  comparison: ThresholdComparison;
  isSameSpeaker: boolean;
  confidence: ConfidenceBand;
}

/**
 * `vector` divided by its largest absolute component, so squaring stays in
 * range for finite input of any magnitude.
 */
function rescaled(vector: Embedding): number[] {
  let largest = 0;
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new RangeError("embedding has zero or non-finite norm");
    }
    largest = Math.max(largest, Math.abs(value));
  }
  if (largest === 0) {
    throw new RangeError("embedding has zero or non-finite norm");
  }
  return vector.map((value) => value / largest);
}

function norm(vector: Embedding): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

/** Unit-length copy of `vector`. Throws RangeError for empty, zero or non-finite input. */
export function l2Normalize(vector: Embedding): number[] {
  if (vector.length === 0) {
    throw new RangeError("embedding is empty");
  }
  const scaled = rescaled(vector);
  const length = norm(scaled);
  return scaled.map((value) => value / length);
}

/**
 * Cosine similarity in [-1, 1]. Inputs need not be normalized.
 * Symmetric: the products and the summation order do not depend on argument order.
 */
export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new RangeError(`embedding dimensions differ: ${a.length} vs ${b.length}`);
  }
  const left = rescaled(a);
  const right = rescaled(b);
  let dot = 0;
  for (let index = 0; index < left.length; index++) {
    dot += (left[index] ?? 0) * (right[index] ?? 0);
  }
  return Math.min(1, Math.max(-1, dot / (norm(left) * norm(right))));
}

export function isSameSpeaker(score: number, threshold: number, comparison: ThresholdComparison): boolean {
  return comparison === "gte" ? score >= threshold : score > threshold;
}

export function confidenceBand(score: number, threshold: number): ConfidenceBand {
  return Math.abs(score - threshold) > CONFIDENCE_MARGIN ? "high" : "medium";
}

/** Pure decision layer: no I/O, no model access. */
export class VerificationEngine {
  constructor(private readonly settings: () => DecisionSettings) {}

  /** The per-call threshold when given, the configured one otherwise. */
  resolveThreshold(override?: number): number {
    return override ?? this.settings().threshold;
  }

  compare(a: Embedding, b: Embedding, threshold?: number): VerificationResult {
    const current = this.settings();
    const effectiveThreshold = threshold ?? current.threshold;
    const score = cosineSimilarity(a, b);
    return {
      score,
      threshold: effectiveThreshold,
      comparison: current.comparison,
      isSameSpeaker: isSameSpeaker(score, effectiveThreshold, current.comparison),
      confidence: confidenceBand(score, effectiveThreshold),
    };
  }
}
