import type { ModelStatus } from "./types.js";

/**
 * Valid state transitions for the shared embedding model.
 *
 * - UNLOADED → LOADING (first use, eager start-up, or reload)
 * - LOADING → READY | FAILED (attempt outcome)
 * - FAILED → LOADING (next retry attempt, or a later ensure-ready call)
 * - READY → UNLOADED (reload drops the current handle before loading again)
 * - LOADING / FAILED → UNLOADED (shutdown or reload)
 */
export const VALID_MODEL_TRANSITIONS: Readonly<
  Record<ModelStatus, ReadonlyArray<ModelStatus>>
> = {
  UNLOADED: ["LOADING"],
  LOADING: ["READY", "FAILED", "UNLOADED"],
  READY: ["UNLOADED"],
  FAILED: ["LOADING", "UNLOADED"],
};

/**
 * Returns true if transitioning from `from` to `to` is a valid state change.
 */
export function canTransitionModel(from: ModelStatus, to: ModelStatus): boolean {
  return VALID_MODEL_TRANSITIONS[from].includes(to);
}
