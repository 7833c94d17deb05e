export interface BackoffConfig {
  kind: "linear" | "exponential";
  baseMs: number;
  maxMs: number;
}

/** Delay before retry number `attempt` (1-based: the wait after the first failure is attempt 1). */
export type BackoffPolicy = (attempt: number) => number;

/**
 * Builds a monotonically non-decreasing backoff policy.
 * linear: base * attempt; exponential: base * 2^(attempt - 1). Both capped at maxMs.
 */
export function createBackoffPolicy(config: BackoffConfig): BackoffPolicy {
  const { kind, baseMs, maxMs } = config;
  return (attempt) => {
    const step = Math.max(1, Math.floor(attempt));
    const raw = kind === "linear" ? baseMs * step : baseMs * 2 ** (step - 1);
    return Math.min(raw, maxMs);
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
