import { canTransitionModel, type ModelStatus, type ModelStatusPayload } from "@speakercheck/shared";
import { sleep as defaultSleep, type BackoffPolicy } from "../lib/backoff.js";
import { InternalError, ModelUnavailableError, TimeoutError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { withTimeout } from "../lib/timeout.js";
import type { ModelConfig } from "./embedding-extractor.js";

const logger = createLogger("model");

export type ModelState<H> =
  | { status: "UNLOADED" }
  | { status: "LOADING"; attempt: number; startedAt: number }
  | { status: "READY"; handle: H; attempts: number; loadedAt: number }
  | { status: "FAILED"; error: Error; attempt: number };

export interface ModelCoordinatorOptions<H> {
  config: ModelConfig;
  /** `signal` is aborted when the attempt times out or the coordinator shuts down. */
  load: (config: ModelConfig, signal: AbortSignal) => Promise<H>;
  /** Called once a replaced handle has no more users. */
  dispose?: (handle: H) => Promise<void>;
  maxAttempts: number;
  backoff: BackoffPolicy;
  loadTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Owns the single model handle of the process.
 *
 * At most one load runs at a time; every caller that arrives while it runs
 * awaits the same promise and sees the same outcome. A failed load is retried
 * with backoff up to `maxAttempts`, after which callers get
 * ModelUnavailableError and the next call starts a fresh series.
 *
 * reload() swaps the configuration. Work already holding the old handle
 * through use() finishes on it, and the old handle is disposed afterwards.
 */
export class ModelLifecycleCoordinator<H> {
  private state: ModelState<H> = { status: "UNLOADED" };
  private config: ModelConfig;
  private loadPromise: Promise<H> | null = null;
  private generation = 0;
  private lastError: Error | null = null;
  private readonly users = new Map<H, number>();
  private readonly retired = new Set<H>();
  private reloadQueue: Promise<unknown> = Promise.resolve();
  private attempt: AbortController | null = null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: ModelCoordinatorOptions<H>) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.config = { ...options.config };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get status(): ModelStatus {
    return this.state.status;
  }

  get currentState(): ModelState<H> {
    return this.state;
  }

  get currentConfig(): ModelConfig {
    return { ...this.config };
  }

  /** Resolves with the ready handle, starting or joining a load if needed. */
  ensureReady(): Promise<H> {
    if (this.state.status === "READY") {
      return Promise.resolve(this.state.handle);
    }
    return this.loadPromise ?? this.startLoad();
  }

  /**
   * Runs `fn` with the ready handle. The handle stays alive until `fn`
   * settles even if a reload replaces it meanwhile.
   */
  async use<T>(fn: (handle: H) => Promise<T>): Promise<T> {
    const handle = await this.ensureReady();
    this.users.set(handle, (this.users.get(handle) ?? 0) + 1);
    try {
      return await fn(handle);
    } finally {
      const remaining = (this.users.get(handle) ?? 1) - 1;
      if (remaining > 0) {
        this.users.set(handle, remaining);
      } else {
        this.users.delete(handle);
        if (this.retired.has(handle)) {
          this.retired.delete(handle);
          await this.disposeHandle(handle);
        }
      }
    }
  }

  /**
   * Applies `changes` and loads the model again. Reloads are serialized;
   * one requested while a load is running starts after that load settles.
   */
  reload(changes: Partial<ModelConfig> = {}): Promise<H> {
    const run = async (): Promise<H> => {
      while (this.loadPromise) {
        await Promise.allSettled([this.loadPromise]);
      }
      // No await from here on: nothing may start a load in between.
      this.config = { ...this.config, ...changes };
      this.generation++;
      const previous = this.detach();
      logger.info(`reloading ${this.config.modelId} on ${this.config.device}`);
      const loading = this.startLoad();
      if (previous) {
        void this.retire(previous.handle);
      }
      return loading;
    };

    const next = this.reloadQueue.then(run);
    this.reloadQueue = Promise.allSettled([next]);
    return next;
  }

  /** Drops the current handle and abandons any running load. */
  async shutdown(): Promise<void> {
    this.generation++;
    this.loadPromise = null;
    this.attempt?.abort(new Error("model coordinator shut down"));
    const previous = this.detach();
    if (previous) {
      await this.retire(previous.handle);
    }
  }

  describe(): ModelStatusPayload {
    const { modelId, device } = this.config;
    const base = { model_id: modelId, device, last_error: this.lastError?.message ?? null };
    switch (this.state.status) {
      case "UNLOADED":
        return { ...base, status: "UNLOADED", attempt: 0, loaded_at: null };
      case "LOADING":
        return { ...base, status: "LOADING", attempt: this.state.attempt, loaded_at: null };
      case "READY":
        return {
          ...base,
          status: "READY",
          attempt: this.state.attempts,
          loaded_at: new Date(this.state.loadedAt).toISOString(),
        };
      case "FAILED":
        return { ...base, status: "FAILED", attempt: this.state.attempt, loaded_at: null };
    }
  }

  // ─── Internals ───────────────────────────────────────────────────────────────

  private startLoad(): Promise<H> {
    const pending: Promise<H> = this.runLoad({ ...this.config }, this.generation).finally(() => {
      if (this.loadPromise === pending) {
        this.loadPromise = null;
      }
    });
    this.loadPromise = pending;
    return pending;
  }

  private async runLoad(config: ModelConfig, generation: number): Promise<H> {
    const { maxAttempts, backoff } = this.options;
    let lastError: Error = new Error("model load was not attempted");

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.transition({ status: "LOADING", attempt, startedAt: this.now() });
      logger.info(`loading ${config.modelId} on ${config.device} (attempt ${attempt}/${maxAttempts})`);

      let handle: H;
      try {
        handle = await this.loadOnce(config);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (generation !== this.generation) {
          throw this.cancelled(config, attempt, lastError);
        }
        this.lastError = lastError;
        this.transition({ status: "FAILED", error: lastError, attempt });
        logger.warn(`load attempt ${attempt}/${maxAttempts} failed: ${lastError.message}`);
        if (attempt < maxAttempts) {
          await this.sleep(backoff(attempt));
          if (generation !== this.generation) {
            throw this.cancelled(config, attempt, lastError);
          }
        }
        continue;
      }

      if (generation !== this.generation) {
        await this.disposeHandle(handle);
        throw this.cancelled(config, attempt, new Error("model load was superseded"));
      }

      this.lastError = null;
      this.transition({ status: "READY", handle, attempts: attempt, loadedAt: this.now() });
      logger.info(`${config.modelId} ready after ${attempt} attempt(s)`);
      return handle;
    }

    logger.error(`${config.modelId} unavailable after ${maxAttempts} attempt(s)`);
    throw new ModelUnavailableError(config.modelId, maxAttempts, { cause: lastError });
  }

  /**
   * Runs one load attempt. On timeout the attempt's signal is aborted and the
   * call does not return until the abandoned load settles, so a retry never
   * overlaps it. A handle that arrives late is disposed.
   */
  private async loadOnce(config: ModelConfig): Promise<H> {
    const { load, loadTimeoutMs } = this.options;
    const controller = new AbortController();
    this.attempt = controller;
    try {
      const loading = load(config, controller.signal);
      if (loadTimeoutMs === undefined) {
        return await loading;
      }
      try {
        return await withTimeout(loading, loadTimeoutMs, () => new TimeoutError("model_load", loadTimeoutMs));
      } catch (err) {
        controller.abort(err);
        const [late] = await Promise.allSettled([loading]);
        if (late?.status === "fulfilled") {
          logger.warn(`discarding ${config.modelId} handle that loaded after the attempt timed out`);
          await this.disposeHandle(late.value);
        }
        throw err;
      }
    } finally {
      if (this.attempt === controller) {
        this.attempt = null;
      }
    }
  }

  private cancelled(config: ModelConfig, attempt: number, cause: Error): ModelUnavailableError {
    return new ModelUnavailableError(config.modelId, attempt, { cause });
  }

  private detach(): { handle: H } | null {
    const previous = this.state.status === "READY" ? { handle: this.state.handle } : null;
    if (this.state.status !== "UNLOADED") {
      this.transition({ status: "UNLOADED" });
    }
    return previous;
  }

  private async retire(handle: H): Promise<void> {
    if (this.users.has(handle)) {
      this.retired.add(handle);
      return;
    }
    this.retired.delete(handle);
    await this.disposeHandle(handle);
  }

  private async disposeHandle(handle: H): Promise<void> {
    if (!this.options.dispose) return;
    try {
      await this.options.dispose(handle);
    } catch (err) {
      logger.error("failed to dispose model handle", err);
    }
  }

  private transition(next: ModelState<H>): void {
    if (!canTransitionModel(this.state.status, next.status)) {
      throw new InternalError(`Invalid model transition ${this.state.status} -> ${next.status}`);
    }
    this.state = next;
  }
}
