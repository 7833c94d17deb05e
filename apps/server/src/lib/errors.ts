import type { ErrorKind, ErrorResponse } from "@speakercheck/shared";

type ErrorStatus = 400 | 413 | 500 | 502 | 503 | 504;

/**
 * Base class for every failure the service reports on purpose.
 * `retryable` tells clients "try again" apart from "fix your input".
 */
export class ServiceError extends Error {
  readonly kind: ErrorKind;
  readonly status: ErrorStatus;
  readonly retryable: boolean;

  constructor(
    kind: ErrorKind,
    status: ErrorStatus,
    retryable: boolean,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.status = status;
    this.retryable = retryable;
  }

  toResponse(): ErrorResponse {
    return {
      success: false,
      error: this.message,
      error_kind: this.kind,
      retryable: this.retryable,
    };
  }
}

/** Bad input shape or type: unknown extension, unsupported scheme, missing file. */
export class InvalidSourceError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_SOURCE", 400, false, message, options);
  }
}

/** Audio resolved fine but breaks a duration or format constraint. */
export class ValidationFailedError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("VALIDATION_FAILED", 400, false, message, options);
  }
}

export class DownloadFailedError extends ServiceError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super("DOWNLOAD_FAILED", 502, true, `Failed to download audio from URL: ${url} (${reason})`, options);
    this.url = url;
  }
}

export type TimedOperation = "download" | "probe" | "extract" | "model_load" | "model_unload";

export class TimeoutError extends ServiceError {
  readonly operation: TimedOperation;
  readonly timeoutMs: number;

  constructor(operation: TimedOperation, timeoutMs: number, options?: { cause?: unknown }) {
    super("TIMEOUT", 504, true, `${operation} timed out after ${timeoutMs}ms`, options);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** Model loading exhausted its retries. The process keeps running. */
export class ModelUnavailableError extends ServiceError {
  readonly attempts: number;

  constructor(modelId: string, attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(
      "MODEL_UNAVAILABLE",
      503,
      true,
      `Model "${modelId}" unavailable after ${attempts} attempt(s)${reason}`,
      options,
    );
    this.attempts = attempts;
  }
}

/** Retryable unless the inference service rejected the audio itself. */
export class ExtractionError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super("EXTRACTION_ERROR", 500, options?.retryable ?? true, message, { cause: options?.cause });
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(limitBytes: number) {
    super("PAYLOAD_TOO_LARGE", 413, false, `File too large (limit ${limitBytes} bytes)`);
  }
}

export class InternalError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", 500, false, message, options);
  }
}

/** Wraps anything thrown into a ServiceError, keeping typed errors as they are. */
export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(message, { cause: err });
}

/** True for the abort reasons `AbortSignal.timeout()` and `AbortController.abort()` produce. */
export function isAbortError(err: unknown): boolean {
  if (err instanceof ServiceError) {
    return false;
  }
  if (typeof err !== "object" || err === null || !("name" in err)) {
    return false;
  }
  return err.name === "TimeoutError" || err.name === "AbortError";
}
