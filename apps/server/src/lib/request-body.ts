import type { Context } from "hono";
import type { z } from "zod";
import { InternalError, InvalidSourceError, ServiceError } from "./errors.js";

type FormBody = Record<string, string | File | (string | File)[]>;

export function isMultipart(c: Context): boolean {
  return (c.req.header("content-type") ?? "").toLowerCase().startsWith("multipart/form-data");
}

/** bodyLimit's own error; it must reach the middleware to become a 413. */
export function isBodyLimitError(err: unknown): boolean {
  return err instanceof Error && err.name === "BodyLimitError";
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parses and validates a JSON body. Any failure is the caller's fault (400). */
export async function readJsonBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    if (err instanceof ServiceError || isBodyLimitError(err)) throw err;
    throw new InvalidSourceError("Request body must be valid JSON", { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSourceError(formatZodError(parsed.error));
  }
  return parsed.data;
}

export async function readFormBody(c: Context): Promise<FormBody> {
  try {
    return await c.req.parseBody();
  } catch (err) {
    if (err instanceof ServiceError || isBodyLimitError(err)) throw err;
    throw new InvalidSourceError("Malformed multipart body", { cause: err });
  }
}

/** The single file under `field`, or undefined. */
export function formFile(body: FormBody, field: string): File | undefined {
  const value = body[field];
  return value instanceof File ? value : undefined;
}

export function formString(body: FormBody, field: string): string | undefined {
  const value = body[field];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Runs an outgoing payload through its schema. A mismatch is a server bug,
 * reported as a 500 instead of sending malformed data.
 */
export function validatedPayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new InternalError(`Internal error: invalid ${what} data (${formatZodError(parsed.error)})`);
  }
  return parsed.data;
}
