import { randomUUID } from "node:crypto";
import { SUPPORTED_AUDIO_FORMATS } from "@speakercheck/shared";

const supportedFormats: ReadonlySet<string> = new Set(SUPPORTED_AUDIO_FORMATS);

/** Lowercase extension without the dot, or "" when there is none. */
export function getExtension(filename: string): string {
  const base = getBasename(filename);
  const idx = base.lastIndexOf(".");
  return idx > 0 ? base.slice(idx + 1).toLowerCase() : "";
}

export function isAllowedAudioFile(filename: string): boolean {
  return supportedFormats.has(getExtension(filename));
}

/**
 * Reduces a client-supplied name to a safe ASCII stem: path components are
 * dropped, whitespace becomes "_", anything outside [A-Za-z0-9._-] is removed
 * and leading dots/underscores are stripped.
 */
export function sanitizeFilename(filename: string): string {
  return getBasename(filename)
    .normalize("NFKD")
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
}

/**
 * Collision-resistant scratch file name that keeps the (allow-listed) extension:
 * `<uuid>_<stem>.<ext>`.
 */
export function scratchFileName(originalName: string): string {
  const extension = getExtension(originalName);
  const base = getBasename(originalName);
  const stemSource = extension ? base.slice(0, base.length - extension.length - 1) : base;
  const stem = sanitizeFilename(stemSource) || "upload";
  return extension ? `${randomUUID()}_${stem}.${extension}` : `${randomUUID()}_${stem}`;
}

function getBasename(filePath: string): string {
  return filePath.slice(Math.max(filePath.lastIndexOf("/"), filePath.lastIndexOf("\\")) + 1);
}
