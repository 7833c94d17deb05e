import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import { TimeoutError } from "./errors.js";

const execFileAsync = promisify(execFile);

const PROBE_TIMEOUT_MS = 15_000;

// ─── Internal ffprobe output schema ───────────────────────────────────────────

const ffprobeStreamSchema = z.object({
  codec_type: z.string(),
  sample_rate: z.string().optional(),
  channels: z.number().optional(),
});

const ffprobeFormatSchema = z.object({
  format_name: z.string(),
  duration: z.string(),
  size: z.string(),
});

const ffprobeOutputSchema = z.object({
  streams: z.array(ffprobeStreamSchema),
  format: ffprobeFormatSchema,
});

// ─── Public interface ──────────────────────────────────────────────────────────

export interface AudioMetadata {
  durationSeconds: number;
  sampleRate: number;
  channels: number;
  /** ffprobe's container name, e.g. "wav" or "mov,mp4,m4a,3gp,3g2,mj2". */
  formatName: string;
  fileSizeBytes: number;
}

export type AudioProbe = (filePath: string) => Promise<AudioMetadata>;

/**
 * Probes an audio file with ffprobe and returns parsed metadata.
 * Throws if ffprobe is not available, the file is unreadable, or the output
 * cannot be parsed into valid AudioMetadata.
 *
 * The container is taken from ffprobe itself, not the file name: cached
 * downloads carry a neutral `.audio` extension.
 */
export async function probeAudioFile(filePath: string): Promise<AudioMetadata> {
  let stdout: string;
  try {
    ({ stdout } = await execFileAsync(
      "ffprobe",
      ["-v", "quiet", "-print_format", "json", "-show_format", "-show_streams", filePath],
      { timeout: PROBE_TIMEOUT_MS },
    ));
  } catch (cause) {
    throw probeFailure(cause, filePath);
  }

  return parseProbeOutput(stdout, filePath);
}

/** A killed ffprobe ran out of time; anything else means it could not read the file. */
export function probeFailure(cause: unknown, filePath: string): Error {
  if (cause instanceof Error && "killed" in cause && cause.killed === true) {
    return new TimeoutError("probe", PROBE_TIMEOUT_MS, { cause });
  }
  return new Error(`ffprobe failed for "${filePath}": ${String(cause)}`);
}

/** Parses ffprobe's JSON output. Split out so it can be tested without ffprobe installed. */
export function parseProbeOutput(stdout: string, filePath: string): AudioMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new Error(`ffprobe returned non-JSON output for "${filePath}"`);
  }

  const parsed = ffprobeOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `ffprobe output has unexpected shape for "${filePath}": ${parsed.error.message}`,
    );
  }

  const { streams, format } = parsed.data;

  const audioStream = streams.find((s) => s.codec_type === "audio");
  if (!audioStream) {
    throw new Error(`No audio stream found in "${filePath}"`);
  }

  const durationSeconds = parseFloat(format.duration);
  if (!isFinite(durationSeconds) || durationSeconds < 0) {
    throw new Error(`Invalid duration "${format.duration}" in "${filePath}"`);
  }

  const sampleRate = parseInt(audioStream.sample_rate ?? "0", 10);
  if (!sampleRate || sampleRate <= 0) {
    throw new Error(`Invalid sample_rate "${audioStream.sample_rate}" in "${filePath}"`);
  }

  const channels = audioStream.channels;
  if (!channels || channels <= 0) {
    throw new Error(`Invalid channels "${channels}" in "${filePath}"`);
  }

  const fileSizeBytes = parseInt(format.size, 10);
  if (!isFinite(fileSizeBytes) || fileSizeBytes < 0) {
    throw new Error(`Invalid size "${format.size}" in "${filePath}"`);
  }

  return {
    durationSeconds,
    sampleRate,
    channels,
    formatName: format.format_name,
    fileSizeBytes,
  };
}
