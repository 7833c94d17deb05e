import { constants } from "node:fs";
import { access, mkdir, rm, stat } from "node:fs/promises";
import { isAbsolute, join, relative, resolve } from "node:path";
import type { ReadableStream } from "node:stream/web";
import { SUPPORTED_AUDIO_FORMATS, type AudioSourceInput } from "@speakercheck/shared";
import { InternalError, InvalidSourceError, ServiceError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { writeStreamToFile } from "../lib/stream-to-file.js";
import { isAllowedAudioFile, scratchFileName } from "../lib/upload-filename.js";
import type { CacheLease } from "./content-cache.js";

const logger = createLogger("audio-resolver");

export type AudioSource =
  | { kind: "upload"; filename: string; content: ReadableStream<Uint8Array> }
  | { kind: "url"; url: string }
  | { kind: "path"; path: string };

export type AudioSourceKind = AudioSource["kind"];

/**
 * A local file ready for probing and extraction.
 * `owned` files belong to the request and are deleted when it ends;
 * `release` (cache entries) unpins the file so it may be evicted again.
 */
export interface ResolvedAudio {
  kind: AudioSourceKind;
  path: string;
  owned: boolean;
  release?: () => void;
}

export interface SourceResolver {
  resolve(source: AudioSource): Promise<ResolvedAudio>;
}

export interface RemoteAudioStore {
  lease(url: string): Promise<CacheLease>;
}

export interface AudioSourceResolverOptions {
  scratchDir: string;
  cache: RemoteAudioStore;
  maxUploadBytes: number;
  /** When non-empty, local paths must fall under one of these directories. */
  localPathRoots?: readonly string[];
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Classifies a JSON source value. Plain strings are URLs when they carry
 * a scheme and local paths otherwise; objects say which one they are.
 */
export function toAudioSource(input: AudioSourceInput): AudioSource {
  if (typeof input === "string") {
    return SCHEME_PATTERN.test(input) ? { kind: "url", url: input } : { kind: "path", path: input };
  }
  if ("url" in input) {
    return { kind: "url", url: input.url };
  }
  return { kind: "path", path: input.path };
}

export function describeSource(source: AudioSource): string {
  switch (source.kind) {
    case "upload":
      return `upload:${source.filename}`;
    case "url":
      return source.url;
    case "path":
      return source.path;
  }
}

export class AudioSourceResolver implements SourceResolver {
  private readonly localPathRoots: string[];

  constructor(private readonly options: AudioSourceResolverOptions) {
    this.localPathRoots = (options.localPathRoots ?? []).map((root) => resolve(root));
  }

  async resolve(source: AudioSource): Promise<ResolvedAudio> {
    switch (source.kind) {
      case "upload":
        return this.resolveUpload(source.filename, source.content);
      case "url":
        return this.resolveUrl(source.url);
      case "path":
        return this.resolvePath(source.path);
    }
  }

  private async resolveUpload(
    filename: string,
    content: ReadableStream<Uint8Array>,
  ): Promise<ResolvedAudio> {
    if (!filename) {
      await discard(content);
      throw new InvalidSourceError("No file selected");
    }
    if (!isAllowedAudioFile(filename)) {
      await discard(content);
      throw new InvalidSourceError(
        `File type not allowed: ${filename} (allowed: ${SUPPORTED_AUDIO_FORMATS.join(", ")})`,
      );
    }

    await mkdir(this.options.scratchDir, { recursive: true });
    const path = join(this.options.scratchDir, scratchFileName(filename));

    let bytes: number;
    try {
      bytes = await writeStreamToFile(content, path, this.options.maxUploadBytes);
    } catch (err) {
      if (err instanceof ServiceError) throw err;
      throw new InternalError(`Could not store upload "${filename}"`, { cause: err });
    }

    if (bytes === 0) {
      await rm(path, { force: true });
      throw new InvalidSourceError(`Uploaded file is empty: ${filename}`);
    }

    logger.debug(`stored upload ${filename} (${bytes} bytes) at ${path}`);
    return { kind: "upload", path, owned: true };
  }

  private async resolveUrl(url: string): Promise<ResolvedAudio> {
    const lease = await this.options.cache.lease(url);
    return { kind: "url", path: lease.path, owned: false, release: lease.release };
  }

  private async resolvePath(inputPath: string): Promise<ResolvedAudio> {
    const path = resolve(inputPath);

    if (this.localPathRoots.length > 0 && !this.localPathRoots.some((root) => isWithin(root, path))) {
      throw new InvalidSourceError(`Path is outside the allowed directories: ${inputPath}`);
    }

    try {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new InvalidSourceError(`Not a file: ${inputPath}`);
      }
      await access(path, constants.R_OK);
    } catch (err) {
      if (err instanceof ServiceError) throw err;
      throw new InvalidSourceError(`File not found: ${inputPath}`, { cause: err });
    }

    return { kind: "path", path, owned: false };
  }
}

async function discard(content: ReadableStream<Uint8Array>): Promise<void> {
  await content.cancel().catch((err: unknown) => {
    logger.debug(`cancelling rejected upload raised: ${String(err)}`);
  });
}

function isWithin(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}
