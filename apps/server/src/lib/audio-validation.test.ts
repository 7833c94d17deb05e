import { describe, expect, it, vi } from "vitest";
import { createAudioValidator, skipAudioValidation } from "./audio-validation.js";
import { TimeoutError, ValidationFailedError } from "./errors.js";
import type { AudioMetadata } from "./ffprobe.js";

function metadata(durationSeconds: number): AudioMetadata {
  return { durationSeconds, sampleRate: 16000, channels: 1, formatName: "wav", fileSizeBytes: 1024 };
}

const limits = { minSeconds: 0.5, maxSeconds: 30 };

describe("createAudioValidator", () => {
  it("returns rounded audio info for audio within limits", async () => {
    const validator = createAudioValidator(async () => metadata(2.3456), limits);
    await expect(validator.validate("/tmp/a.wav")).resolves.toEqual({
      duration: 2.35,
      sample_rate: 16000,
      channels: 1,
    });
  });

  it("rejects audio that is too short", async () => {
    const validator = createAudioValidator(async () => metadata(0.2), limits);
    await expect(validator.validate("/tmp/a.wav")).rejects.toThrow("Audio too short: 0.20s (min: 0.5s)");
  });

  it("rejects audio that is too long", async () => {
    const validator = createAudioValidator(async () => metadata(31), limits);
    await expect(validator.validate("/tmp/a.wav")).rejects.toThrow("Audio too long: 31.00s (max: 30s)");
  });

  it("accepts durations exactly on the limits", async () => {
    const probe = vi.fn(async () => metadata(0.5));
    const validator = createAudioValidator(probe, limits);
    await expect(validator.validate("/tmp/a.wav")).resolves.toMatchObject({ duration: 0.5 });
    probe.mockResolvedValueOnce(metadata(30));
    await expect(validator.validate("/tmp/a.wav")).resolves.toMatchObject({ duration: 30 });
  });

  it("turns probe failures into validation failures", async () => {
    const validator = createAudioValidator(async () => {
      throw new Error("No audio stream found");
    }, limits);
    const result = validator.validate("/tmp/a.txt");
    await expect(result).rejects.toBeInstanceOf(ValidationFailedError);
    await expect(result).rejects.toThrow("Invalid audio file: No audio stream found");
  });

  it("passes a probe timeout through as retryable", async () => {
    const timeout = new TimeoutError("probe", 15_000);
    const validator = createAudioValidator(async () => {
      throw timeout;
    }, limits);

    const error = await validator.validate("/tmp/a.wav").catch((err: unknown) => err);

    expect(error).toBe(timeout);
    expect(timeout.toResponse()).toEqual({
      success: false,
      error: "probe timed out after 15000ms",
      error_kind: "TIMEOUT",
      retryable: true,
    });
  });
});

describe("skipAudioValidation", () => {
  it("returns null without probing", async () => {
    await expect(skipAudioValidation.validate("/does/not/exist")).resolves.toBeNull();
  });
});
