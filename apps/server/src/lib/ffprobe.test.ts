import { describe, expect, it } from "vitest";
import { TimeoutError } from "./errors.js";
import { parseProbeOutput, probeFailure } from "./ffprobe.js";

function probeJson(overrides: { streams?: unknown[]; format?: Record<string, unknown> } = {}): string {
  return JSON.stringify({
    streams: overrides.streams ?? [
      { codec_type: "video" },
      { codec_type: "audio", sample_rate: "16000", channels: 1 },
    ],
    format: { format_name: "wav", duration: "3.250000", size: "104044", ...overrides.format },
  });
}

describe("parseProbeOutput", () => {
  it("reads the first audio stream and the container format", () => {
    expect(parseProbeOutput(probeJson(), "/tmp/a.wav")).toEqual({
      durationSeconds: 3.25,
      sampleRate: 16000,
      channels: 1,
      formatName: "wav",
      fileSizeBytes: 104044,
    });
  });

  it("rejects non-JSON output", () => {
    expect(() => parseProbeOutput("not json", "/tmp/a.wav")).toThrow(
      'ffprobe returned non-JSON output for "/tmp/a.wav"',
    );
  });

  it("rejects files without an audio stream", () => {
    expect(() => parseProbeOutput(probeJson({ streams: [{ codec_type: "video" }] }), "/tmp/v.mp4")).toThrow(
      'No audio stream found in "/tmp/v.mp4"',
    );
  });

  it("rejects an unparseable duration", () => {
    expect(() => parseProbeOutput(probeJson({ format: { duration: "N/A" } }), "/tmp/a.wav")).toThrow(
      'Invalid duration "N/A" in "/tmp/a.wav"',
    );
  });

  it("rejects a missing sample rate", () => {
    const json = probeJson({ streams: [{ codec_type: "audio", channels: 2 }] });
    expect(() => parseProbeOutput(json, "/tmp/a.wav")).toThrow('Invalid sample_rate "undefined"');
  });
});

describe("probeFailure", () => {
  it("reports a killed ffprobe as a probe timeout", () => {
    const killed = Object.assign(new Error("Command failed: ffprobe"), { killed: true, signal: "SIGTERM" });

    const error = probeFailure(killed, "/tmp/a.wav");

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe("probe timed out after 15000ms");
    expect(error.cause).toBe(killed);
  });

  it("reports other failures as unreadable input", () => {
    const failed = Object.assign(new Error("Command failed: ffprobe"), { killed: false, code: 1 });

    const error = probeFailure(failed, "/tmp/a.wav");

    expect(error).not.toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('ffprobe failed for "/tmp/a.wav": Error: Command failed: ffprobe');
  });
});
