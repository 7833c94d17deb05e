import { describe, expect, it } from "vitest";
import { getExtension, isAllowedAudioFile, sanitizeFilename, scratchFileName } from "./upload-filename.js";

const UUID = "[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}";

describe("getExtension", () => {
  it("returns the lowercase extension", () => {
    expect(getExtension("Speaker.WAV")).toBe("wav");
    expect(getExtension("clip.take2.flac")).toBe("flac");
  });

  it("returns an empty string without an extension", () => {
    expect(getExtension("recording")).toBe("");
    expect(getExtension(".hidden")).toBe("");
  });

  it("ignores dots in directory names", () => {
    expect(getExtension("dir.v2/recording")).toBe("");
  });
});

describe("isAllowedAudioFile", () => {
  it.each(["a.wav", "a.mp3", "a.flac", "a.m4a", "a.ogg", "a.wma", "a.aac"])("accepts %s", (name) => {
    expect(isAllowedAudioFile(name)).toBe(true);
  });

  it.each(["a.txt", "a.exe", "wav", "a.wav.zip"])("rejects %s", (name) => {
    expect(isAllowedAudioFile(name)).toBe(false);
  });
});

describe("sanitizeFilename", () => {
  it("drops path components and unsafe characters", () => {
    expect(sanitizeFilename("../../etc/pass wd")).toBe("pass_wd");
    expect(sanitizeFilename("C:\\Users\\me\\my clip!.wav")).toBe("my_clip.wav");
  });

  it("strips accents through NFKD decomposition", () => {
    expect(sanitizeFilename("café.mp3")).toBe("cafe.mp3");
  });

  it("strips leading dots and underscores", () => {
    expect(sanitizeFilename("..._secret.wav")).toBe("secret.wav");
  });
});

describe("scratchFileName", () => {
  it("prefixes a uuid and keeps the extension", () => {
    expect(scratchFileName("My Voice.WAV")).toMatch(new RegExp(`^${UUID}_My_Voice\\.wav$`));
  });

  it("falls back to a generic stem", () => {
    expect(scratchFileName("日本.mp3")).toMatch(new RegExp(`^${UUID}_upload\\.mp3$`));
  });

  it("never repeats for the same input", () => {
    expect(scratchFileName("a.wav")).not.toBe(scratchFileName("a.wav"));
  });
});
