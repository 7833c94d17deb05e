import type { AudioInfo } from "@speakercheck/shared";
import { ServiceError, ValidationFailedError } from "./errors.js";
import type { AudioMetadata, AudioProbe } from "./ffprobe.js";

export interface AudioValidator {
  /** Returns probe info, or null when validation is switched off. */
  validate(filePath: string): Promise<AudioInfo | null>;
}

export interface DurationLimits {
  minSeconds: number;
  maxSeconds: number;
}

/**
 * Rejects audio that ffprobe cannot read or whose duration falls outside the limits.
 * Service errors from the probe itself, such as a timeout, pass through unchanged.
 */
export function createAudioValidator(probe: AudioProbe, limits: DurationLimits): AudioValidator {
  return {
    async validate(filePath) {
      let metadata: AudioMetadata;
      try {
        metadata = await probe(filePath);
      } catch (cause) {
        if (cause instanceof ServiceError) throw cause;
        const reason = cause instanceof Error ? cause.message : String(cause);
        throw new ValidationFailedError(`Invalid audio file: ${reason}`, { cause });
      }

      const duration = metadata.durationSeconds;
      if (duration < limits.minSeconds) {
        throw new ValidationFailedError(
          `Audio too short: ${duration.toFixed(2)}s (min: ${limits.minSeconds}s)`,
        );
      }
      if (duration > limits.maxSeconds) {
        throw new ValidationFailedError(
          `Audio too long: ${duration.toFixed(2)}s (max: ${limits.maxSeconds}s)`,
        );
      }

      return {
        duration: Math.round(duration * 100) / 100,
        sample_rate: metadata.sampleRate,
        channels: metadata.channels,
      };
    },
  };
}

export const skipAudioValidation: AudioValidator = {
  validate: async () => null,
};
