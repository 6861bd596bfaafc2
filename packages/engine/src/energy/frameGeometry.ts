import type { SampleBuffer, ValidationError } from "@vadpoint/contracts";
import { InvalidConfigurationError, InvalidInputError } from "@vadpoint/contracts";

/**
 * Checks frame/hop lengths for callers that bypass resolveConfig.
 *
 * @throws InvalidConfigurationError
 */
export function assertFrameGeometry(frameLength: number, hopLength: number): void {
  const errors: ValidationError[] = [];
  if (!Number.isInteger(hopLength) || hopLength <= 0) {
    errors.push({ field: "hopLength", reason: "must be a positive integer" });
  }
  if (!Number.isInteger(frameLength) || frameLength <= 0) {
    errors.push({ field: "frameLength", reason: "must be a positive integer" });
  } else if (frameLength < hopLength) {
    errors.push({ field: "frameLength", reason: "must be >= hopLength" });
  }
  if (errors.length > 0) {
    throw new InvalidConfigurationError(errors);
  }
}

export function assertSampleRate(sampleRate: number): void {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new InvalidInputError(`Sample rate must be positive, got ${sampleRate}`);
  }
}

/**
 * @throws InvalidInputError on an empty buffer or a NaN/Infinity sample
 */
export function assertSamples(samples: SampleBuffer): void {
  if (samples.length === 0) {
    throw new InvalidInputError("Signal is empty");
  }
  for (let i = 0; i < samples.length; i++) {
    if (!Number.isFinite(samples[i])) {
      throw new InvalidInputError(`Sample ${i} is not finite`);
    }
  }
}
