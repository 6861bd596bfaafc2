import type { SampleCount, SampleRate } from "../core/time";

/**
 * What to do with a trailing window that has fewer than frameLength samples.
 * - zero: pad with zeros so every sample belongs to some frame
 * - drop: discard it (inputs shorter than one frame produce no frames)
 */
export type PaddingMode = "zero" | "drop";

/**
 * Detector configuration. Shared by the offline and online segmenters and
 * never mutated after construction.
 */
export interface EndpointConfig {
  /** Drop below the reference level, in dB, under which a frame is silence. */
  topDb?: number;

  /** Samples per analysis frame. Must be >= hopLength. */
  frameLength?: SampleCount;

  /** Samples between consecutive frame starts. */
  hopLength?: SampleCount;

  /** Consecutive speech frames needed to open a segment. */
  minSpeechFrames?: number;

  /** Consecutive silence frames needed to close a segment. */
  minSilenceFrames?: number;

  /**
   * Fixed reference energy. When omitted the offline path uses the buffer
   * maximum and the online path the running maximum.
   */
  referenceLevel?: number;

  padding?: PaddingMode;

  /** Lowest threshold ever used; keeps digital silence out of speech. */
  energyFloor?: number;
}

/**
 * Online configuration: the stream has no input object to read the sample
 * rate from, so it is part of the configuration.
 */
export interface StreamConfig extends EndpointConfig {
  sampleRate: SampleRate;
}

export type ResolvedEndpointConfig = Readonly<
  Required<Omit<EndpointConfig, "referenceLevel">> &
    Pick<EndpointConfig, "referenceLevel">
>;

export type ResolvedStreamConfig = ResolvedEndpointConfig &
  Readonly<Pick<StreamConfig, "sampleRate">>;
