/**
 * Segment Types
 *
 * Frame-level results of the detector and the timed segments handed back to
 * callers.
 */

import type { FrameIndex, SampleCount, Seconds } from "../core/time";

export type FrameLabel = "speech" | "silence";

/**
 * Half-open run of speech frames: [startFrame, endFrame).
 */
export interface Segment {
  startFrame: FrameIndex;
  endFrame: FrameIndex;
}

/**
 * Externally visible speech interval in seconds, start < end.
 */
export interface TimedSegment {
  start: Seconds;
  end: Seconds;
}

/**
 * Per-frame energies plus the extent of the input they describe.
 */
export interface FrameEnergies {
  energies: Float64Array;

  /**
   * Samples covered by the frames. A segment that reaches the last frame
   * ends at coveredSamples / sampleRate.
   */
  coveredSamples: SampleCount;
}

/**
 * Everything the offline detector computed for one input.
 */
export interface EndpointAnalysis extends FrameEnergies {
  reference: number;
  threshold: number;
  labels: FrameLabel[];
  segments: Segment[];
  timed: TimedSegment[];
}
