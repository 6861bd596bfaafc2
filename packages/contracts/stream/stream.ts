import type { FrameIndex, SampleCount } from "../core/time";
import type { InputKind } from "../input/input";

export type HysteresisMode = "silence" | "speech";

/**
 * State carried across push() calls of one online stream.
 * Owned by a single segmenter instance; never shared between streams.
 */
export interface StreamState {
  mode: HysteresisMode;

  /** Consecutive speech frames seen while in silence */
  speechRun: number;

  /** Consecutive silence frames seen while in speech */
  silenceRun: number;

  /** Start of the open segment, null while in silence */
  openStart: FrameIndex | null;

  /** Reference energy currently in effect */
  reference: number;

  /** Index the next produced frame will get */
  nextFrame: FrameIndex;

  /** Samples received so far (rows * hopLength for spectrogram streams) */
  samplesSeen: SampleCount;

  /** Fixed by the first chunk */
  kind: InputKind | null;

  closed: boolean;
}
