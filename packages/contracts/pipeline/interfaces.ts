/**
 * Segmenter Interfaces
 *
 * Contracts for the two detector front ends. The offline segmenter is a pure
 * function of its input; the stream segmenter carries StreamState between
 * calls and follows the init / reset / dispose lifecycle of stateful
 * components.
 */

import type { AudioChunk, AudioInput } from "../input/input";
import type { ResolvedEndpointConfig, ResolvedStreamConfig } from "../config/endpoint";
import type {
  EndpointAnalysis,
  FrameLabel,
  TimedSegment,
} from "../segments/segments";
import type { StreamState } from "../stream/stream";

// ============================================================================
// Offline
// ============================================================================

/**
 * Whole-buffer detector. Computes the reference level from the complete
 * input before classifying any frame.
 */
export interface IOfflineSegmenter {
  readonly config: ResolvedEndpointConfig;

  /** Speech intervals in ascending order; empty when nothing was found. */
  getSpeechEndpoints(input: AudioInput): TimedSegment[];

  /** Complement of getSpeechEndpoints over [0, duration). */
  getSilenceEndpoints(input: AudioInput): TimedSegment[];

  /** Raw (unsmoothed) per-frame labels. */
  classifyFrames(input: AudioInput): FrameLabel[];

  /** All intermediate values of one detection run. */
  analyze(input: AudioInput): EndpointAnalysis;
}

// ============================================================================
// Online
// ============================================================================

/**
 * Incremental detector for one stream.
 */
export interface IStreamSegmenter {
  readonly id: string;
  readonly config: ResolvedStreamConfig;

  /** Called once before the first push */
  init(): void;

  /** Called once when the stream owner is done with the segmenter */
  dispose(): void;

  /** Discard all stream state and accept a new stream */
  reset(): void;

  /**
   * Feed the next chunk.
   *
   * @returns Segments that closed during this call, each exactly once
   * @throws StreamClosedError after flush()
   */
  push(chunk: AudioChunk): TimedSegment[];

  /**
   * End the stream: process any padded tail frames and close the open
   * segment. The stream is terminal afterwards.
   */
  flush(): TimedSegment[];

  getState(): Readonly<StreamState>;
}
