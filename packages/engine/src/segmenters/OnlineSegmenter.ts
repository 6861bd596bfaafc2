/**
 * Online Segmenter
 *
 * Streaming speech endpoint detection over caller-sized chunks. Energies are
 * computed only for frames completed by each chunk; the running reference
 * (or the fixed referenceLevel) sets the threshold for those frames, and a
 * two-state hysteresis machine advances one frame at a time:
 *
 * - silence: consecutive speech frames count up; at minSpeechFrames the
 *   machine enters speech and opens a segment at the first of them
 * - speech: consecutive silence frames count up; at minSilenceFrames the
 *   machine enters silence and closes the segment at the first of them
 *
 * Each segment is returned once, by the push() or flush() that closed it.
 *
 * With a fixed reference the segments do not depend on how the stream was
 * chunked, and match OfflineSegmenter on the concatenated input. Without
 * one, even a single push can differ from OfflineSegmenter: the padded tail
 * frames are only seen by flush(), so a peak there cannot retract speech
 * already accepted against the smaller running maximum.
 */

import type {
  AudioChunk,
  FrameLabel,
  IStreamSegmenter,
  ResolvedStreamConfig,
  Segment,
  SignalChunk,
  SpectrogramChunk,
  StreamConfig,
  StreamState,
  TimedSegment,
} from "@vadpoint/contracts";

import { InvalidInputError, StreamClosedError } from "@vadpoint/contracts";

import { resolveStreamConfig } from "../config/resolveConfig";
import { SignalFramer } from "../energy/SignalFramer";
import { spectrogramEnergies } from "../energy/computeEnergies";
import { classify, referenceLevel, thresholdFrom } from "../threshold/ThresholdPolicy";
import { toTimedSegments } from "./frames";

export class OnlineSegmenter implements IStreamSegmenter {
  readonly id = "online-segmenter";

  readonly config: ResolvedStreamConfig;

  private state: StreamState;

  private framer: SignalFramer;

  /** Band count fixed by the first spectrogram row */
  private rowWidth: number | null = null;

  /**
   * @throws InvalidConfigurationError
   */
  constructor(config: StreamConfig) {
    this.config = resolveStreamConfig(config);
    this.framer = new SignalFramer(
      this.config.frameLength,
      this.config.hopLength,
      this.config.padding
    );
    this.state = this.initialState();
  }

  init(): void {
    this.framer.reset();
    this.rowWidth = null;
    this.state = this.initialState();
  }

  dispose(): void {
    this.framer.reset();
    this.rowWidth = null;
  }

  reset(): void {
    this.init();
  }

  getState(): Readonly<StreamState> {
    return { ...this.state };
  }

  push(chunk: AudioChunk): TimedSegment[] {
    this.assertOpen();
    if (this.state.kind !== null && this.state.kind !== chunk.kind) {
      throw new InvalidInputError(
        `Stream carries ${this.state.kind} chunks, got ${chunk.kind}`
      );
    }

    const energies =
      chunk.kind === "signal" ? this.signalEnergies(chunk) : this.rowEnergies(chunk);
    this.state.kind = chunk.kind;

    return this.timed(this.advance(energies));
  }

  flush(): TimedSegment[] {
    this.assertOpen();

    const closed = this.state.kind === "signal" ? this.advance(this.framer.finish()) : [];

    const { openStart, nextFrame, silenceRun } = this.state;
    if (openStart !== null) {
      // Trailing silence shorter than minSilenceFrames is not part of the segment
      closed.push({ startFrame: openStart, endFrame: nextFrame - silenceRun });
      this.state.openStart = null;
      this.state.mode = "silence";
    }
    this.state.closed = true;

    console.log(
      `[OnlineSegmenter] Stream flushed after ${nextFrame} frames, reference ${this.state.reference.toExponential(3)}`
    );

    return this.timed(closed, true);
  }

  private initialState(): StreamState {
    return {
      mode: "silence",
      speechRun: 0,
      silenceRun: 0,
      openStart: null,
      reference: this.config.referenceLevel ?? 0,
      nextFrame: 0,
      samplesSeen: 0,
      kind: null,
      closed: false,
    };
  }

  private assertOpen(): void {
    if (this.state.closed) {
      throw new StreamClosedError(this.id);
    }
  }

  private signalEnergies(chunk: SignalChunk): Float64Array {
    const energies = this.framer.push(chunk.samples);
    this.state.samplesSeen += chunk.samples.length;
    return energies;
  }

  private rowEnergies(chunk: SpectrogramChunk): Float64Array {
    const energies = spectrogramEnergies(
      chunk.rows,
      chunk.scale,
      this.rowWidth ?? undefined
    );
    this.rowWidth = chunk.rows[0].length;
    this.state.samplesSeen += chunk.rows.length * this.config.hopLength;
    return energies;
  }

  /**
   * Classify new frames against the current threshold and run them through
   * the hysteresis machine. Returns the segments that closed.
   */
  private advance(energies: Float64Array): Segment[] {
    if (this.config.referenceLevel === undefined) {
      this.state.reference = Math.max(this.state.reference, referenceLevel(energies));
    }
    const threshold = thresholdFrom(
      this.state.reference,
      this.config.topDb,
      this.config.energyFloor
    );

    const closed: Segment[] = [];
    for (let i = 0; i < energies.length; i++) {
      const frame = this.state.nextFrame++;
      const segment = this.step(frame, classify(energies[i], threshold));
      if (segment) {
        closed.push(segment);
      }
    }
    return closed;
  }

  private step(frame: number, label: FrameLabel): Segment | null {
    const { minSpeechFrames, minSilenceFrames } = this.config;
    const state = this.state;

    if (state.openStart === null) {
      if (label === "silence") {
        state.speechRun = 0;
        return null;
      }
      state.speechRun++;
      if (state.speechRun >= minSpeechFrames) {
        state.mode = "speech";
        state.openStart = frame - minSpeechFrames + 1;
        state.speechRun = 0;
        state.silenceRun = 0;
      }
      return null;
    }

    if (label === "speech") {
      state.silenceRun = 0;
      return null;
    }
    state.silenceRun++;
    if (state.silenceRun < minSilenceFrames) {
      return null;
    }

    const segment = { startFrame: state.openStart, endFrame: frame - minSilenceFrames + 1 };
    state.mode = "silence";
    state.openStart = null;
    state.silenceRun = 0;
    state.speechRun = 0;
    return segment;
  }

  private timed(segments: Segment[], final = false): TimedSegment[] {
    const { hopLength, sampleRate } = this.config;
    if (!final) {
      return toTimedSegments(segments, { hopLength, sampleRate });
    }
    const coveredSamples =
      this.state.kind === "signal" ? this.framer.coveredSamples() : this.state.samplesSeen;
    return toTimedSegments(segments, {
      hopLength,
      sampleRate,
      totalFrames: this.state.nextFrame,
      coveredSamples,
    });
  }
}
