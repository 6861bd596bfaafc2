/**
 * Audio Input Types
 *
 * The two input representations the detector accepts. Both are owned by the
 * caller and never mutated by the engine.
 */

import type { SampleRate } from "../core/time";

/**
 * Sample storage accepted by the engine. Typed arrays avoid a copy when the
 * caller already decoded into one.
 */
export type SampleBuffer = Float32Array | Float64Array | readonly number[];

/**
 * One spectrogram row (mel bands for a single hop).
 */
export type SpectrogramRow = Float32Array | Float64Array | readonly number[];

/**
 * How spectrogram values are encoded.
 * - magnitude: linear band magnitudes, summed as-is
 * - normalized-db: decibel mels normalized into [0, 1] (−100 dB .. 0 dB)
 */
export type SpectrogramScale = "magnitude" | "normalized-db";

/**
 * Time-domain signal.
 */
export interface Signal {
  kind: "signal";
  samples: SampleBuffer;
  sampleRate: SampleRate;
}

/**
 * Precomputed mel spectrogram, one row per hop.
 * The sample rate cannot be recovered from the rows, so it travels with them.
 */
export interface Spectrogram {
  kind: "spectrogram";
  rows: readonly SpectrogramRow[];
  sampleRate: SampleRate;
  /** @default "magnitude" */
  scale?: SpectrogramScale;
}

export type AudioInput = Signal | Spectrogram;

export type InputKind = AudioInput["kind"];

/**
 * Incremental pieces of a stream. Boundaries are chosen by the caller and
 * need not line up with frames.
 */
export interface SignalChunk {
  kind: "signal";
  samples: SampleBuffer;
}

export interface SpectrogramChunk {
  kind: "spectrogram";
  rows: readonly SpectrogramRow[];
  /** @default "magnitude" */
  scale?: SpectrogramScale;
}

export type AudioChunk = SignalChunk | SpectrogramChunk;
