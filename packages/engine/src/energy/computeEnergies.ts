/**
 * Frame Energy Extractor
 *
 * One energy value per frame for either input representation:
 * - Signal: sum of squared samples per window (see SignalFramer)
 * - Spectrogram: sum of the row's band magnitudes; frame/hop lengths are
 *   only used to place rows in time
 */

import type {
  AudioInput,
  FrameEnergies,
  PaddingMode,
  SampleCount,
  SpectrogramRow,
  SpectrogramScale,
} from "@vadpoint/contracts";
import { InvalidInputError } from "@vadpoint/contracts";
import { SignalFramer } from "./SignalFramer";
import { assertFrameGeometry, assertSampleRate } from "./frameGeometry";

/** Floor of the normalized dB range */
const MIN_LEVEL_DB = -100;

/** Level added back before converting to amplitude */
const REF_LEVEL_DB = 20;

/**
 * Map a normalized dB mel value in [0, 1] back to linear amplitude.
 * Values outside [0, 1] are clamped.
 */
export function normalizedDbToAmplitude(value: number): number {
  const clamped = Math.max(0, Math.min(1, value));
  const db = clamped * -MIN_LEVEL_DB + MIN_LEVEL_DB;
  return Math.pow(10, (db + REF_LEVEL_DB) * 0.05);
}

/**
 * Energies of spectrogram rows. Every row must have the same number of
 * bands; pass `width` to pin it to rows seen earlier in a stream.
 *
 * @throws InvalidInputError on empty, ragged, negative or non-finite rows
 */
export function spectrogramEnergies(
  rows: readonly SpectrogramRow[],
  scale: SpectrogramScale = "magnitude",
  width?: number
): Float64Array {
  if (rows.length === 0) {
    throw new InvalidInputError("Spectrogram has no rows");
  }
  const bands = width ?? rows[0].length;
  if (bands === 0) {
    throw new InvalidInputError("Spectrogram rows have no bands");
  }

  const energies = new Float64Array(rows.length);
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (row.length !== bands) {
      throw new InvalidInputError(
        `Spectrogram row ${r} has ${row.length} bands, expected ${bands}`
      );
    }
    let sum = 0;
    for (let b = 0; b < bands; b++) {
      const value = row[b];
      if (!Number.isFinite(value)) {
        throw new InvalidInputError(`Spectrogram row ${r} band ${b} is not finite`);
      }
      if (scale === "normalized-db") {
        sum += normalizedDbToAmplitude(value);
      } else if (value < 0) {
        throw new InvalidInputError(`Spectrogram row ${r} band ${b} is negative`);
      } else {
        sum += value;
      }
    }
    energies[r] = sum;
  }
  return energies;
}

/**
 * Compute per-frame energies for a whole input.
 *
 * @throws InvalidInputError on an empty or malformed input
 * @throws InvalidConfigurationError on bad frame/hop lengths
 */
export function computeEnergies(
  input: AudioInput,
  frameLength: SampleCount,
  hopLength: SampleCount,
  padding: PaddingMode = "zero"
): FrameEnergies {
  assertFrameGeometry(frameLength, hopLength);
  assertSampleRate(input.sampleRate);

  if (input.kind === "spectrogram") {
    const energies = spectrogramEnergies(input.rows, input.scale);
    return { energies, coveredSamples: energies.length * hopLength };
  }

  const framer = new SignalFramer(frameLength, hopLength, padding);
  const head = framer.push(input.samples);
  const tail = framer.finish();

  const energies = new Float64Array(head.length + tail.length);
  energies.set(head);
  energies.set(tail, head.length);

  return { energies, coveredSamples: framer.coveredSamples() };
}
