/**
 * Threshold Policy
 *
 * Turns a reference energy and a dB drop into a linear energy threshold and
 * labels frames against it.
 *
 * Frame energies are sums of squared amplitudes (power), so the dB drop is
 * converted with a /10 exponent. A different energy domain needs a
 * different exponent here.
 */

import type { FrameLabel } from "@vadpoint/contracts";

/** Threshold never drops below this, so digital silence stays silence */
export const DEFAULT_ENERGY_FLOOR = 1e-10;

/**
 * Maximum energy in the sequence, 0 when empty.
 */
export function referenceLevel(energies: ArrayLike<number>): number {
  let max = 0;
  for (let i = 0; i < energies.length; i++) {
    if (energies[i] > max) {
      max = energies[i];
    }
  }
  return max;
}

/**
 * reference * 10^(-topDb / 10), never below energyFloor.
 */
export function thresholdFrom(
  reference: number,
  topDb: number,
  energyFloor: number = DEFAULT_ENERGY_FLOOR
): number {
  return Math.max(reference * Math.pow(10, -topDb / 10), energyFloor);
}

/**
 * Ties count as speech.
 */
export function classify(energy: number, threshold: number): FrameLabel {
  return energy >= threshold ? "speech" : "silence";
}

export function classifyFrames(
  energies: ArrayLike<number>,
  threshold: number
): FrameLabel[] {
  const labels: FrameLabel[] = new Array(energies.length);
  for (let i = 0; i < energies.length; i++) {
    labels[i] = classify(energies[i], threshold);
  }
  return labels;
}
