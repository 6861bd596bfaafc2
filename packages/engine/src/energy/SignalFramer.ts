/**
 * Signal Framer
 *
 * Incremental frame energy extraction for time-domain samples. Chunks may end
 * anywhere; samples that do not yet fill a frame are kept until the next
 * push(). finish() emits the zero-padded tail.
 *
 * Frame k covers samples [k * hopLength, k * hopLength + frameLength).
 * Energy is the plain sum of squares, no window function.
 *
 * With zero padding, n > 0 samples produce 1 frame when n <= frameLength and
 * 1 + ceil((n - frameLength) / hopLength) frames otherwise, which is the
 * smallest count whose last frame reaches sample n.
 */

import type { PaddingMode, SampleBuffer, SampleCount } from "@vadpoint/contracts";
import { assertFrameGeometry, assertSamples } from "./frameGeometry";

const EMPTY = new Float64Array(0);

export class SignalFramer {
  /** Samples from the start of the next frame onward */
  private pending: Float64Array = EMPTY;

  /** Total samples received */
  private received: SampleCount = 0;

  /** Frames emitted so far */
  private emitted = 0;

  private finished = false;

  constructor(
    readonly frameLength: SampleCount,
    readonly hopLength: SampleCount,
    readonly padding: PaddingMode = "zero"
  ) {
    assertFrameGeometry(frameLength, hopLength);
  }

  /**
   * Append samples and return the energies of every frame that became
   * complete.
   *
   * @throws InvalidInputError on an empty chunk or a non-finite sample
   */
  push(samples: SampleBuffer): Float64Array {
    if (this.finished) {
      throw new Error("SignalFramer already finished");
    }
    assertSamples(samples);

    const merged = new Float64Array(this.pending.length + samples.length);
    merged.set(this.pending);
    merged.set(samples, this.pending.length);
    this.received += samples.length;

    const energies: number[] = [];
    let offset = 0;
    while (merged.length - offset >= this.frameLength) {
      energies.push(sumOfSquares(merged, offset, offset + this.frameLength));
      offset += this.hopLength;
    }
    this.emitted += energies.length;
    this.pending = merged.subarray(offset);

    return Float64Array.from(energies);
  }

  /**
   * Emit the tail frames that extend past the last sample. Under "drop"
   * padding there are none.
   */
  finish(): Float64Array {
    if (this.finished) {
      return EMPTY;
    }
    this.finished = true;
    if (this.padding === "drop") {
      return EMPTY;
    }

    const energies: number[] = [];
    let offset = 0;
    while (this.received > 0 && (this.emitted === 0 || this.lastFrameEnd() < this.received)) {
      const end = Math.min(offset + this.frameLength, this.pending.length);
      energies.push(sumOfSquares(this.pending, offset, end));
      offset += this.hopLength;
      this.emitted++;
    }
    this.pending = EMPTY;

    return Float64Array.from(energies);
  }

  /**
   * Samples described by the emitted frames.
   */
  coveredSamples(): SampleCount {
    if (this.padding === "zero" && this.finished) {
      return this.received;
    }
    return this.emitted === 0 ? 0 : Math.min(this.lastFrameEnd(), this.received);
  }

  get frameCount(): number {
    return this.emitted;
  }

  reset(): void {
    this.pending = EMPTY;
    this.received = 0;
    this.emitted = 0;
    this.finished = false;
  }

  private lastFrameEnd(): SampleCount {
    return (this.emitted - 1) * this.hopLength + this.frameLength;
  }
}

function sumOfSquares(samples: Float64Array, from: number, to: number): number {
  let sum = 0;
  for (let i = from; i < to; i++) {
    sum += samples[i] * samples[i];
  }
  return sum;
}
