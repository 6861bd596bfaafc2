import { describe, it, expect } from "vitest";
import { SignalFramer } from "../../src/energy/SignalFramer";
import { InvalidConfigurationError, InvalidInputError } from "@vadpoint/contracts";
import { noise, split } from "../_harness/signals";

function drain(framer: SignalFramer, chunks: ArrayLike<number>[]): number[] {
  const energies: number[] = [];
  for (const chunk of chunks) {
    energies.push(...framer.push(Array.from(chunk)));
  }
  energies.push(...framer.finish());
  return energies;
}

describe("SignalFramer", () => {
  describe("framing", () => {
    it("sums squares over non-overlapping frames", () => {
      const framer = new SignalFramer(2, 2);
      expect(drain(framer, [[1, 1, 1, 1, 2, 2]])).toEqual([2, 2, 8]);
    });

    it("sums squares over overlapping frames", () => {
      const framer = new SignalFramer(4, 2);
      expect(drain(framer, [[1, 1, 1, 1, 2, 2]])).toEqual([4, 10]);
    });

    it("holds back samples until a frame is complete", () => {
      const framer = new SignalFramer(4, 2);
      expect(Array.from(framer.push([1, 1, 1]))).toEqual([]);
      expect(Array.from(framer.push([1, 2, 2]))).toEqual([4, 10]);
      expect(Array.from(framer.finish())).toEqual([]);
      expect(framer.frameCount).toBe(2);
    });

    it("zero-pads the tail so every sample is covered", () => {
      const framer = new SignalFramer(4, 2);
      // Frames start at 0, 2, 4; the last one holds only samples 4..6
      expect(drain(framer, [[1, 1, 1, 1, 2, 2, 3]])).toEqual([4, 10, 17]);
      expect(framer.coveredSamples()).toBe(7);
    });

    it("produces one padded frame for input shorter than a frame", () => {
      const framer = new SignalFramer(400, 160);
      const energies = drain(framer, [[0.5, 0.5, 0.5]]);
      expect(energies).toEqual([0.75]);
      expect(framer.coveredSamples()).toBe(3);
    });

    it("drops the partial tail under drop padding", () => {
      const framer = new SignalFramer(4, 2, "drop");
      expect(drain(framer, [[1, 1, 1, 1, 2, 2, 3]])).toEqual([4, 10]);
      expect(framer.coveredSamples()).toBe(6);
    });

    it("produces no frames for short input under drop padding", () => {
      const framer = new SignalFramer(400, 160, "drop");
      expect(drain(framer, [[0.5, 0.5]])).toEqual([]);
      expect(framer.coveredSamples()).toBe(0);
    });
  });

  describe("frame count", () => {
    it.each([
      [400, 1],
      [560, 2],
      [561, 3],
      [16000, 99],
    ])("%i samples at 400/160 produce %i frames", (length, frames) => {
      const framer = new SignalFramer(400, 160);
      drain(framer, [new Float32Array(length)]);
      expect(framer.frameCount).toBe(frames);
    });
  });

  describe("chunk boundaries", () => {
    it("produces identical energies however the input is split", () => {
      const samples = noise(5000, 0.3, 7);
      const whole = drain(new SignalFramer(400, 160), [samples]);

      for (const sizes of [[1], [159, 161], [7, 400, 33], [1000]]) {
        const chunked = drain(new SignalFramer(400, 160), split(samples, sizes));
        expect(chunked).toEqual(whole);
      }
    });
  });

  describe("errors", () => {
    it("rejects an empty chunk", () => {
      const framer = new SignalFramer(4, 2);
      expect(() => framer.push([])).toThrow(InvalidInputError);
    });

    it("rejects non-finite samples without consuming the chunk", () => {
      const framer = new SignalFramer(2, 2);
      expect(() => framer.push([1, Number.NaN])).toThrow(InvalidInputError);
      expect(Array.from(framer.push([1, 1]))).toEqual([2]);
    });

    it("rejects a frame shorter than the hop", () => {
      expect(() => new SignalFramer(100, 200)).toThrow(InvalidConfigurationError);
    });

    it("rejects a non-positive hop", () => {
      expect(() => new SignalFramer(100, 0)).toThrow(InvalidConfigurationError);
    });
  });

  it("accepts new input after reset", () => {
    const framer = new SignalFramer(2, 2);
    drain(framer, [[1, 1, 1]]);
    framer.reset();
    expect(drain(framer, [[2, 2]])).toEqual([8]);
  });
});
