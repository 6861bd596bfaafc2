import { describe, it, expect } from "vitest";
import {
  computeEnergies,
  normalizedDbToAmplitude,
  spectrogramEnergies,
} from "../../src/energy/computeEnergies";
import { InvalidConfigurationError, InvalidInputError } from "@vadpoint/contracts";
import { SAMPLE_RATE, toneInSilence } from "../_harness/signals";

describe("computeEnergies", () => {
  describe("signal input", () => {
    it("frames the 1 s scenario into 99 frames covering every sample", () => {
      const { energies, coveredSamples } = computeEnergies(
        { kind: "signal", samples: toneInSilence(), sampleRate: SAMPLE_RATE },
        400,
        160
      );

      expect(energies.length).toBe(99);
      expect(coveredSamples).toBe(16000);
    });

    it("gives zero energy to frames before the tone and half the tone power inside it", () => {
      const { energies } = computeEnergies(
        { kind: "signal", samples: toneInSilence(), sampleRate: SAMPLE_RATE },
        400,
        160
      );

      // Frame 47 ends at sample 7920, before the tone
      expect(energies[47]).toBe(0);
      // Frame 48 overlaps the first 80 tone samples: 80 * 0.25 / 2
      expect(energies[48]).toBeCloseTo(10, 4);
      // Frame 60 lies fully inside: 400 * 0.25 / 2
      expect(energies[60]).toBeCloseTo(50, 4);
      expect(energies[75]).toBe(0);
    });

    it("accepts plain number arrays", () => {
      const { energies } = computeEnergies(
        { kind: "signal", samples: [1, 2, 3, 4], sampleRate: 8000 },
        2,
        2
      );
      expect(Array.from(energies)).toEqual([5, 25]);
    });

    it("rejects an empty signal", () => {
      expect(() =>
        computeEnergies({ kind: "signal", samples: [], sampleRate: 8000 }, 4, 2)
      ).toThrow(InvalidInputError);
    });

    it("rejects a non-positive sample rate", () => {
      expect(() =>
        computeEnergies({ kind: "signal", samples: [1], sampleRate: 0 }, 4, 2)
      ).toThrow(InvalidInputError);
    });

    it("rejects frame shorter than hop", () => {
      expect(() =>
        computeEnergies({ kind: "signal", samples: [1], sampleRate: 8000 }, 2, 4)
      ).toThrow(InvalidConfigurationError);
    });
  });

  describe("spectrogram input", () => {
    it("sums band magnitudes per row and ignores frame length", () => {
      const { energies, coveredSamples } = computeEnergies(
        {
          kind: "spectrogram",
          rows: [
            [1, 2, 3],
            [0, 0, 0],
            [0.5, 0.5, 1],
          ],
          sampleRate: SAMPLE_RATE,
        },
        400,
        160
      );

      expect(Array.from(energies)).toEqual([6, 0, 2]);
      expect(coveredSamples).toBe(480);
    });

    it("converts normalized dB rows back to amplitude before summing", () => {
      const energies = spectrogramEnergies([[1, 1], [0, 0]], "normalized-db");

      expect(energies[0]).toBeCloseTo(20, 10);
      expect(energies[1]).toBeCloseTo(2e-4, 12);
    });
  });
});

describe("spectrogramEnergies", () => {
  it("rejects no rows", () => {
    expect(() => spectrogramEnergies([])).toThrow(InvalidInputError);
  });

  it("rejects rows without bands", () => {
    expect(() => spectrogramEnergies([[]])).toThrow(InvalidInputError);
  });

  it("rejects ragged rows", () => {
    expect(() => spectrogramEnergies([[1, 2], [1]])).toThrow(
      "Spectrogram row 1 has 1 bands, expected 2"
    );
  });

  it("rejects rows that do not match a pinned width", () => {
    expect(() => spectrogramEnergies([[1, 2]], "magnitude", 3)).toThrow(InvalidInputError);
  });

  it("rejects negative magnitudes", () => {
    expect(() => spectrogramEnergies([[1, -1]])).toThrow(InvalidInputError);
  });

  it("rejects non-finite values", () => {
    expect(() => spectrogramEnergies([[1, Number.POSITIVE_INFINITY]])).toThrow(
      InvalidInputError
    );
  });
});

describe("normalizedDbToAmplitude", () => {
  it("maps 1 to the reference level (20 dB)", () => {
    expect(normalizedDbToAmplitude(1)).toBeCloseTo(10, 10);
  });

  it("maps 0 to the floor (-100 dB + 20 dB)", () => {
    expect(normalizedDbToAmplitude(0)).toBeCloseTo(1e-4, 12);
  });

  it("maps the midpoint to -30 dB", () => {
    expect(normalizedDbToAmplitude(0.5)).toBeCloseTo(Math.pow(10, -1.5), 12);
  });

  it("clamps values outside [0, 1]", () => {
    expect(normalizedDbToAmplitude(2)).toBe(normalizedDbToAmplitude(1));
    expect(normalizedDbToAmplitude(-1)).toBe(normalizedDbToAmplitude(0));
  });
});
