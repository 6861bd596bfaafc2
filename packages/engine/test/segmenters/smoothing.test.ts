import { describe, it, expect } from "vitest";
import { smoothLabels, toRuns } from "../../src/segmenters/smoothing";
import type { FrameLabel } from "@vadpoint/contracts";

/** "S" = speech, anything else = silence */
function labels(pattern: string): FrameLabel[] {
  return Array.from(pattern, (c) => (c === "S" ? "speech" : "silence"));
}

describe("toRuns", () => {
  it("groups consecutive labels", () => {
    expect(toRuns(labels("..SSS."))).toEqual([
      { label: "silence", start: 0, length: 2 },
      { label: "speech", start: 2, length: 3 },
      { label: "silence", start: 5, length: 1 },
    ]);
  });

  it("returns no runs for no labels", () => {
    expect(toRuns([])).toEqual([]);
  });
});

describe("smoothLabels", () => {
  it("drops a speech run shorter than minSpeechFrames", () => {
    expect(smoothLabels(labels("...S....SSSS...."), 2, 2)).toEqual([
      { startFrame: 8, endFrame: 12 },
    ]);
  });

  it("bridges a silence gap shorter than minSilenceFrames", () => {
    expect(smoothLabels(labels("SSS.SSS...."), 2, 2)).toEqual([
      { startFrame: 0, endFrame: 7 },
    ]);
  });

  it("splits on a silence gap of minSilenceFrames", () => {
    expect(smoothLabels(labels("SS..SS"), 2, 2)).toEqual([
      { startFrame: 0, endFrame: 2 },
      { startFrame: 4, endFrame: 6 },
    ]);
  });

  it("keeps short speech runs inside an open segment", () => {
    expect(smoothLabels(labels("SSS..S..SSS"), 3, 3)).toEqual([
      { startFrame: 0, endFrame: 11 },
    ]);
  });

  it("does not bridge trailing silence", () => {
    expect(smoothLabels(labels("..SSS."), 2, 2)).toEqual([{ startFrame: 2, endFrame: 5 }]);
  });

  it("spans everything when every frame is speech", () => {
    expect(smoothLabels(labels("SSSS"), 2, 2)).toEqual([{ startFrame: 0, endFrame: 4 }]);
  });

  it("finds nothing in silence or in no frames", () => {
    expect(smoothLabels(labels("......"), 1, 1)).toEqual([]);
    expect(smoothLabels([], 1, 1)).toEqual([]);
  });

  it("emits every speech run with minimums of 1", () => {
    expect(smoothLabels(labels("S.S.S"), 1, 1)).toEqual([
      { startFrame: 0, endFrame: 1 },
      { startFrame: 2, endFrame: 3 },
      { startFrame: 4, endFrame: 5 },
    ]);
  });
});
