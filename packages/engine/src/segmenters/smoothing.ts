/**
 * Run-length smoothing of frame labels (offline path).
 *
 * Scans maximal label runs left to right:
 * 1. While no segment is open, a speech run of at least minSpeechFrames opens
 *    one at the run's first frame. Shorter speech runs are dropped.
 * 2. While a segment is open, a silence run shorter than minSilenceFrames is
 *    bridged; a longer one closes the segment at the run's first frame.
 * 3. A segment still open at the end stops before any trailing silence.
 *
 * This yields exactly the segments the online hysteresis machine produces
 * for the same labels.
 */

import type { FrameIndex, FrameLabel, Segment } from "@vadpoint/contracts";

export interface LabelRun {
  label: FrameLabel;
  start: FrameIndex;
  length: number;
}

export function toRuns(labels: readonly FrameLabel[]): LabelRun[] {
  const runs: LabelRun[] = [];
  for (let i = 0; i < labels.length; i++) {
    const last = runs[runs.length - 1];
    if (last && last.label === labels[i]) {
      last.length++;
    } else {
      runs.push({ label: labels[i], start: i, length: 1 });
    }
  }
  return runs;
}

export function smoothLabels(
  labels: readonly FrameLabel[],
  minSpeechFrames: number,
  minSilenceFrames: number
): Segment[] {
  const runs = toRuns(labels);
  const segments: Segment[] = [];
  let openStart: FrameIndex | null = null;

  for (const run of runs) {
    if (openStart === null) {
      if (run.label === "speech" && run.length >= minSpeechFrames) {
        openStart = run.start;
      }
    } else if (run.label === "silence" && run.length >= minSilenceFrames) {
      segments.push({ startFrame: openStart, endFrame: run.start });
      openStart = null;
    }
  }

  if (openStart !== null) {
    const last = runs[runs.length - 1];
    const endFrame = last.label === "silence" ? last.start : labels.length;
    segments.push({ startFrame: openStart, endFrame });
  }

  return segments;
}
