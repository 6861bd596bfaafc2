import type {
  FrameIndex,
  SampleCount,
  SampleRate,
  Seconds,
  Segment,
  TimedSegment,
} from "@vadpoint/contracts";

export interface FrameTiming {
  hopLength: SampleCount;
  sampleRate: SampleRate;

  /**
   * When both are known, a segment ending at totalFrames ends at
   * coveredSamples / sampleRate instead of on the hop grid.
   */
  totalFrames?: number;
  coveredSamples?: SampleCount;
}

export function frameToSeconds(
  frame: FrameIndex,
  hopLength: SampleCount,
  sampleRate: SampleRate
): Seconds {
  return (frame * hopLength) / sampleRate;
}

/**
 * Smallest frame count lasting at least `seconds`, never below 1.
 * Converts duration-based minimums into minSpeechFrames / minSilenceFrames.
 */
export function framesForDuration(
  seconds: Seconds,
  hopLength: SampleCount,
  sampleRate: SampleRate
): number {
  return Math.max(1, Math.ceil((seconds * sampleRate) / hopLength));
}

export function toTimedSegments(
  segments: readonly Segment[],
  timing: FrameTiming
): TimedSegment[] {
  const { hopLength, sampleRate, totalFrames, coveredSamples } = timing;
  return segments.map((segment) => {
    const end =
      totalFrames !== undefined &&
      coveredSamples !== undefined &&
      segment.endFrame >= totalFrames
        ? coveredSamples / sampleRate
        : frameToSeconds(segment.endFrame, hopLength, sampleRate);
    return {
      start: frameToSeconds(segment.startFrame, hopLength, sampleRate),
      end,
    };
  });
}

/**
 * Gaps between ascending, non-overlapping segments within [0, duration).
 */
export function invertSegments(
  segments: readonly TimedSegment[],
  duration: Seconds
): TimedSegment[] {
  const gaps: TimedSegment[] = [];
  let cursor = 0;
  for (const segment of segments) {
    if (segment.start > cursor) {
      gaps.push({ start: cursor, end: segment.start });
    }
    cursor = Math.max(cursor, segment.end);
  }
  if (duration > cursor) {
    gaps.push({ start: cursor, end: duration });
  }
  return gaps;
}
