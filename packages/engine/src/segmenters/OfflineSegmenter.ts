/**
 * Offline Segmenter
 *
 * Whole-buffer speech endpoint detection. Two passes: all frame energies are
 * computed first, then the reference level (buffer maximum unless a fixed
 * referenceLevel is configured) sets one threshold for every frame.
 *
 * Because the reference comes from the complete buffer, results can differ
 * from the online path, whose reference only grows as peaks arrive. Configure
 * referenceLevel to make both agree.
 */

import type {
  AudioInput,
  EndpointAnalysis,
  EndpointConfig,
  FrameLabel,
  IOfflineSegmenter,
  ResolvedEndpointConfig,
  Seconds,
  TimedSegment,
} from "@vadpoint/contracts";

import { resolveConfig } from "../config/resolveConfig";
import { computeEnergies } from "../energy/computeEnergies";
import { classifyFrames, referenceLevel, thresholdFrom } from "../threshold/ThresholdPolicy";
import { smoothLabels } from "./smoothing";
import { invertSegments, toTimedSegments } from "./frames";

export class OfflineSegmenter implements IOfflineSegmenter {
  readonly config: ResolvedEndpointConfig;

  /**
   * @throws InvalidConfigurationError
   */
  constructor(config: EndpointConfig = {}) {
    this.config = resolveConfig(config);
  }

  analyze(input: AudioInput): EndpointAnalysis {
    const {
      frameLength,
      hopLength,
      padding,
      topDb,
      energyFloor,
      minSpeechFrames,
      minSilenceFrames,
    } = this.config;

    const { energies, coveredSamples } = computeEnergies(
      input,
      frameLength,
      hopLength,
      padding
    );

    const reference = this.config.referenceLevel ?? referenceLevel(energies);
    const threshold = thresholdFrom(reference, topDb, energyFloor);
    const labels = classifyFrames(energies, threshold);
    const segments = smoothLabels(labels, minSpeechFrames, minSilenceFrames);
    const timed = toTimedSegments(segments, {
      hopLength,
      sampleRate: input.sampleRate,
      totalFrames: energies.length,
      coveredSamples,
    });

    return { energies, coveredSamples, reference, threshold, labels, segments, timed };
  }

  getSpeechEndpoints(input: AudioInput): TimedSegment[] {
    return this.analyze(input).timed;
  }

  getSilenceEndpoints(input: AudioInput): TimedSegment[] {
    return invertSegments(this.analyze(input).timed, this.duration(input));
  }

  classifyFrames(input: AudioInput): FrameLabel[] {
    return this.analyze(input).labels;
  }

  private duration(input: AudioInput): Seconds {
    if (input.kind === "spectrogram") {
      return (input.rows.length * this.config.hopLength) / input.sampleRate;
    }
    return input.samples.length / input.sampleRate;
  }
}

/**
 * One-shot form of OfflineSegmenter.getSpeechEndpoints.
 */
export function getSpeechEndpoint(
  input: AudioInput,
  config: EndpointConfig = {}
): TimedSegment[] {
  return new OfflineSegmenter(config).getSpeechEndpoints(input);
}
