export { OfflineSegmenter, getSpeechEndpoint } from "./OfflineSegmenter";
export { OnlineSegmenter } from "./OnlineSegmenter";
export { smoothLabels, toRuns, type LabelRun } from "./smoothing";
export {
  frameToSeconds,
  framesForDuration,
  toTimedSegments,
  invertSegments,
  type FrameTiming,
} from "./frames";
