// Segmenters
export * from "./segmenters";

// Frame energy
export { computeEnergies, spectrogramEnergies, normalizedDbToAmplitude } from "./energy/computeEnergies";
export { SignalFramer } from "./energy/SignalFramer";
export { assertFrameGeometry } from "./energy/frameGeometry";

// Threshold policy
export {
  referenceLevel,
  thresholdFrom,
  classify,
  classifyFrames,
  DEFAULT_ENERGY_FLOOR,
} from "./threshold/ThresholdPolicy";

// Configuration
export {
  resolveConfig,
  resolveStreamConfig,
  toValidationErrors,
  DEFAULT_CONFIG,
} from "./config/resolveConfig";
