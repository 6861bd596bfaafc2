/**
 * Configuration Resolution
 *
 * Merges caller configuration over the defaults and validates the result.
 * Resolved configs are frozen; both segmenters keep the object they were
 * constructed with for their whole lifetime.
 */

import { z } from "zod";
import type {
  EndpointConfig,
  ResolvedEndpointConfig,
  ResolvedStreamConfig,
  StreamConfig,
  ValidationError,
} from "@vadpoint/contracts";
import { InvalidConfigurationError } from "@vadpoint/contracts";
import { DEFAULT_ENERGY_FLOOR } from "../threshold/ThresholdPolicy";

export const DEFAULT_CONFIG: Required<Omit<EndpointConfig, "referenceLevel">> = {
  topDb: 25,
  frameLength: 1024,
  hopLength: 256,
  minSpeechFrames: 1,
  minSilenceFrames: 1,
  padding: "zero",
  energyFloor: DEFAULT_ENERGY_FLOOR,
};

const endpointFields = z.object({
  topDb: z.number().finite().nonnegative(),
  frameLength: z.number().int().positive(),
  hopLength: z.number().int().positive(),
  minSpeechFrames: z.number().int().positive(),
  minSilenceFrames: z.number().int().positive(),
  referenceLevel: z.number().finite().positive().optional(),
  padding: z.enum(["zero", "drop"]),
  energyFloor: z.number().finite().nonnegative(),
});

// A hop longer than the frame would leave samples no frame looks at.
const frameCoversHop = (c: { frameLength: number; hopLength: number }) =>
  c.frameLength >= c.hopLength;

const frameCoversHopIssue = {
  message: "frameLength must be >= hopLength",
  path: ["frameLength"],
};

const endpointSchema = endpointFields.refine(frameCoversHop, frameCoversHopIssue);

const streamSchema = endpointFields
  .extend({ sampleRate: z.number().finite().positive() })
  .refine(frameCoversHop, frameCoversHopIssue);

/**
 * Convert zod issues into the contracts' ValidationError shape.
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join(".") : "config";
    if (issue.code === z.ZodIssueCode.invalid_enum_value) {
      return {
        field,
        reason: issue.message,
        hint: `one of ${issue.options.map(String).join(", ")}`,
      };
    }
    return { field, reason: issue.message };
  });
}

/**
 * Defaults overlaid with the fields the caller actually set. A field given
 * as undefined keeps its default.
 */
function withDefaults(config: object): Record<string, unknown> {
  const given = Object.entries(config).filter(([, value]) => value !== undefined);
  return { ...DEFAULT_CONFIG, ...Object.fromEntries(given) };
}

/**
 * @throws InvalidConfigurationError listing every rejected field
 */
export function resolveConfig(config: EndpointConfig = {}): ResolvedEndpointConfig {
  const result = endpointSchema.safeParse(withDefaults(config));
  if (!result.success) {
    throw new InvalidConfigurationError(toValidationErrors(result.error));
  }
  return Object.freeze(result.data);
}

/**
 * Same as resolveConfig, plus the stream's sample rate.
 */
export function resolveStreamConfig(config: StreamConfig): ResolvedStreamConfig {
  const result = streamSchema.safeParse(withDefaults(config));
  if (!result.success) {
    throw new InvalidConfigurationError(toValidationErrors(result.error));
  }
  return Object.freeze(result.data);
}
