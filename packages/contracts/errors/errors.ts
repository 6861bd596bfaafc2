/**
 * Detector Errors
 *
 * Every failure the core can raise. All are thrown synchronously by the call
 * that received the offending input or configuration.
 */

import type { ValidationError } from "../diagnostics/diagnostics";

export type VadErrorCode = "InvalidInput" | "InvalidConfiguration" | "StreamClosed";

/**
 * Base class. Callers can switch on `code` without instanceof checks.
 */
export class VadError extends Error {
  constructor(
    message: string,
    public readonly code: VadErrorCode
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Empty or malformed buffer, spectrogram or chunk.
 */
export class InvalidInputError extends VadError {
  constructor(message: string) {
    super(message, "InvalidInput");
  }
}

/**
 * Configuration rejected during resolution.
 */
export class InvalidConfigurationError extends VadError {
  constructor(public readonly errors: ValidationError[]) {
    super(
      `Invalid configuration: ${errors.map((e) => `${e.field}: ${e.reason}`).join("; ")}`,
      "InvalidConfiguration"
    );
  }
}

/**
 * push() or flush() on a stream that was already flushed.
 */
export class StreamClosedError extends VadError {
  constructor(streamId: string) {
    super(`Stream ${streamId} is closed`, "StreamClosed");
  }
}

export function isVadError(error: unknown): error is VadError {
  return error instanceof VadError;
}
