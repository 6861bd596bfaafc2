import type { Seconds } from "../core/time";

/**
 * Diagnostic categories for grouping.
 */
export type DiagnosticCategory = "input" | "config" | "stream";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A runtime diagnostic recorded when something goes wrong where no caller is
 * on the stack to receive an exception (e.g. inside a source callback).
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  category: DiagnosticCategory;

  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Stream position when the diagnostic was recorded */
  timestamp: Seconds;

  /** Optional: which component recorded this */
  source?: string;
}

/**
 * A single rejected configuration field.
 */
export interface ValidationError {
  /** Which field failed, dotted path for nested values */
  field: string;

  /** What went wrong */
  reason: string;

  /** Optional: what values are valid */
  hint?: string;
}
