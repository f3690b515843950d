import type { SessionMs } from "../core/time";

/**
 * Diagnostic categories for grouping and visual indication.
 */
export type DiagnosticCategory = "input" | "timeline" | "scheduler" | "cache" | "control";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A runtime diagnostic emitted when something goes wrong but the system
 * keeps running.
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  /** Category for grouping and visual indication */
  category: DiagnosticCategory;

  /** Severity level */
  severity: DiagnosticSeverity;

  /** Error kind when the diagnostic wraps one of the engine's errors */
  kind?: string;

  /** Human-readable message */
  message: string;

  /** When the diagnostic was emitted */
  timestamp: SessionMs;

  /** Optional: which component emitted this */
  source?: string;

  /**
   * Persistence mode:
   * - "transient": appears on the next snapshot only
   * - "sticky": appears on every snapshot until its condition clears
   */
  persistence: "transient" | "sticky";
}

/**
 * A validation error returned when a control op fails validation.
 */
export interface ValidationError {
  /** Which field or parameter failed */
  field: string;

  /** What went wrong */
  reason: string;

  /** Optional: what values are valid */
  hint?: string;
}

/**
 * Result of executing a control operation.
 */
export interface ControlOpResult {
  /** Whether the op was accepted and applied */
  success: boolean;

  /** If rejected, why */
  errors?: ValidationError[];
}
