/**
 * Error types for the tide display
 *
 * Acquisition failures are closed tagged unions carried in a Result and absorbed
 * by the tide service. Classes are kept for conditions that are thrown: invalid
 * configuration at startup and failed drawing primitives inside a sink.
 */

// ═══════════════════════════════════════════════════════════════
// ACQUISITION ERRORS (returned, never thrown)
// ═══════════════════════════════════════════════════════════════

/**
 * Failure of the single remote fetch
 * - network: transport failure, timeout or non-2xx status
 * - parse: body is not the expected predictions document
 * - insufficient-data: parsed fine but cannot cover the display window
 */
export type StationError =
  | { kind: 'network'; message: string }
  | { kind: 'parse'; message: string }
  | { kind: 'insufficient-data'; message: string };

/**
 * A canonical offset fell outside the raw data coverage
 */
export interface ResampleRangeError {
  kind: 'range';
  message: string;
  /** First offset (minutes from now) that could not be bracketed */
  offsetMinutes: number;
}

/**
 * Any failure the live branch of the tide service can absorb
 */
export type LiveDataError = StationError | ResampleRangeError;

/**
 * Reason a cache read produced no series
 */
export type CacheMissReason = 'missing' | 'corrupt' | 'stale';

/**
 * Render failure surfaced to the process boundary
 */
export interface RenderError {
  kind: 'render';
  message: string;
  /** One entry per failed primitive or failed flush */
  failures: string[];
}

// ═══════════════════════════════════════════════════════════════
// THROWN ERRORS
// ═══════════════════════════════════════════════════════════════

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the startup configuration is rejected
 */
export class ConfigValidationError extends ValidationError {
  /** Individual field problems, formatted "[FIELD]: message" */
  readonly details: string[];

  constructor(message: string, details: string[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.details = details;
  }
}

/**
 * Error thrown by a pixel sink when one drawing primitive cannot be applied
 */
export class PrimitiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PrimitiveError';
  }
}
