/**
 * Validation result types
 */

export interface ValidationError {
  field: string;
  message: string;
  level?: 'CRITICAL';
}

export interface ValidationWarning {
  field: string;
  message: string;
  level?: 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Accepted range of a numeric setting
 * Outside [min, max] is an error; outside recommended only warns.
 */
export interface Limits {
  min: number;
  max: number;
  recommended?: { min: number; max: number };
}

/**
 * Collects problems for one validation pass
 */
export interface FieldChecker {
  /** Record an error */
  fail(field: string, message: string): void;
  /** Record a warning */
  warn(field: string, message: string): void;
  boolean(field: string, value: unknown): void;
  nonEmpty(field: string, value: unknown): void;
  /** Whole value must match pattern; description completes "must be ..." */
  matches(field: string, value: unknown, pattern: RegExp, description: string): void;
  /** Finite number within limits */
  number(field: string, value: number, limits: Limits): void;
  /** Integer within limits */
  integer(field: string, value: number, limits: Limits): void;
  result(): ValidationResult;
}
