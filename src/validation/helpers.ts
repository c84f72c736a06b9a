/**
 * Field checks shared by the configuration validator
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { FieldChecker, Limits, ValidationError, ValidationResult, ValidationWarning } from './types';

/**
 * Message for a value outside its hard limits
 * @param field - Setting name
 * @param value - Rejected value
 * @param limits - Accepted range
 * @returns e.g. "DISPLAY_WIDTH must be between 40 and 2000 (got 5000)"
 */
export function rangeMessage(field: string, value: number, limits: Limits): string {
  return field + ' must be between ' + limits.min + ' and ' + limits.max + ' (got ' + value + ')';
}

/**
 * Start a validation pass
 *
 * Every check appends to the pass; nothing stops at the first problem.
 *
 * @returns Checker whose result() lists everything recorded so far
 *
 * @example
 * ```typescript
 * const check = createFieldChecker();
 * check.integer('CACHE_TTL_MIN', config.CACHE_TTL_MIN, { min: 1, max: 1440 });
 * check.result().valid;
 * ```
 */
export function createFieldChecker(): FieldChecker {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  function fail(field: string, message: string): void {
    errors.push({ level: 'CRITICAL', field: field, message: message });
  }

  function warn(field: string, message: string): void {
    warnings.push({ level: 'WARNING', field: field, message: message });
  }

  function boolean(field: string, value: unknown): void {
    if (typeof value !== 'boolean') {
      fail(field, field + ' must be a boolean (got ' + typeof value + ')');
    }
  }

  function nonEmpty(field: string, value: unknown): void {
    if (typeof value !== 'string' || value.trim() === '') {
      fail(field, field + ' must be a non-empty string');
    }
  }

  function matches(field: string, value: unknown, pattern: RegExp, description: string): void {
    if (typeof value !== 'string' || !pattern.test(value)) {
      fail(field, field + ' must be ' + description + ' (got "' + String(value) + '")');
    }
  }

  function number(field: string, value: number, limits: Limits): void {
    // NaN and Infinity fail the range test as well
    if (!isFiniteNumber(value) || value < limits.min || value > limits.max) {
      fail(field, rangeMessage(field, value, limits));
      return;
    }

    const recommended = limits.recommended;
    if (recommended && (value < recommended.min || value > recommended.max)) {
      warn(field, field + ' is outside recommended range ' + recommended.min + '-' + recommended.max + ' (got ' + value + ')');
    }
  }

  function integer(field: string, value: number, limits: Limits): void {
    if (!isInteger(value)) {
      fail(field, field + ' must be an integer (got ' + value + ')');
      return;
    }
    number(field, value, limits);
  }

  function result(): ValidationResult {
    return {
      valid: errors.length === 0,
      errors: errors.slice(),
      warnings: warnings.slice()
    };
  }

  return {
    fail: fail,
    warn: warn,
    boolean: boolean,
    nonEmpty: nonEmpty,
    matches: matches,
    number: number,
    integer: integer,
    result: result
  };
}
