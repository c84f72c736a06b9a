/**
 * Tests for number utilities
 */

import { clamp, isFiniteNumber, isInteger } from './index';

describe('isFiniteNumber', () => {
  it('should accept ordinary numbers', () => {
    expect(isFiniteNumber(0)).toBe(true);
    expect(isFiniteNumber(-4.25)).toBe(true);
  });

  it('should reject NaN and infinities', () => {
    expect(isFiniteNumber(NaN)).toBe(false);
    expect(isFiniteNumber(Infinity)).toBe(false);
    expect(isFiniteNumber(-Infinity)).toBe(false);
  });

  it('should not coerce strings or null', () => {
    expect(isFiniteNumber('5')).toBe(false);
    expect(isFiniteNumber(null)).toBe(false);
  });
});

describe('isInteger', () => {
  it('should accept whole numbers', () => {
    expect(isInteger(720)).toBe(true);
    expect(isInteger(-10)).toBe(true);
  });

  it('should reject fractions and non-numbers', () => {
    expect(isInteger(0.5)).toBe(false);
    expect(isInteger('10')).toBe(false);
  });
});

describe('clamp', () => {
  it('should return value inside range unchanged', () => {
    expect(clamp(5, 0, 10)).toBe(5);
  });

  it('should clamp to bounds', () => {
    expect(clamp(-3, 0, 10)).toBe(0);
    expect(clamp(42, 0, 10)).toBe(10);
  });

  it('should prefer max when range is inverted', () => {
    expect(clamp(5, 8, 3)).toBe(3);
  });
});
