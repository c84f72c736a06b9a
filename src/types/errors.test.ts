/**
 * Tests for error types
 */

import { ConfigValidationError, PrimitiveError, ValidationError } from './errors';

describe('Error Types', () => {
  describe('ValidationError', () => {
    it('should create error with correct message and name', () => {
      const error = new ValidationError('Test error message');
      expect(error.message).toBe('Test error message');
      expect(error.name).toBe('ValidationError');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('ConfigValidationError', () => {
    it('should carry the field details', () => {
      const error = new ConfigValidationError('Invalid configuration', ['[STATION_ID]: bad']);

      expect(error.name).toBe('ConfigValidationError');
      expect(error.message).toBe('Invalid configuration');
      expect(error.details).toEqual(['[STATION_ID]: bad']);
    });

    it('should be catchable as a ValidationError', () => {
      const error = new ConfigValidationError('Invalid configuration', []);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('PrimitiveError', () => {
    it('should not be a validation error', () => {
      const error = new PrimitiveError('point (500, 2) is outside the 400x300 surface');

      expect(error.name).toBe('PrimitiveError');
      expect(error).toBeInstanceOf(Error);
      expect(error).not.toBeInstanceOf(ValidationError);
    });
  });
});
