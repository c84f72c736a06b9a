/**
 * Tests for logging helpers
 */

import { fmtHeight, formatLogMessage, shouldLog, toLogLevel } from './helpers';

import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = { DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 };

describe('fmtHeight', () => {
  it('should format to one decimal with unit', () => {
    expect(fmtHeight(4.26)).toBe('4.3ft');
    expect(fmtHeight(-0.04)).toBe('-0.0ft');
  });

  it('should show n/a for non-finite values', () => {
    expect(fmtHeight(NaN)).toBe('n/a');
  });
});

describe('formatLogMessage', () => {
  it('should prefix every level with its tag', () => {
    expect(formatLogMessage(0, 'm', LOG_LEVELS)).toBe('[DEBUG]    m');
    expect(formatLogMessage(1, 'm', LOG_LEVELS)).toBe('[INFO]     m');
    expect(formatLogMessage(2, 'm', LOG_LEVELS)).toBe('[WARNING]  m');
    expect(formatLogMessage(3, 'm', LOG_LEVELS)).toBe('[CRITICAL] m');
  });
});

describe('shouldLog', () => {
  it('should pass levels at or above the current level', () => {
    expect(shouldLog(2, 2)).toBe(true);
    expect(shouldLog(3, 1)).toBe(true);
  });

  it('should suppress levels below the current level', () => {
    expect(shouldLog(0, 1)).toBe(false);
  });
});

describe('toLogLevel', () => {
  it('should accept 0-3', () => {
    expect(toLogLevel(2, 1)).toBe(2);
  });

  it('should fall back for anything else', () => {
    expect(toLogLevel(7, 1)).toBe(1);
    expect(toLogLevel(1.5, 0)).toBe(0);
  });
});
