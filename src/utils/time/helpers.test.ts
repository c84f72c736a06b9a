/**
 * Tests for time helper functions
 */

import { addMinutes, formatUtcDate, parseIsoInstant, parseUtcTimestamp } from './helpers';

describe('addMinutes', () => {
  it('should shift forward and backward', () => {
    const t = Date.UTC(2025, 0, 1, 12, 0);
    expect(addMinutes(t, 10)).toBe(Date.UTC(2025, 0, 1, 12, 10));
    expect(addMinutes(t, -720)).toBe(Date.UTC(2025, 0, 1, 0, 0));
  });
});

describe('formatUtcDate', () => {
  it('should zero-pad month and day', () => {
    expect(formatUtcDate(Date.UTC(2024, 5, 6, 23, 59))).toBe('20240606');
  });

  it('should use the UTC calendar day', () => {
    expect(formatUtcDate(Date.UTC(2024, 11, 31, 0, 0))).toBe('20241231');
  });
});

describe('parseUtcTimestamp', () => {
  it('should parse a valid timestamp as UTC', () => {
    expect(parseUtcTimestamp('2024-06-16 15:06')).toBe(Date.UTC(2024, 5, 16, 15, 6));
  });

  it('should reject other layouts', () => {
    expect(parseUtcTimestamp('2024-06-16T15:06')).toBeNull();
    expect(parseUtcTimestamp('2024-6-16 15:06')).toBeNull();
    expect(parseUtcTimestamp('')).toBeNull();
  });

  it('should reject out-of-range fields', () => {
    expect(parseUtcTimestamp('2024-02-30 10:00')).toBeNull();
    expect(parseUtcTimestamp('2024-06-16 24:00')).toBeNull();
    expect(parseUtcTimestamp('2024-13-01 00:00')).toBeNull();
  });
});

describe('parseIsoInstant', () => {
  it('should parse ISO text', () => {
    expect(parseIsoInstant('2025-07-24T06:30:00Z')).toBe(Date.UTC(2025, 6, 24, 6, 30));
  });

  it('should return null for garbage', () => {
    expect(parseIsoInstant('yesterday')).toBeNull();
  });
});
