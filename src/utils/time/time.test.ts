/**
 * Tests for time utility functions
 */

import { now } from './time';

describe('Time Utilities', () => {
  describe('now', () => {
    it('should return current time in milliseconds', () => {
      const before = Date.now();
      const result = now();
      const after = Date.now();

      expect(result).toBeGreaterThanOrEqual(before);
      expect(result).toBeLessThanOrEqual(after);
    });

    it('should follow a mocked system clock', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-07-24T00:00:00Z'));

      expect(now()).toBe(Date.UTC(2025, 6, 24));

      vi.useRealTimers();
    });
  });
});
