/**
 * Tests for the offline tide approximation
 */

import { clockPhase, DEFAULT_FALLBACK_MODEL, generateFallbackSeries } from './fallback';

import { validateSeries } from '@core/series';

const HOUR = 3600000;
const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);

describe('fallback', () => {
  describe('generateFallbackSeries', () => {
    it('should produce a valid series tagged fallback', () => {
      const series = generateFallbackSeries(NOW);

      expect(series.source).toBe('fallback');
      expect(validateSeries(series.samples)).toBeNull();
    });

    it('should keep the range within six feet across a whole period', () => {
      // 25 instants spread over one 12.42 h cycle
      const step = DEFAULT_FALLBACK_MODEL.periodHours * HOUR / 24;
      for (let k = 0; k <= 24; k++) {
        const heights = generateFallbackSeries(NOW + k * step).samples.map((s) => s.heightFt);
        const range = Math.max(...heights) - Math.min(...heights);

        expect(range).toBeGreaterThan(5.5);
        expect(range).toBeLessThanOrEqual(6);
      }
    });

    it('should keep the range within six feet at distant epochs', () => {
      const instants = [
        0,
        Date.UTC(1900, 0, 1, 0, 0, 0),
        Date.UTC(1999, 11, 31, 23, 59, 0),
        Date.UTC(2100, 6, 4, 6, 30, 0),
        Date.UTC(2262, 3, 11, 23, 47, 0),
      ];

      for (const instant of instants) {
        const heights = generateFallbackSeries(instant).samples.map((s) => s.heightFt);
        const range = Math.max(...heights) - Math.min(...heights);

        expect(validateSeries(generateFallbackSeries(instant).samples)).toBeNull();
        expect(range).toBeGreaterThan(5.5);
        expect(range).toBeLessThanOrEqual(6);
      }
    });

    it('should stay within mean plus or minus amplitude', () => {
      const model = DEFAULT_FALLBACK_MODEL;
      for (const s of generateFallbackSeries(NOW).samples) {
        expect(s.heightFt).toBeGreaterThanOrEqual(model.meanLevelFt - model.amplitudeFt - 1e-9);
        expect(s.heightFt).toBeLessThanOrEqual(model.meanLevelFt + model.amplitudeFt + 1e-9);
      }
    });

    it('should be deterministic for the same instant', () => {
      expect(generateFallbackSeries(NOW)).toEqual(generateFallbackSeries(NOW));
    });

    it('should advance with the clock', () => {
      const a = generateFallbackSeries(NOW).samples[72].heightFt;
      const b = generateFallbackSeries(NOW + 3 * HOUR).samples[72].heightFt;

      expect(a).not.toBeCloseTo(b, 3);
    });

    it('should match the curve shifted by one step', () => {
      // the sample at +10 min now equals the sample at 0 ten minutes later
      const earlier = generateFallbackSeries(NOW).samples[73].heightFt;
      const later = generateFallbackSeries(NOW + 10 * 60000).samples[72].heightFt;

      expect(later).toBeCloseTo(earlier, 9);
    });

    it('should use a custom model when given', () => {
      const series = generateFallbackSeries(NOW, {
        meanLevelFt: 2,
        amplitudeFt: 0,
        periodHours: 12.42,
        lunitidalOffsetHours: 0,
      });

      expect(series.samples.every((s) => s.heightFt === 2)).toBe(true);
    });
  });

  describe('clockPhase', () => {
    it('should be zero when the shifted clock sits on a period boundary', () => {
      expect(clockPhase(-3.59 * HOUR, DEFAULT_FALLBACK_MODEL)).toBe(0);
    });

    it('should stay within one turn', () => {
      const phase = clockPhase(NOW, DEFAULT_FALLBACK_MODEL);

      expect(phase).toBeGreaterThanOrEqual(0);
      expect(phase).toBeLessThan(2 * Math.PI);
    });

    it('should repeat after one period', () => {
      const periodMs = DEFAULT_FALLBACK_MODEL.periodHours * HOUR;
      const a = clockPhase(NOW, DEFAULT_FALLBACK_MODEL);
      const b = clockPhase(NOW + periodMs, DEFAULT_FALLBACK_MODEL);

      expect(Math.cos(b)).toBeCloseTo(Math.cos(a), 6);
    });
  });
});
