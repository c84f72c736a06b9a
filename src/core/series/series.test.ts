/**
 * Tests for series invariants and transformations
 */

import { applyDatum, canonicalOffsets, nowSample, validateSeries, withSource } from './series';

import type { Sample, Series } from './types';

function flatSamples(heightFt: number): Sample[] {
  return canonicalOffsets().map((offsetMinutes) => ({ offsetMinutes, heightFt }));
}

describe('series', () => {
  describe('canonicalOffsets', () => {
    it('should span -720..720 in steps of 10', () => {
      const offsets = canonicalOffsets();

      expect(offsets).toHaveLength(145);
      expect(offsets[0]).toBe(-720);
      expect(offsets[72]).toBe(0);
      expect(offsets[144]).toBe(720);
      for (let i = 1; i < offsets.length; i++) {
        expect(offsets[i] - offsets[i - 1]).toBe(10);
      }
    });
  });

  describe('validateSeries', () => {
    it('should accept a canonical series', () => {
      expect(validateSeries(flatSamples(3))).toBeNull();
    });

    it('should reject the wrong sample count', () => {
      expect(validateSeries(flatSamples(3).slice(1))).toBe('expected 145 samples, got 144');
    });

    it('should reject a misplaced offset', () => {
      const samples = flatSamples(3);
      samples[10] = { offsetMinutes: -615, heightFt: 3 };

      expect(validateSeries(samples)).toBe('sample 10 has offset -615, expected -620');
    });

    it('should reject non-finite heights', () => {
      const samples = flatSamples(3);
      samples[144] = { offsetMinutes: 720, heightFt: NaN };

      expect(validateSeries(samples)).toBe('sample 144 has non-finite height');
    });
  });

  describe('nowSample', () => {
    it('should return the offset 0 sample', () => {
      const samples = flatSamples(1);
      samples[72] = { offsetMinutes: 0, heightFt: 6.5 };

      expect(nowSample({ samples, source: 'live' })).toEqual({ offsetMinutes: 0, heightFt: 6.5 });
    });
  });

  describe('applyDatum', () => {
    it('should subtract the MSL offset when showing MSL', () => {
      const shifted = applyDatum(flatSamples(5), { showMsl: true, mslOffsetFt: 4.5 });

      expect(shifted[0].heightFt).toBe(0.5);
      expect(shifted[144].offsetMinutes).toBe(720);
    });

    it('should leave MLLW heights alone otherwise', () => {
      const original = flatSamples(5);
      const shifted = applyDatum(original, { showMsl: false, mslOffsetFt: 4.5 });

      expect(shifted[0].heightFt).toBe(5);
      expect(shifted).not.toBe(original);
    });
  });

  describe('withSource', () => {
    it('should copy samples and change only the tag', () => {
      const series: Series = { samples: flatSamples(2), source: 'live' };
      const cached = withSource(series, 'cached');

      expect(cached.source).toBe('cached');
      expect(cached.samples).toEqual(series.samples);
      expect(cached.samples).not.toBe(series.samples);
    });
  });
});
