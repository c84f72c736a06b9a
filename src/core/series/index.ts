export { applyDatum, canonicalOffsets, nowSample, validateSeries, withSource } from './series';
export * from './types';
