export { resampleSeries } from './resampler';
export { findLeftIndex, interpolate, sortByTime } from './helpers';
export * from './types';
