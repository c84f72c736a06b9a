export { createStationClient } from './station';
export { buildPredictionsUrl, checkCoverage, parsePredictions } from './helpers';
export * from './types';
