export { clockPhase, DEFAULT_FALLBACK_MODEL, generateFallbackSeries } from './fallback';
export * from './types';
