export { createTideService } from './tide-service';
export { describeLiveFailure } from './helpers';
export * from './types';
