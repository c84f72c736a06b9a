export { now } from './time';
export { addMinutes, formatUtcDate, parseIsoInstant, parseUtcTimestamp } from './helpers';
