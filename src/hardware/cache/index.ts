export { createCacheStore } from './cache';
export { decodeEntry, encodeEntry } from './helpers';
export * from './types';
