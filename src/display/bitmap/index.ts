export { createBitmapSink } from './bitmap-sink';
export { createPbmDriver, encodePbm } from './frame-driver';
export { charAdvance, fontScale, glyphRows } from './font';
export * from './types';
