export { createTextSink, lineGlyph, GLYPHS } from './text-sink';
export * from './types';
