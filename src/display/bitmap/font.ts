/**
 * 5x7 bitmap font
 */

import FONT from './font-5x7.json';

const GLYPHS: Record<string, readonly string[]> = FONT.glyphs;

/**
 * Integer scale factor for a configured line height
 * @param fontHeight - Line height in pixels
 * @returns Scale >= 1
 */
export function fontScale(fontHeight: number): number {
  return Math.max(1, Math.floor(fontHeight / 8));
}

/**
 * Horizontal advance of one character at a scale
 * @param scale - Font scale
 * @returns Advance in pixels
 */
export function charAdvance(scale: number): number {
  return (FONT.width + FONT.spacing) * scale;
}

/**
 * Rows of a glyph, '#' for ink; unknown characters use the fallback glyph
 * @param ch - Single character
 * @returns Seven rows of five characters
 */
export function glyphRows(ch: string): readonly string[] {
  if (Object.prototype.hasOwnProperty.call(GLYPHS, ch)) {
    return GLYPHS[ch];
  }
  return GLYPHS[FONT.fallback];
}
