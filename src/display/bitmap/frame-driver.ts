/**
 * Frame drivers
 *
 * The panel itself is reached through an external driver; the PBM writer
 * stores frames on disk for development and previews.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { Frame, FrameDriver } from './types';

/**
 * Encode a frame as binary PBM (P4)
 *
 * P4 uses the same layout as Frame: rows padded to bytes, MSB first, 1 = black.
 *
 * @param frame - Packed frame
 * @returns File contents
 */
export function encodePbm(frame: Frame): Buffer {
  const header = Buffer.from('P4\n' + frame.width + ' ' + frame.height + '\n', 'ascii');
  return Buffer.concat([header, Buffer.from(frame.data)]);
}

/**
 * Create a driver that writes each frame to a PBM file
 *
 * @param filePath - Output file (replaced on every write)
 * @returns Frame driver
 */
export function createPbmDriver(filePath: string): FrameDriver {
  function write(frame: Frame): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, encodePbm(frame));
  }

  return {
    write: write
  };
}
