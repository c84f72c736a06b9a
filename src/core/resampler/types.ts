/**
 * Resampler type definitions
 */

import type { Instant } from '$types/common';

/**
 * Irregular station observation or prediction
 */
export interface RawSample {
  /** Absolute time of the value */
  time: Instant;
  /** Height above chart datum (ft) */
  heightFt: number;
}
