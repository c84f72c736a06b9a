/**
 * Time utility functions
 */

import type { Instant } from '$types/common';

/**
 * Get current time
 * @returns Current time in milliseconds since epoch
 */
export function now(): Instant {
  return Date.now();
}
