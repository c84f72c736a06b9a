/**
 * Tide service helper functions
 */

import type { LiveDataError } from '$types/errors';

/**
 * Describe an absorbed live-branch failure for the log
 * @param error - Station or resample error
 * @returns Log text, e.g. "Live data unavailable (network): HTTP 503"
 */
export function describeLiveFailure(error: LiveDataError): string {
  return 'Live data unavailable (' + error.kind + '): ' + error.message;
}
