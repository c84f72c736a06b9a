/**
 * Time helper functions
 */

import { TIME_CONSTANTS } from '../constants';

import type { Instant } from '$types/common';

const NOAA_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

/**
 * Instant at a whole number of minutes from a reference
 * @param reference - Reference instant
 * @param minutes - Signed minute offset
 * @returns Shifted instant
 */
export function addMinutes(reference: Instant, minutes: number): Instant {
  return reference + minutes * TIME_CONSTANTS.MS_PER_MINUTE;
}

/**
 * Format an instant as a UTC calendar day, "YYYYMMDD"
 * @param instant - Instant to format
 * @returns Compact UTC date
 */
export function formatUtcDate(instant: Instant): string {
  const d = new Date(instant);
  const month = d.getUTCMonth() + 1;
  const day = d.getUTCDate();
  return String(d.getUTCFullYear()) + (month < 10 ? '0' : '') + month + (day < 10 ? '0' : '') + day;
}

/**
 * Parse a "YYYY-MM-DD HH:MM" timestamp interpreted as UTC
 *
 * Rejects out-of-range fields (e.g. "2024-02-30 10:00") instead of letting
 * Date roll them over into the next month.
 *
 * @param text - Timestamp text
 * @returns Instant, or null when the text is not a valid timestamp
 */
export function parseUtcTimestamp(text: string): Instant | null {
  const match = NOAA_TIMESTAMP.exec(text);
  if (!match) {
    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const hour = parseInt(match[4], 10);
  const minute = parseInt(match[5], 10);

  const instant = Date.UTC(year, month - 1, day, hour, minute);
  const check = new Date(instant);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute
  ) {
    return null;
  }

  return instant;
}

/**
 * Parse an ISO-8601 date-time
 * @param text - ISO text, e.g. "2025-07-24T00:00:00Z"
 * @returns Instant, or null when unparseable
 */
export function parseIsoInstant(text: string): Instant | null {
  const instant = Date.parse(text);
  return isNaN(instant) ? null : instant;
}
