/**
 * Expiry Weighting
 *
 * Near-dated options carry more directional conviction than LEAPS, so flow
 * is discounted as days-to-expiration grows.
 */

import type { CalendarDateInput } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * DTE breakpoints, ascending. The first row whose maxDte >= dte applies;
 * anything beyond the last row gets FAR_DTE_WEIGHT.
 */
export const DTE_WEIGHTS: readonly { maxDte: number; weight: number }[] = [
  { maxDte: 4, weight: 1.0 },
  { maxDte: 7, weight: 0.95 },
  { maxDte: 14, weight: 0.9 },
  { maxDte: 28, weight: 0.85 },
  { maxDte: 84, weight: 0.8 },
  { maxDte: 170, weight: 0.75 },
  { maxDte: 365, weight: 0.7 },
];

/** Weight for 366+ DTE */
export const FAR_DTE_WEIGHT = 0.65;

/** Weight used when either date is missing or unparseable */
export const DEFAULT_DTE_WEIGHT = 1.0;

/**
 * Parse a calendar date to its UTC midnight epoch (ms)
 *
 * Strings must be "YYYY-MM-DD" and name a real day ("2025-02-30" is rejected).
 * Date objects are reduced to their UTC calendar day.
 *
 * @returns Epoch ms at UTC midnight, or null if unparseable
 */
export function parseCalendarDate(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time)) return null;
    return Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate());
  }

  if (typeof value !== "string") {
    return null;
  }

  const match = value.match(ISO_DATE_REGEX);
  if (!match) {
    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1;
  const day = parseInt(match[3], 10);
  const utc = new Date(Date.UTC(year, month, day));

  // Date.UTC rolls over out-of-range days; reject instead
  if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month || utc.getUTCDate() !== day) {
    return null;
  }

  return utc.getTime();
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 * @returns Day count, or null if either date is unparseable
 */
export function daysBetween(from: unknown, to: unknown): number | null {
  const fromMs = parseCalendarDate(from);
  const toMs = parseCalendarDate(to);
  if (fromMs === null || toMs === null) {
    return null;
  }
  return Math.round((toMs - fromMs) / MS_PER_DAY);
}

/**
 * Map a DTE value to its weight.
 * Negative DTE (already expired) falls in the first bucket.
 */
export function dteWeightForDays(dte: number): number {
  for (const { maxDte, weight } of DTE_WEIGHTS) {
    if (dte <= maxDte) {
      return weight;
    }
  }
  return FAR_DTE_WEIGHT;
}

/**
 * Calculate the DTE weight for an option
 *
 * Date objects are read by their UTC calendar day, not the local one. A Date
 * built at local midnight east of UTC lands on the previous day, so pass
 * "YYYY-MM-DD" strings when mixing sources.
 *
 * @param expiry - Option expiration date
 * @param asOf - Reference date (usually the date the flow was observed)
 * @returns Weight in (0, 1]; DEFAULT_DTE_WEIGHT if either date is missing or invalid
 */
export function calculateDteWeight(
  expiry: CalendarDateInput | null | undefined,
  asOf: CalendarDateInput | null | undefined
): number {
  if (!expiry || !asOf) {
    return DEFAULT_DTE_WEIGHT;
  }

  const dte = daysBetween(asOf, expiry);
  if (dte === null) {
    return DEFAULT_DTE_WEIGHT;
  }

  return dteWeightForDays(dte);
}
