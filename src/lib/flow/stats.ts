/**
 * Robust Statistics
 *
 * Outlier-resistant scaling for cross-ticker comparisons.
 */

/** Scales MAD to a standard deviation estimate for normally distributed data */
export const MAD_SCALE = 1.4826;

/**
 * Median of a numeric sequence
 * @returns The median, or NaN for an empty sequence
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Robust z-score using median and MAD (median absolute deviation)
 *
 * z = (x - median) / (1.4826 × MAD)
 *
 * @returns One score per input value; all zeros when the input is empty or MAD is 0
 */
export function robustZscore(values: readonly number[]): number[] {
  if (values.length === 0) return [];

  const center = median(values);
  const mad = median(values.map((x) => Math.abs(x - center)));

  if (mad === 0) {
    return values.map(() => 0);
  }

  return values.map((x) => (x - center) / (MAD_SCALE * mad));
}
