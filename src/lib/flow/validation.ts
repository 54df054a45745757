/**
 * Flow Record Validation
 *
 * Explicit skip stage ahead of aggregation. Each raw row either becomes an
 * OptionFlowRecord or is dropped with a reason, so one malformed alert can
 * never take down the rest of the batch.
 */

import type {
  CalendarDateInput,
  OptionFlowRecord,
  RawFlowRecord,
  RecordResult,
  SkippedRecord,
} from "./types.js";

/** Plain decimal notation; hex, binary and octal literals do not match */
const DECIMAL_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a trimmed decimal string
 * @returns The number, or NaN when the text is not plain decimal notation
 */
export function parseDecimalString(text: string): number {
  return DECIMAL_REGEX.test(text) ? Number(text) : NaN;
}

/**
 * Read a numeric field. Absent fields read as 0 (the vendor omits zero
 * premiums); decimal strings are parsed.
 * @returns The number, or null if present but not a finite number
 */
export function parseNumericField(value: unknown): number | null {
  if (value === undefined) return 0;

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string") {
    const parsed = parseDecimalString(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

function toCalendarDate(value: unknown): CalendarDateInput | null {
  if (value instanceof Date || typeof value === "string") {
    return value;
  }
  return null;
}

/**
 * Validate one raw flow row
 */
export function validateFlowRecord(raw: RawFlowRecord): RecordResult {
  const { ticker } = raw;
  if (typeof ticker !== "string" || !ticker) {
    return { ok: false, reason: "missing_ticker" };
  }

  const callPremiumAskSide = parseNumericField(raw.callPremiumAskSide);
  const callPremiumBidSide = parseNumericField(raw.callPremiumBidSide);
  const putPremiumAskSide = parseNumericField(raw.putPremiumAskSide);
  const putPremiumBidSide = parseNumericField(raw.putPremiumBidSide);
  if (
    callPremiumAskSide === null ||
    callPremiumBidSide === null ||
    putPremiumAskSide === null ||
    putPremiumBidSide === null
  ) {
    return { ok: false, reason: "invalid_premium" };
  }

  const volume = parseNumericField(raw.volume);
  if (volume === null || volume < 0) {
    return { ok: false, reason: "invalid_volume" };
  }

  const openInterest = parseNumericField(raw.openInterest);
  if (openInterest === null || openInterest < 0) {
    return { ok: false, reason: "invalid_open_interest" };
  }

  return {
    ok: true,
    record: {
      ticker,
      callPremiumAskSide,
      callPremiumBidSide,
      putPremiumAskSide,
      putPremiumBidSide,
      expiry: toCalendarDate(raw.expiry),
      date: toCalendarDate(raw.date),
      volume,
      openInterest,
      // Informational only; not used in scoring
      totalPremium: parseNumericField(raw.totalPremium) ?? 0,
    },
  };
}

/**
 * Split raw rows into valid records and skipped rows, preserving order
 */
export function partitionFlowRecords(raws: readonly RawFlowRecord[]): {
  valid: OptionFlowRecord[];
  skipped: SkippedRecord[];
} {
  const valid: OptionFlowRecord[] = [];
  const skipped: SkippedRecord[] = [];

  raws.forEach((raw, index) => {
    const result = validateFlowRecord(raw);
    if (result.ok) {
      valid.push(result.record);
    } else {
      skipped.push({ index, reason: result.reason });
    }
  });

  return { valid, skipped };
}
