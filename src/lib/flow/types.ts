/**
 * Type definitions for options flow scoring and ranking
 */

/**
 * Market capitalization bucket, ordered by decreasing minimum cap
 */
export type CapCategory = "mega" | "large" | "mid" | "small" | "micro";

/**
 * External reference data for one security
 */
export interface SecurityRecord {
  ticker: string;
  /** Market capitalization in USD */
  marketCap: number;
}

/**
 * Screener row before validation.
 * Market cap arrives as a decimal string or a number and may be missing; the
 * vendor's `marketcap` and the normalized `marketCap` are both read.
 */
export interface ScreenerStock {
  ticker?: unknown;
  marketCap?: unknown;
  marketcap?: unknown;
  [key: string]: unknown;
}

/**
 * Liquidity thresholds attached to a cap bucket
 */
export interface CapTier {
  category: CapCategory;
  /** Inclusive lower bound of the bucket in USD */
  minMarketCap: number;
  /** Eligibility hint for downstream fetch filtering */
  minOpenInterest: number;
  /** Eligibility hint for downstream fetch filtering */
  minPremiumValue: number;
}

/**
 * A security that passed the market cap filter
 */
export interface FilteredStock {
  ticker: string;
  marketCap: number;
  category: CapCategory;
  minOpenInterest: number;
  minPremiumValue: number;
}

/** Calendar date as a Date or an ISO "YYYY-MM-DD" string */
export type CalendarDateInput = Date | string;

/**
 * One observed options flow alert, validated
 */
export interface OptionFlowRecord {
  ticker: string;
  /** Call premium traded at the ask (aggressive call buying) */
  callPremiumAskSide: number;
  /** Call premium traded at the bid (aggressive call selling) */
  callPremiumBidSide: number;
  /** Put premium traded at the ask (aggressive put buying) */
  putPremiumAskSide: number;
  /** Put premium traded at the bid (aggressive put selling) */
  putPremiumBidSide: number;
  expiry: CalendarDateInput | null;
  /** Date the alert was observed; reference date for DTE */
  date: CalendarDateInput | null;
  volume: number;
  openInterest: number;
  totalPremium: number;
}

/**
 * Flow row before validation. Field names follow OptionFlowRecord;
 * values are whatever the data source handed over.
 */
export interface RawFlowRecord {
  ticker?: unknown;
  callPremiumAskSide?: unknown;
  callPremiumBidSide?: unknown;
  putPremiumAskSide?: unknown;
  putPremiumBidSide?: unknown;
  expiry?: unknown;
  date?: unknown;
  volume?: unknown;
  openInterest?: unknown;
  totalPremium?: unknown;
}

export type SkipReason =
  | "missing_ticker"
  | "invalid_premium"
  | "invalid_volume"
  | "invalid_open_interest";

export type RecordResult =
  | { ok: true; record: OptionFlowRecord }
  | { ok: false; reason: SkipReason };

/**
 * A flow row dropped by validation
 */
export interface SkippedRecord {
  /** Position in the input sequence */
  index: number;
  reason: SkipReason;
}

/**
 * Running per-ticker totals during one aggregation pass
 */
export interface TickerFlowAccumulator {
  /** Σ (callAsk + putBid) × volume × dteWeight */
  bullishFlow: number;
  /** Σ (putAsk + callBid) × volume × dteWeight */
  bearishFlow: number;
  totalVolume: number;
  totalOpenInterest: number;
  marketCap: number;
}

export type FlowTotals = Map<string, TickerFlowAccumulator>;

/**
 * Ranked output row for one ticker
 */
export interface RankedEntry {
  ticker: string;
  bullishFlow: number;
  bearishFlow: number;
  /** bullishFlow - bearishFlow */
  netFlow: number;
  totalVolume: number;
  totalOpenInterest: number;
  marketCap: number;
  /** netFlow / marketCap, 0 when market cap is unknown */
  relativeFlow: number;
  /** Volume-normalized net flow used for cross-ticker ranking */
  standardizedScore: number;
}

/**
 * Ranked lists for one analysis
 */
export interface FlowRankings {
  /** netFlow > 0, standardizedScore descending */
  bullish: RankedEntry[];
  /** netFlow < 0, standardizedScore ascending */
  bearish: RankedEntry[];
  /** Every ranked ticker, in aggregation order */
  entries: RankedEntry[];
}

/**
 * Category summary row for the market cap breakdown
 */
export interface MarketCapBreakdownRow {
  category: CapCategory;
  /** Display label, e.g. "Mid Cap" */
  label: string;
  bullishCount: number;
  bearishCount: number;
  topBullish: RankedEntry[];
  topBearish: RankedEntry[];
}
