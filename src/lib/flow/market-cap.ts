/**
 * Market Cap Classification
 *
 * Buckets securities by market capitalization and attaches the liquidity
 * thresholds used to decide which tickers are worth pulling flow for.
 */

import type { CapCategory, CapTier, FilteredStock, ScreenerStock, SecurityRecord } from "./types.js";
import { parseDecimalString } from "./validation.js";

/**
 * Cap buckets in decreasing threshold order. First match wins, so a value
 * exactly on a boundary belongs to the higher bucket.
 *
 * Securities under the micro-cap floor ($300M) are excluded entirely.
 */
export const CAP_TIERS: readonly CapTier[] = [
  // Mega-cap: >= $200B
  { category: "mega", minMarketCap: 200_000_000_000, minOpenInterest: 1000, minPremiumValue: 100_000 },
  // Large-cap: $10B - $200B
  { category: "large", minMarketCap: 10_000_000_000, minOpenInterest: 500, minPremiumValue: 50_000 },
  // Mid-cap: $2B - $10B
  { category: "mid", minMarketCap: 2_000_000_000, minOpenInterest: 200, minPremiumValue: 20_000 },
  // Small-cap: $1B - $2B
  { category: "small", minMarketCap: 1_000_000_000, minOpenInterest: 100, minPremiumValue: 10_000 },
  // Micro-cap: $300M - $1B
  { category: "micro", minMarketCap: 300_000_000, minOpenInterest: 50, minPremiumValue: 5_000 },
];

/** Display order for category reports: smallest bucket first */
export const CATEGORY_REPORT_ORDER: readonly CapCategory[] = ["micro", "small", "mid", "large", "mega"];

/**
 * Find the cap bucket for a market cap value
 * @returns The matching tier, or null when below $300M or not a number
 */
export function classifyMarketCap(marketCap: number): CapTier | null {
  return CAP_TIERS.find((tier) => marketCap >= tier.minMarketCap) ?? null;
}

/**
 * Parse a market cap from a screener value.
 * Missing values read as 0; anything that is not a number or a decimal
 * string reads as NaN.
 */
export function parseMarketCap(value: unknown): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    return parseDecimalString(value.trim());
  }
  return NaN;
}

/**
 * Classify one security
 * @returns FilteredStock, or null if the row has no ticker or falls outside every bucket
 */
export function classifySecurity(record: ScreenerStock): FilteredStock | null {
  const { ticker } = record;
  if (typeof ticker !== "string" || !ticker) {
    return null;
  }

  const marketCap = parseMarketCap(record.marketCap ?? record.marketcap);
  const tier = classifyMarketCap(marketCap);
  if (!tier) {
    return null;
  }

  return {
    ticker,
    marketCap,
    category: tier.category,
    minOpenInterest: tier.minOpenInterest,
    minPremiumValue: tier.minPremiumValue,
  };
}

/**
 * Filter a universe down to classified stocks, preserving input order
 */
export function filterStocksByMarketCap(
  records: readonly ScreenerStock[] | null | undefined
): FilteredStock[] {
  if (!records || records.length === 0) {
    return [];
  }

  const filtered: FilteredStock[] = [];
  for (const record of records) {
    const stock = classifySecurity(record);
    if (stock) {
      filtered.push(stock);
    }
  }
  return filtered;
}

/**
 * Build the ticker -> market cap lookup used to seed flow aggregation
 */
export function marketCapsByTicker(stocks: readonly SecurityRecord[]): Map<string, number> {
  return new Map(stocks.map((stock) => [stock.ticker, stock.marketCap]));
}
