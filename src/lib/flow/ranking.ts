/**
 * Flow Ranking
 *
 * Turns per-ticker totals into ranked entries and picks the top bullish and
 * bearish names by standardized score.
 */

import type { FlowRankings, FlowTotals, RankedEntry, TickerFlowAccumulator } from "./types.js";
import { InvariantViolation } from "../errors.js";

/** Default size of each ranked list */
export const DEFAULT_TOP_N = 20;

/**
 * Calculate relative flow (net premium relative to market cap)
 * @returns netFlow / marketCap, or 0 if market cap is unknown
 */
export function calculateRelativeFlow(netFlow: number, marketCap: number): number {
  return marketCap > 0 ? netFlow / marketCap : 0;
}

/**
 * Calculate standardized score
 *
 * score = (netFlow / totalVolume) × √totalVolume
 *
 * Average flow per contract, scaled up by the square root of activity so that
 * heavily traded names outrank thin ones with the same per-contract flow.
 * Kept in this form rather than netFlow / √totalVolume so results match
 * bit-for-bit.
 *
 * @returns The score, or 0 if there was no volume
 */
export function calculateStandardizedScore(netFlow: number, totalVolume: number): number {
  if (totalVolume > 0) {
    return (netFlow / totalVolume) * Math.sqrt(totalVolume);
  }
  return 0;
}

/**
 * Derive the ranked entry for one ticker
 * @throws InvariantViolation if market cap or volume is negative
 */
export function toRankedEntry(ticker: string, acc: TickerFlowAccumulator): RankedEntry {
  if (acc.marketCap < 0) {
    throw new InvariantViolation(`Negative market cap for ${ticker}: ${acc.marketCap}`);
  }
  if (acc.totalVolume < 0) {
    throw new InvariantViolation(`Negative total volume for ${ticker}: ${acc.totalVolume}`);
  }

  const netFlow = acc.bullishFlow - acc.bearishFlow;

  return {
    ticker,
    bullishFlow: acc.bullishFlow,
    bearishFlow: acc.bearishFlow,
    netFlow,
    totalVolume: acc.totalVolume,
    totalOpenInterest: acc.totalOpenInterest,
    marketCap: acc.marketCap,
    relativeFlow: calculateRelativeFlow(netFlow, acc.marketCap),
    standardizedScore: calculateStandardizedScore(netFlow, acc.totalVolume),
  };
}

/**
 * Build ranked entries for every aggregated ticker, in aggregation order
 */
export function buildRankedEntries(totals: FlowTotals): RankedEntry[] {
  const entries: RankedEntry[] = [];
  for (const [ticker, acc] of totals) {
    entries.push(toRankedEntry(ticker, acc));
  }
  return entries;
}

/** Ascending code-unit order, so ties do not depend on map iteration order */
function compareTickers(a: RankedEntry, b: RankedEntry): number {
  if (a.ticker < b.ticker) return -1;
  if (a.ticker > b.ticker) return 1;
  return 0;
}

/**
 * Top N entries with positive net flow, highest standardized score first
 */
export function selectTopBullish(entries: readonly RankedEntry[], topN: number): RankedEntry[] {
  return entries
    .filter((entry) => entry.netFlow > 0)
    .sort((a, b) => b.standardizedScore - a.standardizedScore || compareTickers(a, b))
    .slice(0, topN);
}

/**
 * Top N entries with negative net flow, most negative standardized score first
 */
export function selectTopBearish(entries: readonly RankedEntry[], topN: number): RankedEntry[] {
  return entries
    .filter((entry) => entry.netFlow < 0)
    .sort((a, b) => a.standardizedScore - b.standardizedScore || compareTickers(a, b))
    .slice(0, topN);
}

/**
 * Rank aggregated flow
 *
 * Tickers with zero net flow appear in neither list.
 *
 * @param totals - Per-ticker totals from aggregateFlows
 * @param topN - Maximum size of each list
 * @returns Ranked lists, or null when there is no data at all (distinct from
 *   lists that are computed but empty)
 */
export function rankFlows(totals: FlowTotals, topN: number = DEFAULT_TOP_N): FlowRankings | null {
  if (!Number.isInteger(topN) || topN <= 0) {
    throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }

  if (totals.size === 0) {
    return null;
  }

  const entries = buildRankedEntries(totals);

  return {
    bullish: selectTopBullish(entries, topN),
    bearish: selectTopBearish(entries, topN),
    entries,
  };
}
