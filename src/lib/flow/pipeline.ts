/**
 * Flow Analysis Pipeline
 *
 * universe -> market cap filter -> validate + aggregate flow -> rank -> breakdown
 *
 * Pure: all inputs are passed in, nothing is fetched and no clock is read.
 */

import type {
  FilteredStock,
  FlowRankings,
  MarketCapBreakdownRow,
  RawFlowRecord,
  ScreenerStock,
  SkippedRecord,
} from "./types.js";
import { filterStocksByMarketCap, marketCapsByTicker } from "./market-cap.js";
import { aggregateRawFlows } from "./aggregation.js";
import { DEFAULT_TOP_N, rankFlows } from "./ranking.js";
import { buildMarketCapBreakdown } from "./breakdown.js";

export interface FlowAnalysisInput {
  /** Raw stock universe */
  securities: readonly ScreenerStock[];
  /** Raw flow alerts for the analysis date */
  flows: readonly RawFlowRecord[];
  topN?: number;
}

export type FlowAnalysisResult =
  | {
      status: "no_data";
      filteredStocks: FilteredStock[];
      skipped: SkippedRecord[];
    }
  | {
      status: "ok";
      rankings: FlowRankings;
      breakdown: MarketCapBreakdownRow[];
      filteredStocks: FilteredStock[];
      skipped: SkippedRecord[];
    };

/**
 * Run the full scoring and ranking pipeline over in-memory data
 */
export function runFlowAnalysis(input: FlowAnalysisInput): FlowAnalysisResult {
  const filteredStocks = filterStocksByMarketCap(input.securities);
  const marketCaps = marketCapsByTicker(filteredStocks);

  const { totals, skipped } = aggregateRawFlows(input.flows, marketCaps);
  const rankings = rankFlows(totals, input.topN ?? DEFAULT_TOP_N);

  if (!rankings) {
    return { status: "no_data", filteredStocks, skipped };
  }

  return {
    status: "ok",
    rankings,
    breakdown: buildMarketCapBreakdown(rankings.bullish, rankings.bearish, filteredStocks),
    filteredStocks,
    skipped,
  };
}
