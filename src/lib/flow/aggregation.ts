/**
 * Flow Aggregation
 *
 * Groups flow alerts by ticker and accumulates DTE-weighted directional premium:
 * - Bullish = calls bought at the ask + puts sold at the bid
 * - Bearish = puts bought at the ask + calls sold at the bid
 *
 * FS = Σ (premium × volume × w(DTE))
 */

import type {
  FlowTotals,
  OptionFlowRecord,
  RawFlowRecord,
  SkippedRecord,
  TickerFlowAccumulator,
} from "./types.js";
import { calculateDteWeight } from "./dte-weight.js";
import { partitionFlowRecords } from "./validation.js";

/**
 * Directional contribution of a single alert
 */
export interface FlowContribution {
  bullish: number;
  bearish: number;
  dteWeight: number;
}

/**
 * Calculate the weighted bullish/bearish contribution of one record
 */
export function computeFlowContribution(record: OptionFlowRecord): FlowContribution {
  const dteWeight = calculateDteWeight(record.expiry, record.date);

  const bullish =
    (record.callPremiumAskSide + record.putPremiumBidSide) * record.volume * dteWeight;
  const bearish =
    (record.putPremiumAskSide + record.callPremiumBidSide) * record.volume * dteWeight;

  return { bullish, bearish, dteWeight };
}

/**
 * Create an empty accumulator for a ticker
 */
export function createAccumulator(marketCap: number): TickerFlowAccumulator {
  return {
    bullishFlow: 0,
    bearishFlow: 0,
    totalVolume: 0,
    totalOpenInterest: 0,
    marketCap,
  };
}

/**
 * Add one record to an accumulator
 *
 * @param acc - Accumulator to update (mutated in place)
 */
export function addRecordToAccumulator(acc: TickerFlowAccumulator, record: OptionFlowRecord): void {
  const { bullish, bearish } = computeFlowContribution(record);

  acc.bullishFlow += bullish;
  acc.bearishFlow += bearish;

  // Volume and OI are tracked unweighted
  acc.totalVolume += record.volume;
  acc.totalOpenInterest += record.openInterest;
}

/**
 * Aggregate validated records into per-ticker totals
 *
 * @param records - Validated flow records
 * @param marketCaps - Optional ticker -> market cap lookup (0 when absent)
 * @returns Map keyed by ticker, in order of first appearance
 */
export function aggregateFlows(
  records: readonly OptionFlowRecord[],
  marketCaps?: ReadonlyMap<string, number>
): FlowTotals {
  const totals: FlowTotals = new Map();

  for (const record of records) {
    let acc = totals.get(record.ticker);
    if (!acc) {
      acc = createAccumulator(marketCaps?.get(record.ticker) ?? 0);
      totals.set(record.ticker, acc);
    }
    addRecordToAccumulator(acc, record);
  }

  return totals;
}

/**
 * Validate then aggregate raw rows. Malformed rows are reported, not thrown.
 */
export function aggregateRawFlows(
  raws: readonly RawFlowRecord[],
  marketCaps?: ReadonlyMap<string, number>
): { totals: FlowTotals; skipped: SkippedRecord[] } {
  const { valid, skipped } = partitionFlowRecords(raws);
  return {
    totals: aggregateFlows(valid, marketCaps),
    skipped,
  };
}
