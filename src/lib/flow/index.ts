/**
 * Options Flow Scoring Library
 *
 * Ranks equities by the directional premium in their options flow.
 *
 * Stages:
 * 1. Classification: market cap buckets and liquidity thresholds
 * 2. Weighting: DTE decay so near-dated flow counts more
 * 3. Validation: explicit skip stage for malformed alerts
 * 4. Aggregation: per-ticker bullish/bearish premium
 * 5. Ranking: standardized score, top bullish and bearish lists
 * 6. Breakdown: ranked lists regrouped by cap bucket
 */

// Types
export type {
  CapCategory,
  CapTier,
  SecurityRecord,
  ScreenerStock,
  FilteredStock,
  CalendarDateInput,
  OptionFlowRecord,
  RawFlowRecord,
  SkipReason,
  RecordResult,
  SkippedRecord,
  TickerFlowAccumulator,
  FlowTotals,
  RankedEntry,
  FlowRankings,
  MarketCapBreakdownRow,
} from "./types.js";

// Classification
export {
  CAP_TIERS,
  CATEGORY_REPORT_ORDER,
  classifyMarketCap,
  parseMarketCap,
  classifySecurity,
  filterStocksByMarketCap,
  marketCapsByTicker,
} from "./market-cap.js";

// DTE weighting
export {
  DTE_WEIGHTS,
  FAR_DTE_WEIGHT,
  DEFAULT_DTE_WEIGHT,
  parseCalendarDate,
  daysBetween,
  dteWeightForDays,
  calculateDteWeight,
} from "./dte-weight.js";

// Validation
export { parseDecimalString, parseNumericField, validateFlowRecord, partitionFlowRecords } from "./validation.js";

// Aggregation
export type { FlowContribution } from "./aggregation.js";
export {
  computeFlowContribution,
  createAccumulator,
  addRecordToAccumulator,
  aggregateFlows,
  aggregateRawFlows,
} from "./aggregation.js";

// Ranking
export {
  DEFAULT_TOP_N,
  calculateRelativeFlow,
  calculateStandardizedScore,
  toRankedEntry,
  buildRankedEntries,
  selectTopBullish,
  selectTopBearish,
  rankFlows,
} from "./ranking.js";

// Statistics
export { MAD_SCALE, median, robustZscore } from "./stats.js";

// Breakdown
export {
  TOP_PER_CATEGORY,
  CATEGORY_LABELS,
  groupTickersByCategory,
  buildMarketCapBreakdown,
} from "./breakdown.js";

// Pipeline
export type { FlowAnalysisInput, FlowAnalysisResult } from "./pipeline.js";
export { runFlowAnalysis } from "./pipeline.js";
