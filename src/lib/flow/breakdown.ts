/**
 * Market Cap Breakdown
 *
 * Regroups the ranked lists by cap bucket so small-cap activity is not
 * drowned out by mega-cap names.
 */

import type { CapCategory, FilteredStock, MarketCapBreakdownRow, RankedEntry } from "./types.js";
import { CATEGORY_REPORT_ORDER } from "./market-cap.js";

/** Entries shown per category and side */
export const TOP_PER_CATEGORY = 2;

export const CATEGORY_LABELS: Record<CapCategory, string> = {
  mega: "Mega Cap",
  large: "Large Cap",
  mid: "Mid Cap",
  small: "Small Cap",
  micro: "Micro Cap",
};

/**
 * Group filtered tickers by cap category
 */
export function groupTickersByCategory(stocks: readonly FilteredStock[]): Map<CapCategory, Set<string>> {
  const groups = new Map<CapCategory, Set<string>>();
  for (const stock of stocks) {
    let tickers = groups.get(stock.category);
    if (!tickers) {
      tickers = new Set();
      groups.set(stock.category, tickers);
    }
    tickers.add(stock.ticker);
  }
  return groups;
}

/**
 * Build the per-category breakdown
 *
 * Categories run smallest to largest. A category with no filtered stocks is
 * omitted entirely; one with members but no ranked entries still gets a row.
 *
 * @param bullish - Ranked bullish list (rank order is kept)
 * @param bearish - Ranked bearish list (rank order is kept)
 * @param filteredStocks - Universe after market cap filtering
 */
export function buildMarketCapBreakdown(
  bullish: readonly RankedEntry[],
  bearish: readonly RankedEntry[],
  filteredStocks: readonly FilteredStock[],
  topPerCategory: number = TOP_PER_CATEGORY
): MarketCapBreakdownRow[] {
  const groups = groupTickersByCategory(filteredStocks);
  const rows: MarketCapBreakdownRow[] = [];

  for (const category of CATEGORY_REPORT_ORDER) {
    const tickers = groups.get(category);
    if (!tickers || tickers.size === 0) continue;

    const bullishInCategory = bullish.filter((entry) => tickers.has(entry.ticker));
    const bearishInCategory = bearish.filter((entry) => tickers.has(entry.ticker));

    rows.push({
      category,
      label: CATEGORY_LABELS[category],
      bullishCount: bullishInCategory.length,
      bearishCount: bearishInCategory.length,
      topBullish: bullishInCategory.slice(0, topPerCategory),
      topBearish: bearishInCategory.slice(0, topPerCategory),
    });
  }

  return rows;
}
