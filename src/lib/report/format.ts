/**
 * Console Report Formatting
 *
 * Plain-text tables for the ranked lists and the market cap breakdown.
 */

import type { MarketCapBreakdownRow, RankedEntry } from "../flow/types.js";

const moneyFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const countFormat = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

/** "1,234,567.89" */
export function formatMoney(value: number): string {
  return moneyFormat.format(value);
}

/** "1,234,568" */
export function formatCount(value: number): string {
  return countFormat.format(value);
}

interface Column {
  header: string;
  format: (entry: RankedEntry) => string;
}

export const RANKING_COLUMNS: readonly Column[] = [
  { header: "ticker", format: (e) => e.ticker },
  { header: "bullish_flow", format: (e) => formatMoney(e.bullishFlow) },
  { header: "bearish_flow", format: (e) => formatMoney(e.bearishFlow) },
  { header: "net_flow", format: (e) => formatMoney(e.netFlow) },
  { header: "total_volume", format: (e) => formatCount(e.totalVolume) },
  { header: "market_cap", format: (e) => formatMoney(e.marketCap) },
  { header: "relative_flow", format: (e) => e.relativeFlow.toFixed(6) },
  { header: "standardized_score", format: (e) => e.standardizedScore.toFixed(2) },
];

/**
 * Render ranked entries as a right-aligned text table.
 * Columns are separated by two spaces; no trailing newline.
 */
export function formatRankingTable(entries: readonly RankedEntry[]): string {
  const cells = entries.map((entry) => RANKING_COLUMNS.map((col) => col.format(entry)));
  const widths = RANKING_COLUMNS.map((col, i) =>
    Math.max(col.header.length, ...cells.map((row) => row[i].length))
  );

  const renderRow = (row: readonly string[]): string =>
    row.map((cell, i) => cell.padStart(widths[i])).join("  ");

  return [renderRow(RANKING_COLUMNS.map((col) => col.header)), ...cells.map(renderRow)].join("\n");
}

/**
 * Render one ranked list section with its title
 */
export function formatRankingSection(title: string, entries: readonly RankedEntry[], emptyMessage: string): string {
  const lines = [title, "=".repeat(50)];
  lines.push(entries.length > 0 ? formatRankingTable(entries) : emptyMessage);
  return lines.join("\n");
}

function formatTopEntries(entries: readonly RankedEntry[]): string {
  return entries.map((entry) => `${entry.ticker} (${formatMoney(entry.netFlow)})`).join(", ");
}

/**
 * Render the market cap breakdown
 *
 * Example:
 *   Mid Cap: 2 bullish, 1 bearish
 *   Top Bullish: ABC (12,000.00), DEF (9,500.00)
 *   Top Bearish: GHI (-4,000.00)
 */
export function formatBreakdown(rows: readonly MarketCapBreakdownRow[]): string {
  const lines = ["MARKET CAP BREAKDOWN", "=".repeat(30)];

  for (const row of rows) {
    lines.push("");
    lines.push(`${row.label}: ${row.bullishCount} bullish, ${row.bearishCount} bearish`);
    if (row.topBullish.length > 0) {
      lines.push(`Top Bullish: ${formatTopEntries(row.topBullish)}`);
    }
    if (row.topBearish.length > 0) {
      lines.push(`Top Bearish: ${formatTopEntries(row.topBearish)}`);
    }
  }

  return lines.join("\n");
}
