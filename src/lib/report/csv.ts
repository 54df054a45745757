/**
 * CSV Export
 *
 * One file per ranked list: bullish_flow_rankings_<date>.csv and
 * bearish_flow_rankings_<date>.csv.
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { stringify } from "csv-stringify/sync";
import type { RankedEntry } from "../flow/types.js";

export type RankingSide = "bullish" | "bearish";

/** CSV header -> entry field */
export const CSV_COLUMNS: readonly { key: keyof RankedEntry; header: string }[] = [
  { key: "ticker", header: "ticker" },
  { key: "bullishFlow", header: "bullish_flow" },
  { key: "bearishFlow", header: "bearish_flow" },
  { key: "netFlow", header: "net_flow" },
  { key: "totalVolume", header: "total_volume" },
  { key: "totalOpenInterest", header: "total_open_interest" },
  { key: "marketCap", header: "market_cap" },
  { key: "relativeFlow", header: "relative_flow" },
  { key: "standardizedScore", header: "standardized_score" },
];

/**
 * Serialize entries to CSV with a header row
 */
export function rankingsToCsv(entries: readonly RankedEntry[]): string {
  const rows = entries.map((entry) =>
    Object.fromEntries(CSV_COLUMNS.map(({ key, header }) => [header, entry[key]]))
  );
  return stringify(rows, {
    header: true,
    columns: CSV_COLUMNS.map(({ header }) => header),
  });
}

export function rankingsFileName(side: RankingSide, date: string): string {
  return `${side}_flow_rankings_${date}.csv`;
}

/**
 * Write a ranked list to `<dir>/<side>_flow_rankings_<date>.csv`
 * @returns The written path, or null if there was nothing to write
 */
export async function writeRankingsCsv(
  dir: string,
  side: RankingSide,
  date: string,
  entries: readonly RankedEntry[]
): Promise<string | null> {
  if (entries.length === 0) {
    return null;
  }

  await mkdir(dir, { recursive: true });
  const filePath = join(dir, rankingsFileName(side, date));
  await writeFile(filePath, rankingsToCsv(entries), "utf8");
  return filePath;
}
