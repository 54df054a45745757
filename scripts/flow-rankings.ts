#!/usr/bin/env npx tsx
/**
 * Options Flow Rankings - Top Bullish/Bearish Stocks
 *
 * Pulls the day's options flow alerts for every stock above $300M market cap,
 * scores each ticker by DTE-weighted directional premium, prints the top
 * bullish and bearish names and exports both lists to CSV.
 *
 * Usage:
 *   npx tsx scripts/flow-rankings.ts             # today, or the last session if closed
 *   npx tsx scripts/flow-rankings.ts 2025-03-14  # specific trading date
 *
 * Requires UNUSUAL_WHALES_API_KEY in .env
 */

import "dotenv/config";
import { loadConfig, type AppConfig } from "../src/lib/config.js";
import { errorMessage } from "../src/lib/errors.js";
import { UnusualWhalesClient } from "../src/lib/vendor/unusual-whales.js";
import { getAnalysisDate, getMarketStatus } from "../src/lib/market/session.js";
import { parseCalendarDate } from "../src/lib/flow/dte-weight.js";
import { runAnalysisForDate } from "../src/lib/analysis.js";
import { formatBreakdown, formatRankingSection } from "../src/lib/report/format.js";
import { writeRankingsCsv } from "../src/lib/report/csv.js";

function formatClockTime(hour: number, minute: number): string {
  const suffix = hour < 12 ? "AM" : "PM";
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${String(hour12).padStart(2, "0")}:${String(minute).padStart(2, "0")} ${suffix}`;
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    console.error("   Get a key from: https://unusualwhales.com/");
    process.exit(1);
  }
}

async function main(): Promise<void> {
  console.log("Options Flow Analysis - Top Bullish/Bearish Stocks");

  const config = loadConfigOrExit();

  const dateArg = process.argv[2];
  if (dateArg !== undefined && parseCalendarDate(dateArg) === null) {
    console.error("Usage: npx tsx scripts/flow-rankings.ts [YYYY-MM-DD]");
    process.exit(1);
  }

  const now = new Date();
  const market = getMarketStatus(now, config.marketTimezone);
  console.log(
    `Current Time: ${formatClockTime(market.clock.hour, market.clock.minute)} (${config.marketTimezone}) | ` +
      `Market: ${market.isOpen ? "Open" : "Closed"}`
  );

  const analysisDate = dateArg ?? getAnalysisDate(now, config.marketTimezone);
  console.log(`📅 Analysis date: ${analysisDate}`);

  const client = new UnusualWhalesClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
  });

  const { data, result } = await runAnalysisForDate(client, config, analysisDate);

  console.log(`📊 Retrieved ${data.flows.length} flow records`);
  console.log(`📊 Filtered ${data.filteredStocks.length} stocks`);

  if (data.flows.length === 0) {
    console.log("❌ No options flow data retrieved");
    console.log("This could be due to:");
    console.log("1. API key issues");
    console.log("2. No trading data for the selected date");
    console.log("3. Market closed (no options activity)");
    return;
  }

  if (result.status === "no_data") {
    console.log("No data to display");
    return;
  }

  const { bullish, bearish } = result.rankings;

  console.log("\n" + formatRankingSection(`TOP ${config.topN} BULLISH FLOW STOCKS`, bullish, "No bullish flows found"));
  console.log("\n" + formatRankingSection(`TOP ${config.topN} BEARISH FLOW STOCKS`, bearish, "No bearish flows found"));
  console.log("\n" + formatBreakdown(result.breakdown));
  console.log("");

  const bullishFile = await writeRankingsCsv(config.outputDir, "bullish", analysisDate, bullish);
  if (bullishFile) {
    console.log(`💾 Bullish rankings saved to: ${bullishFile}`);
  }

  const bearishFile = await writeRankingsCsv(config.outputDir, "bearish", analysisDate, bearish);
  if (bearishFile) {
    console.log(`💾 Bearish rankings saved to: ${bearishFile}`);
  }

  console.log(`✅ Analysis completed at ${new Date().toISOString()}`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
