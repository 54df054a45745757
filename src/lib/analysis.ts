/**
 * Flow Analysis Run
 *
 * Fetches one trading day of data and pushes it through the scoring pipeline.
 * Shared by the CLI script and the HTTP API.
 */

import type { AppConfig } from "./config.js";
import type { UnusualWhalesClient } from "./vendor/unusual-whales.js";
import type { AnalysisData } from "./vendor/fetch-analysis-data.js";
import { fetchAnalysisData } from "./vendor/fetch-analysis-data.js";
import { runFlowAnalysis, type FlowAnalysisResult } from "./flow/index.js";

export interface AnalysisRun {
  date: string;
  data: AnalysisData;
  result: FlowAnalysisResult;
}

/**
 * Fetch and rank flow for one date
 *
 * @param client - Vendor client
 * @param config - Uses requestDelayMs and topN unless topN is overridden
 * @param date - Trading date "YYYY-MM-DD"
 */
export async function runAnalysisForDate(
  client: UnusualWhalesClient,
  config: Pick<AppConfig, "requestDelayMs" | "topN">,
  date: string,
  topN: number = config.topN
): Promise<AnalysisRun> {
  const data = await fetchAnalysisData(client, date, { requestDelayMs: config.requestDelayMs });

  const result = runFlowAnalysis({
    securities: data.universe,
    flows: data.flows,
    topN,
  });

  if (result.skipped.length > 0) {
    console.warn(`⚠️ Skipped ${result.skipped.length} malformed flow record(s)`);
  }

  return { date, data, result };
}
