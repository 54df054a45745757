import { Request, Response } from "express";
import type { AppConfig } from "../../lib/config.js";
import type { UnusualWhalesClient } from "../../lib/vendor/unusual-whales.js";
import { runAnalysisForDate } from "../../lib/analysis.js";
import { getAnalysisDate } from "../../lib/market/session.js";
import { parseCalendarDate } from "../../lib/flow/dte-weight.js";
import { errorMessage } from "../../lib/errors.js";

/** Upper bound on topN to keep responses reasonable */
const MAX_TOP_N = 500;

interface RankingsDeps {
  client: UnusualWhalesClient;
  config: Pick<AppConfig, "requestDelayMs" | "topN" | "marketTimezone">;
  /** Clock override for tests */
  now?: () => Date;
}

/**
 * Flow Rankings
 *
 * Query params:
 *   date - Trading date YYYY-MM-DD (default: today if the market is open, else the previous session)
 *   topN - Size of each ranked list (default: TOP_N from config)
 *
 * Runs a full fetch + ranking pass; expect this to take a while for a large universe.
 */
export function createRankingsHandler(deps: RankingsDeps) {
  const now = deps.now ?? (() => new Date());

  return async function rankingsHandler(req: Request, res: Response): Promise<void> {
    try {
      const { date, topN } = req.query;

      if (date !== undefined && (typeof date !== "string" || parseCalendarDate(date) === null)) {
        res.status(400).json({ error: "Invalid date: expected YYYY-MM-DD" });
        return;
      }

      let limit = deps.config.topN;
      if (topN !== undefined) {
        limit = typeof topN === "string" ? Number(topN) : NaN;
        if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_TOP_N) {
          res.status(400).json({ error: `Invalid topN: expected an integer from 1 to ${MAX_TOP_N}` });
          return;
        }
      }

      const analysisDate = date ?? getAnalysisDate(now(), deps.config.marketTimezone);
      const { data, result } = await runAnalysisForDate(deps.client, deps.config, analysisDate, limit);

      const counts = {
        universe: data.universe.length,
        filtered: data.filteredStocks.length,
        flows: data.flows.length,
        skipped: result.skipped.length,
      };

      if (result.status === "no_data") {
        res.json({ date: analysisDate, status: "no_data", bullish: [], bearish: [], breakdown: [], counts });
        return;
      }

      res.json({
        date: analysisDate,
        status: "ok",
        bullish: result.rankings.bullish,
        bearish: result.rankings.bearish,
        breakdown: result.breakdown,
        counts,
      });
    } catch (error) {
      console.error("Error computing flow rankings:", error);
      res.status(500).json({
        error: "Failed to compute flow rankings",
        message: errorMessage(error),
      });
    }
  };
}
