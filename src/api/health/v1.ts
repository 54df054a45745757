import { Request, Response } from "express";
import type { AppConfig } from "../../lib/config.js";
import { getMarketStatus } from "../../lib/market/session.js";

/**
 * Health Check
 *
 * Reports the market session so callers can tell whether a rankings request
 * will cover today or the previous session.
 */
export function createHealthHandler(config: Pick<AppConfig, "marketTimezone">) {
  return function healthHandler(_req: Request, res: Response): void {
    const market = getMarketStatus(new Date(), config.marketTimezone);

    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      vendor: "configured",
      market: {
        state: market.state,
        isOpen: market.isOpen,
        date: market.clock.date,
      },
    });
  };
}
