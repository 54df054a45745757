import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Request, Response as ExpressResponse } from "express";
import { createRankingsHandler } from "../rankings/v1.js";
import { createHealthHandler } from "../health/v1.js";
import { UnusualWhalesClient } from "../../lib/vendor/unusual-whales.js";

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

interface MockResponse {
  statusCode: number;
  body: unknown;
  status(code: number): MockResponse;
  json(payload: unknown): MockResponse;
}

function mockResponse(): MockResponse {
  const res: MockResponse = {
    statusCode: 200,
    body: undefined,
    status(code) {
      res.statusCode = code;
      return res;
    },
    json(payload) {
      res.body = payload;
      return res;
    },
  };
  return res;
}

const asRequest = (query: Record<string, unknown>) => ({ query }) as unknown as Request;

const config = { requestDelayMs: 1, topN: 20, marketTimezone: "America/New_York" };

describe("GET /rankings", () => {
  const client = new UnusualWhalesClient({ apiKey: "test-key", baseUrl: "https://api.test", timeoutMs: 1000 });
  // Friday 2025-03-14, 10:00 in New York
  const now = () => new Date("2025-03-14T14:00:00Z");
  const handler = createRankingsHandler({ client, config, now });
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it("rejects a malformed date", async () => {
    const res = mockResponse();
    await handler(asRequest({ date: "2025-02-30" }), res as unknown as ExpressResponse);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "Invalid date: expected YYYY-MM-DD" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects an out-of-range topN", async () => {
    for (const topN of ["0", "2.5", "501", "abc"]) {
      const res = mockResponse();
      await handler(asRequest({ topN }), res as unknown as ExpressResponse);
      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "Invalid topN: expected an integer from 1 to 500" });
    }
  });

  it("ranks flow for the requested date", async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = new URL(String(input));
      if (url.pathname === "/api/screener/stocks") {
        return jsonResponse({
          data: [
            { ticker: "AAA", marketcap: "5000000000" },
            { ticker: "BBB", marketcap: "200000000000" },
          ],
        });
      }
      if (url.pathname === "/api/option-trades/flow-alerts") {
        const ticker = url.searchParams.get("ticker");
        const alert =
          ticker === "AAA"
            ? { ticker, call_premium_ask_side: "1000", volume: 2, expiry: "2025-03-12" }
            : { ticker, put_premium_ask_side: "500", volume: 4, expiry: "2025-03-12" };
        return jsonResponse({ data: [alert] });
      }
      return new Response("not found", { status: 404 });
    });

    const res = mockResponse();
    await handler(asRequest({ date: "2025-03-12", topN: "5" }), res as unknown as ExpressResponse);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      date: "2025-03-12",
      status: "ok",
      bullish: [{ ticker: "AAA", bullishFlow: 2000, bearishFlow: 0, netFlow: 2000, totalVolume: 2 }],
      bearish: [{ ticker: "BBB", bullishFlow: 0, bearishFlow: 2000, netFlow: -2000, totalVolume: 4 }],
      breakdown: [
        { label: "Mid Cap", bullishCount: 1, bearishCount: 0 },
        { label: "Mega Cap", bullishCount: 0, bearishCount: 1 },
      ],
      counts: { universe: 2, filtered: 2, flows: 2, skipped: 0 },
    });
  });

  it("defaults to today while the market is open and reports no_data", async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = new URL(String(input));
      if (url.pathname === "/api/screener/stocks") {
        return jsonResponse({ data: [{ ticker: "AAA", marketcap: "5000000000" }] });
      }
      return jsonResponse({ data: [] });
    });

    const res = mockResponse();
    await handler(asRequest({}), res as unknown as ExpressResponse);

    expect(res.body).toEqual({
      date: "2025-03-14",
      status: "no_data",
      bullish: [],
      bearish: [],
      breakdown: [],
      counts: { universe: 1, filtered: 1, flows: 0, skipped: 0 },
    });
    expect(String(fetchMock.mock.calls[1][0])).toBe(
      "https://api.test/api/option-trades/flow-alerts?ticker=AAA&date=2025-03-14"
    );
  });
});

describe("GET /health", () => {
  it("reports service and market state", () => {
    const res = mockResponse();
    createHealthHandler(config)(asRequest({}), res as unknown as ExpressResponse);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      status: "healthy",
      vendor: "configured",
      market: { state: expect.any(String), isOpen: expect.any(Boolean) },
    });
  });
});
