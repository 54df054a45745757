import { describe, expect, it } from "vitest";
import {
  classifyMarketCap,
  classifySecurity,
  filterStocksByMarketCap,
  marketCapsByTicker,
  parseMarketCap,
} from "../market-cap.js";

describe("classifyMarketCap", () => {
  it("puts boundary values in the higher bucket", () => {
    expect(classifyMarketCap(200_000_000_000)?.category).toBe("mega");
    expect(classifyMarketCap(10_000_000_000)?.category).toBe("large");
    expect(classifyMarketCap(2_000_000_000)?.category).toBe("mid");
    expect(classifyMarketCap(1_000_000_000)?.category).toBe("small");
    expect(classifyMarketCap(300_000_000)?.category).toBe("micro");
  });

  it("uses the lower bucket just under each boundary", () => {
    expect(classifyMarketCap(199_999_999_999)?.category).toBe("large");
    expect(classifyMarketCap(9_999_999_999)?.category).toBe("mid");
    expect(classifyMarketCap(1_999_999_999)?.category).toBe("small");
    expect(classifyMarketCap(999_999_999)?.category).toBe("micro");
  });

  it("excludes anything under $300M", () => {
    expect(classifyMarketCap(299_999_999)).toBeNull();
    expect(classifyMarketCap(0)).toBeNull();
    expect(classifyMarketCap(-5)).toBeNull();
    expect(classifyMarketCap(NaN)).toBeNull();
  });

  it("attaches liquidity thresholds", () => {
    expect(classifyMarketCap(3e12)).toEqual({
      category: "mega",
      minMarketCap: 200_000_000_000,
      minOpenInterest: 1000,
      minPremiumValue: 100_000,
    });
    expect(classifyMarketCap(5e8)).toMatchObject({ minOpenInterest: 50, minPremiumValue: 5_000 });
  });
});

describe("parseMarketCap", () => {
  it("reads numbers and decimal strings", () => {
    expect(parseMarketCap(1.5e9)).toBe(1.5e9);
    expect(parseMarketCap("2500000000.00")).toBe(2_500_000_000);
    expect(parseMarketCap(" 4e9 ")).toBe(4e9);
  });

  it("reads missing values as 0", () => {
    expect(parseMarketCap(undefined)).toBe(0);
    expect(parseMarketCap(null)).toBe(0);
  });

  it("reads non-numeric values as NaN", () => {
    expect(parseMarketCap("n/a")).toBeNaN();
    expect(parseMarketCap("")).toBeNaN();
    expect(parseMarketCap({})).toBeNaN();
  });

  it("rejects hex, binary and octal literals", () => {
    expect(parseMarketCap("0x12A05F200")).toBeNaN();
    expect(parseMarketCap("0b1")).toBeNaN();
    expect(parseMarketCap("0o7")).toBeNaN();
    expect(classifySecurity({ ticker: "HEX", marketcap: "0x12A05F200" })).toBeNull();
  });
});

describe("classifySecurity", () => {
  it("builds a filtered stock from a vendor screener row", () => {
    expect(classifySecurity({ ticker: "ABC", marketcap: "12000000000" })).toEqual({
      ticker: "ABC",
      marketCap: 12_000_000_000,
      category: "large",
      minOpenInterest: 500,
      minPremiumValue: 50_000,
    });
  });

  it("accepts the normalized marketCap field", () => {
    expect(classifySecurity({ ticker: "XYZ", marketCap: 1e9 })?.category).toBe("small");
  });

  it("drops rows without a ticker", () => {
    expect(classifySecurity({ marketCap: 5e11 })).toBeNull();
    expect(classifySecurity({ ticker: "", marketCap: 5e11 })).toBeNull();
    expect(classifySecurity({ ticker: 42, marketCap: 5e11 })).toBeNull();
  });

  it("drops rows with a missing or non-numeric market cap", () => {
    expect(classifySecurity({ ticker: "ABC" })).toBeNull();
    expect(classifySecurity({ ticker: "ABC", marketcap: "unknown" })).toBeNull();
  });
});

describe("filterStocksByMarketCap", () => {
  it("keeps qualifying stocks in input order", () => {
    const result = filterStocksByMarketCap([
      { ticker: "MEGA", marketcap: 3e12 },
      { ticker: "TINY", marketcap: 1e8 },
      { ticker: "MICRO", marketcap: "4e8" },
      { marketcap: 5e10 },
      { ticker: "MID", marketcap: 3e9 },
    ]);
    expect(result.map((s) => s.ticker)).toEqual(["MEGA", "MICRO", "MID"]);
    expect(result.map((s) => s.category)).toEqual(["mega", "micro", "mid"]);
  });

  it("returns an empty list for empty or missing input", () => {
    expect(filterStocksByMarketCap([])).toEqual([]);
    expect(filterStocksByMarketCap(undefined)).toEqual([]);
    expect(filterStocksByMarketCap(null)).toEqual([]);
  });
});

describe("marketCapsByTicker", () => {
  it("maps tickers to market caps", () => {
    const caps = marketCapsByTicker([
      { ticker: "A", marketCap: 1e9 },
      { ticker: "B", marketCap: 2e9 },
    ]);
    expect(caps.get("A")).toBe(1e9);
    expect(caps.get("B")).toBe(2e9);
    expect(caps.size).toBe(2);
  });
});
