import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults around the API key", () => {
    expect(loadConfig({ UNUSUAL_WHALES_API_KEY: "test-key" })).toEqual({
      apiKey: "test-key",
      baseUrl: "https://api.unusualwhales.com",
      requestDelayMs: 100,
      requestTimeoutMs: 30000,
      topN: 20,
      marketTimezone: "America/New_York",
      outputDir: ".",
      port: 8080,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      UNUSUAL_WHALES_API_KEY: "test-key",
      UNUSUAL_WHALES_BASE_URL: "http://localhost:9999/",
      REQUEST_DELAY_MS: "250",
      TOP_N: "10",
      MARKET_TIMEZONE: "America/Chicago",
      OUTPUT_DIR: "./out",
      PORT: "3000",
    });
    expect(config).toMatchObject({
      baseUrl: "http://localhost:9999",
      requestDelayMs: 250,
      topN: 10,
      marketTimezone: "America/Chicago",
      outputDir: "./out",
      port: 3000,
    });
  });

  it("requires the API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ UNUSUAL_WHALES_API_KEY: "   " })).toThrow(/UNUSUAL_WHALES_API_KEY not found/);
  });

  it("rejects invalid numeric settings", () => {
    expect(() => loadConfig({ UNUSUAL_WHALES_API_KEY: "test-key", TOP_N: "0" })).toThrow(
      'TOP_N must be a positive integer, got "0"'
    );
    expect(() => loadConfig({ UNUSUAL_WHALES_API_KEY: "test-key", REQUEST_DELAY_MS: "fast" })).toThrow(ConfigError);
    expect(() => loadConfig({ UNUSUAL_WHALES_API_KEY: "test-key", REQUEST_DELAY_MS: "-1" })).toThrow(
      'REQUEST_DELAY_MS must be a non-negative integer, got "-1"'
    );
  });

  it("allows a zero request delay", () => {
    expect(loadConfig({ UNUSUAL_WHALES_API_KEY: "test-key", REQUEST_DELAY_MS: "0" }).requestDelayMs).toBe(0);
  });

  it("rejects an unknown timezone", () => {
    expect(() => loadConfig({ UNUSUAL_WHALES_API_KEY: "test-key", MARKET_TIMEZONE: "Mars/Olympus" })).toThrow(
      /MARKET_TIMEZONE/
    );
  });
});
