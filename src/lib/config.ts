/**
 * Configuration
 *
 * Built once at startup from the environment (.env is loaded by the entry
 * point via dotenv) and passed down explicitly.
 */

import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://api.unusualwhales.com";

export interface AppConfig {
  /** Unusual Whales API key */
  apiKey: string;
  baseUrl: string;
  /** Fixed pause between vendor requests */
  requestDelayMs: number;
  requestTimeoutMs: number;
  /** Size of each ranked list */
  topN: number;
  /** IANA timezone used to decide "today" and market hours */
  marketTimezone: string;
  /** Directory for CSV exports */
  outputDir: string;
  port: number;
}

/**
 * Read an integer setting no smaller than `min` (1 unless stated)
 */
function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    const expected = min === 0 ? "a non-negative integer" : "a positive integer";
    throw new ConfigError(`${name} must be ${expected}, got "${raw}"`, name);
  }
  return value;
}

/**
 * Build the app config from environment variables
 * @throws ConfigError if the API key is missing or a numeric setting is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.UNUSUAL_WHALES_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError(
      "UNUSUAL_WHALES_API_KEY not found! Create .env with: UNUSUAL_WHALES_API_KEY=your_key_here",
      "UNUSUAL_WHALES_API_KEY"
    );
  }

  const marketTimezone = env.MARKET_TIMEZONE || "America/New_York";
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: marketTimezone });
  } catch {
    throw new ConfigError(`MARKET_TIMEZONE is not a valid IANA timezone: "${marketTimezone}"`, "MARKET_TIMEZONE");
  }

  return {
    apiKey,
    baseUrl: (env.UNUSUAL_WHALES_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ""),
    requestDelayMs: readInt(env, "REQUEST_DELAY_MS", 100, 0),
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 30000),
    topN: readInt(env, "TOP_N", 20),
    marketTimezone,
    outputDir: env.OUTPUT_DIR || ".",
    port: readInt(env, "PORT", 8080),
  };
}
