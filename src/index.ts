import "dotenv/config";
import express from "express";
import cors from "cors";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { errorMessage } from "./lib/errors.js";
import { UnusualWhalesClient } from "./lib/vendor/unusual-whales.js";
import { createHealthHandler } from "./api/health/v1.js";
import { createRankingsHandler } from "./api/rankings/v1.js";

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const client = new UnusualWhalesClient({
  apiKey: config.apiKey,
  baseUrl: config.baseUrl,
  timeoutMs: config.requestTimeoutMs,
});

const app = express();

app.use(cors());
app.use(express.json());

/**
 * Health Check
 */
app.get("/health", createHealthHandler(config));

/**
 * Flow Rankings
 *
 * Query params:
 *   date - Trading date YYYY-MM-DD (optional)
 *   topN - Size of each ranked list (optional)
 */
app.get("/rankings", createRankingsHandler({ client, config }));

/**
 * Start Server
 */
const server = app.listen(config.port, "::", () => {
  console.log(`🚀 Options Flow API server running on port ${config.port}`);
  console.log(`   Environment: ${process.env.NODE_ENV || "local"}`);
  console.log(`   Health: http://localhost:${config.port}/health`);
  console.log(`   Rankings: http://localhost:${config.port}/rankings?date=YYYY-MM-DD&topN=20`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down gracefully...`);
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
