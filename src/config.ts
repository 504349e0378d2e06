import dotenv from "dotenv";

dotenv.config();

const DEFAULT_SYMBOLS_FEED_URL =
  "https://marketdata.theocc.com/delo-download?prodType=ALL&downloadFields=US;OS;SN;EXCH;PL;ONN&format=txt";

const tradierBaseUrl = process.env.TRADIER_BASE_URL ?? "https://api.tradier.com/v1";

// Sandbox accounts get half the production market-data quota
const tradierIsSandbox = tradierBaseUrl.toLowerCase().includes("sandbox");

export const config = {
  tradier: {
    baseUrl: tradierBaseUrl,
    apiToken: process.env.TRADIER_API_TOKEN ?? "",
    isSandbox: tradierIsSandbox,
    /** Requests per rate-limit window (60 sandbox, 120 production) */
    rateLimit: tradierIsSandbox ? 60 : 120,
    rateWindowMs: 60_000,
    timeoutMs: parseInt(process.env.TRADIER_TIMEOUT_MS ?? "20000", 10),
  },
  symbols: {
    feedUrl: process.env.SYMBOLS_FEED_URL ?? DEFAULT_SYMBOLS_FEED_URL,
    timeoutMs: parseInt(process.env.SYMBOLS_TIMEOUT_MS ?? "30000", 10),
    refreshIntervalMs: parseInt(process.env.SYMBOLS_REFRESH_INTERVAL_MS ?? String(24 * 60 * 60 * 1000), 10),
  },
  snapshot: {
    batchSize: parseInt(process.env.BATCH_SIZE ?? "860", 10),
    refreshIntervalMs: parseInt(process.env.REFRESH_INTERVAL_SEC ?? "61", 10) * 1000,
    maxConcurrency: parseInt(process.env.MAX_CONCURRENCY ?? "8", 10),
    startupDelayMs: parseInt(process.env.SNAPSHOT_STARTUP_DELAY_MS ?? "1000", 10),
  },
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
    allowOrigins: (process.env.ALLOW_ORIGINS ?? "*")
      .split(",")
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
  },
};

export type AppConfig = typeof config;
