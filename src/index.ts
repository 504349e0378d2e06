import type { Server } from "node:http";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { RateLimiter } from "./providers/rate-limiter.js";
import { TradierClient } from "./providers/tradier.js";
import { SymbolUniverse } from "./symbols/universe.js";
import { SnapshotRefresher } from "./quotes/refresher.js";
import { Scheduler } from "./scheduler.js";
import { startRestServer } from "./rest/server.js";
import { setReady } from "./ops/readiness.js";

async function main() {
  logger.info({ pid: process.pid, sandbox: config.tradier.isSandbox }, "Optionable quotes service starting");

  // Validate configuration early
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // Prune old log files (keep 30 days)
  pruneOldLogs();

  const limiter = new RateLimiter({
    maxRequests: config.tradier.rateLimit,
    windowMs: config.tradier.rateWindowMs,
  });
  const tradier = new TradierClient({
    baseUrl: config.tradier.baseUrl,
    apiToken: config.tradier.apiToken,
    timeoutMs: config.tradier.timeoutMs,
    limiter,
  });
  const universe = new SymbolUniverse({
    feedUrl: config.symbols.feedUrl,
    timeoutMs: config.symbols.timeoutMs,
  });
  const refresher = new SnapshotRefresher(universe, tradier, {
    batchSize: config.snapshot.batchSize,
    maxConcurrency: config.snapshot.maxConcurrency,
    intervalMs: config.snapshot.refreshIntervalMs,
    startupDelayMs: config.snapshot.startupDelayMs,
  });
  const scheduler = new Scheduler(universe, refresher, {
    symbolRefreshIntervalMs: config.symbols.refreshIntervalMs,
  });

  scheduler.start();

  const server: Server = await startRestServer({ universe, refresher, limiter, scheduler }, config.rest.port, {
    apiKey: config.rest.apiKey,
    allowOrigins: config.rest.allowOrigins,
    tradierTokenSet: tradier.hasToken,
  });

  setReady(true);
  logger.info({ port: config.rest.port }, "Service fully initialized — accepting connections");

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    setReady(false);
    await scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });
  process.on("SIGTERM", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });

  // Keep serving stale data through transient failures — log and carry on
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection (swallowed — keeping server alive)");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
