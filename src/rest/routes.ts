import { Router } from "express";
import { z } from "zod";
import type { SymbolUniverse } from "../symbols/universe.js";
import type { SnapshotRefresher } from "../quotes/refresher.js";
import type { RateLimiter } from "../providers/rate-limiter.js";
import type { Scheduler } from "../scheduler.js";
import { errorMessage } from "../errors.js";
import { logRest } from "../logging.js";

export interface RouteServices {
  universe: SymbolUniverse;
  refresher: SnapshotRefresher;
  limiter: RateLimiter;
  scheduler?: Scheduler;
}

/** Validate a comma-separated symbol filter — alphanumerics, dots, hyphens, max 20 chars each */
const SYMBOL_RE = /^[A-Za-z0-9.\-]{1,20}$/;

const snapshotQuerySchema = z.object({
  symbols: z
    .string()
    .optional()
    .transform((raw) =>
      raw === undefined
        ? undefined
        : raw
            .split(",")
            .map((s) => s.trim().toUpperCase())
            .filter((s) => s.length > 0),
    )
    .refine((list) => list === undefined || list.every((s) => SYMBOL_RE.test(s)), {
      message: "Invalid symbol: must be 1-20 alphanumeric characters",
    }),
});

function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function createRouter(services: RouteServices): Router {
  const { universe, refresher, limiter, scheduler } = services;
  const router = Router();

  // GET /v1/markets/options/symbols — every underlying with listed options
  router.get("/v1/markets/options/symbols", (_req, res) => {
    const symbols = universe.getSortedSymbols();
    res.json({
      symbols,
      count: symbols.length,
      last_update: isoOrNull(universe.getLastUpdate()),
      note: "Underlyings with listed options per the OCC daily download; refreshed every 24h",
    });
  });

  // POST /v1/markets/options/symbols/refresh — manual refresh, failures surface as 500
  router.post("/v1/markets/options/symbols/refresh", async (_req, res) => {
    try {
      await universe.refresh(true);
      const count = universe.getSymbolCount();
      res.json({
        status: "success",
        count,
        last_update: isoOrNull(universe.getLastUpdate()),
        message: `Refreshed ${count} symbols`,
      });
    } catch (e: unknown) {
      logRest.error({ err: e }, "Manual symbol refresh failed");
      res.status(500).json({ error: `Failed to refresh symbols: ${errorMessage(e)}` });
    }
  });

  // GET /v1/markets/quotes/snapshot?symbols=AAPL,MSFT
  router.get("/v1/markets/quotes/snapshot", (req, res) => {
    const parsed = snapshotQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid query" });
      return;
    }
    const view = refresher.getSnapshot(parsed.data.symbols);
    res.json({ last_update: view.lastUpdate, count: view.count, results: view.results });
  });

  // GET /v1/markets/quotes/last_update — cheap freshness probe
  router.get("/v1/markets/quotes/last_update", (_req, res) => {
    const meta = refresher.getLastUpdateMeta();
    res.json({ last_update: meta.lastUpdate, count: meta.count });
  });

  // GET /v1/markets/quotes/status — background task + vendor quota diagnostics
  router.get("/v1/markets/quotes/status", (_req, res) => {
    res.json({
      task: refresher.getBackgroundTaskStatus(),
      rate_limiter: limiter.getStats(),
      scheduler: scheduler ? scheduler.getStatus() : null,
    });
  });

  return router;
}
