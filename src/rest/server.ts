import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import type { Server } from "node:http";
import { timingSafeEqual } from "node:crypto";
import { createRouter, type RouteServices } from "./routes.js";
import { requestLogger, logRest } from "../logging.js";
import { isReady } from "../ops/readiness.js";

export interface AppOptions {
  apiKey?: string;
  allowOrigins?: string[];
  tradierTokenSet?: boolean;
}

function apiKeyAuth(key: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!key) {
      next();
      return;
    }
    const header = req.headers["x-api-key"];
    const provided =
      (typeof header === "string" ? header : undefined) ??
      req.headers.authorization?.replace(/^Bearer\s+/i, "");
    const providedBuffer = Buffer.from(provided ?? "");
    const keyBuffer = Buffer.from(key);

    if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

const startTime = Date.now();

export function createApp(services: RouteServices, opts: AppOptions = {}): express.Express {
  const app = express();
  const origins = opts.allowOrigins ?? ["*"];

  app.use(cors({ origin: origins.includes("*") ? "*" : origins }));
  app.use(express.json());
  app.use(requestLogger);

  // Health checks (unauthenticated)
  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, uptime_seconds: Math.floor((Date.now() - startTime) / 1000) });
  });

  app.get("/healthz/secrets", (_req, res) => {
    res.json({ tradier_token_set: opts.tradierTokenSet ?? false });
  });

  // Readiness probe (503 until startup finishes)
  app.get("/healthz/ready", (_req, res) => {
    const ready = isReady();
    const status = {
      ready,
      symbols: services.universe.getSymbolCount(),
      quotes: services.refresher.getLastUpdateMeta().count,
      timestamp: new Date().toISOString(),
    };
    res.status(ready ? 200 : 503).json(status);
  });

  app.use(apiKeyAuth(opts.apiKey ?? ""), createRouter(services));

  // Last-resort error translation — the core degrades instead of throwing, so this is rare
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logRest.error({ err }, "Unhandled route error");
    res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
  });

  return app;
}

export function startRestServer(services: RouteServices, port: number, opts: AppOptions = {}): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(services, opts);
    const httpServer = app.listen(port, () => {
      logRest.info({ port }, "REST server listening");
      if (opts.apiKey) {
        logRest.info("API key authentication enabled");
      } else {
        logRest.warn("No REST_API_KEY set — endpoints are unauthenticated");
      }
      resolve(httpServer);
    });
  });
}
