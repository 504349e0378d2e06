import type { SymbolUniverse } from "./symbols/universe.js";
import type { SnapshotRefresher } from "./quotes/refresher.js";
import { logScheduler } from "./logging.js";

const log = logScheduler;

const DEFAULT_SYMBOL_REFRESH_MS = 24 * 60 * 60 * 1000; // daily

type RefreshableUniverse = Pick<SymbolUniverse, "refresh" | "getSymbolCount">;
type BackgroundTask = Pick<SnapshotRefresher, "start" | "stop">;

export interface SchedulerOptions {
  symbolRefreshIntervalMs?: number;
}

export interface SchedulerStatus {
  running: boolean;
  symbolRefreshIntervalMs: number;
  lastSymbolRefresh: { at: string; ok: boolean } | null;
}

/**
 * Startup/shutdown glue: refresh the symbol universe now and then on a daily
 * interval, and run the quote refresher's background loop alongside it.
 */
export class Scheduler {
  private readonly universe: RefreshableUniverse;
  private readonly refresher: BackgroundTask;
  private readonly symbolRefreshIntervalMs: number;
  private symbolTimer: ReturnType<typeof setInterval> | null = null;
  private lastSymbolRefresh: { at: string; ok: boolean } | null = null;

  constructor(universe: RefreshableUniverse, refresher: BackgroundTask, opts: SchedulerOptions = {}) {
    this.universe = universe;
    this.refresher = refresher;
    this.symbolRefreshIntervalMs = opts.symbolRefreshIntervalMs ?? DEFAULT_SYMBOL_REFRESH_MS;
  }

  start(): void {
    if (this.symbolTimer) return;

    this.symbolTimer = setInterval(() => {
      this.refreshSymbols().catch((err) => log.error({ err }, "Symbol refresh timer error (swallowed)"));
    }, this.symbolRefreshIntervalMs);
    // Also refresh once immediately
    this.refreshSymbols().catch((err) => log.error({ err }, "Initial symbol refresh error (swallowed)"));
    log.info(
      { intervalHours: this.symbolRefreshIntervalMs / 3_600_000 },
      "Symbol refresh scheduler armed",
    );

    this.refresher.start();
  }

  async stop(): Promise<void> {
    if (this.symbolTimer) {
      clearInterval(this.symbolTimer);
      this.symbolTimer = null;
    }
    await this.refresher.stop();
    log.info("Scheduler stopped");
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.symbolTimer !== null,
      symbolRefreshIntervalMs: this.symbolRefreshIntervalMs,
      lastSymbolRefresh: this.lastSymbolRefresh ? { ...this.lastSymbolRefresh } : null,
    };
  }

  private async refreshSymbols(): Promise<void> {
    const ok = await this.universe.refresh(false);
    this.lastSymbolRefresh = { at: new Date().toISOString(), ok };
    if (ok) {
      log.info({ count: this.universe.getSymbolCount() }, "Scheduled symbol refresh complete");
    } else {
      log.warn({ kept: this.universe.getSymbolCount() }, "Scheduled symbol refresh failed — serving previous set");
    }
  }
}
