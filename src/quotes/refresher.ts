/**
 * Quote snapshot refresher.
 *
 * Every cycle reads the current symbol universe, splits it into Tradier-sized
 * batches, fetches them with a cap on batches in flight, and swaps in a new
 * snapshot only when at least one quote came back. A failed or empty cycle keeps
 * the previous snapshot, so readers get stale data rather than no data.
 */
import type { QuoteRecord, QuoteSource } from "../providers/tradier.js";
import type { SymbolProvider } from "../symbols/universe.js";
import { chunk, mapWithConcurrency } from "./batching.js";
import {
  EMPTY_SNAPSHOT,
  buildSnapshot,
  snapshotMeta,
  viewSnapshot,
  type Snapshot,
  type SnapshotMeta,
  type SnapshotView,
} from "./snapshot.js";
import { errorMessage, isAbortError } from "../errors.js";
import { sleep } from "../util/async.js";
import { logQuotes } from "../logging.js";

const log = logQuotes;

export interface SnapshotRefresherOptions {
  batchSize?: number;
  maxConcurrency?: number;
  intervalMs?: number;
  /** Delay before the first cycle so the symbol universe can populate */
  startupDelayMs?: number;
}

export type CycleOutcome = "published" | "empty-universe" | "no-quotes" | "error";

export interface CycleReport {
  published: boolean;
  reason: CycleOutcome;
  symbols: number;
  batches: number;
  failedBatches: number;
  quotes: number;
  startedAt: string;
  durationMs: number;
  error?: string;
}

export interface BackgroundTaskStatus {
  running: boolean;
  intervalMs: number;
  batchSize: number;
  maxConcurrency: number;
  cycles: number;
  lastCycle: CycleReport | null;
}

type BatchResult = { ok: true; records: QuoteRecord[] } | { ok: false; error: string };

export const DEFAULT_BATCH_SIZE = 860;
export const DEFAULT_MAX_CONCURRENCY = 8;
export const DEFAULT_REFRESH_INTERVAL_MS = 61_000;
export const DEFAULT_STARTUP_DELAY_MS = 1_000;

export class SnapshotRefresher {
  private readonly universe: SymbolProvider;
  private readonly source: QuoteSource;
  private readonly batchSize: number;
  private readonly maxConcurrency: number;
  private readonly intervalMs: number;
  private readonly startupDelayMs: number;

  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private task: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private cycles = 0;
  private lastCycle: CycleReport | null = null;

  constructor(universe: SymbolProvider, source: QuoteSource, opts: SnapshotRefresherOptions = {}) {
    this.universe = universe;
    this.source = source;
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxConcurrency = opts.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.intervalMs = opts.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.startupDelayMs = opts.startupDelayMs ?? DEFAULT_STARTUP_DELAY_MS;

    for (const [name, value] of [["batchSize", this.batchSize], ["maxConcurrency", this.maxConcurrency]] as const) {
      if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
      }
    }
  }

  // ── Readers (never suspend) ─────────────────────────────────────────

  getSnapshot(symbols?: readonly string[]): SnapshotView {
    return viewSnapshot(this.snapshot, symbols);
  }

  getLastUpdateMeta(): SnapshotMeta {
    return snapshotMeta(this.snapshot);
  }

  getBackgroundTaskStatus(): BackgroundTaskStatus {
    return {
      running: this.task !== null,
      intervalMs: this.intervalMs,
      batchSize: this.batchSize,
      maxConcurrency: this.maxConcurrency,
      cycles: this.cycles,
      lastCycle: this.lastCycle ? { ...this.lastCycle } : null,
    };
  }

  // ── Cycle ───────────────────────────────────────────────────────────

  /** Run one refresh cycle. Never throws except when `signal` aborts mid-cycle. */
  async refreshOnce(signal?: AbortSignal): Promise<CycleReport> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const finish = (report: Omit<CycleReport, "startedAt" | "durationMs">): CycleReport => {
      const full: CycleReport = { ...report, startedAt, durationMs: Date.now() - started };
      this.cycles++;
      this.lastCycle = full;
      return full;
    };

    const symbols = [...this.universe.getSymbols()].sort();
    if (symbols.length === 0) {
      log.warn("No symbols available for quotes snapshot — symbol universe is empty, skipping cycle");
      return finish({ published: false, reason: "empty-universe", symbols: 0, batches: 0, failedBatches: 0, quotes: 0 });
    }

    const batches = chunk(symbols, this.batchSize);
    log.info(
      { symbols: symbols.length, batches: batches.length, batchSize: this.batchSize, maxConcurrency: this.maxConcurrency },
      `Starting quotes snapshot refresh: ${symbols.length} symbols in ${batches.length} batches`,
    );

    const results = await mapWithConcurrency(batches, this.maxConcurrency, (batch, i) =>
      this.fetchBatch(batch, i, batches.length, signal),
    );
    if (signal?.aborted) throw signal.reason instanceof Error ? signal.reason : new Error("Refresh cycle aborted");

    const records: QuoteRecord[] = [];
    let failedBatches = 0;
    for (const result of results) {
      if (result.ok) {
        records.push(...result.records);
      } else {
        failedBatches++;
      }
    }

    if (failedBatches > 0) {
      log.warn(
        { failedBatches, batches: batches.length },
        `Completed with ${failedBatches} batch errors out of ${batches.length} batches`,
      );
    }

    const base = { symbols: symbols.length, batches: batches.length, failedBatches };

    if (records.length === 0) {
      log.error(
        { ...base, previousCount: this.snapshot.count },
        "No quotes retrieved from vendor — keeping previous snapshot",
      );
      return finish({ ...base, published: false, reason: "no-quotes", quotes: 0 });
    }

    // Single assignment — readers see the old snapshot or the new one, never a mix
    this.snapshot = buildSnapshot(records, new Date());
    log.info(
      { ...base, quotes: this.snapshot.count },
      `Quotes snapshot updated: ${this.snapshot.count} quotes, ${symbols.length} symbols requested`,
    );
    return finish({ ...base, published: true, reason: "published", quotes: this.snapshot.count });
  }

  private async fetchBatch(
    batch: string[],
    index: number,
    total: number,
    signal?: AbortSignal,
  ): Promise<BatchResult> {
    if (signal?.aborted) return { ok: false, error: "aborted" };
    try {
      const records = await this.source.fetchQuotes(batch, signal);
      return { ok: true, records };
    } catch (e: unknown) {
      if (!signal?.aborted) {
        log.error(
          { err: e, batch: index + 1, of: total, first: batch.slice(0, 5) },
          `Batch ${index + 1}/${total} failed: ${errorMessage(e)}`,
        );
      }
      return { ok: false, error: errorMessage(e) };
    }
  }

  // ── Background loop ─────────────────────────────────────────────────

  /** Start the refresh loop. No-op (with a warning) if it is already running. */
  start(): void {
    if (this.task) {
      log.warn("Quotes snapshot background task already running");
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.task = this.runLoop(controller.signal)
      .catch((err) => log.error({ err }, "Quotes snapshot loop exited unexpectedly"))
      .finally(() => {
        if (this.controller === controller) {
          this.task = null;
          this.controller = null;
        }
      });
    log.info(
      { intervalMs: this.intervalMs, startupDelayMs: this.startupDelayMs },
      "Quotes snapshot background task started",
    );
  }

  /** Cancel the loop and wait for it to wind down. No-op if not running. */
  async stop(): Promise<void> {
    const task = this.task;
    const controller = this.controller;
    if (!task || !controller) return;
    controller.abort();
    log.info("Quotes snapshot background task cancelled");
    await task;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.startupDelayMs, signal);
      log.info("Performing initial quotes snapshot refresh");

      while (!signal.aborted) {
        try {
          const report = await this.refreshOnce(signal);
          if (!report.published) {
            log.warn({ reason: report.reason }, "Quotes snapshot refresh failed — keeping previous snapshot");
          }
        } catch (e: unknown) {
          if (signal.aborted) break;
          log.error({ err: e }, "Unexpected error in quotes snapshot refresh cycle");
          this.cycles++;
          this.lastCycle = {
            published: false,
            reason: "error",
            symbols: 0,
            batches: 0,
            failedBatches: 0,
            quotes: 0,
            startedAt: new Date().toISOString(),
            durationMs: 0,
            error: errorMessage(e),
          };
        }
        await sleep(this.intervalMs, signal);
      }
    } catch (e: unknown) {
      if (!isAbortError(e)) throw e;
    }
    log.info("Quotes snapshot background loop stopped");
  }
}
