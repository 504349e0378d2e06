import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { QuoteRecord, QuoteSource } from "../../providers/tradier.js";
import type { SymbolProvider } from "../../symbols/universe.js";
import { NetworkError } from "../../errors.js";
import { SnapshotRefresher } from "../refresher.js";

function quote(symbol: string, last = 100): QuoteRecord {
  return { symbol, description: `${symbol} Corp`, last, bid: last - 1, ask: last + 1, volume: 500, change: 0, changePercent: 0 };
}

function universeOf(symbols: string[]): SymbolProvider {
  return { getSymbols: () => new Set(symbols) };
}

/** Echoes every requested symbol back as a quote, except those listed in `failOn`. */
function echoSource(failOn: string[] = []): QuoteSource & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    async fetchQuotes(symbols: string[]) {
      calls.push([...symbols]);
      if (symbols.some((s) => failOn.includes(s))) {
        throw new NetworkError("Tradier quotes returned HTTP 502", "https://api.tradier.test/v1/markets/quotes", { status: 502 });
      }
      return symbols.map((s) => quote(s));
    },
  };
}

describe("SnapshotRefresher.refreshOnce()", () => {
  it("publishes the partial result when one batch fails", async () => {
    const refresher = new SnapshotRefresher(universeOf(["MSFT", "AAPL"]), echoSource(["MSFT"]), { batchSize: 1 });

    const report = await refresher.refreshOnce();

    expect(report).toMatchObject({
      published: true,
      reason: "published",
      symbols: 2,
      batches: 2,
      failedBatches: 1,
      quotes: 1,
    });
    const view = refresher.getSnapshot();
    expect(view.count).toBe(1);
    expect(view.results.map((q) => q.symbol)).toEqual(["AAPL"]);
    expect(view.lastUpdate).not.toBeNull();
  });

  it("requests symbols in sorted order, split into batches of batchSize", async () => {
    const symbols = Array.from({ length: 2000 }, (_, i) => `S${String(i).padStart(4, "0")}`).reverse();
    const source = echoSource();
    const refresher = new SnapshotRefresher(universeOf(symbols), source, { batchSize: 860, maxConcurrency: 2 });

    const report = await refresher.refreshOnce();

    expect(report.batches).toBe(3);
    expect(source.calls.map((c) => c.length)).toEqual([860, 860, 280]);
    expect(source.calls[0][0]).toBe("S0000");
    expect(refresher.getLastUpdateMeta().count).toBe(2000);
  });

  it("caps the number of batches in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const source: QuoteSource = {
      async fetchQuotes(symbols) {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((r) => setTimeout(r, 2));
        inFlight--;
        return symbols.map((s) => quote(s));
      },
    };
    const refresher = new SnapshotRefresher(universeOf(["A", "B", "C", "D", "E", "F", "G"]), source, {
      batchSize: 1,
      maxConcurrency: 3,
    });

    await refresher.refreshOnce();
    expect(peak).toBe(3);
  });

  it("skips the cycle on an empty universe and leaves the snapshot alone", async () => {
    const source = echoSource();
    const refresher = new SnapshotRefresher(universeOf([]), source);

    const report = await refresher.refreshOnce();

    expect(report).toMatchObject({ published: false, reason: "empty-universe", symbols: 0, batches: 0 });
    expect(source.calls).toEqual([]);
    expect(refresher.getLastUpdateMeta()).toEqual({ lastUpdate: null, count: 0 });
  });

  it("reports no-quotes and publishes nothing when every batch fails", async () => {
    const refresher = new SnapshotRefresher(universeOf(["AAPL", "MSFT"]), echoSource(["AAPL", "MSFT"]), { batchSize: 1 });

    const report = await refresher.refreshOnce();

    expect(report).toMatchObject({ published: false, reason: "no-quotes", failedBatches: 2, quotes: 0 });
    expect(refresher.getSnapshot()).toEqual({ lastUpdate: null, count: 0, results: [] });
  });

  it("preserves the published snapshot across a failed cycle on the same instance", async () => {
    let fail = false;
    const source: QuoteSource = {
      async fetchQuotes(symbols) {
        if (fail) throw new Error("upstream down");
        return symbols.map((s) => quote(s, 42));
      },
    };
    const refresher = new SnapshotRefresher(universeOf(["IBM", "SPY"]), source);
    await refresher.refreshOnce();
    const before = refresher.getSnapshot();

    fail = true;
    const report = await refresher.refreshOnce();

    expect(report.reason).toBe("no-quotes");
    expect(refresher.getSnapshot()).toEqual(before);
    expect(refresher.getBackgroundTaskStatus()).toMatchObject({ cycles: 2, lastCycle: { reason: "no-quotes" } });
  });

  it("filters the published snapshot by symbol", async () => {
    const refresher = new SnapshotRefresher(universeOf(["AAPL", "MSFT"]), echoSource());
    await refresher.refreshOnce();

    expect(refresher.getSnapshot(["aapl"]).results.map((q) => q.symbol)).toEqual(["AAPL"]);
    expect(refresher.getSnapshot(["NOPE"])).toMatchObject({ count: 0, results: [] });
  });
});

describe("SnapshotRefresher background loop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits the startup delay, then refreshes once per interval", async () => {
    const source = echoSource();
    const refresher = new SnapshotRefresher(universeOf(["AAPL"]), source, { startupDelayMs: 1000, intervalMs: 61_000 });

    refresher.start();
    expect(refresher.getBackgroundTaskStatus().running).toBe(true);

    await vi.advanceTimersByTimeAsync(999);
    expect(source.calls).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(source.calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(61_000);
    expect(source.calls).toHaveLength(2);

    await refresher.stop();
    expect(refresher.getBackgroundTaskStatus().running).toBe(false);

    await vi.advanceTimersByTimeAsync(200_000);
    expect(source.calls).toHaveLength(2);
  });

  it("treats a second start as a no-op", async () => {
    const source = echoSource();
    const refresher = new SnapshotRefresher(universeOf(["AAPL"]), source, { startupDelayMs: 0, intervalMs: 10_000 });

    refresher.start();
    refresher.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(source.calls).toHaveLength(1);

    await refresher.stop();
  });

  it("stops during the startup delay without running a cycle", async () => {
    const source = echoSource();
    const refresher = new SnapshotRefresher(universeOf(["AAPL"]), source, { startupDelayMs: 5000 });

    refresher.start();
    await refresher.stop();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(source.calls).toHaveLength(0);
    expect(refresher.getBackgroundTaskStatus().cycles).toBe(0);
  });

  it("keeps looping after a failed cycle", async () => {
    const source = echoSource(["AAPL"]);
    const refresher = new SnapshotRefresher(universeOf(["AAPL"]), source, { startupDelayMs: 0, intervalMs: 1000 });

    refresher.start();
    await vi.advanceTimersByTimeAsync(2500);
    await refresher.stop();

    expect(source.calls).toHaveLength(3);
    expect(refresher.getBackgroundTaskStatus().lastCycle?.reason).toBe("no-quotes");
  });

  it("records an unexpected cycle error and publishes on the next interval", async () => {
    let calls = 0;
    const universe: SymbolProvider = {
      getSymbols: () => {
        calls++;
        if (calls === 1) throw new Error("symbol store unavailable");
        return new Set(["AAPL"]);
      },
    };
    const refresher = new SnapshotRefresher(universe, echoSource(), { startupDelayMs: 0, intervalMs: 1000 });

    refresher.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(refresher.getBackgroundTaskStatus()).toMatchObject({
      running: true,
      cycles: 1,
      lastCycle: { published: false, reason: "error", error: "symbol store unavailable" },
    });
    expect(refresher.getLastUpdateMeta().count).toBe(0);

    await vi.advanceTimersByTimeAsync(1000);

    expect(refresher.getBackgroundTaskStatus().lastCycle?.reason).toBe("published");
    expect(refresher.getLastUpdateMeta().count).toBe(1);
    await refresher.stop();
  });

  it("refuses a non-positive concurrency cap or batch size", () => {
    expect(() => new SnapshotRefresher(universeOf(["AAPL"]), echoSource(), { maxConcurrency: 0 })).toThrow(
      "maxConcurrency must be a positive integer, got 0",
    );
    expect(() => new SnapshotRefresher(universeOf(["AAPL"]), echoSource(), { batchSize: Number.NaN })).toThrow(RangeError);
  });

  it("stop is a no-op when nothing is running", async () => {
    const refresher = new SnapshotRefresher(universeOf([]), echoSource());
    await expect(refresher.stop()).resolves.toBeUndefined();
  });
});
