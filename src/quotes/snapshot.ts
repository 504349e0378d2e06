import type { QuoteRecord } from "../providers/tradier.js";

/** The six fields kept per symbol in the published snapshot. */
export interface SnapshotQuote {
  symbol: string;
  description: string;
  last: number;
  bid: number;
  ask: number;
  volume: number;
}

export interface Snapshot {
  readonly lastUpdate: Date | null;
  readonly results: readonly SnapshotQuote[];
  readonly bySymbol: ReadonlyMap<string, SnapshotQuote>;
  readonly count: number;
}

export interface SnapshotView {
  lastUpdate: string | null;
  count: number;
  results: SnapshotQuote[];
}

export interface SnapshotMeta {
  lastUpdate: string | null;
  count: number;
}

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  lastUpdate: null,
  results: Object.freeze([]),
  bySymbol: new Map<string, SnapshotQuote>(),
  count: 0,
});

export function toSnapshotQuote(record: QuoteRecord): SnapshotQuote {
  return {
    symbol: record.symbol,
    description: record.description,
    last: record.last,
    bid: record.bid,
    ask: record.ask,
    volume: record.volume,
  };
}

/**
 * Build a snapshot from aggregated records. A symbol seen twice keeps its first
 * position and its last values, so `results` and `bySymbol` always agree.
 */
export function buildSnapshot(records: readonly QuoteRecord[], at: Date): Snapshot {
  const bySymbol = new Map<string, SnapshotQuote>();
  for (const record of records) {
    bySymbol.set(record.symbol, toSnapshotQuote(record));
  }
  const results = [...bySymbol.values()];
  return {
    lastUpdate: at,
    results,
    bySymbol,
    count: results.length,
  };
}

/**
 * Copy-out read of a snapshot. No `symbols` (or an empty list) returns everything;
 * otherwise requested symbols are upper-cased, de-duplicated and looked up in
 * `bySymbol`, unknown ones dropped.
 */
export function viewSnapshot(snapshot: Snapshot, symbols?: readonly string[]): SnapshotView {
  const lastUpdate = snapshot.lastUpdate ? snapshot.lastUpdate.toISOString() : null;

  if (!symbols || symbols.length === 0) {
    return {
      lastUpdate,
      count: snapshot.count,
      results: snapshot.results.map((q) => ({ ...q })),
    };
  }

  const wanted = new Set(symbols.map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0));
  const results: SnapshotQuote[] = [];
  for (const symbol of wanted) {
    const quote = snapshot.bySymbol.get(symbol);
    if (quote) results.push({ ...quote });
  }
  return { lastUpdate, count: results.length, results };
}

export function snapshotMeta(snapshot: Snapshot): SnapshotMeta {
  return {
    lastUpdate: snapshot.lastUpdate ? snapshot.lastUpdate.toISOString() : null,
    count: snapshot.count,
  };
}
