import { z } from "zod";
import { RateLimiter } from "./rate-limiter.js";
import { NetworkError, errorMessage } from "../errors.js";
import { timeoutSignal } from "../util/async.js";
import { logVendor } from "../logging.js";

// ─── Interfaces ───────────────────────────────────────────────

export interface QuoteRecord {
  symbol: string;
  description: string;
  last: number;
  bid: number;
  ask: number;
  volume: number;
  exchange?: string;
  /** ISO timestamp of the last trade, when Tradier reports one */
  tradeTime?: string;
  change?: number;
  changePercent?: number;
}

/** Anything that can fetch quotes for a batch of symbols in one call. */
export interface QuoteSource {
  fetchQuotes(symbols: string[], signal?: AbortSignal): Promise<QuoteRecord[]>;
}

export interface TradierClientOptions {
  baseUrl: string;
  apiToken: string;
  limiter: RateLimiter;
  timeoutMs?: number;
}

// ─── Response shapes ──────────────────────────────────────────

// Tradier collapses a one-element list into a bare object and an empty result
// into null, "null" or an unmatched_symbols-only envelope.
const quotesEnvelopeSchema = z.object({
  quotes: z
    .union([
      z.object({ quote: z.unknown().optional() }).passthrough(),
      z.null(),
      z.literal("null"),
    ])
    .optional(),
});

const looseNumber = z.union([z.number(), z.string(), z.null()]).optional();

const rawQuoteSchema = z
  .object({
    symbol: z.string().trim().min(1),
    description: z.string().nullish(),
    exch: z.string().nullish(),
    last: looseNumber,
    bid: looseNumber,
    ask: looseNumber,
    volume: looseNumber,
    change: looseNumber,
    change_percentage: looseNumber,
    trade_date: looseNumber,
  })
  .passthrough();

type RawQuote = z.infer<typeof rawQuoteSchema>;

export type QuotePayload =
  | { kind: "empty" }
  | { kind: "single"; entry: unknown }
  | { kind: "many"; entries: unknown[] };

// ─── Normalization ────────────────────────────────────────────

function toNumber(value: unknown, fallback = 0): number {
  if (value === null || value === undefined || value === "") return fallback;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function toInteger(value: unknown, fallback = 0): number {
  return Math.trunc(toNumber(value, fallback));
}

/** Classify the `quotes` envelope before anything downstream touches it. */
export function classifyQuotePayload(body: unknown): QuotePayload {
  const parsed = quotesEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    logVendor.warn({ issues: parsed.error.issues.length }, "Unrecognized quotes response shape");
    return { kind: "empty" };
  }
  const quotes = parsed.data.quotes;
  if (quotes === undefined || quotes === null || quotes === "null") return { kind: "empty" };

  const quote = quotes.quote;
  if (quote === undefined || quote === null) return { kind: "empty" };
  if (Array.isArray(quote)) return quote.length > 0 ? { kind: "many", entries: quote } : { kind: "empty" };
  return { kind: "single", entry: quote };
}

function toQuoteRecord(raw: RawQuote): QuoteRecord {
  const record: QuoteRecord = {
    symbol: raw.symbol.toUpperCase(),
    description: raw.description ?? "",
    last: toNumber(raw.last),
    bid: toNumber(raw.bid),
    ask: toNumber(raw.ask),
    volume: toInteger(raw.volume),
    change: toNumber(raw.change),
    changePercent: toNumber(raw.change_percentage),
  };
  if (raw.exch) record.exchange = raw.exch;
  const tradeDate = toNumber(raw.trade_date);
  if (tradeDate > 0) {
    // Finite but past the Date range still yields an invalid Date
    const traded = new Date(tradeDate);
    if (!Number.isNaN(traded.getTime())) record.tradeTime = traded.toISOString();
  }
  return record;
}

/**
 * Turn a Tradier /markets/quotes body into quote records.
 * Entries that fail validation are skipped, never fatal.
 */
export function normalizeQuotes(body: unknown): QuoteRecord[] {
  const payload = classifyQuotePayload(body);
  const entries =
    payload.kind === "empty" ? [] : payload.kind === "single" ? [payload.entry] : payload.entries;

  const records: QuoteRecord[] = [];
  for (const entry of entries) {
    const parsed = rawQuoteSchema.safeParse(entry);
    if (!parsed.success) {
      logVendor.debug({ issue: parsed.error.issues[0]?.message }, "Skipping malformed quote entry");
      continue;
    }
    records.push(toQuoteRecord(parsed.data));
  }
  return records;
}

// ─── Client ───────────────────────────────────────────────────

const DEFAULT_TIMEOUT_MS = 20_000;

export class TradierClient implements QuoteSource {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly limiter: RateLimiter;
  private readonly timeoutMs: number;

  constructor(opts: TradierClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiToken = opts.apiToken;
    this.limiter = opts.limiter;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get hasToken(): boolean {
    return this.apiToken.length > 0;
  }

  /**
   * Batched multi-symbol quote call: POST /markets/quotes.
   * Waits on the shared rate limiter first; throws on transport or HTTP failure.
   */
  async fetchQuotes(symbols: string[], signal?: AbortSignal): Promise<QuoteRecord[]> {
    if (!this.hasToken) {
      throw new Error("TRADIER_API_TOKEN not set");
    }
    if (symbols.length === 0) return [];

    await this.limiter.acquire(signal);

    const url = `${this.baseUrl}/markets/quotes`;
    const body = new URLSearchParams({ symbols: symbols.join(","), greeks: "false" });
    const { signal: requestSignal, dispose } = timeoutSignal(this.timeoutMs, signal);

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          Accept: "application/json",
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: body.toString(),
        signal: requestSignal,
      });
    } catch (e: unknown) {
      dispose();
      if (signal?.aborted) throw e;
      throw new NetworkError(`Tradier quotes request failed: ${errorMessage(e)}`, url, { cause: e });
    }

    try {
      this.limiter.updateFromHeaders(res.headers);

      if (!res.ok) {
        throw new NetworkError(`Tradier quotes returned HTTP ${res.status}`, url, { status: res.status });
      }

      let json: unknown;
      try {
        json = await res.json();
      } catch (e: unknown) {
        throw new NetworkError(`Tradier quotes body unreadable: ${errorMessage(e)}`, url, {
          status: res.status,
          cause: e,
        });
      }

      const records = normalizeQuotes(json);
      logVendor.debug({ requested: symbols.length, received: records.length }, "Tradier quotes batch fetched");
      return records;
    } finally {
      dispose();
    }
  }
}
