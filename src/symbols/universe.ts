/**
 * Symbol universe — the set of underlyings with listed options.
 *
 * Downloaded from the OCC once at startup and daily after that. The set and its
 * timestamp are replaced together as one value, so readers see either the initial
 * empty state or one complete download, never a half-built set.
 */
import { parseSymbolFeed } from "./parse.js";
import { EmptyUniverseError, NetworkError, errorMessage } from "../errors.js";
import { timeoutSignal } from "../util/async.js";
import { logSymbols } from "../logging.js";

const DEFAULT_TIMEOUT_MS = 30_000;

export interface SymbolUniverseOptions {
  feedUrl: string;
  timeoutMs?: number;
}

/** Read side of the universe, all the refresher needs. */
export interface SymbolProvider {
  getSymbols(): Set<string>;
}

interface UniverseState {
  readonly symbols: ReadonlySet<string>;
  readonly lastUpdate: Date | null;
}

export class SymbolUniverse implements SymbolProvider {
  private readonly feedUrl: string;
  private readonly timeoutMs: number;
  private state: UniverseState = { symbols: new Set<string>(), lastUpdate: null };

  constructor(opts: SymbolUniverseOptions) {
    this.feedUrl = opts.feedUrl;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Download and parse the feed. An unparseable body yields an empty set rather
   * than an error; only transport failures and non-2xx statuses throw.
   */
  async fetchAndParse(): Promise<Set<string>> {
    const text = await this.download();
    const result = parseSymbolFeed(text);

    for (const skip of result.skipped) {
      logSymbols.debug(skip, `Skipping line ${skip.line}: ${skip.reason}`);
    }
    logSymbols.info(
      { lines: result.lineCount, skipped: result.skipped.length, symbols: result.symbols.size },
      `Parsed ${result.symbols.size} unique symbols from OCC file`,
    );
    return result.symbols;
  }

  /**
   * Replace the stored set with a fresh download.
   *
   * Failures (including a download that parsed to zero symbols) keep the previous
   * set and timestamp. Returns whether the set was replaced; throws only when
   * `raiseOnError` is set.
   */
  async refresh(raiseOnError = false): Promise<boolean> {
    try {
      const symbols = await this.fetchAndParse();
      if (symbols.size === 0) {
        throw new EmptyUniverseError("Symbol feed parsed to zero symbols");
      }

      const previous = this.state.symbols.size;
      this.state = { symbols, lastUpdate: new Date() };
      logSymbols.info({ previous, count: symbols.size }, `Symbols refreshed: ${symbols.size} unique symbols stored`);
      return true;
    } catch (e: unknown) {
      logSymbols.error(
        { err: e, kept: this.state.symbols.size },
        `Failed to refresh symbols — keeping previous set: ${errorMessage(e)}`,
      );
      if (raiseOnError) throw e;
      return false;
    }
  }

  getSymbols(): Set<string> {
    return new Set(this.state.symbols);
  }

  getSortedSymbols(): string[] {
    return [...this.state.symbols].sort();
  }

  getSymbolCount(): number {
    return this.state.symbols.size;
  }

  getLastUpdate(): Date | null {
    const { lastUpdate } = this.state;
    return lastUpdate ? new Date(lastUpdate.getTime()) : null;
  }

  isSymbolAvailable(symbol: string): boolean {
    return this.state.symbols.has(symbol.trim().toUpperCase());
  }

  private async download(): Promise<string> {
    logSymbols.info({ url: this.feedUrl }, "Downloading OCC symbols");
    const { signal, dispose } = timeoutSignal(this.timeoutMs);
    try {
      let res: Response;
      try {
        res = await fetch(this.feedUrl, { signal });
      } catch (e: unknown) {
        throw new NetworkError(`OCC symbol download failed: ${errorMessage(e)}`, this.feedUrl, { cause: e });
      }
      if (!res.ok) {
        throw new NetworkError(`OCC symbol download returned HTTP ${res.status}`, this.feedUrl, {
          status: res.status,
        });
      }
      try {
        return await res.text();
      } catch (e: unknown) {
        throw new NetworkError(`OCC symbol download interrupted: ${errorMessage(e)}`, this.feedUrl, { cause: e });
      }
    } finally {
      dispose();
    }
  }
}
