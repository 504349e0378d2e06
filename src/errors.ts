/**
 * Failure taxonomy shared by the symbol feed, the vendor client and the refresher.
 *
 * Parse problems are not errors here: a malformed feed degrades to an empty symbol
 * set, a malformed quote entry is skipped. Local quota exhaustion never surfaces;
 * the rate limiter absorbs it by waiting.
 */

/** Upstream unreachable, timed out, or answered with a non-2xx status. */
export class NetworkError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "NetworkError";
    this.url = url;
    this.status = opts.status ?? null;
  }
}

/** No symbols to work with — a feed that parsed to nothing, or an empty universe at cycle time. */
export class EmptyUniverseError extends Error {
  constructor(message = "Symbol universe is empty") {
    super(message);
    this.name = "EmptyUniverseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}
