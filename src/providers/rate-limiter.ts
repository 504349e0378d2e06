/**
 * Sliding-window rate limiter for the Tradier market-data quota.
 *
 * Tradier allows 120 requests/minute on production and 60 on sandbox, and reports
 * the live figures back in X-Ratelimit-* response headers. One limiter instance is
 * shared by every outbound call in the process.
 */
import { abortReason } from "../util/async.js";
import { logVendor } from "../logging.js";

const DEFAULT_MAX_REQUESTS = 120;
const DEFAULT_WINDOW_MS = 60_000;
const DEFAULT_BUFFER_MS = 100; // slack past the oldest entry's expiry

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  bufferMs?: number;
}

export interface QuotaReport {
  allowed: number | null;
  used: number | null;
  available: number | null;
  /** Epoch ms at which the upstream window resets */
  expiry: number | null;
  receivedAt: string;
}

export interface RateLimiterStats {
  maxRequests: number;
  requestsInWindow: number;
  available: number;
  windowSeconds: number;
  lastReportedQuota: QuotaReport | null;
}

type HeaderSource = Headers | Record<string, string | string[] | undefined>;

function readHeader(headers: HeaderSource, name: string): string | null {
  if (headers instanceof Headers) return headers.get(name);
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return Array.isArray(value) ? (value[0] ?? null) : value;
  }
  return null;
}

function parseCount(raw: string | null): number | null {
  if (raw === null || !/^\s*\d+\s*$/.test(raw)) return null;
  return parseInt(raw, 10);
}

interface Waiter {
  admit: () => void;
}

export class RateLimiter {
  private _maxRequests: number;
  private readonly windowMs: number;
  private readonly bufferMs: number;
  /** Admission times, oldest first */
  private admissions: number[] = [];
  /** Callers waiting for a slot, in arrival order */
  private waiters: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lastQuota: QuotaReport | null = null;

  constructor(opts: RateLimiterOptions = {}) {
    this._maxRequests = opts.maxRequests ?? DEFAULT_MAX_REQUESTS;
    this.windowMs = opts.windowMs ?? DEFAULT_WINDOW_MS;
    this.bufferMs = opts.bufferMs ?? DEFAULT_BUFFER_MS;
  }

  get maxRequests(): number {
    return this._maxRequests;
  }

  /**
   * Wait until one more request fits in the trailing window, then record it.
   *
   * Callers are admitted in arrival order: a newcomer goes straight through only
   * when nobody is queued and the window has room. Queued callers are released by
   * a single timer that fires when the oldest admission leaves the window, so no
   * caller holds the limiter while it waits.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    const now = Date.now();
    this.purge(now);
    if (this.waiters.length === 0 && this.admissions.length < this._maxRequests) {
      this.admissions.push(now);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        if (this.waiters.length === 0) this.clearTimer();
        reject(abortReason(signal));
      };
      const waiter: Waiter = {
        admit: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
      this.schedule();
    });
  }

  /**
   * Adopt the quota Tradier reports. Best-effort: anything unparseable is ignored.
   *
   * Headers: X-Ratelimit-Allowed, X-Ratelimit-Used, X-Ratelimit-Available,
   * X-Ratelimit-Expiry (epoch ms).
   */
  updateFromHeaders(headers: HeaderSource): void {
    const allowed = parseCount(readHeader(headers, "x-ratelimit-allowed"));
    const used = parseCount(readHeader(headers, "x-ratelimit-used"));
    const available = parseCount(readHeader(headers, "x-ratelimit-available"));
    const expiry = parseCount(readHeader(headers, "x-ratelimit-expiry"));

    if (allowed === null && used === null && available === null && expiry === null) return;

    this.lastQuota = { allowed, used, available, expiry, receivedAt: new Date().toISOString() };

    // A zero ceiling would stall every caller forever
    if (allowed !== null && allowed > 0 && allowed !== this._maxRequests) {
      logVendor.info(
        { previous: this._maxRequests, allowed },
        `Upstream quota changed: ${this._maxRequests} → ${allowed} requests/window`,
      );
      this._maxRequests = allowed;
      if (this.waiters.length > 0) {
        this.clearTimer();
        this.release();
      }
    }

    if (available !== null && available < 5) {
      logVendor.warn({ available, used, expiry }, "Upstream quota nearly exhausted");
    }
  }

  getStats(): RateLimiterStats {
    this.purge(Date.now());
    return {
      maxRequests: this._maxRequests,
      requestsInWindow: this.admissions.length,
      available: Math.max(0, this._maxRequests - this.admissions.length),
      windowSeconds: this.windowMs / 1000,
      lastReportedQuota: this.lastQuota ? { ...this.lastQuota } : null,
    };
  }

  /** Admit queued callers while the window has room, then re-arm the timer. */
  private release(): void {
    this.timer = null;
    const now = Date.now();
    this.purge(now);
    while (this.admissions.length < this._maxRequests) {
      const next = this.waiters.shift();
      if (!next) break;
      this.admissions.push(now);
      next.admit();
    }
    this.schedule();
  }

  private schedule(): void {
    if (this.timer || this.waiters.length === 0) return;
    const now = Date.now();
    this.purge(now);
    const waitMs =
      this.admissions.length < this._maxRequests ? 0 : this.windowMs - (now - this.admissions[0]) + this.bufferMs;
    logVendor.debug(
      { waitMs, queued: this.waiters.length, inWindow: this.admissions.length, maxRequests: this._maxRequests },
      "Rate limit reached — waiting for window to free up",
    );
    this.timer = setTimeout(() => this.release(), waitMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private purge(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.admissions.length && this.admissions[expired] < cutoff) expired++;
    if (expired > 0) this.admissions = this.admissions.slice(expired);
  }
}
