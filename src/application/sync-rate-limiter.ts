import { RateLimited } from '../domain/index.js';

export const SYNC_RATE_LIMIT = 10;
export const SYNC_RATE_WINDOW_MS = 10 * 60_000;

export interface SyncRateLimiterOptions {
  limit?: number;
  windowMs?: number;
  /** Clock in epoch ms. Injected by tests. */
  now?: () => number;
}

/**
 * Sliding-window admission control for manual sync requests.
 *
 * Keeps the admission timestamps of the trailing window, oldest first.
 * Entries at or before `now - windowMs` are pruned on every call.
 *
 * `check()` and `record()` are synchronous, and `admit()` runs both in
 * one call, so no other request can be admitted between the check and
 * the record on Node's single-threaded event loop.
 */
export class SyncRateLimiter {
  private timestamps: number[] = [];
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: SyncRateLimiterOptions = {}) {
    this.limit = options.limit ?? SYNC_RATE_LIMIT;
    this.windowMs = options.windowMs ?? SYNC_RATE_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  /** Throws `RateLimited` when the window already holds `limit` admissions. */
  check(): void {
    const now = this.now();
    this.prune(now);

    const oldest = this.timestamps[0];
    if (oldest !== undefined && this.timestamps.length >= this.limit) {
      throw new RateLimited(oldest + this.windowMs - now);
    }
  }

  record(): void {
    const now = this.now();
    this.timestamps.push(now);
    this.prune(now);
  }

  /** Check-then-record as one step. */
  admit(): void {
    this.check();
    this.record();
  }

  /** Admissions currently inside the window. */
  get size(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }
}
