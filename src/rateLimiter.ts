// src/rateLimiter.ts
import { setTimeout as sleep } from "node:timers/promises";
import type { RateLimitAlgorithm, RateLimitOptions } from "./types.js";

export interface RateLimiterSnapshot {
  algorithm: RateLimitAlgorithm;
  requestsPerSecond: number;
  tokens?: number;       // token bucket only
  windowCount?: number;  // fixed window only
}

/**
 * Admission control for outbound calls. `tryAcquire` never blocks; `acquire`
 * polls until admitted, so callers are delayed rather than rejected.
 */
export interface RateLimiter {
  tryAcquire(nowMs?: number): boolean;
  acquire(onWait?: () => void): Promise<void>;
  snapshot(nowMs?: number): RateLimiterSnapshot;
}

abstract class PollingRateLimiter implements RateLimiter {
  protected constructor(
    readonly requestsPerSecond: number,
    private readonly pollIntervalMs: number
  ) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new Error(`requestsPerSecond must be > 0 (got ${requestsPerSecond})`);
    }
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
      throw new Error(`pollIntervalMs must be > 0 (got ${pollIntervalMs})`);
    }
  }

  abstract tryAcquire(nowMs?: number): boolean;
  abstract snapshot(nowMs?: number): RateLimiterSnapshot;

  async acquire(onWait?: () => void): Promise<void> {
    if (this.tryAcquire()) return;
    onWait?.();
    while (!this.tryAcquire()) {
      await sleep(this.pollIntervalMs);
    }
  }
}

/**
 * Refills continuously at requestsPerSecond up to capacity and spends one
 * token per admission. Starts full, so a burst of `capacity` is admitted at once.
 * Capacity defaults to the rate, and to one token for rates below 1/s.
 */
export class TokenBucketLimiter extends PollingRateLimiter {
  readonly capacity: number;
  private tokens: number;
  private lastRefillMs: number;

  constructor(opts: { requestsPerSecond: number; capacity?: number; pollIntervalMs?: number }, nowMs: number = Date.now()) {
    super(opts.requestsPerSecond, opts.pollIntervalMs ?? 100);
    const capacity = opts.capacity ?? Math.max(1, opts.requestsPerSecond);
    if (!Number.isFinite(capacity) || capacity < 1) throw new Error(`capacity must be >= 1 (got ${capacity})`);

    this.capacity = capacity;
    this.tokens = capacity;
    this.lastRefillMs = nowMs;
  }

  tryAcquire(nowMs: number = Date.now()): boolean {
    this.refill(nowMs);
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  snapshot(nowMs: number = Date.now()): RateLimiterSnapshot {
    this.refill(nowMs);
    return { algorithm: "token_bucket", requestsPerSecond: this.requestsPerSecond, tokens: this.tokens };
  }

  private refill(nowMs: number): void {
    const elapsedSec = Math.max(0, nowMs - this.lastRefillMs) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.requestsPerSecond);
    this.lastRefillMs = nowMs;
  }
}

/**
 * Counts admissions since the start of the current second, recomputed as
 * floor(now) on every attempt, and admits while that count is below the rate.
 */
export class FixedWindowLimiter extends PollingRateLimiter {
  private admitted: number[] = [];

  constructor(opts: { requestsPerSecond: number; pollIntervalMs?: number }) {
    super(opts.requestsPerSecond, opts.pollIntervalMs ?? 100);
  }

  tryAcquire(nowMs: number = Date.now()): boolean {
    this.prune(nowMs);
    if (this.admitted.length < this.requestsPerSecond) {
      this.admitted.push(nowMs);
      return true;
    }
    return false;
  }

  snapshot(nowMs: number = Date.now()): RateLimiterSnapshot {
    this.prune(nowMs);
    return { algorithm: "fixed_window", requestsPerSecond: this.requestsPerSecond, windowCount: this.admitted.length };
  }

  private prune(nowMs: number): void {
    const windowStart = Math.floor(nowMs / 1000) * 1000;
    // timestamps are appended in order, drop the stale prefix
    let i = 0;
    while (i < this.admitted.length && this.admitted[i] < windowStart) i++;
    if (i > 0) this.admitted = this.admitted.slice(i);
  }
}

export function createRateLimiter(opts: RateLimitOptions): RateLimiter {
  switch (opts.algorithm) {
    case "token_bucket":
      return new TokenBucketLimiter(opts);
    case "fixed_window":
      return new FixedWindowLimiter(opts);
  }
}
