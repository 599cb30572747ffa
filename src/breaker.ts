// src/breaker.ts
import type { BreakerOptions, BreakerState } from "./types.js";

export interface BreakerDecision {
  allowed: boolean;
  state: BreakerState;
  retryAfterMs?: number; // only when blocked
  probe: boolean;        // true when this admission holds the HALF_OPEN probe
}

export interface BreakerChange {
  changed: boolean;
  from?: BreakerState;
  to?: BreakerState;
}

export interface BreakerSnapshot {
  state: BreakerState;
  failureCount: number;
  failureThreshold: number;
  lastFailureAtMs?: number;
  probeInFlight: boolean;
}

/**
 * Consecutive-failure circuit breaker owned by a single client.
 * - CLOSED: allow; OPEN once failureCount reaches failureThreshold.
 * - OPEN: block until recoveryTimeoutMs has passed since the last failure, then HALF_OPEN.
 * - HALF_OPEN: one probe at a time; close on success, open on failure.
 *
 * The OPEN -> HALF_OPEN flip happens lazily inside `allow()`, there is no timer.
 * Every read-modify-write here is synchronous, so concurrent callers on the
 * event loop observe each transition exactly once.
 */
export class CircuitBreaker {
  private readonly opts: BreakerOptions;

  private current: BreakerState = "CLOSED";
  private failures = 0;
  private lastFailureAtMs?: number;
  private probeInFlight = false;

  constructor(opts: Partial<BreakerOptions> = {}) {
    const failureThreshold = opts.failureThreshold ?? 5;
    const recoveryTimeoutMs = opts.recoveryTimeoutMs ?? 60_000;
    if (!Number.isInteger(failureThreshold) || failureThreshold <= 0)
      throw new Error(`failureThreshold must be > 0 (got ${failureThreshold})`);
    if (!Number.isFinite(recoveryTimeoutMs) || recoveryTimeoutMs < 0)
      throw new Error(`recoveryTimeoutMs must be >= 0 (got ${recoveryTimeoutMs})`);

    this.opts = { failureThreshold, recoveryTimeoutMs, expectedErrors: opts.expectedErrors ?? [Error] };
  }

  /**
   * Decide whether a call may proceed. A decision with `probe: true` MUST be
   * settled exactly once, with `onSuccess(…, true)`, `onFailure(…, true)` or
   * `releaseProbe`. Only that holder clears the probe flag.
   */
  allow(nowMs: number = Date.now()): BreakerDecision {
    if (this.current === "OPEN") {
      const elapsed = nowMs - (this.lastFailureAtMs ?? nowMs);
      if (elapsed <= this.opts.recoveryTimeoutMs) {
        return { allowed: false, state: "OPEN", retryAfterMs: this.opts.recoveryTimeoutMs - elapsed, probe: false };
      }
      this.current = "HALF_OPEN";
    }

    if (this.current === "HALF_OPEN") {
      if (this.probeInFlight) {
        return { allowed: false, state: "HALF_OPEN", retryAfterMs: 0, probe: false };
      }
      this.probeInFlight = true;
      return { allowed: true, state: "HALF_OPEN", probe: true };
    }

    return { allowed: true, state: "CLOSED", probe: false };
  }

  canExecute(nowMs: number = Date.now()): boolean {
    return this.allow(nowMs).allowed;
  }

  onSuccess(probe = false): BreakerChange {
    this.failures = 0;
    if (probe) this.probeInFlight = false;

    if (this.current === "HALF_OPEN") {
      this.current = "CLOSED";
      return { changed: true, from: "HALF_OPEN", to: "CLOSED" };
    }
    return { changed: false };
  }

  onFailure(nowMs: number = Date.now(), probe = false): BreakerChange {
    this.failures += 1;
    this.lastFailureAtMs = nowMs;
    if (probe) this.probeInFlight = false;

    const from = this.current;
    if (from === "HALF_OPEN" || (from === "CLOSED" && this.failures >= this.opts.failureThreshold)) {
      this.current = "OPEN";
      return { changed: true, from, to: "OPEN" };
    }
    return { changed: false };
  }

  /** Give the HALF_OPEN probe back when the call ended without reaching upstream. */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  /** Whether a transport error is of a kind worth retrying. */
  isExpected(err: unknown): boolean {
    return this.opts.expectedErrors.some((cls) => err instanceof cls);
  }

  get state(): BreakerState {
    return this.current;
  }

  get failureCount(): number {
    return this.failures;
  }

  snapshot(): BreakerSnapshot {
    return {
      state: this.current,
      failureCount: this.failures,
      failureThreshold: this.opts.failureThreshold,
      lastFailureAtMs: this.lastFailureAtMs,
      probeInFlight: this.probeInFlight,
    };
  }
}
