// src/retry.ts
import type { RetryOptions } from "./types.js";

export const DEFAULT_RETRYABLE_STATUSES: readonly number[] = [429, 500, 502, 503, 504];

/**
 * Stateless retry decision shared by every call of a client.
 *
 * Attempts are numbered from 1. With maxRetries = 3 a call makes at most
 * three attempts: attempts 1 and 2 may be retried, attempt 3 may not.
 *
 * Delays grow as backoffMs * 2^attempt with no jitter and no ceiling.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly backoffMs: number;
  private readonly retryable: ReadonlySet<number>;

  constructor(opts: Partial<RetryOptions> = {}) {
    const maxRetries = opts.maxRetries ?? 3;
    const backoffMs = opts.backoffMs ?? 1000;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) throw new Error(`maxRetries must be >= 0 (got ${maxRetries})`);
    if (!Number.isFinite(backoffMs) || backoffMs < 0) throw new Error(`backoffMs must be >= 0 (got ${backoffMs})`);

    this.maxRetries = maxRetries;
    this.backoffMs = backoffMs;
    this.retryable = new Set(opts.retryableStatuses ?? DEFAULT_RETRYABLE_STATUSES);
  }

  /** Attempts remain, regardless of what went wrong. */
  hasAttemptsLeft(attempt: number): boolean {
    return attempt < this.maxRetries;
  }

  shouldRetry(status: number, attempt: number): boolean {
    return this.hasAttemptsLeft(attempt) && this.retryable.has(status);
  }

  delayFor(attempt: number): number {
    return this.backoffMs * 2 ** attempt;
  }

  get retryableStatuses(): number[] {
    return [...this.retryable];
  }
}
