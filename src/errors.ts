// src/errors.ts
import type { ApiResponse } from "./types.js";

export class ApiClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApiClientError";
  }
}

/**
 * Connection-level failure raised by the transport (refused, DNS, reset).
 * The only failure the pipeline surfaces by rejecting once retries are spent.
 */
export class TransportError extends ApiClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

/** The breaker rejected the call before any attempt was made. Never retried. */
export class CircuitOpenError extends ApiClientError {
  constructor(public readonly retryAfterMs: number) {
    super(`Circuit is OPEN; retry after ${retryAfterMs}ms`);
    this.name = "CircuitOpenError";
  }
}

export class InvalidOptionsError extends ApiClientError {
  constructor(
    public readonly subject: string,
    public readonly issues: string[]
  ) {
    super(`Invalid ${subject}: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
  }
}

export class UnknownEndpointError extends ApiClientError {
  constructor(public readonly endpointName: string) {
    super(`Unknown endpoint '${endpointName}'`);
    this.name = "UnknownEndpointError";
  }
}

export class UnknownClientError extends ApiClientError {
  constructor(public readonly clientName: string) {
    super(`Unknown client '${clientName}'`);
    this.name = "UnknownClientError";
  }
}

/** Opt-in exception form of an unsuccessful response, see `raiseForStatus`. */
export class HttpStatusError extends ApiClientError {
  constructor(public readonly response: ApiResponse) {
    super(`HTTP ${response.status} for ${response.url}`);
    this.name = "HttpStatusError";
  }
}
