import type { BreakerState, HttpMethod } from "./types.js";

export type ApiClientEventName =
  | "mock:hit"
  | "cache:hit"
  | "ratelimit:wait"
  | "breaker:state"
  | "request:start"
  | "request:retry"
  | "request:success"
  | "request:failure"
  | "request:rejected";

export interface BreakerStateEvent {
  from: BreakerState;
  to: BreakerState;
}

export interface RequestEventBase {
  requestId: string; // generated UUID-like string (no external deps)
  method: HttpMethod;
  endpoint: string;
}

export interface AttemptEvent extends RequestEventBase {
  url: string;
  attempt: number;
}

export interface AttemptResultEvent extends AttemptEvent {
  durationMs: number;
  status?: number;     // set when a response came back
  error?: unknown;     // set on transport failure
}

export interface RetryEvent extends AttemptEvent {
  delayMs: number;
  status?: number;
  errorName?: string;
}

export interface RejectedEvent extends RequestEventBase {
  error: Error;
}
