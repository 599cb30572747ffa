export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | QueryValue[]>;

/**
 * Unified response returned by every call path (transport, cache and mocks).
 * `success` is derived from `status` at construction and never changes.
 */
export interface ApiResponse<T = unknown> {
  readonly status: number;
  readonly body: T;
  readonly headers: Readonly<Record<string, string>>;
  readonly elapsedMs: number;
  readonly url: string;
  readonly success: boolean;
}

/** What the transport collaborator receives for a single attempt. */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  params?: QueryParams;
  body?: unknown;
  timeoutMs: number;
}

/** What the transport collaborator hands back for a single attempt. */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
  elapsedMs: number;
}

/**
 * Performs the actual network I/O. Rejects on connection-level failures
 * (refused, DNS, timeout); resolves for every well-formed response, 2xx or not.
 */
export interface Transport {
  send(req: TransportRequest): Promise<TransportResponse>;
  close?(): Promise<void>;
}

/** Per-call options recognised by the pipeline. Unknown fields are rejected. */
export interface RequestOptions {
  retry?: boolean;           // default true
  useCache?: boolean;        // GET only, needs a cache on the client
  validateAgainstSchema?: string;
  headers?: Record<string, string>;
  params?: QueryParams;
  body?: unknown;
}

export type BreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type ErrorClass = new (...args: never[]) => Error;

export interface RetryOptions {
  maxRetries: number;          // e.g. 3
  backoffMs: number;           // e.g. 1000 -> 2000, 4000, ...
  retryableStatuses: number[]; // e.g. [429, 500, 502, 503, 504]
}

export interface BreakerOptions {
  failureThreshold: number;    // e.g. 5
  recoveryTimeoutMs: number;   // e.g. 60000
  /** Transport errors of these classes count as retryable. */
  expectedErrors: ErrorClass[];
}

export type RateLimitAlgorithm = "token_bucket" | "fixed_window";

export interface RateLimitOptions {
  requestsPerSecond: number;
  algorithm: RateLimitAlgorithm;
  capacity?: number;           // token bucket burst size, defaults to requestsPerSecond
  pollIntervalMs: number;      // e.g. 100
}

export interface CacheOptions {
  ttlMs: number;               // e.g. 300000
}

export interface MockDefinition {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
  elapsedMs?: number;
}

export interface BatchRequest extends RequestOptions {
  method?: HttpMethod;
  endpoint: string;
}

export interface BatchOptions {
  parallel?: boolean;          // default true
  concurrency?: number;        // default 10
}

export interface EndpointDefinition {
  method: HttpMethod;
  path: string;
}

export type EndpointMap = Record<string, EndpointDefinition>;
