// src/client.ts
import { EventEmitter } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import type { ZodTypeAny } from "zod";
import { CircuitBreaker, type BreakerChange } from "./breaker.js";
import { ResponseCache } from "./cache.js";
import {
  batchRequestSchema,
  parseOptions,
  resolveClientOptions,
  resolveRequestOptions,
  type ClientOptions,
} from "./config.js";
import { CircuitOpenError } from "./errors.js";
import { appendQuery, UndiciTransport } from "./http.js";
import { LoadGenerator, type LoadTestOptions, type LoadTestResult } from "./loadgen.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import { formatSummary, MetricsCollector, type MetricsSummary } from "./metrics.js";
import { MockRegistry } from "./mocks.js";
import { WorkerPool } from "./pool.js";
import { createRateLimiter, type RateLimiter } from "./rateLimiter.js";
import { createResponse } from "./response.js";
import { RetryPolicy } from "./retry.js";
import type { ClientSnapshot } from "./snapshot.js";
import type {
  ApiResponse,
  BatchOptions,
  BatchRequest,
  HttpMethod,
  MockDefinition,
  RequestOptions,
  Transport,
  TransportResponse,
} from "./types.js";
import { SchemaRegistry, type SchemaValidator } from "./validator.js";

function genRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

/** Registry name of a client: explicit name, else its base URL, else "default". */
export function clientName(name: string | undefined, baseUrl: string | undefined): string {
  return name ?? ((baseUrl ?? "").replace(/\/+$/, "") || "default");
}

/** Whether this call still owns the HALF_OPEN probe it was admitted with. */
interface ProbeHold {
  held: boolean;
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}

/**
 * Outbound API client. Every call runs the same gate sequence:
 * mocks -> circuit breaker -> rate limiter -> cache -> transport (with retries).
 *
 * Failure signalling is split on purpose:
 * - rejects with TransportError once retries are spent, or CircuitOpenError
 *   when the breaker refuses the call;
 * - resolves with `success: false` for any well-formed non-2xx response.
 */
export class ApiClient extends EventEmitter {
  readonly name: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;

  readonly retryPolicy: RetryPolicy;
  readonly circuitBreaker: CircuitBreaker;
  readonly rateLimiter?: RateLimiter;
  readonly cache?: ResponseCache;
  readonly metrics?: MetricsCollector;
  readonly mocks: MockRegistry;

  private readonly defaultHeaders: Record<string, string>;
  private readonly schemas?: SchemaRegistry;
  private readonly validator?: SchemaValidator;
  private readonly transport: Transport;
  private readonly pool: WorkerPool;
  private readonly log: Logger;

  constructor(options: ClientOptions = {}) {
    super();
    const opts = resolveClientOptions(options);

    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.name = clientName(opts.name, this.baseUrl);
    this.timeoutMs = opts.timeoutMs;
    this.defaultHeaders = { ...opts.defaultHeaders };
    this.log = (opts.logger ?? rootLogger).child({ client: this.name });

    this.retryPolicy = new RetryPolicy(opts.retry === false ? { maxRetries: 0 } : opts.retry);
    this.circuitBreaker = new CircuitBreaker(opts.circuitBreaker);
    if (opts.rateLimit) this.rateLimiter = createRateLimiter(opts.rateLimit);
    if (opts.cache !== false) this.cache = new ResponseCache(opts.cache === true ? {} : opts.cache);
    if (opts.metrics) this.metrics = new MetricsCollector();
    this.mocks = new MockRegistry(this.log);

    if (opts.validator) {
      this.validator = opts.validator;
    } else if (opts.validation) {
      this.schemas = new SchemaRegistry(this.log);
      this.validator = this.schemas;
    }

    this.transport = opts.transport ?? new UndiciTransport();
    this.pool = new WorkerPool(opts.poolSize);

    this.log.info({ baseUrl: this.baseUrl }, "api client created");
  }

  async execute(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const opts = resolveRequestOptions(options);
    const requestId = genRequestId();

    // 1. Mocks short-circuit everything, including metrics.
    const mocked = this.mocks.lookup(method, endpoint);
    if (mocked) {
      this.log.debug({ requestId, method, endpoint }, "serving mock response");
      this.emit("mock:hit", { requestId, method, endpoint });
      return mocked;
    }

    // 2. Circuit decision before waiting on the rate limiter.
    const decision = this.circuitBreaker.allow();
    if (!decision.allowed) {
      const err = new CircuitOpenError(decision.retryAfterMs ?? 0);
      this.emit("request:rejected", { requestId, method, endpoint, error: err });
      throw err;
    }

    const hold: ProbeHold = { held: decision.probe };
    try {
      // 3. Rate limiting delays the call, it never fails it.
      if (this.rateLimiter) {
        await this.rateLimiter.acquire(() => this.emit("ratelimit:wait", { requestId, method, endpoint }));
      }

      // 4. Cache
      let cacheKey: string | undefined;
      if (opts.useCache && this.cache && method === "GET") {
        cacheKey = ResponseCache.keyFor(method, endpoint, opts.params);
        const cached = this.cache.get(cacheKey);
        if (cached) {
          this.log.debug({ requestId, key: cacheKey }, "serving cached response");
          this.emit("cache:hit", { requestId, method, endpoint });
          return cached;
        }
      }

      return await this.attempts(requestId, method, endpoint, opts, cacheKey, hold);
    } finally {
      // upstream never settled the probe (cache hit, throwing listener), hand it back
      if (hold.held) {
        hold.held = false;
        this.circuitBreaker.releaseProbe();
      }
    }
  }

  private async attempts(
    requestId: string,
    method: HttpMethod,
    endpoint: string,
    opts: RequestOptions,
    cacheKey: string | undefined,
    hold: ProbeHold
  ): Promise<ApiResponse> {
    const url = this.buildUrl(endpoint);
    const headers = { ...this.defaultHeaders, ...(opts.headers ?? {}) };
    const retryEnabled = opts.retry ?? true;

    for (let attempt = 1; ; attempt++) {
      const base = { requestId, method, endpoint, url, attempt };
      const start = Date.now();
      this.log.debug(base, "sending request");
      this.emit("request:start", base);

      let raw: TransportResponse;
      try {
        raw = await this.transport.send({
          method,
          url,
          headers,
          params: opts.params,
          body: opts.body,
          timeoutMs: this.timeoutMs,
        });
      } catch (err) {
        this.log.error({ ...base, err }, "transport error");
        this.breakerFailure(hold);
        this.emit("request:failure", { ...base, error: err, durationMs: Date.now() - start });

        if (retryEnabled && this.retryPolicy.hasAttemptsLeft(attempt) && this.circuitBreaker.isExpected(err)) {
          await this.backoff(base, { errorName: errorName(err) });
          continue;
        }
        throw err;
      }

      const response = createResponse({
        status: raw.status,
        body: raw.body,
        headers: raw.headers,
        elapsedMs: raw.elapsedMs,
        url: appendQuery(url, opts.params),
      });

      this.metrics?.record(response);
      this.log.debug({ ...base, status: response.status, elapsedMs: response.elapsedMs }, "response received");
      this.emit("request:success", { ...base, status: response.status, durationMs: Date.now() - start });

      if (opts.validateAgainstSchema) this.validate(response, opts.validateAgainstSchema);

      if (response.success) {
        if (cacheKey && this.cache) this.cache.set(cacheKey, response);
        this.breakerSuccess(hold);
        return response;
      }

      if (retryEnabled && this.retryPolicy.shouldRetry(response.status, attempt)) {
        await this.backoff(base, { status: response.status });
        continue;
      }

      this.breakerFailure(hold);
      return response;
    }
  }

  private async backoff(
    base: { requestId: string; method: HttpMethod; endpoint: string; url: string; attempt: number },
    cause: { status?: number; errorName?: string }
  ): Promise<void> {
    const delayMs = this.retryPolicy.delayFor(base.attempt);
    this.log.warn({ ...base, ...cause, delayMs }, "retrying request");
    this.emit("request:retry", { ...base, ...cause, delayMs });
    await sleep(delayMs);
  }

  private validate(response: ApiResponse, schemaName: string): void {
    if (!this.validator) {
      this.log.warn({ schema: schemaName }, "schema validation requested but disabled for this client");
      return;
    }
    try {
      this.validator.validate(response.body, schemaName);
    } catch (err) {
      this.log.error({ schema: schemaName, err }, "schema validator threw");
    }
  }

  private breakerSuccess(hold: ProbeHold): void {
    const probe = hold.held;
    hold.held = false;
    this.emitBreakerChange(this.circuitBreaker.onSuccess(probe));
  }

  private breakerFailure(hold: ProbeHold): void {
    const probe = hold.held;
    hold.held = false;
    this.emitBreakerChange(this.circuitBreaker.onFailure(Date.now(), probe));
  }

  private emitBreakerChange(change: BreakerChange): void {
    if (!change.changed) return;
    this.log.info({ from: change.from, to: change.to }, "circuit breaker state changed");
    this.emit("breaker:state", { from: change.from, to: change.to });
  }

  buildUrl(endpoint: string): string {
    if (this.baseUrl) return `${this.baseUrl}/${endpoint.replace(/^\/+/, "")}`;
    return endpoint;
  }

  get(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.execute("GET", endpoint, options);
  }

  post(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.execute("POST", endpoint, options);
  }

  put(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.execute("PUT", endpoint, options);
  }

  patch(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.execute("PATCH", endpoint, options);
  }

  delete(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.execute("DELETE", endpoint, options);
  }

  /**
   * Runs every request through `execute`, in parallel on a bounded pool or
   * one after another. Results keep input order; the first rejection wins.
   */
  async batch(requests: BatchRequest[], options: BatchOptions = {}): Promise<ApiResponse[]> {
    const parsed = requests.map((r, i) => parseOptions(batchRequestSchema, r, `batch request #${i}`));
    const run = ({ method, endpoint, ...opts }: BatchRequest): Promise<ApiResponse> =>
      this.execute(method ?? "GET", endpoint, opts);

    if (options.parallel === false) {
      const out: ApiResponse[] = [];
      for (const r of parsed) out.push(await run(r));
      return out;
    }

    const pool = options.concurrency === undefined ? this.pool : new WorkerPool(options.concurrency);
    return pool.map(parsed, run);
  }

  loadTest(endpoint: string, options: LoadTestOptions): Promise<LoadTestResult> {
    return new LoadGenerator(this, { logger: this.log }).run(endpoint, options);
  }

  addMock(endpoint: string, mock: MockDefinition & { method?: HttpMethod } = {}): void {
    const { method, ...def } = mock;
    this.mocks.add(endpoint, method ?? "GET", def);
  }

  enableMocks(): void {
    this.mocks.enable();
  }

  disableMocks(): void {
    this.mocks.disable();
  }

  addSchema(name: string, schema: ZodTypeAny): void {
    if (!this.schemas) {
      this.log.warn({ schema: name }, "validation was disabled when the client was created");
      return;
    }
    this.schemas.addSchema(name, schema);
  }

  getMetrics(): MetricsSummary | undefined {
    return this.metrics?.summary();
  }

  printMetrics(): void {
    const summary = this.getMetrics();
    if (!summary) return;
    for (const line of formatSummary(summary)) this.log.info(line);
  }

  snapshot(): ClientSnapshot {
    return {
      name: this.name,
      breaker: this.circuitBreaker.snapshot(),
      rateLimiter: this.rateLimiter?.snapshot(),
      cacheSize: this.cache?.size,
      mocksEnabled: this.mocks.enabled,
      mockCount: this.mocks.size,
      pool: this.pool.snapshot(),
    };
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }
}
