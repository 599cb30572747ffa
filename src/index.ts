export { ApiClient, clientName } from "./client.js";
export { EndpointClient } from "./endpoints.js";
export { createClient, createEndpointClient, withClient, withMocks, withRateLimit } from "./factory.js";
export { ClientManager } from "./manager.js";
export { CircuitBreaker } from "./breaker.js";
export type { BreakerChange, BreakerDecision, BreakerSnapshot } from "./breaker.js";
export { RetryPolicy, DEFAULT_RETRYABLE_STATUSES } from "./retry.js";
export { TokenBucketLimiter, FixedWindowLimiter, createRateLimiter } from "./rateLimiter.js";
export type { RateLimiter, RateLimiterSnapshot } from "./rateLimiter.js";
export { ResponseCache, canonicalJson } from "./cache.js";
export { MetricsCollector, formatSummary } from "./metrics.js";
export type { MetricsSample, MetricsSummary, ErrorRecord } from "./metrics.js";
export { MockRegistry } from "./mocks.js";
export { SchemaRegistry } from "./validator.js";
export type { SchemaValidator } from "./validator.js";
export { LoadGenerator, LoadTestResult } from "./loadgen.js";
export type { LoadTestOptions, LoadTestOutcome, RequestExecutor } from "./loadgen.js";
export { WorkerPool } from "./pool.js";
export { UndiciTransport } from "./http.js";
export { createResponse, isSuccessStatus, raiseForStatus } from "./response.js";
export { loadClientOptionsFromEnv, resolveClientOptions, DEFAULT_TIMEOUT_MS, DEFAULT_POOL_SIZE } from "./config.js";
export type { ClientOptions, ResolvedClientOptions } from "./config.js";
export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export * from "./errors.js";
export type * from "./types.js";
export type * from "./events.js";
export type { ClientSnapshot } from "./snapshot.js";
