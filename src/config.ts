// src/config.ts
import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";
import type { Logger } from "./logger.js";
import { DEFAULT_RETRYABLE_STATUSES } from "./retry.js";
import type { ErrorClass, RequestOptions, Transport } from "./types.js";
import type { SchemaValidator } from "./validator.js";

/** Default per-attempt timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Default worker pool size for parallel batches. */
export const DEFAULT_POOL_SIZE = 10;

const hasMethod = (v: unknown, name: string): boolean =>
  typeof v === "object" && v !== null && name in v && typeof Reflect.get(v, name) === "function";

const retrySchema = z
  .object({
    maxRetries: z.number().int().min(0).default(3),
    backoffMs: z.number().min(0).default(1000),
    retryableStatuses: z.array(z.number().int().min(100).max(599)).default([...DEFAULT_RETRYABLE_STATUSES]),
  })
  .strict();

const breakerSchema = z
  .object({
    failureThreshold: z.number().int().positive().default(5),
    recoveryTimeoutMs: z.number().min(0).default(60_000),
    expectedErrors: z
      .array(z.custom<ErrorClass>((v) => typeof v === "function", "expected an error class"))
      .default([Error]),
  })
  .strict();

const rateLimitSchema = z
  .object({
    requestsPerSecond: z.number().positive(),
    algorithm: z.enum(["token_bucket", "fixed_window"]).default("token_bucket"),
    capacity: z.number().min(1).optional(),
    pollIntervalMs: z.number().positive().default(100),
  })
  .strict();

const cacheSchema = z
  .object({
    ttlMs: z.number().positive().default(300_000),
  })
  .strict();

export const clientOptionsSchema = z
  .object({
    name: z.string().min(1).optional(),
    baseUrl: z.string().default(""),
    timeoutMs: z.number().positive().default(DEFAULT_TIMEOUT_MS),
    defaultHeaders: z.record(z.string()).default({}),
    /** `false` disables retries entirely. */
    retry: z.union([z.literal(false), retrySchema]).default({}),
    circuitBreaker: breakerSchema.default({}),
    rateLimit: rateLimitSchema.optional(),
    /** `true` uses the default TTL; omitted or `false` disables caching. */
    cache: z.union([z.boolean(), cacheSchema]).default(false),
    metrics: z.boolean().default(false),
    validation: z.boolean().default(false),
    poolSize: z.number().int().positive().default(DEFAULT_POOL_SIZE),
    transport: z.custom<Transport>((v) => hasMethod(v, "send"), "expected a transport with send()").optional(),
    validator: z
      .custom<SchemaValidator>((v) => hasMethod(v, "validate"), "expected a validator with validate()")
      .optional(),
    logger: z.custom<Logger>((v) => hasMethod(v, "child"), "expected a pino logger").optional(),
  })
  .strict();

export type ClientOptions = z.input<typeof clientOptionsSchema>;
export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>;

const queryValue = z.union([z.string(), z.number(), z.boolean()]);

export const requestOptionsSchema = z
  .object({
    retry: z.boolean().optional(),
    useCache: z.boolean().optional(),
    validateAgainstSchema: z.string().min(1).optional(),
    headers: z.record(z.string()).optional(),
    params: z.record(z.union([queryValue, z.array(queryValue)])).optional(),
    body: z.unknown().optional(),
  })
  .strict();

export const httpMethodSchema = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"]);

export const batchRequestSchema = requestOptionsSchema.extend({
  method: httpMethodSchema.optional(),
  endpoint: z.string(),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new InvalidOptionsError(subject, describeIssues(result.error));
  return result.data;
}

export function resolveClientOptions(input: ClientOptions = {}): ResolvedClientOptions {
  return parseOptions(clientOptionsSchema, input, "client options");
}

export function resolveRequestOptions(input: RequestOptions = {}): RequestOptions {
  return parseOptions(requestOptionsSchema, input, "request options");
}

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  API_CLIENT_NAME: z.string().min(1).optional(),
  API_BASE_URL: z.string().optional(),
  API_TIMEOUT_MS: z.coerce.number().positive().optional(),
  API_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
  API_BACKOFF_MS: z.coerce.number().min(0).optional(),
  API_BREAKER_THRESHOLD: z.coerce.number().int().positive().optional(),
  API_BREAKER_RECOVERY_MS: z.coerce.number().min(0).optional(),
  API_RATE_LIMIT_RPS: z.coerce.number().positive().optional(),
  API_RATE_LIMIT_ALGORITHM: z.enum(["token_bucket", "fixed_window"]).optional(),
  API_CACHE_TTL_MS: z.coerce.number().positive().optional(),
  API_ENABLE_METRICS: flag.optional(),
});

/**
 * Builds client options from API_* environment variables. Unset variables
 * fall back to the client defaults.
 */
export function loadClientOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  const e = parseOptions(envSchema, env, "environment");

  const opts: ClientOptions = {
    name: e.API_CLIENT_NAME,
    baseUrl: e.API_BASE_URL,
    timeoutMs: e.API_TIMEOUT_MS,
    retry: { maxRetries: e.API_MAX_RETRIES, backoffMs: e.API_BACKOFF_MS },
    circuitBreaker: { failureThreshold: e.API_BREAKER_THRESHOLD, recoveryTimeoutMs: e.API_BREAKER_RECOVERY_MS },
    metrics: e.API_ENABLE_METRICS,
  };

  if (e.API_RATE_LIMIT_RPS !== undefined) {
    opts.rateLimit = { requestsPerSecond: e.API_RATE_LIMIT_RPS, algorithm: e.API_RATE_LIMIT_ALGORITHM };
  }
  if (e.API_CACHE_TTL_MS !== undefined) {
    opts.cache = { ttlMs: e.API_CACHE_TTL_MS };
  }
  return opts;
}
