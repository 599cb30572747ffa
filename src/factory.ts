// src/factory.ts
import { ApiClient } from "./client.js";
import type { ClientOptions } from "./config.js";
import { EndpointClient } from "./endpoints.js";
import type { EndpointMap } from "./types.js";

/** Each call returns a new client that owns its breaker, limiter, cache and metrics. */
export function createClient(options: ClientOptions = {}): ApiClient {
  return new ApiClient(options);
}

export function createEndpointClient<E extends EndpointMap>(endpoints: E, options: ClientOptions = {}): EndpointClient<E> {
  return new EndpointClient<E>(endpoints, options);
}

/** Runs `fn` with a fresh client and closes it afterwards, whatever happens. */
export async function withClient<T>(options: ClientOptions, fn: (client: ApiClient) => Promise<T>): Promise<T> {
  const client = createClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

/** Like `withClient`, with metrics on and mock mode enabled for the duration of `fn`. */
export async function withMocks<T>(options: ClientOptions, fn: (client: ApiClient) => Promise<T>): Promise<T> {
  const client = createClient({ ...options, metrics: true });
  client.enableMocks();
  try {
    return await fn(client);
  } finally {
    client.disableMocks();
    await client.close();
  }
}

/** Like `withClient`, with a token-bucket limit of `requestsPerSecond` on every call. */
export async function withRateLimit<T>(
  requestsPerSecond: number,
  fn: (client: ApiClient) => Promise<T>,
  options: ClientOptions = {}
): Promise<T> {
  return withClient({ ...options, rateLimit: { requestsPerSecond } }, fn);
}
