// src/manager.ts
import { ApiClient, clientName } from "./client.js";
import type { ClientOptions } from "./config.js";
import { UnknownClientError } from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import type { ApiResponse, RequestOptions } from "./types.js";

/**
 * Owned registry of named clients. Clients are keyed by `name`, falling back
 * to their base URL and then to "default"; asking for a known key returns the
 * existing client and ignores the new options.
 *
 * @example
 * const apis = new ClientManager({ timeoutMs: 5_000 });
 * apis.client({ name: "billing", baseUrl: "https://billing.example.test" });
 * await apis.getClient("billing").get("/invoices");
 * await apis.closeAll();
 */
export class ClientManager {
  private readonly clients = new Map<string, ApiClient>();
  private readonly log: Logger;

  constructor(
    private readonly defaults: ClientOptions = {},
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: "client-manager" });
  }

  client(options: ClientOptions = {}): ApiClient {
    const merged: ClientOptions = { ...this.defaults, ...options };
    const name = clientName(merged.name, merged.baseUrl);

    const existing = this.clients.get(name);
    if (existing) return existing;

    const created = new ApiClient({ ...merged, name });
    this.clients.set(name, created);
    this.log.info({ client: name }, "api client registered");
    return created;
  }

  getClient(name = "default"): ApiClient {
    const found = this.clients.get(name);
    if (!found) throw new UnknownClientError(name);
    return found;
  }

  has(name: string): boolean {
    return this.clients.has(name);
  }

  names(): string[] {
    return [...this.clients.keys()];
  }

  get(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.getClient().get(endpoint, options);
  }

  post(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.getClient().post(endpoint, options);
  }

  put(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.getClient().put(endpoint, options);
  }

  patch(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.getClient().patch(endpoint, options);
  }

  delete(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.getClient().delete(endpoint, options);
  }

  /** Closes every client and empties the registry; rethrows close failures together. */
  async closeAll(): Promise<void> {
    const entries = [...this.clients.entries()];
    this.clients.clear();

    const results = await Promise.allSettled(entries.map(([, c]) => c.close()));
    const errors: unknown[] = [];
    results.forEach((r, i) => {
      const name = entries[i][0];
      if (r.status === "rejected") {
        this.log.error({ client: name, err: r.reason }, "failed to close api client");
        errors.push(r.reason);
      } else {
        this.log.debug({ client: name }, "api client closed");
      }
    });

    if (errors.length > 0) throw new AggregateError(errors, `Failed to close ${errors.length} client(s)`);
  }
}
