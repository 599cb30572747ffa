// src/endpoints.ts
import { ApiClient } from "./client.js";
import type { ClientOptions } from "./config.js";
import { UnknownEndpointError } from "./errors.js";
import type { ApiResponse, EndpointMap, RequestOptions } from "./types.js";

/**
 * Client bound to a static map of named endpoints. `call` resolves the name
 * to its method and path and runs it through the regular pipeline.
 *
 * @example
 * const users = new EndpointClient(
 *   { listUsers: { method: "GET", path: "/users" }, createUser: { method: "POST", path: "/users" } },
 *   { baseUrl: "https://api.example.test" }
 * );
 * await users.call("listUsers", { params: { page: 2 } });
 */
export class EndpointClient<E extends EndpointMap> extends ApiClient {
  constructor(
    readonly endpoints: Readonly<E>,
    options: ClientOptions = {}
  ) {
    super(options);
  }

  async call(name: keyof E & string, options?: RequestOptions): Promise<ApiResponse> {
    if (!Object.hasOwn(this.endpoints, name)) throw new UnknownEndpointError(name);
    const { method, path } = this.endpoints[name];
    return this.execute(method, path, options);
  }

  endpointNames(): Array<keyof E & string> {
    return Object.keys(this.endpoints).filter((k): k is keyof E & string => Object.hasOwn(this.endpoints, k));
  }
}
