// src/mocks.ts
import type { Logger } from "./logger.js";
import { createResponse } from "./response.js";
import type { ApiResponse, HttpMethod, MockDefinition } from "./types.js";

interface MockEntry {
  status: number;
  body: unknown;
  headers: Record<string, string>;
  elapsedMs: number;
}

/**
 * Canned responses keyed by method + endpoint. Only consulted while enabled;
 * a hit bypasses every other gate of the pipeline.
 */
export class MockRegistry {
  private readonly mocks = new Map<string, MockEntry>();
  private on = false;

  constructor(private readonly log?: Logger) {}

  private static keyFor(method: string, endpoint: string): string {
    return `${method.toUpperCase()}_${endpoint}`;
  }

  add(endpoint: string, method: HttpMethod = "GET", def: MockDefinition = {}): void {
    const key = MockRegistry.keyFor(method, endpoint);
    this.mocks.set(key, {
      status: def.status ?? 200,
      body: def.body ?? { message: "Mock response" },
      headers: { ...(def.headers ?? {}) },
      elapsedMs: def.elapsedMs ?? 100,
    });
    this.log?.debug({ key }, "mock registered");
  }

  remove(endpoint: string, method: HttpMethod = "GET"): boolean {
    return this.mocks.delete(MockRegistry.keyFor(method, endpoint));
  }

  enable(): void {
    this.on = true;
    this.log?.info("mock mode enabled");
  }

  disable(): void {
    this.on = false;
    this.log?.info("mock mode disabled");
  }

  get enabled(): boolean {
    return this.on;
  }

  get size(): number {
    return this.mocks.size;
  }

  lookup(method: string, endpoint: string): ApiResponse | undefined {
    if (!this.on) return undefined;

    const entry = this.mocks.get(MockRegistry.keyFor(method, endpoint));
    if (!entry) return undefined;

    return createResponse({
      status: entry.status,
      body: entry.body,
      headers: entry.headers,
      elapsedMs: entry.elapsedMs,
      url: `mock://${endpoint}`,
    });
  }
}
