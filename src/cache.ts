// src/cache.ts
import type { ApiResponse, QueryParams } from "./types.js";

interface CacheEntry {
  response: ApiResponse;
  storedAtMs: number;
}

/** JSON with object keys sorted at every depth, so equal params give equal keys. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const out: Record<string, unknown> = {};
    for (const [key, v] of entries) out[key] = sortKeys(v);
    return out;
  }
  return value;
}

/**
 * TTL-keyed store of successful responses. Entries expire lazily: a read that
 * finds an entry at or past its TTL evicts it and misses.
 */
export class ResponseCache {
  readonly ttlMs: number;
  private readonly entries = new Map<string, CacheEntry>();

  constructor(opts: { ttlMs?: number } = {}) {
    const ttlMs = opts.ttlMs ?? 300_000;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) throw new Error(`ttlMs must be > 0 (got ${ttlMs})`);
    this.ttlMs = ttlMs;
  }

  static keyFor(method: string, endpoint: string, params?: QueryParams): string {
    const paramPart = params && Object.keys(params).length > 0 ? canonicalJson(params) : "";
    return `${method.toUpperCase()}_${endpoint}_${paramPart}`;
  }

  get(key: string, nowMs: number = Date.now()): ApiResponse | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (nowMs - entry.storedAtMs >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.response;
  }

  set(key: string, response: ApiResponse, nowMs: number = Date.now()): void {
    this.entries.set(key, { response, storedAtMs: nowMs });
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
